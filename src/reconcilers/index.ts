/**
 * Reconcilers module - Drive registry state toward the desired state
 *
 * @module reconcilers
 */

export * as tags from './tags/index.js';
