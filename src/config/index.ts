/**
 * Configuration module exports
 */

export {
  resolveRegistryConnection,
  resolveBaseUrl,
  resolveToken,
  resolveAuthHelperToken,
  parseAuthHelperArgs,
  AUTH_HELPER_TIMEOUT_MS,
  type TokenSource,
  type ConnectionOverrides,
  type RegistryConnection,
  type ConnectionResolution,
  type HelperRunner,
  type ResolveConnectionOptions,
} from './credentials.js';
