/**
 * Command exports
 */

export { enforceCommand, rollbackCommand, planCommand, type TagPlanView } from './tags.js';
export {
  aggregateCommand,
  type AggregateOptions,
  type AggregateResult,
  DEFAULT_SERVICES_CONFIG,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_PLATFORM_APP,
} from './aggregate.js';
export { connectRegistry, failureResult, parseTimeout, type RegistryConnectResult } from './shared.js';
