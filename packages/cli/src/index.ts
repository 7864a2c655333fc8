/**
 * Bakeline CLI — command implementations, usable without the binary.
 */

export { register } from './commands/register.js';
export type { RegisterOptions, RegisterResult } from './commands/register.js';
export { check } from './commands/check.js';
export type { CheckOptions, CheckResult } from './commands/check.js';
export { history, formatRecord } from './commands/history.js';
export type { HistoryOptions, HistoryResult } from './commands/history.js';
export { readDescriptors } from './commands/inputs.js';

export {
  loadRegistrationConfig,
  loadRuntimeVersions,
  loadSecrets,
  loadDbPath,
  DEFAULT_PROJECT_TAG,
  DEFAULT_DB_PATH,
} from './config.js';
export type { CliConfig, Env, Loaded } from './config.js';

export { HttpWorkflowEngine, HttpAutomationHooks, serializeJob } from './engine-client.js';
export type { EngineClientOptions, FetchLike, SerializedJob } from './engine-client.js';

export { loadCatalog } from './catalog-loader.js';
export type { ModuleImporter, CatalogLoadResult } from './catalog-loader.js';
