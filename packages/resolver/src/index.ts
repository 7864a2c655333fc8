/**
 * Bakeline Resolver — recipe manifests into registered pipeline jobs
 *
 * Checks toolchain versions, resolves storage targets, executors, run
 * configs and flow storage per bakery, and registers one job per recipe.
 *
 * Integration: EventBus, RegistrationLedger.
 */

export const VERSION = '0.1.0';

// ─── Manifest Parser ─────────────────────────────────────────────
export {
  parseRecipeManifest,
  validateRecipeManifest,
  parseBakeries,
  validateBakeries,
} from './manifest-parser.js';
export type { ManifestParseResult, BakeriesParseResult } from './manifest-parser.js';

// ─── Resolvers ───────────────────────────────────────────────────
export { checkVersions } from './version-gate.js';
export { resolveTargets, deriveTargetPaths, descriptorFilesystem } from './target-resolver.js';
export type { TargetLocation } from './target-resolver.js';
export {
  buildExecutor,
  flowStorageSecret,
  workerResources,
  resourceTags,
  makePodSpec,
  MIN_WORKERS,
  DEFAULT_WORKER_RESOURCES,
  FARGATE_SCHEDULER,
  FARGATE_SCHEDULER_TIMEOUT,
  KUBERNETES_SCHEDULER_REQUESTS,
  STORAGE_CONNECTION_ENV,
} from './cluster-executor.js';
export { buildRunConfig, SAFE_TO_EVICT_ANNOTATION } from './run-config.js';
export { resolveFlowStorage } from './flow-storage.js';
export { requireSecret, resolveCredentials } from './secrets.js';
export type { Credentials } from './secrets.js';

// ─── Flow Assembly ───────────────────────────────────────────────
export { assembleFlow, decorateTask, TASK_MAX_RETRIES, TASK_RETRY_DELAY_MS } from './flow-assembler.js';
export type { AssembleInput } from './flow-assembler.js';

// ─── Recipes & Catalog ───────────────────────────────────────────
export {
  XarrayZarrRecipe,
  HdfReferenceRecipe,
  isComputationObject,
  targetExtension,
  RECIPES_LOGGER,
  DEFAULT_PRUNE_KEEP,
} from './recipes.js';
export type { ChunkKey, ZarrRecipeStages, XarrayZarrRecipeOptions, HdfReferenceStages } from './recipes.js';
export { RecipeCatalog, isRecipeReference, parseRecipeReference, isRecipeFamily } from './recipe-catalog.js';
export type { RegisterableEntry } from './recipe-catalog.js';

// ─── Orchestrator ────────────────────────────────────────────────
export { RegistrationOrchestrator, prepareBatch, BOT_TOKEN_SECRET } from './registration-orchestrator.js';
export type {
  RegistrationConfig,
  OrchestratorDeps,
  RegisteredJob,
  RegistrationResult,
  BatchContext,
} from './registration-orchestrator.js';

// ─── Errors ──────────────────────────────────────────────────────
export { ResolutionError, resolved, failed } from './errors.js';
export type {
  Resolution,
  ResolutionErrorKind,
  ErrorCategory,
  CompatibilityErrorKind,
  DispatchErrorKind,
  LookupErrorKind,
  ExternalErrorKind,
} from './errors.js';

// ─── Types ───────────────────────────────────────────────────────
export type {
  S3FilesystemOptions,
  AzureFilesystemOptions,
  FilesystemOptions,
  FilesystemHandle,
  StorageFilesystem,
  StorageTarget,
  CacheTarget,
  MetadataTarget,
  Targets,
  TargetPaths,
  AdaptiveScaling,
  ResourceTags,
  FargateExecutorConfig,
  EnvVar,
  ContainerSpec,
  PodSpec,
  KubernetesExecutorConfig,
  ExecutorConfig,
  EcsTaskDefinition,
  EcsRunConfig,
  JobTemplate,
  KubernetesRunConfig,
  RunConfig,
  S3FlowStorage,
  AzureFlowStorage,
  FlowStorage,
  JobTask,
  Job,
  RecipeKind,
  ComputationObject,
  RecipeFamily,
  CatalogEntry,
  RecipeLoader,
  WorkflowEngineClient,
  AutomationHookRegistrar,
  BuildContext,
} from './types.js';
