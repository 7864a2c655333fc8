/**
 * Resolver Types — what the resolution engine produces and consumes
 *
 * Storage targets, executor and run-config descriptors, flow storage,
 * the executable job form, and the collaborator capabilities the
 * orchestrator drives.
 */

import type { Resolution } from './errors.js';

// ─── Filesystems & Targets ───────────────────────────────────────

export interface S3FilesystemOptions {
  protocol: 's3';
  anon: false;
  defaultCacheType: 'none';
  defaultFillCache: false;
  key: string;
  secret: string;
}

export interface AzureFilesystemOptions {
  protocol: 'abfs';
  connectionString: string;
}

export type FilesystemOptions = S3FilesystemOptions | AzureFilesystemOptions;

/** A filesystem connection the engine reopens on the workers. */
export interface FilesystemHandle {
  readonly protocol: FilesystemOptions['protocol'];
  readonly options: Readonly<FilesystemOptions>;
}

/** Opens filesystem handles; swap it out to pool or instrument connections. */
export interface StorageFilesystem {
  open(options: FilesystemOptions): FilesystemHandle;
}

export interface StorageTarget {
  role: 'output';
  fs: FilesystemHandle;
  rootPath: string;
}

export interface CacheTarget {
  role: 'input-cache';
  fs: FilesystemHandle;
  rootPath: string;
}

export interface MetadataTarget {
  role: 'metadata-cache';
  fs: FilesystemHandle;
  rootPath: string;
}

export interface Targets {
  target: StorageTarget;
  cache: CacheTarget;
  metadata: MetadataTarget;
}

export interface TargetPaths {
  target: string;
  cache: string;
  metadata: string;
}

// ─── Executor (worker pool) ──────────────────────────────────────

export interface AdaptiveScaling {
  minimum: number;
  maximum: number;
}

export interface ResourceTags {
  Project: string;
  Recipe: string;
}

export interface FargateExecutorConfig {
  kind: 'fargate';
  image: string;
  vpc: string | null;
  clusterArn: string | null;
  taskRoleArn: string | null;
  executionRoleArn: string | null;
  securityGroups: string[];
  schedulerCpu: number;
  schedulerMem: number;
  workerCpu: number;
  workerMem: number;
  schedulerTimeout: string;
  environment: Record<string, string>;
  tags: ResourceTags;
  adapt: AdaptiveScaling;
}

export interface EnvVar {
  name: string;
  value: string;
}

export interface ContainerSpec {
  name: string;
  image: string;
  args: string[];
  env: EnvVar[];
  resources: {
    requests: { cpu: string; memory: string };
  };
}

export interface PodSpec {
  apiVersion: 'v1';
  kind: 'Pod';
  metadata: { labels: Record<string, string> };
  spec: {
    restartPolicy: 'Never';
    containers: ContainerSpec[];
  };
}

export interface KubernetesExecutorConfig {
  kind: 'kubernetes';
  podTemplate: PodSpec;
  schedulerPodTemplate: PodSpec;
  adapt: AdaptiveScaling;
}

export type ExecutorConfig = FargateExecutorConfig | KubernetesExecutorConfig;

// ─── Run Config (driver process) ─────────────────────────────────

export interface EcsTaskDefinition {
  networkMode: 'awsvpc';
  cpu: number;
  memory: number;
  containerDefinitions: { name: string }[];
  executionRoleArn: string | null;
}

export interface EcsRunConfig {
  kind: 'ecs';
  image: string;
  labels: string[];
  taskDefinition: EcsTaskDefinition;
  runTaskTags: { key: string; value: string }[];
}

export interface JobTemplate {
  apiVersion: 'batch/v1';
  kind: 'Job';
  metadata: { annotations: Record<string, string> };
  spec: { template: { spec: { containers: { name: string }[] } } };
}

export interface KubernetesRunConfig {
  kind: 'kubernetes';
  image: string;
  labels: string[];
  jobTemplate: JobTemplate;
  memoryRequest: string;
  cpuRequest: string;
  env: Record<string, string>;
}

export type RunConfig = EcsRunConfig | KubernetesRunConfig;

// ─── Flow Storage ────────────────────────────────────────────────

export interface S3FlowStorage {
  kind: 's3';
  bucket: string;
  clientOptions: { awsAccessKeyId: string; awsSecretAccessKey: string };
}

export interface AzureFlowStorage {
  kind: 'azure';
  container: string;
  connectionString: string;
}

export type FlowStorage = S3FlowStorage | AzureFlowStorage;

// ─── Jobs ────────────────────────────────────────────────────────

export interface JobTask {
  name: string;
  maxRetries: number;
  retryDelayMs: number;
  run: () => Promise<unknown>;
}

export interface Job {
  name: string;
  tasks: JobTask[];
  storage: FlowStorage | null;
  runConfig: RunConfig | null;
  executor: ExecutorConfig | null;
}

// ─── Computation Objects ─────────────────────────────────────────

export type RecipeKind = 'xarray-zarr' | 'hdf-reference';

export interface ComputationObject {
  readonly kind: RecipeKind;
  target: StorageTarget | null;
  inputCache: CacheTarget | null;
  metadataCache: MetadataTarget | null;
  /** A smaller copy for cheap validation runs; storage slots carry over. */
  copyPruned(nkeep?: number): ComputationObject;
  toJob(): Job;
}

/** A `dict_object` reference resolves to many recipes keyed by recipe id. */
export type RecipeFamily = ReadonlyMap<string, ComputationObject>;

export type CatalogEntry = ComputationObject | RecipeFamily;

// ─── Collaborators ───────────────────────────────────────────────

export interface RecipeLoader {
  load(reference: string): Resolution<CatalogEntry>;
}

export interface WorkflowEngineClient {
  /** Returns the engine's job id. */
  register(job: Job, project: string): Promise<string>;
  /** Returns the engine's run id. */
  createRun(jobId: string, runName: string): Promise<string>;
}

export interface AutomationHookRegistrar {
  /** Returns the engine's hook id. */
  register(jobId: string, botToken: string): Promise<string>;
}

// ─── Build Context ───────────────────────────────────────────────

export interface BuildContext {
  recipeId: string;
  projectTag: string;
}
