/**
 * Bakeline Shared Types
 *
 * The descriptors every package reads: manifests, bakeries, clusters,
 * secrets, and the registration records the ledger keeps.
 */

// ─── Toolchain Versions ──────────────────────────────────────────

export interface VersionTriple {
  notebookVersion: string;
  recipeFrameworkVersion: string;
  engineVersion: string;
}

/** The manifest only pins the two versions its author controls. */
export type ManifestVersions = Pick<VersionTriple, 'notebookVersion' | 'recipeFrameworkVersion'>;

// ─── Bakery ──────────────────────────────────────────────────────

export const S3_PROTOCOL = 's3';
export const ABFS_PROTOCOL = 'abfs';

export const FARGATE_CLUSTER = 'aws.fargate';
export const AKS_CLUSTER = 'azure.aks';

/** Secret *names* (keys into Secrets), never the credential values. */
export interface StorageOptions {
  key?: string;
  secret?: string;
}

export interface TargetDescriptor {
  protocol: string;
  storageOptions?: StorageOptions;
}

export interface ClusterOptions {
  vpc?: string;
  clusterArn?: string;
  taskRoleArn?: string;
  executionRoleArn?: string;
  securityGroups?: string[];
}

export interface Cluster {
  type: string;
  workerImage: string;
  clusterOptions: ClusterOptions;
  flowStorage: string;
  flowStorageProtocol: string;
  flowStorageOptions: StorageOptions;
  maxWorkers: number;
  versions: VersionTriple;
}

export interface BakeryDescriptor {
  id: string;
  region?: string;
  cluster: Cluster;
  targets: Record<string, TargetDescriptor>;
}

export type BakeryTable = Record<string, BakeryDescriptor>;

// ─── Recipe Manifest ─────────────────────────────────────────────

export interface ResourceHint {
  cpu: number;
  memory: number;
}

export interface RecipeBakery {
  id: string;
  target: string;
  resources?: ResourceHint;
}

/** Exactly one of `object` / `dictObject` is set; both are `module:symbol` references. */
export type RecipeEntry =
  | { id: string; object: string; dictObject?: undefined }
  | { id: string; dictObject: string; object?: undefined };

export interface RecipeManifest {
  title?: string;
  description?: string;
  versions: ManifestVersions;
  recipes: RecipeEntry[];
  bakery: RecipeBakery;
}

// ─── Secrets ─────────────────────────────────────────────────────

export type Secrets = Readonly<Record<string, string>>;

// ─── Registrations (orchestrator writes, CLI reads) ──────────────

export interface RegistrationRecord {
  registrationId: string;
  jobId: string;
  recipeId: string;
  jobName: string;
  bakeryId: string;
  project: string;
  runId: string | null;
  correlationId: string | null;
  registeredAt: string; // ISO 8601
}

// ─── Event Bus ───────────────────────────────────────────────────

export type EventChannel =
  | 'registration.started'
  | 'registration.job_registered'
  | 'registration.run_created'
  | 'registration.completed'
  | 'registration.failed';

export interface BusEvent<T = unknown> {
  channel: EventChannel;
  timestamp: string;
  source: 'orchestrator' | 'cli';
  bakeryId: string | null;
  recipeId: string | null;
  payload: T;
}

export type EventHandler<T = unknown> = (event: BusEvent<T>) => void | Promise<void>;
