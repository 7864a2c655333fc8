/**
 * Shared fixtures for the resolver and CLI suites: descriptors, secrets,
 * recipes with recording stages, and in-process engine fakes.
 */

import { AKS_CLUSTER, FARGATE_CLUSTER } from '../../packages/shared/index.js';
import type {
  BakeryDescriptor,
  Cluster,
  RecipeEntry,
  RecipeManifest,
  VersionTriple,
} from '../../packages/shared/index.js';
import { XarrayZarrRecipe } from '../../packages/resolver/src/index.js';
import type {
  AutomationHookRegistrar,
  CacheTarget,
  ChunkKey,
  Job,
  StorageTarget,
  WorkflowEngineClient,
  ZarrRecipeStages,
} from '../../packages/resolver/src/index.js';

export const VERSIONS: VersionTriple = {
  notebookVersion: '2024.01.0',
  recipeFrameworkVersion: '0.9.4',
  engineVersion: '2.14.3',
};

export const SECRETS = {
  'storage-key': 'test-key',
  'storage-secret': 'test-secret',
  'flow-key': 'flow-test-key',
  'flow-secret': 'flow-test-secret',
  'azure-conn': 'test-connection-string',
  ACTIONS_BOT_TOKEN: 'test-token',
};

export const CTX = { recipeId: 'foo', projectTag: 'bakeline-test' };

export function fargateCluster(overrides: Partial<Cluster> = {}): Cluster {
  return {
    type: FARGATE_CLUSTER,
    workerImage: 'registry.example/worker:1',
    clusterOptions: {
      vpc: 'vpc-test',
      clusterArn: 'arn:test:cluster',
      taskRoleArn: 'arn:test:task',
      executionRoleArn: 'arn:test:exec',
      securityGroups: ['sg-test'],
    },
    flowStorage: 'flow-bucket',
    flowStorageProtocol: 's3',
    flowStorageOptions: { key: 'flow-key', secret: 'flow-secret' },
    maxWorkers: 20,
    versions: { ...VERSIONS },
    ...overrides,
  };
}

export function aksCluster(overrides: Partial<Cluster> = {}): Cluster {
  return {
    type: AKS_CLUSTER,
    workerImage: 'registry.example/worker:1',
    clusterOptions: {},
    flowStorage: 'flow-container',
    flowStorageProtocol: 'abfs',
    flowStorageOptions: { secret: 'azure-conn' },
    maxWorkers: 10,
    versions: { ...VERSIONS },
    ...overrides,
  };
}

export function makeBakery(cluster: Cluster = fargateCluster(), id = 'test-bakery'): BakeryDescriptor {
  return {
    id,
    region: 'test-region',
    cluster,
    targets: {
      'test-target': { protocol: 's3', storageOptions: { key: 'storage-key', secret: 'storage-secret' } },
      'azure-target': { protocol: 'abfs', storageOptions: { secret: 'azure-conn' } },
    },
  };
}

export function makeManifest(recipes: RecipeEntry[], overrides: Partial<RecipeManifest> = {}): RecipeManifest {
  return {
    versions: { notebookVersion: VERSIONS.notebookVersion, recipeFrameworkVersion: VERSIONS.recipeFrameworkVersion },
    recipes,
    bakery: { id: 'test-bakery', target: 'test-target' },
    ...overrides,
  };
}

export interface StageCall {
  stage: string;
  detail: string;
}

export function recordingStages(calls: StageCall[] = []): ZarrRecipeStages {
  return {
    async cacheInput(input: string, cache: CacheTarget) {
      calls.push({ stage: 'cacheInput', detail: `${input} -> ${cache.rootPath}` });
    },
    async prepareTarget(target: StorageTarget) {
      calls.push({ stage: 'prepareTarget', detail: target.rootPath });
    },
    async storeChunk(chunk: ChunkKey) {
      calls.push({ stage: 'storeChunk', detail: chunk.inputs.join(',') });
    },
    async finalizeTarget(target: StorageTarget) {
      calls.push({ stage: 'finalizeTarget', detail: target.rootPath });
    },
  };
}

export function makeRecipe(inputs: string[] = ['a', 'b', 'c'], calls: StageCall[] = []): XarrayZarrRecipe {
  return new XarrayZarrRecipe({ inputs, stages: recordingStages(calls) });
}

export class FakeEngine implements WorkflowEngineClient {
  registered: Array<{ job: Job; project: string }> = [];
  runs: Array<{ jobId: string; runName: string }> = [];
  failRegister: Error | null = null;

  async register(job: Job, project: string): Promise<string> {
    if (this.failRegister) throw this.failRegister;
    this.registered.push({ job, project });
    return `job-${this.registered.length}`;
  }

  async createRun(jobId: string, runName: string): Promise<string> {
    this.runs.push({ jobId, runName });
    return `run-${this.runs.length}`;
  }
}

export class FakeHooks implements AutomationHookRegistrar {
  calls: Array<{ jobId: string; token: string }> = [];

  async register(jobId: string, botToken: string): Promise<string> {
    this.calls.push({ jobId, token: botToken });
    return `hook-${this.calls.length}`;
  }
}
