/**
 * Resolver Test Suite
 *
 * 1. Manifest Parser — meta.yaml and bakeries.yaml decoding and errors
 * 2. Version Gate — ordered three-way agreement
 * 3. Target Resolver — derived paths, shared filesystem, credentials
 * 4. Cluster Executor, Run Config, Flow Storage — per cluster type
 * 5. Recipes & Catalog — task layout, pruning, references
 * 6. Flow Assembler — retry policy, log level, pruning, ordering
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { getLogger } from '../../packages/shared/index.js';
import type { Cluster, LogLevel } from '../../packages/shared/index.js';
import {
  parseRecipeManifest,
  parseBakeries,
  checkVersions,
  resolveTargets,
  deriveTargetPaths,
  buildExecutor,
  buildRunConfig,
  resolveFlowStorage,
  assembleFlow,
  XarrayZarrRecipe,
  HdfReferenceRecipe,
  RecipeCatalog,
  isComputationObject,
  isRecipeFamily,
  parseRecipeReference,
  targetExtension,
  ResolutionError,
  TASK_MAX_RETRIES,
  TASK_RETRY_DELAY_MS,
} from '../../packages/resolver/src/index.js';
import type { Resolution, StorageFilesystem, Targets } from '../../packages/resolver/src/index.js';
import {
  CTX,
  SECRETS,
  VERSIONS,
  aksCluster,
  fargateCluster,
  makeBakery,
  makeManifest,
  makeRecipe,
  recordingStages,
} from './fixtures.js';
import type { StageCall } from './fixtures.js';

// ─── Helpers ──────────────────────────────────────────────────────

function unwrap<T>(result: Resolution<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

function errorOf<T>(result: Resolution<T>): ResolutionError {
  if (result.ok) throw new Error('expected a failed resolution');
  return result.error;
}

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const LOCATION = { targetName: 'test-target', namespace: 'org/repo', recipeId: 'foo', extension: 'zarr' };

function s3Targets(): Targets {
  return unwrap(resolveTargets(makeBakery().targets['test-target'], LOCATION, SECRETS));
}

// ─── Manifest Parser ──────────────────────────────────────────────

const META_YAML = `
title: Test recipes
description: Two recipes for the test bakery
notebook_version: "2024.01.0"
recipe_framework_version: "0.9.4"
recipes:
  - id: foo
    object: "recipes:foo"
  - id: family
    dict_object: "recipes/family:members"
bakery:
  id: test-bakery
  target: test-target
  resources:
    cpu: 2048
    memory: 8192
`;

const BAKERIES_YAML = `
test-bakery:
  region: test-region
  targets:
    test-target:
      protocol: s3
      storage_options:
        key: storage-key
        secret: storage-secret
    azure-target:
      protocol: abfs
      storage_options:
        secret: azure-conn
  cluster:
    type: aws.fargate
    worker_image: registry.example/worker:1
    notebook_version: "2024.01.0"
    recipe_framework_version: "0.9.4"
    engine_version: "2.14.3"
    flow_storage: flow-bucket
    flow_storage_protocol: s3
    flow_storage_options:
      key: flow-key
      secret: flow-secret
    max_workers: 20
    cluster_options:
      vpc: vpc-test
      cluster_arn: arn:test:cluster
      task_role_arn: arn:test:task
      execution_role_arn: arn:test:exec
      security_groups:
        - sg-test
`;

describe('Manifest Parser', () => {
  it('parses a recipe manifest', () => {
    const result = parseRecipeManifest(META_YAML);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.manifest).toEqual({
      title: 'Test recipes',
      description: 'Two recipes for the test bakery',
      versions: { notebookVersion: '2024.01.0', recipeFrameworkVersion: '0.9.4' },
      recipes: [
        { id: 'foo', object: 'recipes:foo' },
        { id: 'family', dictObject: 'recipes/family:members' },
      ],
      bakery: { id: 'test-bakery', target: 'test-target', resources: { cpu: 2048, memory: 8192 } },
    });
  });

  it('reports every problem in a manifest', () => {
    const result = parseRecipeManifest(`
notebook_version: 2024
recipe_framework_version: "0.9.4"
recipes:
  - id: foo
    object: "recipes:foo"
  - id: foo
    object: "recipes:foo2"
  - id: both
    object: "recipes:a"
    dict_object: "recipes:b"
  - id: neither
  - id: bad
    object: nocolon
`);
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.errors).toEqual([
      '"notebook_version" is required and must be a string',
      'Recipe 1: duplicate recipe id "foo"',
      'Recipe 2: set only one of "object" and "dict_object"',
      'Recipe 3: must have either "object" or "dict_object"',
      'Recipe 4: reference "nocolon" must look like module:symbol',
      '"bakery" is required and must be an object',
    ]);
  });

  it('rejects non-positive resource hints', () => {
    const result = parseRecipeManifest(META_YAML.replace('cpu: 2048', 'cpu: -1'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual(['bakery.resources: "cpu" must be a positive number']);
  });

  it('reports YAML syntax errors', () => {
    const result = parseRecipeManifest('recipes: [unclosed');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].startsWith('YAML parse error:')).toBe(true);
  });

  it('parses a bakery table', () => {
    const result = parseBakeries(BAKERIES_YAML);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.bakeries['test-bakery']).toEqual(makeBakery(fargateCluster(), 'test-bakery'));
  });

  it('keeps cluster types and protocols it cannot dispatch on', () => {
    const yaml = BAKERIES_YAML.replace('type: aws.fargate', 'type: gcp.gke').replace('protocol: s3\n', 'protocol: gcs\n');
    const result = parseBakeries(yaml);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.bakeries['test-bakery'].cluster.type).toBe('gcp.gke');
    expect(result.bakeries['test-bakery'].targets['test-target'].protocol).toBe('gcs');
  });

  it('reports missing cluster fields', () => {
    const result = parseBakeries(`
broken:
  targets: {}
  cluster:
    type: aws.fargate
    worker_image: registry.example/worker:1
    notebook_version: "2024.01.0"
    recipe_framework_version: "0.9.4"
    engine_version: "2.14.3"
    flow_storage: flow-bucket
    flow_storage_protocol: s3
    max_workers: 0
nocluster:
  targets: {}
`);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toEqual([
      'Bakery "broken": cluster "max_workers" must be a positive integer',
      'Bakery "nocluster": "cluster" is required and must be an object',
    ]);
  });
});

// ─── Version Gate ─────────────────────────────────────────────────

describe('Version Gate', () => {
  const manifest = { notebookVersion: '2024.01.0', recipeFrameworkVersion: '0.9.4' };

  it('returns the agreed triple', () => {
    const result = checkVersions(manifest, VERSIONS, VERSIONS);
    expect(unwrap(result)).toEqual(VERSIONS);
  });

  it('checks the notebook version against the runtime first', () => {
    const runtime = { notebookVersion: '2023.12.0', recipeFrameworkVersion: '0.1.0', engineVersion: '1.0.0' };
    const error = errorOf(checkVersions(manifest, VERSIONS, runtime));
    expect(error.kind).toBe('NotebookVersionMismatch');
    expect(error.category).toBe('compatibility');
    expect(error.message).toBe('NotebookVersionMismatch: manifest pins 2024.01.0, runtime has 2023.12.0');
  });

  it('checks the notebook version against the cluster', () => {
    const cluster = { ...VERSIONS, notebookVersion: '2023.12.0' };
    const error = errorOf(checkVersions(manifest, cluster, VERSIONS));
    expect(error.kind).toBe('NotebookVersionMismatch');
    expect(error.details).toEqual({ manifest: '2024.01.0', cluster: '2023.12.0' });
  });

  it('checks the recipe framework before the engine', () => {
    const runtime = { ...VERSIONS, recipeFrameworkVersion: '0.9.0', engineVersion: '2.0.0' };
    const error = errorOf(checkVersions(manifest, VERSIONS, runtime));
    expect(error.kind).toBe('RecipeFrameworkVersionMismatch');
  });

  it('checks the recipe framework against the cluster', () => {
    const cluster = { ...VERSIONS, recipeFrameworkVersion: '0.9.0' };
    expect(errorOf(checkVersions(manifest, cluster, VERSIONS)).kind).toBe('RecipeFrameworkVersionMismatch');
  });

  it('checks the engine version last', () => {
    const runtime = { ...VERSIONS, engineVersion: '2.0.0' };
    const error = errorOf(checkVersions(manifest, VERSIONS, runtime));
    expect(error.kind).toBe('EngineVersionMismatch');
    expect(error.message).toBe('EngineVersionMismatch: cluster runs 2.14.3, runtime has 2.0.0');
  });
});

// ─── Target Resolver ──────────────────────────────────────────────

describe('Target Resolver', () => {
  it('derives output and cache paths', () => {
    expect(deriveTargetPaths('s3', LOCATION)).toEqual({
      target: 's3://test-target/org/repo/foo.zarr',
      cache: 's3://test-target/org/repo/foo/cache',
      metadata: 's3://test-target/org/repo/foo/cache/metadata',
    });
  });

  it('derives the same paths on every call', () => {
    expect(deriveTargetPaths('s3', LOCATION)).toEqual(deriveTargetPaths('s3', { ...LOCATION }));

    const first = s3Targets();
    const second = s3Targets();
    expect(second.target.rootPath).toBe(first.target.rootPath);
    expect(second.cache.rootPath).toBe(first.cache.rootPath);
    expect(second.metadata.rootPath).toBe(first.metadata.rootPath);
    expect(second.target.fs.options).toEqual(first.target.fs.options);
  });

  it('resolves s3 targets sharing one filesystem', () => {
    const targets = s3Targets();

    expect(targets.target.rootPath).toBe('s3://test-target/org/repo/foo.zarr');
    expect(targets.cache.rootPath).toBe('s3://test-target/org/repo/foo/cache');
    expect(targets.metadata.rootPath).toBe('s3://test-target/org/repo/foo/cache/metadata');
    expect(targets.cache.fs).toBe(targets.target.fs);
    expect(targets.metadata.fs).toBe(targets.target.fs);
    expect(targets.target.fs.options).toEqual({
      protocol: 's3',
      anon: false,
      defaultCacheType: 'none',
      defaultFillCache: false,
      key: 'test-key',
      secret: 'test-secret',
    });
  });

  it('resolves abfs targets from a connection string', () => {
    const targets = unwrap(resolveTargets(
      makeBakery().targets['azure-target'],
      { ...LOCATION, targetName: 'azure-target' },
      SECRETS
    ));
    expect(targets.target.rootPath).toBe('abfs://azure-target/org/repo/foo.zarr');
    expect(targets.target.fs.options).toEqual({ protocol: 'abfs', connectionString: 'test-connection-string' });
  });

  it('opens the filesystem once per recipe', () => {
    let opened = 0;
    const counting: StorageFilesystem = {
      open(options) {
        opened++;
        return { protocol: options.protocol, options };
      },
    };
    unwrap(resolveTargets(makeBakery().targets['test-target'], LOCATION, SECRETS, counting));
    expect(opened).toBe(1);
  });

  it('rejects unsupported protocols', () => {
    const error = errorOf(resolveTargets({ protocol: 'gcs' }, LOCATION, SECRETS));
    expect(error.kind).toBe('UnsupportedTarget');
    expect(error.category).toBe('dispatch');
  });

  it('rejects s3 targets without storage options', () => {
    expect(errorOf(resolveTargets({ protocol: 's3' }, LOCATION, SECRETS)).kind).toBe('UnsupportedTarget');
  });

  it('reports a missing secret by name', () => {
    const { 'storage-secret': _omitted, ...secrets } = SECRETS;
    const error = errorOf(resolveTargets(makeBakery().targets['test-target'], LOCATION, secrets));
    expect(error.kind).toBe('MissingSecret');
    expect(error.details).toEqual({ name: 'storage-secret' });
  });
});

// ─── Cluster Executor ─────────────────────────────────────────────

describe('Cluster Executor', () => {
  it('builds a Fargate executor with default worker sizing', () => {
    const executor = unwrap(buildExecutor(fargateCluster(), undefined, CTX, SECRETS));

    expect(executor).toEqual({
      kind: 'fargate',
      image: 'registry.example/worker:1',
      vpc: 'vpc-test',
      clusterArn: 'arn:test:cluster',
      taskRoleArn: 'arn:test:task',
      executionRoleArn: 'arn:test:exec',
      securityGroups: ['sg-test'],
      schedulerCpu: 2048,
      schedulerMem: 16384,
      workerCpu: 1024,
      workerMem: 4096,
      schedulerTimeout: '15 minutes',
      environment: {
        BAKELINE__LOGGING__EXTRA_LOGGERS: '["recipes"]',
        MALLOC_TRIM_THRESHOLD_: '0',
      },
      tags: { Project: 'bakeline-test', Recipe: 'foo' },
      adapt: { minimum: 5, maximum: 20 },
    });
  });

  it('sizes Fargate workers from the resource hint', () => {
    const executor = unwrap(buildExecutor(fargateCluster(), { cpu: 2048, memory: 8192 }, CTX, SECRETS));
    if (executor.kind !== 'fargate') throw new Error('expected fargate executor');
    expect(executor.workerCpu).toBe(2048);
    expect(executor.workerMem).toBe(8192);
  });

  it('builds Kubernetes worker and scheduler pods', () => {
    const executor = unwrap(buildExecutor(aksCluster(), undefined, CTX, SECRETS));
    expect(executor.kind).toBe('kubernetes');
    if (executor.kind !== 'kubernetes') return;

    const worker = executor.podTemplate;
    expect(worker.metadata.labels).toEqual({ Recipe: 'foo', Project: 'bakeline-test' });
    expect(worker.spec.containers[0]).toEqual({
      name: 'dask',
      image: 'registry.example/worker:1',
      args: ['dask-worker', '$(DASK_SCHEDULER_ADDRESS)', '--nthreads', '1', '--death-timeout', '60'],
      env: [{ name: 'AZURE_STORAGE_CONNECTION_STRING', value: 'test-connection-string' }],
      resources: { requests: { cpu: '250m', memory: '512Mi' } },
    });

    const scheduler = executor.schedulerPodTemplate;
    expect(scheduler.metadata.labels).toEqual({ Recipe: 'foo', Project: 'bakeline-test', component: 'scheduler' });
    expect(scheduler.spec.containers[0].args).toEqual(['dask-scheduler']);
    expect(scheduler.spec.containers[0].env).toEqual([]);
    expect(scheduler.spec.containers[0].resources.requests).toEqual({ cpu: '2048m', memory: '10000Mi' });
    expect(executor.adapt).toEqual({ minimum: 5, maximum: 10 });
  });

  it('sizes Kubernetes workers from the resource hint', () => {
    const executor = unwrap(buildExecutor(aksCluster(), { cpu: 500, memory: 1024 }, CTX, SECRETS));
    if (executor.kind !== 'kubernetes') throw new Error('expected kubernetes executor');
    expect(executor.podTemplate.spec.containers[0].resources.requests).toEqual({ cpu: '500m', memory: '1024Mi' });
  });

  it('rejects unknown cluster types, with or without a hint', () => {
    const cluster = fargateCluster({ type: 'gcp.gke' });
    expect(errorOf(buildExecutor(cluster, undefined, CTX, SECRETS)).kind).toBe('UnsupportedClusterType');
    expect(errorOf(buildExecutor(cluster, { cpu: 1, memory: 1 }, CTX, SECRETS)).kind).toBe('UnsupportedClusterType');
  });

  it('needs the flow-storage connection secret on Kubernetes', () => {
    const error = errorOf(buildExecutor(aksCluster(), undefined, CTX, {}));
    expect(error.kind).toBe('MissingSecret');
  });
});

// ─── Run Config ───────────────────────────────────────────────────

describe('Run Config', () => {
  it('builds an ECS run config for Fargate', () => {
    expect(unwrap(buildRunConfig(fargateCluster(), 'test-bakery', CTX, SECRETS))).toEqual({
      kind: 'ecs',
      image: 'registry.example/worker:1',
      labels: ['test-bakery'],
      taskDefinition: {
        networkMode: 'awsvpc',
        cpu: 2048,
        memory: 16384,
        containerDefinitions: [{ name: 'flow' }],
        executionRoleArn: 'arn:test:exec',
      },
      runTaskTags: [
        { key: 'Project', value: 'bakeline-test' },
        { key: 'Recipe', value: 'foo' },
      ],
    });
  });

  it('builds a Kubernetes run config the autoscaler will not evict', () => {
    const config = unwrap(buildRunConfig(aksCluster(), 'test-bakery', CTX, SECRETS));
    if (config.kind !== 'kubernetes') throw new Error('expected kubernetes run config');

    expect(config.jobTemplate.metadata.annotations).toEqual({
      'cluster-autoscaler.kubernetes.io/safe-to-evict': 'false',
    });
    expect(config.memoryRequest).toBe('10000Mi');
    expect(config.cpuRequest).toBe('2048m');
    expect(config.env).toEqual({ AZURE_STORAGE_CONNECTION_STRING: 'test-connection-string' });
    expect(config.labels).toEqual(['test-bakery']);
  });

  it('rejects unknown cluster types', () => {
    const error = errorOf(buildRunConfig(fargateCluster({ type: 'gcp.gke' }), 'test-bakery', CTX, SECRETS));
    expect(error.kind).toBe('UnsupportedClusterType');
  });
});

// ─── Flow Storage ─────────────────────────────────────────────────

describe('Flow Storage', () => {
  it('resolves s3 flow storage', () => {
    expect(unwrap(resolveFlowStorage(fargateCluster(), SECRETS))).toEqual({
      kind: 's3',
      bucket: 'flow-bucket',
      clientOptions: { awsAccessKeyId: 'flow-test-key', awsSecretAccessKey: 'flow-test-secret' },
    });
  });

  it('resolves azure flow storage', () => {
    expect(unwrap(resolveFlowStorage(aksCluster(), SECRETS))).toEqual({
      kind: 'azure',
      container: 'flow-container',
      connectionString: 'test-connection-string',
    });
  });

  it('follows the flow storage protocol, not the cluster type', () => {
    const cluster = fargateCluster({ flowStorageProtocol: 'abfs', flowStorageOptions: { secret: 'azure-conn' } });
    expect(unwrap(resolveFlowStorage(cluster, SECRETS)).kind).toBe('azure');
  });

  it('rejects unknown flow storage protocols', () => {
    const error = errorOf(resolveFlowStorage(fargateCluster({ flowStorageProtocol: 'gcs' }), SECRETS));
    expect(error.kind).toBe('UnsupportedFlowStorage');
  });
});

// ─── Recipes & Catalog ────────────────────────────────────────────

describe('Recipes', () => {
  it('lays out tasks in stage order', () => {
    const recipe = new XarrayZarrRecipe({
      inputs: ['a', 'b', 'c'],
      inputsPerChunk: 2,
      stages: recordingStages(),
    });
    expect(recipe.toJob().tasks.map(t => t.name)).toEqual([
      'cache_input[0]', 'cache_input[1]', 'cache_input[2]',
      'prepare_target',
      'store_chunk[0]', 'store_chunk[1]',
      'finalize_target',
    ]);
  });

  it('fails a task whose storage slot is unset', async () => {
    const job = makeRecipe().toJob();
    await expect(job.tasks[0].run()).rejects.toThrow('recipe has no input cache configured');
  });

  it('prunes to the first inputs and keeps the slots', () => {
    const recipe = makeRecipe();
    const targets = s3Targets();
    recipe.target = targets.target;
    recipe.inputCache = targets.cache;
    recipe.metadataCache = targets.metadata;

    const pruned = recipe.copyPruned();
    expect(pruned.inputs).toEqual(['a', 'b']);
    expect(pruned.target).toBe(targets.target);
    expect(pruned.inputCache).toBe(targets.cache);
    expect(pruned.metadataCache).toBe(targets.metadata);
    expect(recipe.copyPruned(0).inputs).toEqual(['a']);
    expect(recipe.inputs).toEqual(['a', 'b', 'c']);
  });

  it('requires at least one input', () => {
    expect(() => makeRecipe([])).toThrow('XarrayZarrRecipe needs at least one input');
  });

  it('maps recipe kinds to target extensions', () => {
    expect(unwrap(targetExtension(makeRecipe()))).toBe('zarr');

    const hdf = new HdfReferenceRecipe({
      inputs: ['a.h5'],
      stages: { async scanFile() {}, async writeReferences() {} },
    });
    expect(errorOf(targetExtension(hdf)).kind).toBe('UnsupportedRecipeType');
  });

  it('recognises computation objects structurally', () => {
    expect(isComputationObject(makeRecipe())).toBe(true);
    expect(isComputationObject({})).toBe(false);
    expect(isComputationObject({ kind: 'other', toJob() {}, copyPruned() {} })).toBe(false);
  });
});

describe('Recipe Catalog', () => {
  it('loads registered recipes and families', () => {
    const foo = makeRecipe();
    const bar = makeRecipe(['x']);
    const baz = makeRecipe(['y']);
    const catalog = new RecipeCatalog()
      .register('recipes:foo', foo)
      .register('recipes/family:members', { bar, baz });

    expect(unwrap(catalog.load('recipes:foo'))).toBe(foo);

    const family = unwrap(catalog.load('recipes/family:members'));
    expect(isRecipeFamily(family)).toBe(true);
    if (!isRecipeFamily(family)) return;
    expect([...family.keys()]).toEqual(['bar', 'baz']);
    expect(family.get('baz')).toBe(baz);

    expect(catalog.references()).toEqual(['recipes:foo', 'recipes/family:members']);
  });

  it('reports unknown references', () => {
    const error = errorOf(new RecipeCatalog().load('recipes:missing'));
    expect(error.kind).toBe('UnknownRecipeReference');
    expect(error.details).toEqual({ reference: 'recipes:missing' });
  });

  it('refuses malformed references', () => {
    expect(() => new RecipeCatalog().register('nocolon', makeRecipe())).toThrow(
      'Invalid recipe reference "nocolon" (expected module:symbol)'
    );
  });

  it('splits references into module and symbol', () => {
    expect(parseRecipeReference('recipes/era:recipe')).toEqual({ module: 'recipes/era', symbol: 'recipe' });
    expect(parseRecipeReference('bad')).toBeNull();
  });
});

// ─── Flow Assembler ───────────────────────────────────────────────

describe('Flow Assembler', () => {
  const recipesLogger = getLogger('recipes');
  let previousLevel: LogLevel;

  beforeEach(() => {
    previousLevel = recipesLogger.getLevel();
    recipesLogger.setLevel('warn');
  });

  afterEach(() => {
    recipesLogger.setLevel(previousLevel);
  });

  function assemble(opts: { prune?: boolean; calls?: StageCall[]; cluster?: Cluster } = {}) {
    const recipe = makeRecipe(['a', 'b', 'c'], opts.calls);
    const result = assembleFlow({
      bakery: makeBakery(opts.cluster ?? fargateCluster()),
      manifest: makeManifest([{ id: 'foo', object: 'recipes:foo' }]),
      recipeId: 'foo',
      recipe,
      targets: s3Targets(),
      secrets: SECRETS,
      projectTag: 'bakeline-test',
      prune: opts.prune,
    });
    return { recipe, result };
  }

  it('binds the recipe to its targets and resources', () => {
    const { recipe, result } = assemble();
    const job = unwrap(result);

    expect(job.name).toBe('foo');
    expect(recipe.target?.rootPath).toBe('s3://test-target/org/repo/foo.zarr');
    expect(recipe.inputCache?.rootPath).toBe('s3://test-target/org/repo/foo/cache');
    expect(job.storage?.kind).toBe('s3');
    expect(job.runConfig?.kind).toBe('ecs');
    expect(job.executor?.kind).toBe('fargate');
  });

  it('gives every task the same retry policy', () => {
    const job = unwrap(assemble().result);
    expect(job.tasks).toHaveLength(8);
    for (const task of job.tasks) {
      expect(task.maxRetries).toBe(TASK_MAX_RETRIES);
      expect(task.retryDelayMs).toBe(TASK_RETRY_DELAY_MS);
    }
    expect(TASK_MAX_RETRIES).toBe(3);
    expect(TASK_RETRY_DELAY_MS).toBe(180000);
  });

  it('runs tasks with the recipes logger at debug and restores it', async () => {
    const levels: LogLevel[] = [];
    const recipe = new XarrayZarrRecipe({
      inputs: ['a'],
      stages: {
        async cacheInput() { levels.push(recipesLogger.getLevel()); },
        async prepareTarget() { throw new Error('boom'); },
        async storeChunk() {},
        async finalizeTarget() {},
      },
    });
    const job = unwrap(assembleFlow({
      bakery: makeBakery(),
      manifest: makeManifest([{ id: 'foo', object: 'recipes:foo' }]),
      recipeId: 'foo',
      recipe,
      targets: s3Targets(),
      secrets: SECRETS,
      projectTag: 'bakeline-test',
    }));

    await job.tasks[0].run();
    expect(levels).toEqual(['debug']);
    expect(recipesLogger.getLevel()).toBe('warn');

    await expect(job.tasks[1].run()).rejects.toThrow('boom');
    expect(recipesLogger.getLevel()).toBe('warn');
  });

  it('keeps the recipes logger at debug while overlapping tasks run', async () => {
    const gates: Record<string, ReturnType<typeof deferred>> = { a: deferred(), b: deferred() };
    const recipe = new XarrayZarrRecipe({
      inputs: ['a', 'b'],
      stages: {
        async cacheInput(input) { await gates[input].promise; },
        async prepareTarget() {},
        async storeChunk() {},
        async finalizeTarget() {},
      },
    });
    const job = unwrap(assembleFlow({
      bakery: makeBakery(),
      manifest: makeManifest([{ id: 'foo', object: 'recipes:foo' }]),
      recipeId: 'foo',
      recipe,
      targets: s3Targets(),
      secrets: SECRETS,
      projectTag: 'bakeline-test',
    }));

    const first = job.tasks[0].run();
    const second = job.tasks[1].run();
    expect(recipesLogger.getLevel()).toBe('debug');

    gates.a.resolve();
    await first;
    expect(recipesLogger.getLevel()).toBe('debug');

    gates.b.resolve();
    await second;
    expect(recipesLogger.getLevel()).toBe('warn');
  });

  it('keeps each job on its own paths when one recipe is assembled twice', async () => {
    const calls: StageCall[] = [];
    const recipe = makeRecipe(['a'], calls);
    const assembleAs = (recipeId: string) => unwrap(assembleFlow({
      bakery: makeBakery(),
      manifest: makeManifest([{ id: recipeId, object: 'recipes:foo' }]),
      recipeId,
      recipe,
      targets: unwrap(resolveTargets(makeBakery().targets['test-target'], { ...LOCATION, recipeId }, SECRETS)),
      secrets: SECRETS,
      projectTag: 'bakeline-test',
    }));

    const firstJob = assembleAs('first');
    const secondJob = assembleAs('second');

    const finalize = (job: typeof firstJob) => {
      const task = job.tasks.find(t => t.name === 'finalize_target');
      if (!task) throw new Error('expected a finalize_target task');
      return task.run();
    };
    await finalize(firstJob);
    await finalize(secondJob);

    expect(calls).toEqual([
      { stage: 'finalizeTarget', detail: 's3://test-target/org/repo/first.zarr' },
      { stage: 'finalizeTarget', detail: 's3://test-target/org/repo/second.zarr' },
    ]);
  });

  it('prunes after binding, so the pruned copy writes to the same target', async () => {
    const calls: StageCall[] = [];
    const job = unwrap(assemble({ prune: true, calls }).result);

    expect(job.tasks.map(t => t.name)).toEqual([
      'cache_input[0]', 'cache_input[1]', 'prepare_target', 'store_chunk[0]', 'store_chunk[1]', 'finalize_target',
    ]);

    await job.tasks[0].run();
    await job.tasks[2].run();
    expect(calls).toEqual([
      { stage: 'cacheInput', detail: 'a -> s3://test-target/org/repo/foo/cache' },
      { stage: 'prepareTarget', detail: 's3://test-target/org/repo/foo.zarr' },
    ]);
  });

  it('reports the executor failure before flow storage', () => {
    const cluster = fargateCluster({ type: 'gcp.gke', flowStorageProtocol: 'gcs' });
    expect(errorOf(assemble({ cluster }).result).kind).toBe('UnsupportedClusterType');
  });

  it('reports unsupported flow storage on a supported cluster', () => {
    const cluster = fargateCluster({ flowStorageProtocol: 'gcs' });
    expect(errorOf(assemble({ cluster }).result).kind).toBe('UnsupportedFlowStorage');
  });
});
