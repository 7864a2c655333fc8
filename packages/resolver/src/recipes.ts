/**
 * Recipes — the computation objects a manifest points at
 *
 * A recipe knows its inputs and how to turn them into a target; the
 * resolver fills in *where* (target, input cache, metadata cache) before
 * converting it into a job. Stage bodies are supplied by the recipe author.
 */

import { getLogger } from '../../shared/index.js';
import { failed, resolved } from './errors.js';
import type { Resolution } from './errors.js';
import type { CacheTarget, ComputationObject, Job, JobTask, MetadataTarget, RecipeKind, StorageTarget } from './types.js';

export const RECIPES_LOGGER = 'recipes';

const log = getLogger(RECIPES_LOGGER);

export const DEFAULT_PRUNE_KEEP = 2;

export interface ChunkKey {
  index: number;
  inputs: string[];
}

export interface ZarrRecipeStages {
  cacheInput(input: string, cache: CacheTarget): Promise<void>;
  prepareTarget(target: StorageTarget, metadata: MetadataTarget): Promise<void>;
  storeChunk(chunk: ChunkKey, target: StorageTarget, cache: CacheTarget): Promise<void>;
  finalizeTarget(target: StorageTarget): Promise<void>;
}

export interface XarrayZarrRecipeOptions {
  inputs: string[];
  inputsPerChunk?: number;
  stages: ZarrRecipeStages;
}

function task(name: string, run: () => Promise<unknown>): JobTask {
  return { name, maxRetries: 0, retryDelayMs: 0, run };
}

function requireSlot<T>(slot: T | null, name: string): T {
  if (slot === null) {
    throw new Error(`recipe has no ${name} configured`);
  }
  return slot;
}

/** Combines many array inputs into a single Zarr store. */
export class XarrayZarrRecipe implements ComputationObject {
  readonly kind = 'xarray-zarr' as const;
  target: StorageTarget | null = null;
  inputCache: CacheTarget | null = null;
  metadataCache: MetadataTarget | null = null;

  readonly inputs: readonly string[];
  readonly inputsPerChunk: number;
  private stages: ZarrRecipeStages;

  constructor(options: XarrayZarrRecipeOptions) {
    if (options.inputs.length === 0) {
      throw new Error('XarrayZarrRecipe needs at least one input');
    }
    const perChunk = options.inputsPerChunk ?? 1;
    if (!Number.isInteger(perChunk) || perChunk < 1) {
      throw new Error('inputsPerChunk must be a positive integer');
    }
    this.inputs = [...options.inputs];
    this.inputsPerChunk = perChunk;
    this.stages = options.stages;
  }

  chunks(): ChunkKey[] {
    const chunks: ChunkKey[] = [];
    for (let start = 0; start < this.inputs.length; start += this.inputsPerChunk) {
      chunks.push({ index: chunks.length, inputs: this.inputs.slice(start, start + this.inputsPerChunk) });
    }
    return chunks;
  }

  copyPruned(nkeep = DEFAULT_PRUNE_KEEP): XarrayZarrRecipe {
    const pruned = new XarrayZarrRecipe({
      inputs: this.inputs.slice(0, Math.max(1, nkeep)),
      inputsPerChunk: this.inputsPerChunk,
      stages: this.stages,
    });
    pruned.target = this.target;
    pruned.inputCache = this.inputCache;
    pruned.metadataCache = this.metadataCache;
    return pruned;
  }

  /** Tasks use the storage slots as they are now; later rebinding does not reach them. */
  toJob(): Job {
    const { target, inputCache, metadataCache } = this;
    const tasks: JobTask[] = [];

    this.inputs.forEach((input, i) => {
      tasks.push(task(`cache_input[${i}]`, async () => {
        const cache = requireSlot(inputCache, 'input cache');
        log.debug('Caching input', { input, cache: cache.rootPath });
        await this.stages.cacheInput(input, cache);
      }));
    });

    tasks.push(task('prepare_target', async () => {
      const output = requireSlot(target, 'target');
      const metadata = requireSlot(metadataCache, 'metadata cache');
      log.debug('Preparing target', { target: output.rootPath });
      await this.stages.prepareTarget(output, metadata);
    }));

    for (const chunk of this.chunks()) {
      tasks.push(task(`store_chunk[${chunk.index}]`, async () => {
        const output = requireSlot(target, 'target');
        const cache = requireSlot(inputCache, 'input cache');
        log.debug('Storing chunk', { chunk: chunk.index, inputs: chunk.inputs.length });
        await this.stages.storeChunk(chunk, output, cache);
      }));
    }

    tasks.push(task('finalize_target', async () => {
      const output = requireSlot(target, 'target');
      log.debug('Finalizing target', { target: output.rootPath });
      await this.stages.finalizeTarget(output);
    }));

    return { name: 'xarray-zarr', tasks, storage: null, runConfig: null, executor: null };
  }
}

export interface HdfReferenceStages {
  scanFile(input: string): Promise<void>;
  writeReferences(target: StorageTarget): Promise<void>;
}

/**
 * Builds a reference index over HDF inputs. Recognised, but there is no
 * target layout for it yet, so registration rejects it.
 */
export class HdfReferenceRecipe implements ComputationObject {
  readonly kind = 'hdf-reference' as const;
  target: StorageTarget | null = null;
  inputCache: CacheTarget | null = null;
  metadataCache: MetadataTarget | null = null;

  readonly inputs: readonly string[];
  private stages: HdfReferenceStages;

  constructor(options: { inputs: string[]; stages: HdfReferenceStages }) {
    this.inputs = [...options.inputs];
    this.stages = options.stages;
  }

  copyPruned(nkeep = DEFAULT_PRUNE_KEEP): HdfReferenceRecipe {
    const pruned = new HdfReferenceRecipe({ inputs: this.inputs.slice(0, Math.max(1, nkeep)), stages: this.stages });
    pruned.target = this.target;
    pruned.inputCache = this.inputCache;
    pruned.metadataCache = this.metadataCache;
    return pruned;
  }

  toJob(): Job {
    const target = this.target;
    const tasks: JobTask[] = this.inputs.map((input, i) =>
      task(`scan_file[${i}]`, () => this.stages.scanFile(input))
    );
    tasks.push(task('write_references', async () => {
      await this.stages.writeReferences(requireSlot(target, 'target'));
    }));
    return { name: 'hdf-reference', tasks, storage: null, runConfig: null, executor: null };
  }
}

const RECIPE_KINDS: ReadonlySet<string> = new Set<RecipeKind>(['xarray-zarr', 'hdf-reference']);

/** Structural check, so recipes built against another copy of this module still pass. */
export function isComputationObject(value: unknown): value is ComputationObject {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('toJob' in value) || !('copyPruned' in value)) return false;
  return typeof value.kind === 'string'
    && RECIPE_KINDS.has(value.kind)
    && typeof value.toJob === 'function'
    && typeof value.copyPruned === 'function';
}

/** Output file extension per recipe kind; kinds without a target layout fail. */
export function targetExtension(recipe: ComputationObject): Resolution<string> {
  switch (recipe.kind) {
    case 'xarray-zarr':
      return resolved('zarr');
    case 'hdf-reference':
      return failed('UnsupportedRecipeType', `recipe kind "${recipe.kind}" cannot be registered`, { kind: recipe.kind });
    default:
      return assertNever(recipe.kind);
  }
}

function assertNever(kind: never): never {
  throw new Error(`Unhandled recipe kind: ${String(kind)}`);
}
