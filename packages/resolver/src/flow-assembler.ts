/**
 * Flow Assembler — bind a recipe to its resolved resources
 *
 * Fills the recipe's storage slots, optionally prunes it, converts it into a
 * job and attaches flow storage, driver run config and executor. Every task
 * gets the same retry policy and runs with the recipes logger at debug.
 * No I/O happens here.
 */

import { withLogLevel } from '../../shared/index.js';
import type { BakeryDescriptor, RecipeManifest, Secrets } from '../../shared/index.js';
import { buildExecutor } from './cluster-executor.js';
import { resolved } from './errors.js';
import type { Resolution } from './errors.js';
import { resolveFlowStorage } from './flow-storage.js';
import { RECIPES_LOGGER } from './recipes.js';
import { buildRunConfig } from './run-config.js';
import type { ComputationObject, Job, JobTask, Targets } from './types.js';

export const TASK_MAX_RETRIES = 3;
export const TASK_RETRY_DELAY_MS = 3 * 60 * 1000;

export interface AssembleInput {
  bakery: BakeryDescriptor;
  manifest: RecipeManifest;
  recipeId: string;
  recipe: ComputationObject;
  targets: Targets;
  secrets: Secrets;
  projectTag: string;
  prune?: boolean;
}

/**
 * Apply the uniform retry policy and wrap `run` so the recipes logger is
 * verbose while the task executes.
 */
export function decorateTask(task: JobTask): JobTask {
  const run = task.run;
  return {
    ...task,
    maxRetries: TASK_MAX_RETRIES,
    retryDelayMs: TASK_RETRY_DELAY_MS,
    run: () => withLogLevel(RECIPES_LOGGER, 'debug', run),
  };
}

export function assembleFlow(input: AssembleInput): Resolution<Job> {
  const { bakery, manifest, recipeId, targets, secrets } = input;
  const cluster = bakery.cluster;
  const ctx = { recipeId, projectTag: input.projectTag };

  let recipe = input.recipe;
  recipe.target = targets.target;
  recipe.inputCache = targets.cache;
  recipe.metadataCache = targets.metadata;

  const executor = buildExecutor(cluster, manifest.bakery.resources, ctx, secrets);
  if (!executor.ok) return executor;

  if (input.prune) {
    recipe = recipe.copyPruned();
  }

  const storage = resolveFlowStorage(cluster, secrets);
  if (!storage.ok) return storage;

  const runConfig = buildRunConfig(cluster, manifest.bakery.id, ctx, secrets);
  if (!runConfig.ok) return runConfig;

  const job = recipe.toJob();
  return resolved({
    ...job,
    name: recipeId,
    tasks: job.tasks.map(decorateTask),
    storage: storage.value,
    runConfig: runConfig.value,
    executor: executor.value,
  });
}
