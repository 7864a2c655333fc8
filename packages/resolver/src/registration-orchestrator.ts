/**
 * Registration Orchestrator — manifest in, registered jobs out
 *
 * Strictly sequential: bakery and target lookup, version gate, then one recipe at a
 * time in manifest order (family members in insertion order). The first
 * failure stops the batch; jobs registered before it stay registered.
 *
 * Integration:
 * - EventBus: emits registration.started, registration.job_registered,
 *   registration.run_created, registration.completed, registration.failed
 * - RegistrationLedger: one row per registered job
 */

import { createEvent, getLogger } from '../../shared/index.js';
import type {
  BakeryDescriptor,
  BakeryTable,
  EventBus,
  EventChannel,
  RecipeEntry,
  RecipeManifest,
  RegistrationLedger,
  Secrets,
  TargetDescriptor,
  VersionTriple,
} from '../../shared/index.js';
import { ResolutionError, failed, resolved } from './errors.js';
import type { Resolution } from './errors.js';
import { assembleFlow } from './flow-assembler.js';
import { isRecipeFamily } from './recipe-catalog.js';
import { targetExtension } from './recipes.js';
import { requireSecret } from './secrets.js';
import { descriptorFilesystem, resolveTargets } from './target-resolver.js';
import type {
  AutomationHookRegistrar,
  ComputationObject,
  RecipeLoader,
  StorageFilesystem,
  WorkflowEngineClient,
} from './types.js';
import { checkVersions } from './version-gate.js';

export const BOT_TOKEN_SECRET = 'ACTIONS_BOT_TOKEN';

const log = getLogger('orchestrator');

export interface RegistrationConfig {
  /** Namespace for storage paths, e.g. "org/repo". */
  repository: string;
  /** Workflow-engine project the jobs are registered under. */
  project: string;
  /** Value of the Project resource tag. */
  projectTag: string;
  /** When set, each registered job is run immediately under this name. */
  correlationId: string | null;
  prune: boolean;
}

export interface OrchestratorDeps {
  engine: WorkflowEngineClient;
  hooks: AutomationHookRegistrar;
  loader: RecipeLoader;
  filesystems?: StorageFilesystem;
  ledger?: RegistrationLedger;
  bus?: EventBus;
}

export interface RegisteredJob {
  recipeId: string;
  jobId: string;
  runId: string | null;
  hookId: string | null;
}

export type RegistrationResult =
  | { ok: true; bakeryId: string; jobs: RegisteredJob[] }
  | { ok: false; bakeryId: string; jobs: RegisteredJob[]; error: ResolutionError };

export interface BatchContext {
  manifest: RecipeManifest;
  bakery: BakeryDescriptor;
  target: TargetDescriptor;
  secrets: Secrets;
}

export class RegistrationOrchestrator {
  private config: RegistrationConfig;
  private deps: OrchestratorDeps;

  constructor(config: RegistrationConfig, deps: OrchestratorDeps) {
    this.config = config;
    this.deps = deps;
  }

  async register(
    manifest: RecipeManifest,
    bakeries: BakeryTable,
    secrets: Secrets,
    runtime: VersionTriple
  ): Promise<RegistrationResult> {
    const bakeryId = manifest.bakery.id;
    const jobs: RegisteredJob[] = [];

    const batch = prepareBatch(manifest, bakeries, secrets, runtime);
    if (!batch.ok) {
      return this.fail(bakeryId, jobs, batch.error);
    }

    await this.emit('registration.started', bakeryId, {
      recipes: manifest.recipes.map(r => r.id),
      project: this.config.project,
      prune: this.config.prune,
    });
    log.info('Registering recipes', { bakery: bakeryId, entries: manifest.recipes.length });

    for (const entry of manifest.recipes) {
      const recipes = this.loadEntry(entry);
      if (!recipes.ok) {
        return this.fail(bakeryId, jobs, recipes.error);
      }

      for (const [recipeId, recipe] of recipes.value) {
        const registered = await this.registerRecipe(batch.value, recipeId, recipe);
        if (!registered.ok) {
          return this.fail(bakeryId, jobs, registered.error, recipeId);
        }
        jobs.push(registered.value);
      }
    }

    await this.emit('registration.completed', bakeryId, { jobs: jobs.length });
    log.info('Registration complete', { bakery: bakeryId, jobs: jobs.length });
    return { ok: true, bakeryId, jobs };
  }

  private loadEntry(entry: RecipeEntry): Resolution<Array<[string, ComputationObject]>> {
    if (entry.dictObject !== undefined) {
      const loaded = this.deps.loader.load(entry.dictObject);
      if (!loaded.ok) return loaded;
      if (!isRecipeFamily(loaded.value)) {
        return failed('UnknownRecipeReference', `"${entry.dictObject}" is a single recipe, not a family`,
          { reference: entry.dictObject });
      }
      return resolved([...loaded.value.entries()]);
    }

    const loaded = this.deps.loader.load(entry.object);
    if (!loaded.ok) return loaded;
    if (isRecipeFamily(loaded.value)) {
      return failed('UnknownRecipeReference', `"${entry.object}" is a recipe family; use dict_object`,
        { reference: entry.object });
    }
    const single: Array<[string, ComputationObject]> = [[entry.id, loaded.value]];
    return resolved(single);
  }

  private async registerRecipe(
    batch: BatchContext,
    recipeId: string,
    recipe: ComputationObject
  ): Promise<Resolution<RegisteredJob>> {
    const { manifest, bakery, secrets } = batch;
    const bakeryId = manifest.bakery.id;

    const extension = targetExtension(recipe);
    if (!extension.ok) return extension;

    const targets = resolveTargets(
      batch.target,
      {
        targetName: manifest.bakery.target,
        namespace: this.config.repository,
        recipeId,
        extension: extension.value,
      },
      secrets,
      this.deps.filesystems ?? descriptorFilesystem
    );
    if (!targets.ok) return targets;

    const job = assembleFlow({
      bakery,
      manifest,
      recipeId,
      recipe,
      targets: targets.value,
      secrets,
      projectTag: this.config.projectTag,
      prune: this.config.prune,
    });
    if (!job.ok) return job;

    const jobId = await this.external(`register job "${recipeId}"`,
      () => this.deps.engine.register(job.value, this.config.project));
    if (!jobId.ok) return jobId;

    await this.emit('registration.job_registered', bakeryId, { jobId: jobId.value, tasks: job.value.tasks.length }, recipeId);
    log.info('Registered job', { recipe: recipeId, jobId: jobId.value });

    const correlationId = this.config.correlationId;
    let runId: string | null = null;
    let hookId: string | null = null;

    if (correlationId) {
      const run = await this.external(`create run for "${recipeId}"`,
        () => this.deps.engine.createRun(jobId.value, correlationId));
      if (!run.ok) return run;
      runId = run.value;
      await this.emit('registration.run_created', bakeryId, { jobId: jobId.value, runId, correlationId }, recipeId);
    }

    this.deps.ledger?.record({
      jobId: jobId.value,
      recipeId,
      jobName: job.value.name,
      bakeryId,
      project: this.config.project,
      runId,
      correlationId,
    });

    if (runId !== null) {
      const token = requireSecret(secrets, BOT_TOKEN_SECRET);
      if (!token.ok) return token;

      const hook = await this.external(`register automation hook for "${recipeId}"`,
        () => this.deps.hooks.register(jobId.value, token.value));
      if (!hook.ok) return hook;
      hookId = hook.value;
    }

    return resolved({ recipeId, jobId: jobId.value, runId, hookId });
  }

  private async external<T>(action: string, call: () => Promise<T>): Promise<Resolution<T>> {
    try {
      return resolved(await call());
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return failed('RegistrationFailed', `could not ${action}: ${message}`, { action });
    }
  }

  private async fail(
    bakeryId: string,
    jobs: RegisteredJob[],
    error: ResolutionError,
    recipeId?: string
  ): Promise<RegistrationResult> {
    log.error('Registration stopped', { bakery: bakeryId, recipe: recipeId ?? null, error: error.message });
    await this.emit('registration.failed', bakeryId, {
      kind: error.kind,
      category: error.category,
      error: error.message,
      registered: jobs.length,
    }, recipeId);
    return { ok: false, bakeryId, jobs, error };
  }

  private async emit(
    channel: EventChannel,
    bakeryId: string,
    payload: Record<string, unknown>,
    recipeId?: string
  ): Promise<void> {
    if (!this.deps.bus) return;
    await this.deps.bus.emit(createEvent(channel, 'orchestrator', payload, { bakeryId, recipeId }));
  }
}

/**
 * Bakery, target and version gate, checked once before any recipe is loaded.
 * A failure here means nothing is registered.
 */
export function prepareBatch(
  manifest: RecipeManifest,
  bakeries: BakeryTable,
  secrets: Secrets,
  runtime: VersionTriple
): Resolution<BatchContext> {
  const bakeryId = manifest.bakery.id;
  if (!Object.prototype.hasOwnProperty.call(bakeries, bakeryId)) {
    return failed('UnknownBakery', `bakery "${bakeryId}" is not defined`, { bakery: bakeryId });
  }
  const bakery = bakeries[bakeryId];

  const targetName = manifest.bakery.target;
  if (!Object.prototype.hasOwnProperty.call(bakery.targets, targetName)) {
    return failed('UnknownTarget', `bakery "${bakeryId}" has no target "${targetName}"`,
      { bakery: bakeryId, target: targetName });
  }

  const versions = checkVersions(manifest.versions, bakery.cluster.versions, runtime);
  if (!versions.ok) return versions;

  return resolved({ manifest, bakery, target: bakery.targets[targetName], secrets });
}
