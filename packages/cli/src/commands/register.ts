/**
 * bakeline register — register every recipe in a manifest with the engine.
 *
 * Decodes meta.yaml and bakeries.yaml, checks the bakery, target and
 * versions, loads the referenced recipe modules, then hands everything to
 * the orchestrator. Progress is printed from the
 * event bus as jobs are registered; each job is also recorded in the ledger.
 */

import { dirname } from 'path';
import { EventBus, RegistrationLedger } from '../../../shared/index.js';
import { RegistrationOrchestrator, prepareBatch } from '../../../resolver/src/index.js';
import type {
  AutomationHookRegistrar,
  RegisteredJob,
  WorkflowEngineClient,
} from '../../../resolver/src/index.js';
import { loadCatalog } from '../catalog-loader.js';
import type { ModuleImporter } from '../catalog-loader.js';
import { loadRegistrationConfig, loadSecrets } from '../config.js';
import type { Env } from '../config.js';
import { HttpAutomationHooks, HttpWorkflowEngine } from '../engine-client.js';
import { errorReport, readDescriptors } from './inputs.js';
import type { DescriptorPaths } from './inputs.js';

export interface RegisterOptions extends DescriptorPaths {
  secretsPath?: string;
  prune?: boolean;
  dbPath?: string;
  env?: Env;
  engine?: WorkflowEngineClient;
  hooks?: AutomationHookRegistrar;
  importer?: ModuleImporter;
  bus?: EventBus;
  /** Receives one line per progress event. */
  onProgress?: (line: string) => void;
}

export interface RegisterResult {
  ok: boolean;
  jobs: RegisteredJob[];
  report: string;
}

export async function register(opts: RegisterOptions): Promise<RegisterResult> {
  const env = opts.env ?? process.env;

  const descriptors = readDescriptors(opts);
  if (!descriptors.ok) {
    return { ok: false, jobs: [], report: errorReport('Invalid descriptors:', descriptors.errors) };
  }

  const config = loadRegistrationConfig(env, { prune: opts.prune });
  if (!config.ok) {
    return { ok: false, jobs: [], report: errorReport('Invalid configuration:', config.errors) };
  }

  const secrets = loadSecrets(env, opts.secretsPath);
  if (!secrets.ok) {
    return { ok: false, jobs: [], report: errorReport('Invalid secrets:', secrets.errors) };
  }

  const { manifest, bakeries } = descriptors;

  // Recipe modules run code on import; nothing is loaded until the batch checks pass.
  const batch = prepareBatch(manifest, bakeries, secrets.value, config.value.runtime);
  if (!batch.ok) {
    return { ok: false, jobs: [], report: `Registration failed: ${batch.error.message}` };
  }

  const { catalog } = await loadCatalog(manifest, dirname(opts.metaPath), opts.importer);

  const engineOpts = { baseUrl: config.value.engineUrl, apiKey: config.value.engineApiKey };
  const bus = opts.bus ?? new EventBus();
  const progress = opts.onProgress;
  const unsubscribe = progress
    ? bus.on('registration.*', (event) => {
      const recipe = event.recipeId ? ` ${event.recipeId}` : '';
      progress(`[${event.channel}]${recipe}`);
    })
    : undefined;

  const ledger = new RegistrationLedger(opts.dbPath ?? config.value.dbPath);
  try {
    const orchestrator = new RegistrationOrchestrator(config.value.registration, {
      engine: opts.engine ?? new HttpWorkflowEngine(engineOpts),
      hooks: opts.hooks ?? new HttpAutomationHooks(engineOpts),
      loader: catalog,
      ledger,
      bus,
    });

    const result = await orchestrator.register(manifest, bakeries, secrets.value, config.value.runtime);

    const lines = result.jobs.map(j => {
      const run = j.runId ? `  run ${j.runId}` : '';
      return `  ${j.recipeId} → job ${j.jobId}${run}`;
    });
    const header = `Registered ${result.jobs.length} job(s) on bakery ${result.bakeryId}`;

    if (!result.ok) {
      return {
        ok: false,
        jobs: result.jobs,
        report: [header, ...lines, `Registration failed: ${result.error.message}`].join('\n'),
      };
    }
    return { ok: true, jobs: result.jobs, report: [header, ...lines].join('\n') };
  } finally {
    unsubscribe?.();
    ledger.close();
  }
}
