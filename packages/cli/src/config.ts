/**
 * Bakeline configuration — read once from the environment.
 *
 *   BAKELINE_REPOSITORY | GITHUB_REPOSITORY   storage namespace (required)
 *   BAKELINE_PROJECT                          engine project (required)
 *   BAKELINE_RUN_NAME | COMMENT_ID            run each job under this name
 *   BAKELINE_PROJECT_TAG                      Project resource tag (default: bakeline)
 *   BAKELINE_ENGINE_URL, BAKELINE_ENGINE_API_KEY
 *   BAKELINE_DB                               ledger path (default: .bakeline/registrations.db)
 *   BAKELINE_NOTEBOOK_VERSION, BAKELINE_RECIPE_FRAMEWORK_VERSION, BAKELINE_ENGINE_VERSION
 *   BAKELINE_SECRETS                          JSON object of secret name → value
 */

import { readFileSync } from 'fs';
import type { Secrets, VersionTriple } from '../../shared/index.js';
import type { RegistrationConfig } from '../../resolver/src/index.js';

export const DEFAULT_PROJECT_TAG = 'bakeline';
export const DEFAULT_DB_PATH = '.bakeline/registrations.db';

export type Env = Readonly<Record<string, string | undefined>>;

export type Loaded<T> = { ok: true; value: T } | { ok: false; errors: string[] };

export interface CliConfig {
  registration: RegistrationConfig;
  engineUrl: string;
  engineApiKey: string | undefined;
  dbPath: string;
  runtime: VersionTriple;
}

function pick(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

export function loadDbPath(env: Env): string {
  return pick(env, 'BAKELINE_DB') ?? DEFAULT_DB_PATH;
}

/** The toolchain versions of the registering runtime. */
export function loadRuntimeVersions(env: Env): Loaded<VersionTriple> {
  const errors: string[] = [];
  const read = (name: string): string => {
    const value = pick(env, name);
    if (!value) errors.push(`${name} is required`);
    return value ?? '';
  };

  const runtime: VersionTriple = {
    notebookVersion: read('BAKELINE_NOTEBOOK_VERSION'),
    recipeFrameworkVersion: read('BAKELINE_RECIPE_FRAMEWORK_VERSION'),
    engineVersion: read('BAKELINE_ENGINE_VERSION'),
  };
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: runtime };
}

export function loadRegistrationConfig(env: Env, opts?: { prune?: boolean }): Loaded<CliConfig> {
  const errors: string[] = [];

  const repository = pick(env, 'BAKELINE_REPOSITORY', 'GITHUB_REPOSITORY');
  if (!repository) errors.push('BAKELINE_REPOSITORY (or GITHUB_REPOSITORY) is required');

  const project = pick(env, 'BAKELINE_PROJECT');
  if (!project) errors.push('BAKELINE_PROJECT is required');

  const engineUrl = pick(env, 'BAKELINE_ENGINE_URL');
  if (!engineUrl) errors.push('BAKELINE_ENGINE_URL is required');

  const runtime = loadRuntimeVersions(env);
  if (!runtime.ok) errors.push(...runtime.errors);

  if (errors.length > 0 || !repository || !project || !engineUrl || !runtime.ok) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: {
      registration: {
        repository,
        project,
        projectTag: pick(env, 'BAKELINE_PROJECT_TAG') ?? DEFAULT_PROJECT_TAG,
        correlationId: pick(env, 'BAKELINE_RUN_NAME', 'COMMENT_ID') ?? null,
        prune: opts?.prune ?? false,
      },
      engineUrl,
      engineApiKey: pick(env, 'BAKELINE_ENGINE_API_KEY'),
      dbPath: loadDbPath(env),
      runtime: runtime.value,
    },
  };
}

/**
 * Secrets from a JSON file when a path is given, otherwise from
 * BAKELINE_SECRETS. No secrets at all is an empty table.
 */
export function loadSecrets(env: Env, path?: string): Loaded<Secrets> {
  let source: string | undefined;
  let origin: string;
  if (path) {
    origin = path;
    try {
      source = readFileSync(path, 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, errors: [`Cannot read secrets file ${path}: ${message}`] };
    }
  } else {
    origin = 'BAKELINE_SECRETS';
    source = env.BAKELINE_SECRETS;
  }

  if (source === undefined || source.trim() === '') {
    return { ok: true, value: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(source);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [`${origin} is not valid JSON: ${message}`] };
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: [`${origin} must be a JSON object of secret name to value`] };
  }

  const secrets: Record<string, string> = {};
  const errors: string[] = [];
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value !== 'string') {
      errors.push(`${origin}: secret "${name}" must be a string`);
      continue;
    }
    secrets[name] = value;
  }
  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: secrets };
}
