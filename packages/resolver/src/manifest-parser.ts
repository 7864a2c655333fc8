/**
 * Manifest Parser — meta.yaml and bakeries.yaml into typed descriptors.
 *
 * Validates structure and required fields, collecting every problem rather
 * than stopping at the first. Cluster types and storage protocols are taken
 * as written; the resolvers reject the ones they cannot dispatch on.
 */

import yaml from 'js-yaml';
import type {
  BakeryDescriptor,
  BakeryTable,
  Cluster,
  ClusterOptions,
  RecipeBakery,
  RecipeEntry,
  RecipeManifest,
  ResourceHint,
  StorageOptions,
  TargetDescriptor,
} from '../../shared/index.js';
import { isRecipeReference } from './recipe-catalog.js';

export type ManifestParseResult =
  | { ok: true; manifest: RecipeManifest }
  | { ok: false; errors: string[] };

export type BakeriesParseResult =
  | { ok: true; bakeries: BakeryTable }
  | { ok: false; errors: string[] };

type RawObject = Record<string, unknown>;

function isRecord(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadYaml(source: string): { ok: true; raw: unknown } | { ok: false; errors: string[] } {
  try {
    return { ok: true, raw: yaml.load(source) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [`YAML parse error: ${message}`] };
  }
}

function requireString(obj: RawObject, key: string, prefix: string, errors: string[]): string {
  const value = obj[key];
  if (typeof value !== 'string' || value.length === 0) {
    errors.push(`${prefix}"${key}" is required and must be a string`);
    return '';
  }
  return value;
}

function optionalString(obj: RawObject, key: string, prefix: string, errors: string[]): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    errors.push(`${prefix}"${key}" must be a string if provided`);
    return undefined;
  }
  return value;
}

function positiveNumber(obj: RawObject, key: string, prefix: string, errors: string[]): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    errors.push(`${prefix}"${key}" must be a positive number`);
    return 0;
  }
  return value;
}

// ─── meta.yaml ───────────────────────────────────────────────────

/**
 * Parse a recipe manifest (meta.yaml).
 */
export function parseRecipeManifest(source: string): ManifestParseResult {
  const loaded = loadYaml(source);
  if (!loaded.ok) return loaded;
  return validateRecipeManifest(loaded.raw);
}

/**
 * Validate an already-decoded manifest object.
 */
export function validateRecipeManifest(raw: unknown): ManifestParseResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Recipe manifest must be an object'] };
  }

  const errors: string[] = [];

  const title = optionalString(raw, 'title', '', errors);
  const description = optionalString(raw, 'description', '', errors);
  const notebookVersion = requireString(raw, 'notebook_version', '', errors);
  const recipeFrameworkVersion = requireString(raw, 'recipe_framework_version', '', errors);

  const recipes = parseRecipeEntries(raw.recipes, errors);
  const bakery = parseRecipeBakery(raw.bakery, errors);

  if (errors.length > 0 || !bakery) {
    return { ok: false, errors };
  }

  const manifest: RecipeManifest = {
    versions: { notebookVersion, recipeFrameworkVersion },
    recipes,
    bakery,
  };
  if (title !== undefined) manifest.title = title;
  if (description !== undefined) manifest.description = description;
  return { ok: true, manifest };
}

function parseRecipeEntries(raw: unknown, errors: string[]): RecipeEntry[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    errors.push('"recipes" is required and must be a non-empty array');
    return [];
  }

  const entries: RecipeEntry[] = [];
  const ids = new Set<string>();

  raw.forEach((item: unknown, i) => {
    if (!isRecord(item)) {
      errors.push(`Recipe ${i}: must be an object`);
      return;
    }

    const prefix = `Recipe ${i}: `;
    const id = requireString(item, 'id', prefix, errors);
    if (id && ids.has(id)) {
      errors.push(`${prefix}duplicate recipe id "${id}"`);
    }
    ids.add(id);

    const object = optionalString(item, 'object', prefix, errors);
    const dictObject = optionalString(item, 'dict_object', prefix, errors);

    if (object !== undefined && dictObject !== undefined) {
      errors.push(`${prefix}set only one of "object" and "dict_object"`);
      return;
    }
    if (object === undefined && dictObject === undefined) {
      errors.push(`${prefix}must have either "object" or "dict_object"`);
      return;
    }

    const reference = object ?? dictObject ?? '';
    if (!isRecipeReference(reference)) {
      errors.push(`${prefix}reference "${reference}" must look like module:symbol`);
      return;
    }

    entries.push(object !== undefined ? { id, object } : { id, dictObject: reference });
  });

  return entries;
}

function parseRecipeBakery(raw: unknown, errors: string[]): RecipeBakery | null {
  if (!isRecord(raw)) {
    errors.push('"bakery" is required and must be an object');
    return null;
  }

  const prefix = 'bakery: ';
  const bakery: RecipeBakery = {
    id: requireString(raw, 'id', prefix, errors),
    target: requireString(raw, 'target', prefix, errors),
  };

  if (raw.resources !== undefined && raw.resources !== null) {
    const resources = parseResources(raw.resources, 'bakery.resources: ', errors);
    if (resources) bakery.resources = resources;
  }

  return bakery;
}

function parseResources(raw: unknown, prefix: string, errors: string[]): ResourceHint | null {
  if (!isRecord(raw)) {
    errors.push(`${prefix}must be an object`);
    return null;
  }
  return {
    cpu: positiveNumber(raw, 'cpu', prefix, errors),
    memory: positiveNumber(raw, 'memory', prefix, errors),
  };
}

// ─── bakeries.yaml ───────────────────────────────────────────────

/**
 * Parse the bakery table (bakeries.yaml), keyed by bakery id.
 */
export function parseBakeries(source: string): BakeriesParseResult {
  const loaded = loadYaml(source);
  if (!loaded.ok) return loaded;
  return validateBakeries(loaded.raw);
}

export function validateBakeries(raw: unknown): BakeriesParseResult {
  if (!isRecord(raw)) {
    return { ok: false, errors: ['Bakery table must be a mapping of bakery id to bakery'] };
  }

  const errors: string[] = [];
  const bakeries: BakeryTable = {};

  for (const [id, value] of Object.entries(raw)) {
    const bakery = parseBakery(id, value, errors);
    if (bakery) bakeries[id] = bakery;
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, bakeries };
}

function parseBakery(id: string, raw: unknown, errors: string[]): BakeryDescriptor | null {
  const prefix = `Bakery "${id}": `;
  if (!isRecord(raw)) {
    errors.push(`${prefix}must be an object`);
    return null;
  }

  const region = optionalString(raw, 'region', prefix, errors);
  const targets = parseTargets(raw.targets, prefix, errors);
  const cluster = parseCluster(raw.cluster, prefix, errors);
  if (!cluster) return null;

  const bakery: BakeryDescriptor = { id, cluster, targets };
  if (region !== undefined) bakery.region = region;
  return bakery;
}

function parseTargets(raw: unknown, prefix: string, errors: string[]): Record<string, TargetDescriptor> {
  const targets: Record<string, TargetDescriptor> = {};
  if (!isRecord(raw)) {
    errors.push(`${prefix}"targets" is required and must be a mapping`);
    return targets;
  }

  for (const [name, value] of Object.entries(raw)) {
    const targetPrefix = `${prefix}target "${name}": `;
    if (!isRecord(value)) {
      errors.push(`${targetPrefix}must be an object`);
      continue;
    }
    const target: TargetDescriptor = { protocol: requireString(value, 'protocol', targetPrefix, errors) };
    const storageOptions = parseStorageOptions(value.storage_options, targetPrefix, errors);
    if (storageOptions) target.storageOptions = storageOptions;
    targets[name] = target;
  }
  return targets;
}

function parseStorageOptions(raw: unknown, prefix: string, errors: string[]): StorageOptions | null {
  if (raw === undefined || raw === null) return null;
  if (!isRecord(raw)) {
    errors.push(`${prefix}"storage_options" must be an object`);
    return null;
  }

  const options: StorageOptions = {};
  const key = optionalString(raw, 'key', prefix, errors);
  const secret = optionalString(raw, 'secret', prefix, errors);
  if (key !== undefined) options.key = key;
  if (secret !== undefined) options.secret = secret;
  return options;
}

function parseCluster(raw: unknown, prefix: string, errors: string[]): Cluster | null {
  if (!isRecord(raw)) {
    errors.push(`${prefix}"cluster" is required and must be an object`);
    return null;
  }

  const clusterPrefix = `${prefix}cluster `;
  const maxWorkers = raw.max_workers;
  if (typeof maxWorkers !== 'number' || !Number.isInteger(maxWorkers) || maxWorkers < 1) {
    errors.push(`${clusterPrefix}"max_workers" must be a positive integer`);
  }

  return {
    type: requireString(raw, 'type', clusterPrefix, errors),
    workerImage: requireString(raw, 'worker_image', clusterPrefix, errors),
    flowStorage: requireString(raw, 'flow_storage', clusterPrefix, errors),
    flowStorageProtocol: requireString(raw, 'flow_storage_protocol', clusterPrefix, errors),
    flowStorageOptions: parseStorageOptions(raw.flow_storage_options, clusterPrefix, errors) ?? {},
    maxWorkers: typeof maxWorkers === 'number' ? maxWorkers : 0,
    clusterOptions: parseClusterOptions(raw.cluster_options, clusterPrefix, errors),
    versions: {
      notebookVersion: requireString(raw, 'notebook_version', clusterPrefix, errors),
      recipeFrameworkVersion: requireString(raw, 'recipe_framework_version', clusterPrefix, errors),
      engineVersion: requireString(raw, 'engine_version', clusterPrefix, errors),
    },
  };
}

function parseClusterOptions(raw: unknown, prefix: string, errors: string[]): ClusterOptions {
  const options: ClusterOptions = {};
  if (raw === undefined || raw === null) return options;
  if (!isRecord(raw)) {
    errors.push(`${prefix}"cluster_options" must be an object`);
    return options;
  }

  const vpc = optionalString(raw, 'vpc', prefix, errors);
  const clusterArn = optionalString(raw, 'cluster_arn', prefix, errors);
  const taskRoleArn = optionalString(raw, 'task_role_arn', prefix, errors);
  const executionRoleArn = optionalString(raw, 'execution_role_arn', prefix, errors);
  if (vpc !== undefined) options.vpc = vpc;
  if (clusterArn !== undefined) options.clusterArn = clusterArn;
  if (taskRoleArn !== undefined) options.taskRoleArn = taskRoleArn;
  if (executionRoleArn !== undefined) options.executionRoleArn = executionRoleArn;

  if (raw.security_groups !== undefined) {
    const groups = raw.security_groups;
    if (!Array.isArray(groups) || !groups.every((g): g is string => typeof g === 'string')) {
      errors.push(`${prefix}"security_groups" must be an array of strings`);
    } else {
      options.securityGroups = groups;
    }
  }
  return options;
}
