/**
 * bakeline check — decode the descriptors and run the version gate.
 *
 * Touches no storage, secrets or engine; a passing check means `register`
 * will get as far as resolving the first recipe.
 */

import { prepareBatch } from '../../../resolver/src/index.js';
import { loadRuntimeVersions } from '../config.js';
import type { Env } from '../config.js';
import { errorReport, readDescriptors } from './inputs.js';
import type { DescriptorPaths } from './inputs.js';

export interface CheckOptions extends DescriptorPaths {
  env?: Env;
}

export interface CheckResult {
  ok: boolean;
  report: string;
}

export function check(opts: CheckOptions): CheckResult {
  const env = opts.env ?? process.env;

  const descriptors = readDescriptors(opts);
  if (!descriptors.ok) {
    return { ok: false, report: errorReport('Invalid descriptors:', descriptors.errors) };
  }

  const runtime = loadRuntimeVersions(env);
  if (!runtime.ok) {
    return { ok: false, report: errorReport('Invalid configuration:', runtime.errors) };
  }

  const { manifest, bakeries } = descriptors;
  const batch = prepareBatch(manifest, bakeries, {}, runtime.value);
  if (!batch.ok) {
    return { ok: false, report: `Check failed: ${batch.error.message}` };
  }

  const cluster = batch.value.bakery.cluster;
  const report = [
    `Bakery:    ${manifest.bakery.id} (${cluster.type})`,
    `Target:    ${manifest.bakery.target} (${batch.value.target.protocol})`,
    `Versions:  notebook ${cluster.versions.notebookVersion}, ` +
      `recipe framework ${cluster.versions.recipeFrameworkVersion}, engine ${cluster.versions.engineVersion}`,
    `Recipes:   ${manifest.recipes.map(r => r.id).join(', ')}`,
    'Check passed.',
  ].join('\n');
  return { ok: true, report };
}
