/**
 * Catalog Loader — import the recipe modules a manifest references.
 *
 * `module:symbol` resolves to `{manifestDir}/{module}.js`, export `symbol`.
 * Each module is imported at most once. References that cannot be loaded
 * stay out of the catalog; the orchestrator reports them when it reaches
 * them, after the entries before them have been registered.
 */

import { resolve } from 'path';
import { pathToFileURL } from 'url';
import { getLogger } from '../../shared/index.js';
import type { RecipeManifest } from '../../shared/index.js';
import {
  RecipeCatalog,
  isComputationObject,
  isRecipeFamily,
  parseRecipeReference,
} from '../../resolver/src/index.js';
import type { ComputationObject, RegisterableEntry } from '../../resolver/src/index.js';

const log = getLogger('catalog');

export type ModuleImporter = (specifier: string) => Promise<unknown>;

const nativeImport: ModuleImporter = (specifier) => import(specifier);

export interface CatalogLoadResult {
  catalog: RecipeCatalog;
  skipped: Array<{ reference: string; reason: string }>;
}

function asFamily(value: unknown): RegisterableEntry | null {
  if (isRecipeFamily(value)) {
    for (const member of value.values()) {
      if (!isComputationObject(member)) return null;
    }
    return value;
  }
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null;

  const members: Record<string, ComputationObject> = {};
  for (const [id, member] of Object.entries(value)) {
    if (!isComputationObject(member)) return null;
    members[id] = member;
  }
  return members;
}

export async function loadCatalog(
  manifest: RecipeManifest,
  manifestDir: string,
  importer: ModuleImporter = nativeImport
): Promise<CatalogLoadResult> {
  const catalog = new RecipeCatalog();
  const skipped: CatalogLoadResult['skipped'] = [];
  const modules = new Map<string, Promise<unknown>>();

  const skip = (reference: string, reason: string): void => {
    log.warn('Recipe reference not loaded', { reference, reason });
    skipped.push({ reference, reason });
  };

  for (const entry of manifest.recipes) {
    const family = entry.dictObject !== undefined;
    const reference = entry.dictObject !== undefined ? entry.dictObject : entry.object;
    if (catalog.has(reference)) continue;

    const parsed = parseRecipeReference(reference);
    if (!parsed) {
      skip(reference, 'not a module:symbol reference');
      continue;
    }

    const specifier = pathToFileURL(resolve(manifestDir, `${parsed.module}.js`)).href;
    let pending = modules.get(specifier);
    if (!pending) {
      pending = importer(specifier);
      modules.set(specifier, pending);
    }

    let mod: unknown;
    try {
      mod = await pending;
    } catch (err) {
      skip(reference, err instanceof Error ? err.message : String(err));
      continue;
    }

    if (typeof mod !== 'object' || mod === null || !(parsed.symbol in mod)) {
      skip(reference, `module "${parsed.module}" has no export "${parsed.symbol}"`);
      continue;
    }
    const value: unknown = Reflect.get(mod, parsed.symbol);

    if (family) {
      const members = asFamily(value);
      if (!members) {
        skip(reference, 'export is not a family of recipes');
        continue;
      }
      catalog.register(reference, members);
    } else {
      if (!isComputationObject(value)) {
        skip(reference, 'export is not a recipe');
        continue;
      }
      catalog.register(reference, value);
    }
  }

  return { catalog, skipped };
}
