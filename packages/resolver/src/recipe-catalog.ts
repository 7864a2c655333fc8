/**
 * Recipe Catalog — recipes registered up front under their manifest reference
 *
 * Manifest entries point at recipes with `module:symbol` references. The
 * catalog is filled once before registration starts; lookups never load code.
 */

import { failed, resolved } from './errors.js';
import type { Resolution } from './errors.js';
import { isComputationObject } from './recipes.js';
import type { CatalogEntry, ComputationObject, RecipeFamily, RecipeLoader } from './types.js';

const REFERENCE_PATTERN = /^[\w./-]+:[A-Za-z_$][\w$]*$/;

export function isRecipeReference(value: string): boolean {
  return REFERENCE_PATTERN.test(value);
}

export function parseRecipeReference(reference: string): { module: string; symbol: string } | null {
  if (!isRecipeReference(reference)) return null;
  const separator = reference.lastIndexOf(':');
  return { module: reference.slice(0, separator), symbol: reference.slice(separator + 1) };
}

export function isRecipeFamily(entry: unknown): entry is RecipeFamily {
  return entry instanceof Map;
}

export type RegisterableEntry = ComputationObject | RecipeFamily | Record<string, ComputationObject>;

export class RecipeCatalog implements RecipeLoader {
  private entries = new Map<string, CatalogEntry>();

  /**
   * Register a recipe, or a family of recipes keyed by recipe id.
   * Re-registering a reference replaces the earlier entry.
   */
  register(reference: string, entry: RegisterableEntry): this {
    if (!isRecipeReference(reference)) {
      throw new Error(`Invalid recipe reference "${reference}" (expected module:symbol)`);
    }
    this.entries.set(reference, toCatalogEntry(entry));
    return this;
  }

  has(reference: string): boolean {
    return this.entries.has(reference);
  }

  references(): string[] {
    return [...this.entries.keys()];
  }

  load(reference: string): Resolution<CatalogEntry> {
    const entry = this.entries.get(reference);
    if (!entry) {
      return failed('UnknownRecipeReference', `no recipe registered under "${reference}"`, { reference });
    }
    return resolved(entry);
  }
}

function toCatalogEntry(entry: RegisterableEntry): CatalogEntry {
  if (isComputationObject(entry)) return entry;
  if (isRecipeFamily(entry)) return entry;
  return new Map(Object.entries(entry));
}
