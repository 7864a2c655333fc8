/**
 * Reading and decoding the two descriptor files every command starts from.
 */

import { readFileSync } from 'fs';
import type { BakeryTable, RecipeManifest } from '../../../shared/index.js';
import { parseBakeries, parseRecipeManifest } from '../../../resolver/src/index.js';

export interface DescriptorPaths {
  metaPath: string;
  bakeriesPath: string;
}

export type Descriptors =
  | { ok: true; manifest: RecipeManifest; bakeries: BakeryTable }
  | { ok: false; errors: string[] };

function readText(path: string, label: string): { ok: true; text: string } | { ok: false; errors: string[] } {
  try {
    return { ok: true, text: readFileSync(path, 'utf-8') };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, errors: [`Cannot read ${label} ${path}: ${message}`] };
  }
}

export function readDescriptors(paths: DescriptorPaths): Descriptors {
  const meta = readText(paths.metaPath, 'recipe manifest');
  if (!meta.ok) return meta;
  const table = readText(paths.bakeriesPath, 'bakery table');
  if (!table.ok) return table;

  const manifest = parseRecipeManifest(meta.text);
  const bakeries = parseBakeries(table.text);

  const errors: string[] = [];
  if (!manifest.ok) errors.push(...manifest.errors.map(e => `${paths.metaPath}: ${e}`));
  if (!bakeries.ok) errors.push(...bakeries.errors.map(e => `${paths.bakeriesPath}: ${e}`));
  if (!manifest.ok || !bakeries.ok) return { ok: false, errors };

  return { ok: true, manifest: manifest.manifest, bakeries: bakeries.bakeries };
}

export function errorReport(title: string, errors: string[]): string {
  return [title, ...errors.map(e => `  - ${e}`)].join('\n');
}
