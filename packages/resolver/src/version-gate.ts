/**
 * Version Gate — three-way toolchain agreement
 *
 * The manifest author, the bakery's cluster and the registering runtime each
 * declare their toolchain versions. Nothing is resolved unless they agree.
 */

import type { ManifestVersions, VersionTriple } from '../../shared/index.js';
import { failed, resolved } from './errors.js';
import type { Resolution } from './errors.js';

export function checkVersions(
  manifest: ManifestVersions,
  cluster: VersionTriple,
  runtime: VersionTriple
): Resolution<VersionTriple> {
  if (manifest.notebookVersion !== runtime.notebookVersion) {
    return failed('NotebookVersionMismatch',
      `manifest pins ${manifest.notebookVersion}, runtime has ${runtime.notebookVersion}`,
      { manifest: manifest.notebookVersion, runtime: runtime.notebookVersion });
  }
  if (manifest.notebookVersion !== cluster.notebookVersion) {
    return failed('NotebookVersionMismatch',
      `manifest pins ${manifest.notebookVersion}, cluster has ${cluster.notebookVersion}`,
      { manifest: manifest.notebookVersion, cluster: cluster.notebookVersion });
  }
  if (manifest.recipeFrameworkVersion !== runtime.recipeFrameworkVersion) {
    return failed('RecipeFrameworkVersionMismatch',
      `manifest pins ${manifest.recipeFrameworkVersion}, runtime has ${runtime.recipeFrameworkVersion}`,
      { manifest: manifest.recipeFrameworkVersion, runtime: runtime.recipeFrameworkVersion });
  }
  if (manifest.recipeFrameworkVersion !== cluster.recipeFrameworkVersion) {
    return failed('RecipeFrameworkVersionMismatch',
      `manifest pins ${manifest.recipeFrameworkVersion}, cluster has ${cluster.recipeFrameworkVersion}`,
      { manifest: manifest.recipeFrameworkVersion, cluster: cluster.recipeFrameworkVersion });
  }
  if (cluster.engineVersion !== runtime.engineVersion) {
    return failed('EngineVersionMismatch',
      `cluster runs ${cluster.engineVersion}, runtime has ${runtime.engineVersion}`,
      { cluster: cluster.engineVersion, runtime: runtime.engineVersion });
  }

  return resolved({
    notebookVersion: manifest.notebookVersion,
    recipeFrameworkVersion: manifest.recipeFrameworkVersion,
    engineVersion: cluster.engineVersion,
  });
}
