/**
 * Target Resolver — storage handles for a recipe's output and caches
 *
 * One filesystem handle per recipe, shared by the output target, the input
 * cache and the metadata cache. Paths are derived, never configured:
 *
 *   {protocol}://{targetName}/{namespace}/{recipeId}.{extension}
 *   {protocol}://{targetName}/{namespace}/{recipeId}/cache
 *   {protocol}://{targetName}/{namespace}/{recipeId}/cache/metadata
 */

import type { Secrets, TargetDescriptor } from '../../shared/index.js';
import { resolved } from './errors.js';
import type { Resolution } from './errors.js';
import { resolveCredentials } from './secrets.js';
import type { Credentials } from './secrets.js';
import type { FilesystemOptions, StorageFilesystem, TargetPaths, Targets } from './types.js';

export interface TargetLocation {
  targetName: string;
  namespace: string;
  recipeId: string;
  extension: string;
}

/** Hands the options back as an immutable handle; no connection is made here. */
export const descriptorFilesystem: StorageFilesystem = {
  open(options) {
    return Object.freeze({ protocol: options.protocol, options: Object.freeze({ ...options }) });
  },
};

export function deriveTargetPaths(protocol: string, location: TargetLocation): TargetPaths {
  const base = `${protocol}://${location.targetName}/${location.namespace}/${location.recipeId}`;
  return {
    target: `${base}.${location.extension}`,
    cache: `${base}/cache`,
    metadata: `${base}/cache/metadata`,
  };
}

function filesystemOptions(credentials: Credentials): FilesystemOptions {
  switch (credentials.protocol) {
    case 's3':
      // Caching stays off at this layer; the input cache does its own.
      return {
        protocol: 's3',
        anon: false,
        defaultCacheType: 'none',
        defaultFillCache: false,
        key: credentials.key,
        secret: credentials.secret,
      };
    case 'abfs':
      return { protocol: 'abfs', connectionString: credentials.connectionString };
  }
}

export function resolveTargets(
  descriptor: TargetDescriptor,
  location: TargetLocation,
  secrets: Secrets,
  filesystems: StorageFilesystem = descriptorFilesystem
): Resolution<Targets> {
  const credentials = resolveCredentials(descriptor.protocol, descriptor.storageOptions, secrets, 'UnsupportedTarget');
  if (!credentials.ok) return credentials;

  const fs = filesystems.open(filesystemOptions(credentials.value));
  const paths = deriveTargetPaths(descriptor.protocol, location);

  return resolved({
    target: { role: 'output', fs, rootPath: paths.target },
    cache: { role: 'input-cache', fs, rootPath: paths.cache },
    metadata: { role: 'metadata-cache', fs, rootPath: paths.metadata },
  });
}
