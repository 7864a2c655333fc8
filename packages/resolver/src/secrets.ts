/**
 * Secret lookup and credential resolution shared by the storage resolvers.
 *
 * Storage options only ever hold secret *names*; values are read from the
 * caller's Secrets table at resolution time and never cached here.
 */

import { ABFS_PROTOCOL, S3_PROTOCOL } from '../../shared/index.js';
import type { Secrets, StorageOptions } from '../../shared/index.js';
import { failed, resolved } from './errors.js';
import type { DispatchErrorKind, Resolution } from './errors.js';

export type Credentials =
  | { protocol: 's3'; key: string; secret: string }
  | { protocol: 'abfs'; connectionString: string };

export function requireSecret(secrets: Secrets, name: string): Resolution<string> {
  if (!Object.prototype.hasOwnProperty.call(secrets, name)) {
    return failed('MissingSecret', `secret "${name}" is not available`, { name });
  }
  return resolved(secrets[name]);
}

/**
 * `s3` needs a key and a secret, `abfs` a single connection-string secret.
 * Missing options and unknown protocols fail with `unsupported`.
 */
export function resolveCredentials(
  protocol: string,
  options: StorageOptions | undefined,
  secrets: Secrets,
  unsupported: DispatchErrorKind
): Resolution<Credentials> {
  if (protocol === S3_PROTOCOL) {
    if (!options?.key || !options.secret) {
      return failed(unsupported, `protocol "${protocol}" needs storage options "key" and "secret"`, { protocol });
    }
    const key = requireSecret(secrets, options.key);
    if (!key.ok) return key;
    const secret = requireSecret(secrets, options.secret);
    if (!secret.ok) return secret;
    return resolved({ protocol: 's3', key: key.value, secret: secret.value });
  }

  if (protocol === ABFS_PROTOCOL) {
    if (!options?.secret) {
      return failed(unsupported, `protocol "${protocol}" needs storage option "secret"`, { protocol });
    }
    const connectionString = requireSecret(secrets, options.secret);
    if (!connectionString.ok) return connectionString;
    return resolved({ protocol: 'abfs', connectionString: connectionString.value });
  }

  return failed(unsupported, `protocol "${protocol}" is not supported`, { protocol });
}
