import type { Cluster, Secrets } from '../../shared/index.js';
import { resolved } from './errors.js';
import type { Resolution } from './errors.js';
import { resolveCredentials } from './secrets.js';
import type { FlowStorage } from './types.js';

/**
 * Where the engine keeps the job definition itself, keyed by the cluster's
 * flow_storage_protocol rather than by any data target.
 */
export function resolveFlowStorage(cluster: Cluster, secrets: Secrets): Resolution<FlowStorage> {
  const credentials = resolveCredentials(
    cluster.flowStorageProtocol,
    cluster.flowStorageOptions,
    secrets,
    'UnsupportedFlowStorage'
  );
  if (!credentials.ok) return credentials;

  const creds = credentials.value;
  switch (creds.protocol) {
    case 's3':
      return resolved({
        kind: 's3',
        bucket: cluster.flowStorage,
        clientOptions: { awsAccessKeyId: creds.key, awsSecretAccessKey: creds.secret },
      });
    case 'abfs':
      return resolved({ kind: 'azure', container: cluster.flowStorage, connectionString: creds.connectionString });
  }
}
