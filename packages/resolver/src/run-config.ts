/**
 * Run Config Builder — the environment of a job's driver process
 *
 * The driver orchestrates the job; it is sized and placed separately from
 * the worker pool built by the cluster executor.
 */

import { AKS_CLUSTER, FARGATE_CLUSTER } from '../../shared/index.js';
import type { Cluster, Secrets } from '../../shared/index.js';
import {
  FARGATE_SCHEDULER,
  KUBERNETES_SCHEDULER_REQUESTS,
  STORAGE_CONNECTION_ENV,
  flowStorageSecret,
  resourceTags,
} from './cluster-executor.js';
import { failed, resolved } from './errors.js';
import type { Resolution } from './errors.js';
import type { BuildContext, JobTemplate, RunConfig } from './types.js';

export const SAFE_TO_EVICT_ANNOTATION = 'cluster-autoscaler.kubernetes.io/safe-to-evict';

function driverJobTemplate(): JobTemplate {
  return {
    apiVersion: 'batch/v1',
    kind: 'Job',
    // The autoscaler must not evict a running driver.
    metadata: { annotations: { [SAFE_TO_EVICT_ANNOTATION]: 'false' } },
    spec: { template: { spec: { containers: [{ name: 'flow' }] } } },
  };
}

export function buildRunConfig(
  cluster: Cluster,
  bakeryId: string,
  ctx: BuildContext,
  secrets: Secrets
): Resolution<RunConfig> {
  switch (cluster.type) {
    case FARGATE_CLUSTER: {
      const tags = resourceTags(ctx);
      return resolved({
        kind: 'ecs',
        image: cluster.workerImage,
        labels: [bakeryId],
        taskDefinition: {
          networkMode: 'awsvpc',
          cpu: FARGATE_SCHEDULER.cpu,
          memory: FARGATE_SCHEDULER.memory,
          containerDefinitions: [{ name: 'flow' }],
          executionRoleArn: cluster.clusterOptions.executionRoleArn ?? null,
        },
        runTaskTags: [
          { key: 'Project', value: tags.Project },
          { key: 'Recipe', value: tags.Recipe },
        ],
      });
    }

    case AKS_CLUSTER: {
      const connection = flowStorageSecret(cluster, secrets);
      if (!connection.ok) return connection;

      return resolved({
        kind: 'kubernetes',
        image: cluster.workerImage,
        labels: [bakeryId],
        jobTemplate: driverJobTemplate(),
        memoryRequest: KUBERNETES_SCHEDULER_REQUESTS.memory,
        cpuRequest: KUBERNETES_SCHEDULER_REQUESTS.cpu,
        env: { [STORAGE_CONNECTION_ENV]: connection.value },
      });
    }

    default:
      return failed('UnsupportedClusterType', `cluster type "${cluster.type}" is not supported`, { type: cluster.type });
  }
}
