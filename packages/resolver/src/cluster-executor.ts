/**
 * Cluster Executor Builder — the scalable worker pool a job's tasks run on
 *
 * Worker sizing comes from the manifest's resource hint when there is one,
 * otherwise from the cluster type's defaults. Every executor scales
 * adaptively between MIN_WORKERS and the cluster's max_workers.
 */

import { AKS_CLUSTER, FARGATE_CLUSTER } from '../../shared/index.js';
import type { Cluster, ResourceHint, Secrets } from '../../shared/index.js';
import { failed, resolved } from './errors.js';
import type { Resolution } from './errors.js';
import { RECIPES_LOGGER } from './recipes.js';
import { requireSecret } from './secrets.js';
import type {
  AdaptiveScaling,
  BuildContext,
  ContainerSpec,
  EnvVar,
  ExecutorConfig,
  PodSpec,
  ResourceTags,
} from './types.js';

export const MIN_WORKERS = 5;

/** cpu units / MiB for Fargate, millicores / MiB for Kubernetes. */
export const DEFAULT_WORKER_RESOURCES: Record<string, ResourceHint> = {
  [FARGATE_CLUSTER]: { cpu: 1024, memory: 4096 },
  [AKS_CLUSTER]: { cpu: 250, memory: 512 },
};

export const FARGATE_SCHEDULER = { cpu: 2048, memory: 16384 };
export const FARGATE_SCHEDULER_TIMEOUT = '15 minutes';

export const KUBERNETES_SCHEDULER_REQUESTS = { cpu: '2048m', memory: '10000Mi' };

export const STORAGE_CONNECTION_ENV = 'AZURE_STORAGE_CONNECTION_STRING';

export function resourceTags(ctx: BuildContext): ResourceTags {
  return { Project: ctx.projectTag, Recipe: ctx.recipeId };
}

export function workerResources(cluster: Cluster, hint: ResourceHint | undefined): ResourceHint | null {
  if (hint) return hint;
  return DEFAULT_WORKER_RESOURCES[cluster.type] ?? null;
}

interface PodSpecInput {
  image: string;
  labels: Record<string, string>;
  args: string[];
  cpuRequest: string;
  memoryRequest: string;
  env?: Record<string, string>;
}

export function makePodSpec(input: PodSpecInput): PodSpec {
  const env: EnvVar[] = Object.entries(input.env ?? {}).map(([name, value]) => ({ name, value }));
  const container: ContainerSpec = {
    name: 'dask',
    image: input.image,
    args: input.args,
    env,
    resources: { requests: { cpu: input.cpuRequest, memory: input.memoryRequest } },
  };
  return {
    apiVersion: 'v1',
    kind: 'Pod',
    metadata: { labels: { ...input.labels } },
    spec: { restartPolicy: 'Never', containers: [container] },
  };
}

export function buildExecutor(
  cluster: Cluster,
  hint: ResourceHint | undefined,
  ctx: BuildContext,
  secrets: Secrets
): Resolution<ExecutorConfig> {
  const worker = workerResources(cluster, hint);
  if (!worker) {
    return failed('UnsupportedClusterType', `cluster type "${cluster.type}" is not supported`, { type: cluster.type });
  }

  const adapt: AdaptiveScaling = { minimum: MIN_WORKERS, maximum: cluster.maxWorkers };
  const tags = resourceTags(ctx);

  switch (cluster.type) {
    case FARGATE_CLUSTER: {
      const options = cluster.clusterOptions;
      return resolved({
        kind: 'fargate',
        image: cluster.workerImage,
        vpc: options.vpc ?? null,
        clusterArn: options.clusterArn ?? null,
        taskRoleArn: options.taskRoleArn ?? null,
        executionRoleArn: options.executionRoleArn ?? null,
        securityGroups: options.securityGroups ?? [],
        schedulerCpu: FARGATE_SCHEDULER.cpu,
        schedulerMem: FARGATE_SCHEDULER.memory,
        workerCpu: worker.cpu,
        workerMem: worker.memory,
        schedulerTimeout: FARGATE_SCHEDULER_TIMEOUT,
        environment: {
          BAKELINE__LOGGING__EXTRA_LOGGERS: JSON.stringify([RECIPES_LOGGER]),
          MALLOC_TRIM_THRESHOLD_: '0',
        },
        tags,
        adapt,
      });
    }

    case AKS_CLUSTER: {
      const connection = flowStorageSecret(cluster, secrets);
      if (!connection.ok) return connection;

      const labels = { Recipe: tags.Recipe, Project: tags.Project };
      return resolved({
        kind: 'kubernetes',
        podTemplate: makePodSpec({
          image: cluster.workerImage,
          labels,
          args: ['dask-worker', '$(DASK_SCHEDULER_ADDRESS)', '--nthreads', '1', '--death-timeout', '60'],
          cpuRequest: `${worker.cpu}m`,
          memoryRequest: `${worker.memory}Mi`,
          env: { [STORAGE_CONNECTION_ENV]: connection.value },
        }),
        schedulerPodTemplate: makePodSpec({
          image: cluster.workerImage,
          labels: { ...labels, component: 'scheduler' },
          args: ['dask-scheduler'],
          cpuRequest: KUBERNETES_SCHEDULER_REQUESTS.cpu,
          memoryRequest: KUBERNETES_SCHEDULER_REQUESTS.memory,
        }),
        adapt,
      });
    }

    default:
      return failed('UnsupportedClusterType', `cluster type "${cluster.type}" is not supported`, { type: cluster.type });
  }
}

/** The flow-storage connection secret injected into Kubernetes pods. */
export function flowStorageSecret(cluster: Cluster, secrets: Secrets): Resolution<string> {
  const name = cluster.flowStorageOptions.secret;
  if (!name) {
    return failed('UnsupportedFlowStorage', 'flow storage options need "secret"', { type: cluster.type });
  }
  return requireSecret(secrets, name);
}
