/**
 * Workflow Engine Client
 *
 * Thin wrapper around fetch for the engine's registration API. Jobs are
 * sent in their serialisable form: task names and retry policy, plus the
 * storage, run config and executor descriptors.
 */

import type {
  AutomationHookRegistrar,
  Job,
  WorkflowEngineClient,
} from '../../resolver/src/index.js';

export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) =>
  Promise<{ ok: boolean; status: number; statusText: string; json(): Promise<unknown> }>;

export interface EngineClientOptions {
  baseUrl: string;
  apiKey?: string;
  fetchImpl?: FetchLike;
}

export interface SerializedJob {
  name: string;
  tasks: Array<{ name: string; maxRetries: number; retryDelayMs: number }>;
  storage: Job['storage'];
  runConfig: Job['runConfig'];
  executor: Job['executor'];
}

export function serializeJob(job: Job): SerializedJob {
  return {
    name: job.name,
    tasks: job.tasks.map(t => ({ name: t.name, maxRetries: t.maxRetries, retryDelayMs: t.retryDelayMs })),
    storage: job.storage,
    runConfig: job.runConfig,
    executor: job.executor,
  };
}

function readId(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string') {
    return body.id;
  }
  throw new Error('Workflow engine error: response has no "id"');
}

class EngineHttp {
  private baseUrl: string;
  private apiKey: string | undefined;
  private fetchImpl: FetchLike;

  constructor(opts: EngineClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.apiKey = opts.apiKey;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async post(path: string, payload: unknown): Promise<string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method: 'POST',
      headers,
      body: JSON.stringify(payload),
    });
    if (!res.ok) throw new Error(`Workflow engine error: ${res.status} ${res.statusText}`);
    return readId(await res.json());
  }
}

export class HttpWorkflowEngine implements WorkflowEngineClient {
  private http: EngineHttp;

  constructor(opts: EngineClientOptions) {
    this.http = new EngineHttp(opts);
  }

  register(job: Job, project: string): Promise<string> {
    return this.http.post(`/projects/${encodeURIComponent(project)}/flows`, serializeJob(job));
  }

  createRun(jobId: string, runName: string): Promise<string> {
    return this.http.post(`/flows/${encodeURIComponent(jobId)}/runs`, { name: runName });
  }
}

/** Registers the follow-up hook that reports a run's outcome with the bot token. */
export class HttpAutomationHooks implements AutomationHookRegistrar {
  private http: EngineHttp;

  constructor(opts: EngineClientOptions) {
    this.http = new EngineHttp(opts);
  }

  register(jobId: string, botToken: string): Promise<string> {
    return this.http.post('/automations', {
      flowId: jobId,
      trigger: 'flow_run.completed',
      action: { type: 'notify', token: botToken },
    });
  }
}
