/**
 * Bakeline Event Bus — Registration Progress Events
 *
 * In-process pub/sub. The orchestrator publishes, the CLI and the tests
 * subscribe to what they need.
 *
 * Orchestrator publishes: registration.started, registration.job_registered,
 * registration.run_created, registration.completed, registration.failed
 */

import type { EventChannel, BusEvent, EventHandler } from '../types/index.js';
import { getLogger } from '../logger/index.js';

export type WildcardChannel = EventChannel | '*' | `${string}.*`;

interface Subscription {
  id: number;
  pattern: WildcardChannel;
  handler: EventHandler;
  once: boolean;
}

const log = getLogger('event-bus');

/** `*` takes everything, `registration.*` everything under that prefix. */
function matches(pattern: WildcardChannel, channel: EventChannel): boolean {
  if (pattern === '*' || pattern === channel) return true;
  return pattern.endsWith('.*') && channel.startsWith(pattern.slice(0, -1));
}

export class EventBus {
  private byPattern = new Map<WildcardChannel, Map<number, Subscription>>();
  private recent: BusEvent[] = [];
  private readonly maxHistory: number;
  private nextId = 0;

  constructor(opts?: { maxHistory?: number }) {
    this.maxHistory = opts?.maxHistory ?? 1000;
  }

  /** Returns the unsubscribe function. */
  on(pattern: WildcardChannel, handler: EventHandler): () => void {
    return this.add(pattern, handler, false);
  }

  once(pattern: WildcardChannel, handler: EventHandler): () => void {
    return this.add(pattern, handler, true);
  }

  /**
   * Handlers run one after another in subscription order. A throwing
   * handler is logged and the rest still run.
   */
  async emit<T = unknown>(event: BusEvent<T>): Promise<void> {
    this.remember(event);

    for (const sub of this.subscribersOf(event.channel)) {
      if (sub.once) this.remove(sub);
      try {
        await sub.handler(event);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.error(`Handler error on ${event.channel}`, { error: message });
      }
    }
  }

  /** The last `limit` events kept, oldest first. */
  getHistory(channel?: EventChannel, limit = 100): BusEvent[] {
    const events = channel === undefined ? this.recent : this.recent.filter(e => e.channel === channel);
    return events.slice(-limit);
  }

  /** Live subscriptions per pattern. */
  getStats(): Record<string, number> {
    const stats: Record<string, number> = {};
    for (const [pattern, subs] of this.byPattern) {
      stats[pattern] = subs.size;
    }
    return stats;
  }

  private remember(event: BusEvent): void {
    this.recent.push(event);
    const excess = this.recent.length - this.maxHistory;
    if (excess > 0) this.recent.splice(0, excess);
  }

  private subscribersOf(channel: EventChannel): Subscription[] {
    const found: Subscription[] = [];
    for (const [pattern, subs] of this.byPattern) {
      if (matches(pattern, channel)) found.push(...subs.values());
    }
    return found.sort((a, b) => a.id - b.id);
  }

  private add(pattern: WildcardChannel, handler: EventHandler, once: boolean): () => void {
    const sub: Subscription = { id: ++this.nextId, pattern, handler, once };
    let subs = this.byPattern.get(pattern);
    if (!subs) {
      subs = new Map();
      this.byPattern.set(pattern, subs);
    }
    subs.set(sub.id, sub);
    return () => this.remove(sub);
  }

  private remove(sub: Subscription): void {
    const subs = this.byPattern.get(sub.pattern);
    if (!subs) return;
    subs.delete(sub.id);
    if (subs.size === 0) this.byPattern.delete(sub.pattern);
  }
}

/**
 * Helper to create a typed event with defaults.
 */
export function createEvent<T>(
  channel: EventChannel,
  source: BusEvent['source'],
  payload: T,
  opts?: { bakeryId?: string; recipeId?: string }
): BusEvent<T> {
  return {
    channel,
    timestamp: new Date().toISOString(),
    source,
    bakeryId: opts?.bakeryId ?? null,
    recipeId: opts?.recipeId ?? null,
    payload,
  };
}
