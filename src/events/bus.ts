/**
 * EventBus — in-process publish/subscribe hub.
 *
 * Delivery is synchronous: publish() runs every handler for the topic, in
 * registration order, on the caller's stack, then every wildcard handler.
 * A handler that throws (or returns a promise that rejects) is isolated:
 * the fault is logged and re-published on the `error` topic, and neither
 * the publisher nor sibling handlers ever see it.
 */
import type { Event, PayloadOf } from "./types.ts";
import { Topic, WILDCARD } from "./types.ts";
import { errorToString } from "../infra/errors.ts";
import { shortId } from "../infra/id.ts";
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("event_bus");

export type EventHandler<T extends string = string> = {
  // Method syntax keeps handler parameters bivariant, so a handler typed for
  // one topic can sit in the same registry as handlers for any other.
  bivarianceHack(payload: PayloadOf<T>, topic: string): void | Promise<void>;
}["bivarianceHack"];

/** Token returned by subscribe(); pass it to unsubscribe(). */
export interface Subscription {
  readonly id: number;
  readonly topic: string;
}

interface HandlerEntry {
  id: number;
  handler: EventHandler;
}

const DEFAULT_HISTORY_LIMIT = 1000;

export class EventBus {
  private handlers = new Map<string, HandlerEntry[]>();
  private nextId = 1;
  private _keepHistory: boolean;
  private _historyLimit: number;
  private _history: Event[] = [];

  constructor(opts: { keepHistory?: boolean; historyLimit?: number } = {}) {
    this._keepHistory = opts.keepHistory ?? false;
    this._historyLimit = opts.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  // ── Subscribe / Unsubscribe ──

  /** Register a handler for a topic, or for every topic with `"*"`. */
  subscribe<T extends string>(topic: T, handler: EventHandler<T>): Subscription {
    const id = this.nextId++;
    // Copy-on-write: a publish in progress keeps iterating its own snapshot.
    const list = [...(this.handlers.get(topic) ?? []), { id, handler }];
    this.handlers.set(topic, list);
    return { id, topic };
  }

  /** Remove a subscription. Returns false if it was already gone. */
  unsubscribe(subscription: Subscription): boolean {
    const list = this.handlers.get(subscription.topic);
    if (!list) return false;
    const next = list.filter((entry) => entry.id !== subscription.id);
    if (next.length === list.length) return false;
    if (next.length === 0) {
      this.handlers.delete(subscription.topic);
    } else {
      this.handlers.set(subscription.topic, next);
    }
    return true;
  }

  listenerCount(topic: string): number {
    return this.handlers.get(topic)?.length ?? 0;
  }

  // ── Publish ──

  publish<T extends string>(topic: T, payload: PayloadOf<T>): void {
    if (this._keepHistory) {
      this._history.push(
        Object.freeze({ id: shortId(), topic, payload, timestamp: Date.now() }),
      );
      if (this._history.length > this._historyLimit) {
        this._history.shift();
      }
    }

    const specific = this.handlers.get(topic) ?? [];
    const wildcard = topic === WILDCARD ? [] : (this.handlers.get(WILDCARD) ?? []);
    if (specific.length === 0 && wildcard.length === 0) {
      return;
    }

    for (const entry of [...specific, ...wildcard]) {
      this._safeHandle(entry, topic, payload);
    }
  }

  /**
   * Resolve with the next payload published on `topic` that satisfies
   * `predicate`. Rejects after `timeoutMs`.
   */
  waitFor<T extends string>(
    topic: T,
    opts: { predicate?: (payload: PayloadOf<T>) => boolean; timeoutMs?: number } = {},
  ): Promise<PayloadOf<T>> {
    const timeoutMs = opts.timeoutMs ?? 5000;
    return new Promise<PayloadOf<T>>((resolve, reject) => {
      const subscription = this.subscribe(topic, (payload: PayloadOf<T>) => {
        if (opts.predicate && !opts.predicate(payload)) return;
        clearTimeout(timer);
        this.unsubscribe(subscription);
        resolve(payload);
      });
      const timer = setTimeout(() => {
        this.unsubscribe(subscription);
        reject(new Error(`Timed out after ${timeoutMs}ms waiting for "${topic}"`));
      }, timeoutMs);
    });
  }

  get history(): ReadonlyArray<Event> {
    return this._history;
  }

  // ── Internal ──

  private _safeHandle(entry: HandlerEntry, topic: string, payload: unknown): void {
    try {
      const result = entry.handler(payload, topic);
      if (result instanceof Promise) {
        void result.catch((err: unknown) => this._reportFault(topic, err));
      }
    } catch (err) {
      this._reportFault(topic, err);
    }
  }

  private _reportFault(topic: string, err: unknown): void {
    const error = errorToString(err);
    logger.error({ topic, error }, "handler_error");

    // A failing error reporter must not feed itself.
    if (topic === Topic.ERROR) return;
    this.publish(Topic.ERROR, `Handler for "${topic}" failed: ${error}`);
  }
}
