// In-memory event pub/sub for registry change notifications

import { errorData, type Logger } from '../logging/index.js';

export type EventHandler<E> = (event: E) => void;

/**
 * Event bus keyed by topic.
 *
 * Handlers run synchronously in subscription order. A handler that throws is
 * logged and skipped; the remaining handlers still run.
 */
export class EventBus<K, E> {
  private subscriptions = new Map<K, Set<EventHandler<E>>>();

  constructor(private readonly logger: Logger) {}

  /**
   * Subscribe to events for a topic.
   *
   * @returns Unsubscribe function
   */
  subscribe(topic: K, handler: EventHandler<E>): () => void {
    let subs = this.subscriptions.get(topic);
    if (!subs) {
      subs = new Set();
      this.subscriptions.set(topic, subs);
    }

    // Wrap so the same function can be subscribed twice
    const entry: EventHandler<E> = (event) => handler(event);
    subs.add(entry);

    return () => {
      const current = this.subscriptions.get(topic);
      if (current) {
        current.delete(entry);
        if (current.size === 0) {
          this.subscriptions.delete(topic);
        }
      }
    };
  }

  publish(topic: K, event: E): void {
    const subs = this.subscriptions.get(topic);
    if (!subs || subs.size === 0) {
      return;
    }

    for (const handler of [...subs]) {
      try {
        handler(event);
      } catch (error) {
        // Log but don't fail other handlers
        this.logger.error('Event handler error', { topic: String(topic), ...errorData(error) });
      }
    }
  }

  subscriberCount(topic: K): number {
    return this.subscriptions.get(topic)?.size ?? 0;
  }

  clear(): void {
    this.subscriptions.clear();
  }
}
