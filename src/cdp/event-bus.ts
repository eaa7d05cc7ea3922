import type { EventFrame, EventHandler } from '../types/cdp.js';
import { createLogger } from '../logging/logger.js';

const log = createLogger('event-bus');

export const DEFAULT_QUEUE_CAPACITY = 1000;

interface Subscriber {
  id: number;
  prefix: string;
  handler: EventHandler;
  queue: EventFrame[];
  draining: boolean;
  active: boolean;
}

/**
 * Publish/subscribe keyed by method prefix. Each subscriber owns a bounded
 * queue drained off the publisher's call stack, so a slow handler never
 * stalls frame delivery, and events reach a subscriber in arrival order.
 */
export class EventBus {
  private subscribers: Subscriber[] = [];
  private nextId = 1;

  constructor(private capacity: number = DEFAULT_QUEUE_CAPACITY) {}

  subscribe(prefix: string, handler: EventHandler): () => void {
    const subscriber: Subscriber = {
      id: this.nextId++,
      prefix,
      handler,
      queue: [],
      draining: false,
      active: true,
    };
    this.subscribers.push(subscriber);

    return () => {
      subscriber.active = false;
      subscriber.queue.length = 0;
      this.subscribers = this.subscribers.filter((s) => s.id !== subscriber.id);
    };
  }

  /** Number of subscribers whose prefix matches the method. */
  publish(event: EventFrame): number {
    let matched = 0;
    for (const subscriber of this.subscribers) {
      if (!event.method.startsWith(subscriber.prefix)) continue;
      matched++;
      if (subscriber.queue.length >= this.capacity) {
        const dropped = subscriber.queue.shift();
        log.warn('Subscriber queue full, dropping oldest event', {
          prefix: subscriber.prefix,
          dropped: dropped?.method,
        });
      }
      subscriber.queue.push(event);
      this.scheduleDrain(subscriber);
    }
    return matched;
  }

  get size(): number {
    return this.subscribers.length;
  }

  clear(): void {
    for (const subscriber of this.subscribers) {
      subscriber.active = false;
      subscriber.queue.length = 0;
    }
    this.subscribers = [];
  }

  private scheduleDrain(subscriber: Subscriber): void {
    if (subscriber.draining) return;
    subscriber.draining = true;
    setImmediate(() => {
      void this.drain(subscriber);
    });
  }

  private async drain(subscriber: Subscriber): Promise<void> {
    while (subscriber.active && subscriber.queue.length > 0) {
      const event = subscriber.queue.shift();
      if (!event) break;
      try {
        await subscriber.handler(event);
      } catch (error) {
        log.error('Event handler failed', {
          prefix: subscriber.prefix,
          method: event.method,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    subscriber.draining = false;
  }
}
