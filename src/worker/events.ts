/**
 * Lifecycle event bus
 * Carries state changes from the capture side to presentation. Events queue up in FIFO
 * order until the presenter drains them on its poll tick; local subscribers (logging)
 * are notified synchronously.
 */

import type { Language } from '../config';

export type LifecycleEvent =
  | { type: 'model-loading' }
  | { type: 'model-ready' }
  | { type: 'model-load-failed'; reason: string }
  | { type: 'listening-started'; language: Language }
  | { type: 'listening-stopped' }
  | { type: 'language-switched'; language: Language };

type EventCallback = (event: LifecycleEvent) => void;

export class EventBus {
  private pending: LifecycleEvent[] = [];
  private subscribers = new Set<EventCallback>();

  post(event: LifecycleEvent): void {
    this.pending.push(Object.freeze(event));

    for (const cb of this.subscribers) {
      try {
        cb(event);
      } catch (err) {
        console.error(`[Events] Subscriber error for ${event.type}:`, err);
      }
    }
  }

  /**
   * Take every queued event, oldest first. Each event is handed out once.
   */
  drain(): LifecycleEvent[] {
    return this.pending.splice(0);
  }

  subscribe(callback: EventCallback): () => void {
    this.subscribers.add(callback);
    return () => {
      this.subscribers.delete(callback);
    };
  }

  get size(): number {
    return this.pending.length;
  }
}
