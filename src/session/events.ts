import { logger } from '../utils/logger.js';
import type { SessionEvent, SessionEventHandler } from './types.js';

const log = logger.child({ component: 'notifications' });

/**
 * Queue of session events dispatched by a single drain loop, so handlers see
 * events one at a time and in publish order. A failing handler is logged and
 * does not stop the others.
 */
export class NotificationChannel {
  private readonly handlers = new Set<SessionEventHandler>();
  private readonly queue: SessionEvent[] = [];
  private draining: Promise<void> | null = null;

  subscribe(handler: SessionEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  publish(event: SessionEvent): void {
    this.queue.push(event);
    if (!this.draining) {
      this.draining = this.run();
    }
  }

  /**
   * Resolves once every event published so far has been dispatched.
   */
  async drain(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  get pending(): number {
    return this.queue.length;
  }

  private async run(): Promise<void> {
    // Let the publisher finish its synchronous work first.
    await Promise.resolve();

    let event = this.queue.shift();
    while (event) {
      await this.dispatch(event);
      event = this.queue.shift();
    }
    this.draining = null;
  }

  private async dispatch(event: SessionEvent): Promise<void> {
    for (const handler of Array.from(this.handlers)) {
      try {
        await handler(event);
      } catch (err) {
        log.error({ err, event: event.type }, 'Notification handler failed');
      }
    }
  }
}
