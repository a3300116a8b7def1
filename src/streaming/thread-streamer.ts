import type { WebClient } from '@slack/web-api';
import type { MessageChunk } from '../output/types.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'thread-streamer' });

/**
 * Posts one message and returns its timestamp, or null if the transport did
 * not report one.
 */
export interface MessagePoster {
  post(text: string): Promise<string | null>;
}

export class SlackThreadPoster implements MessagePoster {
  constructor(
    private client: WebClient,
    readonly channelId: string,
    readonly threadTs: string | null
  ) {}

  async post(text: string): Promise<string | null> {
    const result = await this.client.chat.postMessage({
      channel: this.channelId,
      thread_ts: this.threadTs ?? undefined,
      text,
      unfurl_links: false,
      unfurl_media: false,
    });
    return result.ts ?? null;
  }
}

const CHUNK_PREFIX: Record<MessageChunk['type'], string> = {
  error: ':x: ',
  warning: ':warning: ',
  success: ':white_check_mark: ',
  info: ':information_source: ',
  code: '',
  normal: '',
  progress: ':hourglass_flowing_sand: ',
};

export interface ThreadStreamerOptions {
  /** Minimum spacing between two posts. */
  minIntervalMs?: number;
  /** Hard ceiling of the transport; decorated text never exceeds it. */
  transportLimit?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Delivers chunk batches to one thread, strictly in order and spaced out to
 * stay clear of rate limits. A failed post is logged and the rest still go
 * out.
 */
export class ThreadStreamer {
  private queue: Promise<void> = Promise.resolve();
  private lastPostAt: number | null = null;
  private isFinalized = false;
  private messageCount = 0;

  private readonly minIntervalMs: number;
  private readonly transportLimit: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => number;

  constructor(private poster: MessagePoster, options: ThreadStreamerOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 500;
    this.transportLimit = options.transportLimit ?? 2000;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
  }

  get posted(): number {
    return this.messageCount;
  }

  get finalized(): boolean {
    return this.isFinalized;
  }

  idle(): Promise<void> {
    return this.queue;
  }

  /**
   * Queue a batch. Resolves once the batch has been handed to the poster.
   */
  enqueue(chunks: MessageChunk[]): Promise<void> {
    if (this.isFinalized || chunks.length === 0) {
      return this.queue;
    }

    const texts = chunks.map(chunk => this.render(chunk));
    return this.schedule(texts);
  }

  sendImmediate(text: string): Promise<void> {
    if (this.isFinalized) {
      return this.queue;
    }
    return this.schedule([text]);
  }

  /**
   * Post an optional closing status after everything already queued and
   * refuse further batches.
   */
  async finalize(status?: string): Promise<void> {
    if (this.isFinalized) {
      await this.queue;
      return;
    }

    const done = status ? this.schedule([status]) : this.queue;
    this.isFinalized = true;
    await done;
  }

  private schedule(texts: string[]): Promise<void> {
    this.queue = this.queue.then(async () => {
      for (const text of texts) {
        await this.postSpaced(text);
      }
    });
    return this.queue;
  }

  private render(chunk: MessageChunk): string {
    const prefixed = CHUNK_PREFIX[chunk.type] + chunk.content;
    return prefixed.length <= this.transportLimit ? prefixed : chunk.content;
  }

  private async postSpaced(text: string): Promise<void> {
    if (this.lastPostAt !== null) {
      const wait = this.lastPostAt + this.minIntervalMs - this.clock();
      if (wait > 0) {
        await this.sleep(wait);
      }
    }

    try {
      await this.poster.post(text);
      this.messageCount++;
    } catch (err) {
      log.error({ err, length: text.length }, 'Failed to post message');
    } finally {
      this.lastPostAt = this.clock();
    }
  }
}
