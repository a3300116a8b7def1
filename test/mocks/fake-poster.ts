import type { MessagePoster } from '../../src/streaming/thread-streamer.js';

/**
 * Records posted messages instead of calling the chat API.
 */
export class RecordingPoster implements MessagePoster {
  readonly posts: string[] = [];
  /** Number of upcoming posts that should fail. */
  failures = 0;

  constructor(readonly channelId = 'C1', readonly threadTs: string | null = null) {}

  async post(text: string): Promise<string | null> {
    if (this.failures > 0) {
      this.failures--;
      throw new Error('chat API unavailable');
    }
    this.posts.push(text);
    return `${this.posts.length}.000`;
  }
}
