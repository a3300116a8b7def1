import type { SlackContext, ConnectionStore, CommandResult } from './types.js';
import type { SessionManager } from '../session/manager.js';
import type { SessionEvent, TransportHandle } from '../session/types.js';
import { parseInlineCommand, parseSubcommand, executeCommand } from './commands.js';
import { ThreadStreamer, type MessagePoster } from '../streaming/thread-streamer.js';
import { isInteractivePrompt } from '../output/normalizer.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'slack-handlers' });

export type PosterFactory = (channelId: string, threadTs: string | null) => MessagePoster;

export interface ReplyOptions {
  /** Only the sender should see the reply. */
  ephemeral: boolean;
}

export type Reply = (text: string, options: ReplyOptions) => Promise<void>;

export interface SlackBridgeOptions {
  minPostIntervalMs?: number;
  transportLimit?: number;
}

const PROMPT_HINT = '_The process is waiting for an answer. Reply with `/y` or `/n`, or send text._';

function sameTarget(handle: TransportHandle, channelId: string, threadTs: string | null): boolean {
  return handle.channelId === channelId && handle.threadTs === threadTs;
}

/**
 * Connects chat users to sessions and session output to chat threads.
 */
export class SlackBridge implements ConnectionStore {
  private connections = new Map<string, string>();
  private streamers = new Map<string, { streamer: ThreadStreamer; channelId: string; threadTs: string | null }>();

  constructor(
    private sessionManager: SessionManager,
    private posterFactory: PosterFactory,
    private options: SlackBridgeOptions = {}
  ) {}

  getConnection(userId: string): string | null {
    const sessionId = this.connections.get(userId);
    if (!sessionId) return null;

    if (!this.sessionManager.getSession(sessionId)) {
      this.connections.delete(userId);
      return null;
    }
    return sessionId;
  }

  connect(userId: string, sessionId: string, ctx: SlackContext): boolean {
    const attached = this.sessionManager.attachTransport(sessionId, {
      channelId: ctx.channelId,
      threadTs: ctx.threadTs,
      attachedBy: userId,
      attachedAt: new Date().toISOString(),
    });
    if (!attached) return false;

    this.connections.set(userId, sessionId);
    log.info({ userId, sessionId, channelId: ctx.channelId }, 'User connected to session');
    return true;
  }

  disconnect(userId: string): string | null {
    const sessionId = this.connections.get(userId);
    if (!sessionId) return null;

    this.connections.delete(userId);
    const session = this.sessionManager.getSession(sessionId);
    if (session?.transport?.attachedBy === userId) {
      this.sessionManager.detachTransport(sessionId);
    }

    log.info({ userId, sessionId }, 'User disconnected from session');
    return sessionId;
  }

  /**
   * A chat message: either an inline command or input for the connected
   * session.
   */
  async handleMessage(ctx: SlackContext, text: string, reply: Reply): Promise<void> {
    const command = parseInlineCommand(text);
    if (command) {
      const result = await executeCommand(command, ctx, {
        sessionManager: this.sessionManager,
        connections: this,
      });
      await reply(result.text, { ephemeral: result.ephemeral ?? false });
      return;
    }

    const sessionId = this.getConnection(ctx.userId);
    if (!sessionId) {
      await reply('You are not connected to a session. Use `/new` to start one or `/connect <id>` to join one.', {
        ephemeral: true,
      });
      return;
    }

    if (!this.sessionManager.sendCommand(sessionId, text)) {
      await reply(`Session \`${sessionId}\` is not active. Use \`/new\` to start a new one.`, { ephemeral: true });
    }
  }

  async handleSlashCommand(ctx: SlackContext, commandText: string): Promise<CommandResult> {
    const command = parseSubcommand(commandText);
    log.debug({ command: command.type, userId: ctx.userId }, 'Handling slash command');

    return executeCommand(command, ctx, {
      sessionManager: this.sessionManager,
      connections: this,
    });
  }

  async handleEvent(event: SessionEvent): Promise<void> {
    switch (event.type) {
      case 'sessionCreated':
        log.debug({ sessionId: event.session.id }, 'Session created');
        return;

      case 'output': {
        if (!event.transport) return;

        const streamer = this.streamerFor(event.sessionId, event.transport);
        streamer.enqueue(event.chunks).catch(err => {
          log.error({ err, sessionId: event.sessionId }, 'Failed to stream output');
        });

        if (event.chunks.some(chunk => isInteractivePrompt(chunk.content))) {
          streamer.sendImmediate(PROMPT_HINT).catch(err => {
            log.error({ err, sessionId: event.sessionId }, 'Failed to send prompt hint');
          });
        }
        return;
      }

      case 'processExited': {
        const code = event.exit.signal ?? String(event.exit.code);
        await this.closeSession(event.sessionId, `Process exited (${code}). Use \`/new\` to start a new session.`, false);
        return;
      }

      case 'sessionTerminated':
        await this.closeSession(event.sessionId, `Session \`${event.sessionId}\` ended.`, true);
        return;
    }
  }

  /**
   * Resolves once every queued post has gone out.
   */
  async idle(): Promise<void> {
    await Promise.all(Array.from(this.streamers.values(), ({ streamer }) => streamer.idle()));
  }

  private streamerFor(sessionId: string, handle: TransportHandle): ThreadStreamer {
    const existing = this.streamers.get(sessionId);
    if (existing && sameTarget(handle, existing.channelId, existing.threadTs)) {
      return existing.streamer;
    }

    const streamer = new ThreadStreamer(this.posterFactory(handle.channelId, handle.threadTs), {
      minIntervalMs: this.options.minPostIntervalMs,
      transportLimit: this.options.transportLimit,
    });
    this.streamers.set(sessionId, { streamer, channelId: handle.channelId, threadTs: handle.threadTs });
    return streamer;
  }

  private async closeSession(sessionId: string, status: string, removed: boolean): Promise<void> {
    if (removed) {
      for (const [userId, connected] of this.connections) {
        if (connected === sessionId) {
          this.connections.delete(userId);
        }
      }
    }

    const entry = this.streamers.get(sessionId);
    if (!entry) return;

    if (removed) {
      this.streamers.delete(sessionId);
      await entry.streamer.finalize(status);
    } else {
      await entry.streamer.sendImmediate(status);
    }
  }
}
