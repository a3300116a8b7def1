import path from 'path';
import { customAlphabet } from 'nanoid';
import pLimit from 'p-limit';
import { OutputBuffer, type OutputBufferOptions } from '../output/buffer.js';
import { clean } from '../output/normalizer.js';
import type { MessageChunk } from '../output/types.js';
import { ProcessController } from '../process/controller.js';
import type { ProcessExit, ProcessFactory } from '../process/types.js';
import { IdSpaceExhaustedError, SessionNotFoundError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { NotificationChannel } from './events.js';
import { Session } from './session.js';
import type { SessionEventHandler, SessionStats, TransportHandle } from './types.js';

const log = logger.child({ component: 'session-manager' });

const ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const ID_LENGTH = 6;
const MAX_ID_ATTEMPTS = 10_000;

export type SessionBufferOptions = Omit<OutputBufferOptions, 'sessionId' | 'clock'>;

export interface SessionManagerOptions {
  command: string;
  args?: string[];
  defaultWorkingDirectory: string;
  sessionTimeoutMs?: number;
  cleanupIntervalMs?: number;
  maxHistoryLength?: number;
  maxOutputHistory?: number;
  /** SIGTERM grace window handed to each process. */
  graceMs?: number;
  buffer?: SessionBufferOptions;
  processFactory?: ProcessFactory;
  idGenerator?: () => string;
  maxIdAttempts?: number;
  clock?: () => number;
}

const defaultProcessFactory: ProcessFactory = (config) => new ProcessController(config);

export class SessionManager {
  readonly notifications = new NotificationChannel();

  private readonly sessions = new Map<string, Session>();
  private readonly reserved = new Set<string>();
  private readonly lock = pLimit(1);

  private readonly command: string;
  private readonly args: string[];
  private readonly defaultWorkingDirectory: string;
  private readonly sessionTimeoutMs: number;
  private readonly cleanupIntervalMs: number;
  private readonly maxHistoryLength: number;
  private readonly maxOutputHistory: number;
  private readonly graceMs: number | undefined;
  private readonly bufferOptions: SessionBufferOptions;
  private readonly processFactory: ProcessFactory;
  private readonly idGenerator: () => string;
  private readonly maxIdAttempts: number;
  private readonly clock: () => number;

  private sweepTimer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(options: SessionManagerOptions) {
    this.command = options.command;
    this.args = options.args ?? [];
    this.defaultWorkingDirectory = options.defaultWorkingDirectory;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? 3600 * 1000;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 300 * 1000;
    this.maxHistoryLength = options.maxHistoryLength ?? 100;
    this.maxOutputHistory = options.maxOutputHistory ?? 50;
    this.graceMs = options.graceMs;
    this.bufferOptions = options.buffer ?? {};
    this.processFactory = options.processFactory ?? defaultProcessFactory;
    this.idGenerator = options.idGenerator ?? customAlphabet(ID_ALPHABET, ID_LENGTH);
    this.maxIdAttempts = options.maxIdAttempts ?? MAX_ID_ATTEMPTS;
    this.clock = options.clock ?? Date.now;
  }

  onEvent(handler: SessionEventHandler): () => void {
    return this.notifications.subscribe(handler);
  }

  start(): void {
    if (this.running) return;

    log.info(
      { cleanupIntervalMs: this.cleanupIntervalMs, sessionTimeoutMs: this.sessionTimeoutMs },
      'Starting session manager'
    );
    this.running = true;
    this.scheduleSweep();
  }

  /**
   * Stop the sweep and terminate every session, one at a time.
   */
  async stop(): Promise<void> {
    log.info({ sessions: this.sessions.size }, 'Stopping session manager');
    this.running = false;
    if (this.sweepTimer) {
      clearTimeout(this.sweepTimer);
      this.sweepTimer = null;
    }

    for (const id of Array.from(this.sessions.keys())) {
      try {
        await this.terminateSession(id);
      } catch (err) {
        log.error({ err, sessionId: id }, 'Failed to terminate session during shutdown');
      }
    }

    await this.notifications.drain();
  }

  /**
   * A fresh id unused by any registered or reserved session. Callers must hold
   * the registry lock.
   */
  generateId(): string {
    for (let attempt = 0; attempt < this.maxIdAttempts; attempt++) {
      const id = this.idGenerator();
      if (!this.sessions.has(id) && !this.reserved.has(id)) {
        return id;
      }
      log.debug({ id }, 'Session id collision, re-rolling');
    }
    throw new IdSpaceExhaustedError(this.maxIdAttempts);
  }

  /**
   * Spawn a new child and register it. Returns null when the process could
   * not be started.
   */
  async createSession(workingDirectory?: string): Promise<Session | null> {
    const id = await this.lock(() => {
      const reservedId = this.generateId();
      this.reserved.add(reservedId);
      return reservedId;
    });

    try {
      const cwd = path.resolve(workingDirectory ?? this.defaultWorkingDirectory);
      log.info({ sessionId: id, cwd }, 'Creating session');

      const child = this.processFactory({
        sessionId: id,
        command: this.command,
        args: this.args,
        workingDirectory: cwd,
        graceMs: this.graceMs,
      });

      const buffer: OutputBuffer = new OutputBuffer(
        { ...this.bufferOptions, sessionId: id, clock: this.clock },
        (chunks) => this.publishOutput(session, chunks)
      );

      const session = new Session({
        id,
        workingDirectory: cwd,
        process: child,
        buffer,
        maxHistoryLength: this.maxHistoryLength,
        maxOutputHistory: this.maxOutputHistory,
        clock: this.clock,
      });

      child.on('line', (line) => {
        const text = clean(line.text);
        if (text.trim()) {
          session.addOutput(text);
        }
        buffer.addOutput(line.text, line.stream === 'stderr' ? 'error' : undefined, line.stream);
      });

      child.on('exit', (exit) => {
        this.handleProcessExit(session, exit);
      });

      const result = await child.start();
      if (!result.ok) {
        log.error({ err: result.error, sessionId: id }, 'Failed to start session process');
        return null;
      }

      await this.lock(() => {
        this.sessions.set(id, session);
        session.activate();
      });
      buffer.start();

      log.info({ sessionId: id, pid: result.pid }, 'Session created');
      this.notifications.publish({ type: 'sessionCreated', session: session.toSnapshot() });
      return session;
    } finally {
      this.reserved.delete(id);
    }
  }

  getSession(id: string): Session | null {
    return this.sessions.get(id) ?? null;
  }

  getAllSessions(): Session[] {
    return Array.from(this.sessions.values());
  }

  getActiveSessions(): Session[] {
    return this.getAllSessions().filter(session => session.isActive());
  }

  sendCommand(id: string, text: string): boolean {
    const session = this.sessions.get(id);
    if (!session) {
      log.warn({ err: new SessionNotFoundError(id) }, 'Command for unknown session');
      return false;
    }

    if (!session.isActive()) {
      log.warn({ sessionId: id, status: session.status }, 'Command for inactive session');
      return false;
    }

    if (!session.process.sendInput(text)) {
      return false;
    }

    session.addCommand(text);
    return true;
  }

  interruptSession(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session || !session.isActive()) return false;

    const sent = session.process.interrupt();
    if (sent) session.touch();
    return sent;
  }

  /**
   * Remove the session from the registry, then stop its process and buffer.
   * Only the first of several concurrent calls for one id returns true.
   */
  async terminateSession(id: string): Promise<boolean> {
    const session = await this.lock(() => {
      const entry = this.sessions.get(id);
      if (!entry) return null;
      this.sessions.delete(id);
      return entry;
    });

    if (!session) {
      return false;
    }

    log.info({ sessionId: id }, 'Terminating session');

    await session.lifecycle(async () => {
      await session.process.terminate();
      await session.buffer.stop();
      session.markTerminated();
    });

    this.notifications.publish({
      type: 'sessionTerminated',
      sessionId: id,
      transport: session.transport,
    });
    return true;
  }

  /**
   * Terminate the child and start a new one with the same parameters.
   */
  async restartSession(id: string): Promise<boolean> {
    const session = this.sessions.get(id);
    if (!session) {
      return false;
    }

    return session.lifecycle(async () => {
      // a terminate may have claimed the entry while this call waited
      if (session.status === 'terminated' || this.sessions.get(id) !== session) {
        return false;
      }

      log.info({ sessionId: id }, 'Restarting session');
      const result = await session.process.restart();
      if (!result.ok) {
        log.error({ err: result.error, sessionId: id }, 'Restart failed');
        session.markTerminated();
        await session.buffer.stop();
        return false;
      }

      if (this.sessions.get(id) !== session) {
        log.warn({ sessionId: id }, 'Session removed during restart, stopping new process');
        await session.process.terminate();
        return false;
      }

      session.activate();
      return true;
    });
  }

  attachTransport(id: string, handle: TransportHandle): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;

    const previous = session.attachTransport(handle);
    if (previous) {
      log.info({ sessionId: id, previous: previous.channelId }, 'Replaced transport handle');
    }
    return true;
  }

  detachTransport(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    return session.detachTransport() !== null;
  }

  getRecentOutput(id: string, count = 10): string[] {
    return this.sessions.get(id)?.getRecentOutput(count) ?? [];
  }

  getRecentCommands(id: string, count = 10): string[] {
    return this.sessions.get(id)?.getRecentCommands(count) ?? [];
  }

  getSessionStats(): SessionStats {
    const all = this.getAllSessions();
    return {
      totalSessions: all.length,
      activeSessions: all.filter(session => session.isActive()).length,
      terminatedSessions: all.filter(session => session.status === 'terminated').length,
      totalCommands: all.reduce((sum, session) => sum + session.commandCount, 0),
      totalOutputLines: all.reduce((sum, session) => sum + session.outputCount, 0),
    };
  }

  /**
   * Remove terminated sessions and sessions idle past the timeout. Returns
   * the ids removed.
   */
  async sweepExpiredSessions(): Promise<string[]> {
    const now = this.clock();
    const expired = this.getAllSessions()
      .filter(session => session.isExpired(this.sessionTimeoutMs, now))
      .map(session => session.id);

    const removed: string[] = [];
    for (const id of expired) {
      if (await this.terminateSession(id)) {
        removed.push(id);
      }
    }

    if (removed.length > 0) {
      log.info({ removed }, 'Swept expired sessions');
    }
    return removed;
  }

  private scheduleSweep(): void {
    if (!this.running) return;

    this.sweepTimer = setTimeout(() => {
      this.sweepTimer = null;
      this.sweepExpiredSessions()
        .catch(err => {
          log.error({ err }, 'Session sweep failed');
        })
        .finally(() => this.scheduleSweep());
    }, this.cleanupIntervalMs);
    this.sweepTimer.unref();
  }

  private publishOutput(session: Session, chunks: MessageChunk[]): void {
    this.notifications.publish({
      type: 'output',
      sessionId: session.id,
      chunks,
      transport: session.transport,
    });
  }

  private handleProcessExit(session: Session, exit: ProcessExit): void {
    if (exit.requested || session.status === 'terminated') {
      return;
    }

    log.warn({ sessionId: session.id, code: exit.code, signal: exit.signal }, 'Process exited unexpectedly');
    session.markTerminated();

    session.buffer
      .stop()
      .catch(err => {
        log.error({ err, sessionId: session.id }, 'Final flush after exit failed');
      })
      .finally(() => {
        this.notifications.publish({
          type: 'processExited',
          sessionId: session.id,
          exit,
          transport: session.transport,
        });
      });
  }
}
