import { spawn, type ChildProcessWithoutNullStreams } from 'child_process';
import { EventEmitter } from 'events';
import { mkdir } from 'fs/promises';
import type { Readable } from 'stream';
import { logger } from '../utils/logger.js';
import {
  CommandNotFoundError,
  SpawnError,
  StreamClosedError,
  TerminationTimeoutError,
} from '../utils/errors.js';
import type { OutputStream } from '../output/types.js';
import type {
  ManagedProcess,
  ProcessConfig,
  ProcessEvents,
  ProcessExit,
  ProcessInfo,
  ProcessStatus,
  StartResult,
} from './types.js';

const log = logger.child({ component: 'process-controller' });

const DEFAULT_GRACE_MS = 5000;
// Time a dead child's pipes may stay open (held by a grandchild) before they are destroyed.
const EXIT_DRAIN_MS = 1000;
const GROUP_SIGNALS = process.platform !== 'win32';

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Owns one child process talking over plain pipes. stdout and stderr are read
 * independently and re-emitted line by line.
 */
export class ProcessController extends EventEmitter<ProcessEvents> implements ManagedProcess {
  readonly sessionId: string;
  readonly command: string;
  readonly args: string[];
  readonly workingDirectory: string;
  private readonly env: NodeJS.ProcessEnv | undefined;
  private readonly graceMs: number;

  private child: ChildProcessWithoutNullStreams | null = null;
  private status: ProcessStatus = 'not_started';
  private exitCode: number | null = null;
  private exitSignal: NodeJS.Signals | null = null;
  private closed: Promise<void> = Promise.resolve();
  private exited: Promise<void> = Promise.resolve();
  private terminating: Promise<void> | null = null;
  private terminateRequested = false;
  private forcedKill = false;

  constructor(config: ProcessConfig) {
    super();
    this.sessionId = config.sessionId;
    this.command = config.command;
    this.args = config.args ?? [];
    this.workingDirectory = config.workingDirectory;
    this.env = config.env;
    this.graceMs = config.graceMs ?? DEFAULT_GRACE_MS;
  }

  async start(): Promise<StartResult> {
    if (this.child && this.status === 'running' && this.child.pid !== undefined) {
      log.warn({ sessionId: this.sessionId, pid: this.child.pid }, 'Process already running');
      return { ok: true, pid: this.child.pid };
    }

    log.info(
      { sessionId: this.sessionId, command: this.command, args: this.args, cwd: this.workingDirectory },
      'Starting process'
    );

    try {
      await mkdir(this.workingDirectory, { recursive: true });
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      log.error({ err: cause, sessionId: this.sessionId }, 'Could not create working directory');
      return { ok: false, error: new SpawnError(this.command, cause.message, cause) };
    }

    let child: ChildProcessWithoutNullStreams;
    try {
      child = spawn(this.command, this.args, {
        cwd: this.workingDirectory,
        env: {
          ...process.env,
          ...this.env,
          PAGER: '',
          GIT_PAGER: '',
        },
        stdio: 'pipe',
        // own process group, so terminate reaches background jobs too
        detached: GROUP_SIGNALS,
      });
    } catch (err) {
      // spawn throws synchronously for malformed arguments
      const cause = err instanceof Error ? err : new Error(String(err));
      log.error({ err: cause, sessionId: this.sessionId }, 'Spawn failed');
      return { ok: false, error: new SpawnError(this.command, cause.message, cause) };
    }

    this.child = child;
    this.status = 'not_started';
    this.exitCode = null;
    this.exitSignal = null;
    this.terminateRequested = false;
    this.forcedKill = false;

    const result = await new Promise<StartResult>((resolve) => {
      let settled = false;

      child.once('spawn', () => {
        settled = true;
        if (child.pid === undefined) {
          resolve({ ok: false, error: new SpawnError(this.command, 'no pid assigned') });
          return;
        }
        resolve({ ok: true, pid: child.pid });
      });

      child.on('error', (err) => {
        if (!settled) {
          settled = true;
          resolve({ ok: false, error: this.toStartError(err) });
          return;
        }
        log.error({ err, sessionId: this.sessionId }, 'Process error');
      });
    });

    if (!result.ok) {
      log.error({ err: result.error, sessionId: this.sessionId }, 'Process failed to start');
      this.child = null;
      this.status = 'exited';
      return result;
    }

    this.status = 'running';
    this.attach(child);
    log.info({ sessionId: this.sessionId, pid: result.pid }, 'Process started');
    return result;
  }

  isRunning(): boolean {
    return this.child !== null && this.status === 'running';
  }

  sendInput(text: string): boolean {
    const child = this.child;
    if (!child || !this.isRunning() || child.stdin.destroyed || !child.stdin.writable) {
      log.warn({ err: new StreamClosedError(this.sessionId) }, 'Attempted to send input to a closed process');
      return false;
    }

    log.debug({ sessionId: this.sessionId, inputLength: text.length }, 'Sending input');
    child.stdin.write(text + '\n');
    return true;
  }

  interrupt(): boolean {
    if (!this.child || !this.isRunning()) {
      return false;
    }

    log.info({ sessionId: this.sessionId }, 'Interrupting process');
    return this.signal(this.child, 'SIGINT');
  }

  /**
   * SIGTERM to the process group, then SIGKILL once the grace window passes.
   * Resolves after the child has exited and its pipes are closed; concurrent
   * callers share the same termination.
   */
  terminate(): Promise<void> {
    const child = this.child;
    if (!child || this.status !== 'running') {
      return this.closed;
    }

    if (!this.terminating) {
      this.terminating = this.performTerminate(child).finally(() => {
        this.terminating = null;
      });
    }
    return this.terminating;
  }

  async restart(): Promise<StartResult> {
    log.info({ sessionId: this.sessionId }, 'Restarting process');
    await this.terminate();
    return this.start();
  }

  getProcessInfo(): ProcessInfo {
    return {
      status: this.status,
      pid: this.child?.pid ?? null,
      exitCode: this.exitCode,
      signal: this.exitSignal,
    };
  }

  private async performTerminate(child: ChildProcessWithoutNullStreams): Promise<void> {
    log.info({ sessionId: this.sessionId, pid: child.pid }, 'Terminating process');
    this.terminateRequested = true;
    this.signal(child, 'SIGTERM');

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.graceMs);
    });
    const outcome = await Promise.race([this.exited.then(() => 'exited' as const), timeout]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      const err = new TerminationTimeoutError(this.sessionId, child.pid ?? null, this.graceMs);
      log.warn({ err, sessionId: this.sessionId }, 'Process ignored SIGTERM, sending SIGKILL');
      this.forcedKill = true;
      this.signal(child, 'SIGKILL');
    }
    await this.closed;
  }

  private signal(child: ChildProcessWithoutNullStreams, signal: NodeJS.Signals): boolean {
    if (GROUP_SIGNALS && child.pid !== undefined) {
      try {
        process.kill(-child.pid, signal);
        return true;
      } catch (err) {
        log.debug({ err, sessionId: this.sessionId, signal }, 'Process group signal failed, signalling child');
      }
    }
    return child.kill(signal);
  }

  private toStartError(err: Error): SpawnError | CommandNotFoundError {
    if (errorCode(err) === 'ENOENT') {
      return new CommandNotFoundError(this.command);
    }
    return new SpawnError(this.command, err.message, err);
  }

  private attach(child: ChildProcessWithoutNullStreams): void {
    const flushStdout = this.readLines(child.stdout, 'stdout', child);
    const flushStderr = this.readLines(child.stderr, 'stderr', child);

    child.stdin.on('error', (err) => {
      log.debug({ err, sessionId: this.sessionId }, 'stdin closed');
    });

    let drainTimer: NodeJS.Timeout | undefined;

    this.exited = new Promise<void>((resolve) => {
      child.once('exit', (code, signal) => {
        if (this.child === child) {
          this.status = 'exited';
          this.exitCode = code;
          this.exitSignal = signal;
        }
        resolve();

        drainTimer = setTimeout(() => {
          log.warn({ sessionId: this.sessionId, pid: child.pid }, 'Output pipes still open after exit, closing them');
          flushStdout();
          flushStderr();
          child.stdout.destroy();
          child.stderr.destroy();
        }, EXIT_DRAIN_MS);
        drainTimer.unref();
      });
    });

    this.closed = new Promise<void>((resolve) => {
      child.once('close', (code, signal) => {
        clearTimeout(drainTimer);
        const current = this.child === child;
        if (current) {
          this.status = 'exited';
          this.exitCode = code;
          this.exitSignal = signal;
        }

        const exit: ProcessExit = {
          code,
          signal,
          requested: this.terminateRequested,
          forced: this.forcedKill,
        };
        log.info({ sessionId: this.sessionId, pid: child.pid, ...exit }, 'Process exited');
        resolve();

        if (current) {
          this.emit('exit', exit);
        }
      });
    });
  }

  /** Returns a function that emits any unterminated final line. */
  private readLines(stream: Readable, name: OutputStream, child: ChildProcessWithoutNullStreams): () => void {
    let pending = '';

    const emitLine = (raw: string) => {
      if (this.child !== child) return;
      const text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      this.emit('line', { stream: name, text, receivedAt: Date.now() });
    };

    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      pending += chunk;
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        emitLine(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }
    });
    const flush = () => {
      if (pending.length > 0) {
        emitLine(pending);
        pending = '';
      }
    };
    stream.on('end', flush);
    stream.on('error', (err) => {
      log.debug({ err, sessionId: this.sessionId, stream: name }, 'Output stream error');
    });
    return flush;
  }
}
