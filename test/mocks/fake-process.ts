import { EventEmitter } from 'events';
import type {
  ManagedProcess,
  ProcessConfig,
  ProcessEvents,
  ProcessInfo,
  StartResult,
} from '../../src/process/types.js';
import { CommandNotFoundError } from '../../src/utils/errors.js';

/**
 * In-memory stand-in for ProcessController. Records input and lets tests
 * emit output lines and exits by hand.
 */
export class FakeProcess extends EventEmitter<ProcessEvents> implements ManagedProcess {
  readonly sessionId: string;
  readonly inputs: string[] = [];
  startCalls = 0;
  terminateCalls = 0;
  interrupts = 0;
  failStart = false;

  private running = false;
  private pid = 1000;
  private exitCode: number | null = null;

  constructor(readonly config: ProcessConfig) {
    super();
    this.sessionId = config.sessionId;
  }

  async start(): Promise<StartResult> {
    this.startCalls++;
    if (this.failStart) {
      return { ok: false, error: new CommandNotFoundError(this.config.command) };
    }
    this.running = true;
    this.pid++;
    return { ok: true, pid: this.pid };
  }

  sendInput(text: string): boolean {
    if (!this.running) return false;
    this.inputs.push(text);
    return true;
  }

  interrupt(): boolean {
    if (!this.running) return false;
    this.interrupts++;
    return true;
  }

  isRunning(): boolean {
    return this.running;
  }

  async terminate(): Promise<void> {
    this.terminateCalls++;
    if (!this.running) return;
    this.running = false;
    this.exitCode = 0;
    this.emit('exit', { code: 0, signal: 'SIGTERM', requested: true, forced: false });
  }

  async restart(): Promise<StartResult> {
    await this.terminate();
    return this.start();
  }

  getProcessInfo(): ProcessInfo {
    return {
      status: this.running ? 'running' : this.startCalls > 0 ? 'exited' : 'not_started',
      pid: this.running ? this.pid : null,
      exitCode: this.exitCode,
      signal: null,
    };
  }

  /** Simulate a line written by the child. */
  output(text: string, stream: 'stdout' | 'stderr' = 'stdout'): void {
    this.emit('line', { stream, text, receivedAt: Date.now() });
  }

  /** Simulate the child dying on its own. */
  crash(code = 1): void {
    this.running = false;
    this.exitCode = code;
    this.emit('exit', { code, signal: null, requested: false, forced: false });
  }
}

export interface FakeProcessFactory {
  factory: (config: ProcessConfig) => FakeProcess;
  created: FakeProcess[];
  /** Make the next created process fail to start. */
  failNext(): void;
}

export function createFakeProcessFactory(): FakeProcessFactory {
  const created: FakeProcess[] = [];
  let failNext = false;

  return {
    factory: (config) => {
      const fake = new FakeProcess(config);
      fake.failStart = failNext;
      failNext = false;
      created.push(fake);
      return fake;
    },
    created,
    failNext: () => {
      failNext = true;
    },
  };
}
