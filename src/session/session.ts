import pLimit from 'p-limit';
import type { OutputBuffer } from '../output/buffer.js';
import type { ManagedProcess } from '../process/types.js';
import type { SessionSnapshot, SessionStatus, TransportHandle } from './types.js';

export interface SessionOptions {
  id: string;
  workingDirectory: string;
  process: ManagedProcess;
  buffer: OutputBuffer;
  maxHistoryLength?: number;
  maxOutputHistory?: number;
  clock?: () => number;
}

function pushCapped(list: string[], item: string, cap: number): void {
  list.push(item);
  if (list.length > cap) {
    list.splice(0, list.length - cap);
  }
}

function lastN(list: string[], count: number): string[] {
  return count > 0 ? list.slice(-count) : [];
}

/**
 * One bridged child process plus what we remember about it. The process and
 * its output buffer are fixed for the lifetime of the session.
 */
export class Session {
  readonly id: string;
  readonly workingDirectory: string;
  readonly process: ManagedProcess;
  readonly buffer: OutputBuffer;
  readonly createdAt: number;
  /** Serializes restart and terminate for this session. */
  readonly lifecycle = pLimit(1);

  status: SessionStatus = 'inactive';
  lastActivity: number;
  transport: TransportHandle | null = null;

  private readonly commandHistory: string[] = [];
  private readonly outputHistory: string[] = [];
  private readonly maxHistoryLength: number;
  private readonly maxOutputHistory: number;
  private readonly clock: () => number;

  constructor(options: SessionOptions) {
    if (!options.id) {
      throw new Error('Session id cannot be empty');
    }

    this.id = options.id;
    this.workingDirectory = options.workingDirectory;
    this.process = options.process;
    this.buffer = options.buffer;
    this.maxHistoryLength = options.maxHistoryLength ?? 100;
    this.maxOutputHistory = options.maxOutputHistory ?? 50;
    this.clock = options.clock ?? Date.now;
    this.createdAt = this.clock();
    this.lastActivity = this.createdAt;
  }

  isActive(): boolean {
    return this.status === 'active' && this.process.isRunning();
  }

  isExpired(timeoutMs: number, now = this.clock()): boolean {
    if (this.status === 'terminated') return true;
    return now - this.lastActivity > timeoutMs;
  }

  activate(): void {
    if (this.status === 'terminated') return;
    this.status = 'active';
    this.touch();
  }

  markTerminated(): void {
    this.status = 'terminated';
    this.touch();
  }

  touch(): void {
    this.lastActivity = this.clock();
  }

  addCommand(command: string): void {
    pushCapped(this.commandHistory, command, this.maxHistoryLength);
    this.touch();
  }

  addOutput(output: string): void {
    pushCapped(this.outputHistory, output, this.maxOutputHistory);
    this.touch();
  }

  getRecentCommands(count = 10): string[] {
    return lastN(this.commandHistory, count);
  }

  getRecentOutput(count = 10): string[] {
    return lastN(this.outputHistory, count);
  }

  get commandCount(): number {
    return this.commandHistory.length;
  }

  get outputCount(): number {
    return this.outputHistory.length;
  }

  /** Replaces any handle attached before. */
  attachTransport(handle: TransportHandle): TransportHandle | null {
    const previous = this.transport;
    this.transport = handle;
    return previous;
  }

  detachTransport(): TransportHandle | null {
    const previous = this.transport;
    this.transport = null;
    return previous;
  }

  toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      status: this.status,
      createdAt: new Date(this.createdAt).toISOString(),
      lastActivity: new Date(this.lastActivity).toISOString(),
      commandCount: this.commandHistory.length,
      outputCount: this.outputHistory.length,
      workingDirectory: this.workingDirectory,
      isActive: this.isActive(),
      transport: this.transport ? { ...this.transport } : null,
    };
  }
}
