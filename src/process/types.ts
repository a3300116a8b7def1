import type { EventEmitter } from 'events';
import type { OutputStream } from '../output/types.js';
import type { CommandNotFoundError, SpawnError } from '../utils/errors.js';

export interface ProcessConfig {
  sessionId: string;
  command: string;
  args?: string[];
  workingDirectory: string;
  env?: NodeJS.ProcessEnv;
  /** How long to wait after SIGTERM before SIGKILL. */
  graceMs?: number;
}

export interface ProcessLine {
  stream: OutputStream;
  text: string;
  receivedAt: number;
}

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** Exit followed a terminate() call. */
  requested: boolean;
  /** SIGKILL was needed after the grace window. */
  forced: boolean;
}

export interface ProcessEvents {
  line: [line: ProcessLine];
  exit: [exit: ProcessExit];
}

export type ProcessStatus = 'not_started' | 'running' | 'exited';

export interface ProcessInfo {
  status: ProcessStatus;
  pid: number | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export type StartResult =
  | { ok: true; pid: number }
  | { ok: false; error: SpawnError | CommandNotFoundError };

/**
 * What the session registry needs from a child process. The real
 * implementation is ProcessController.
 */
export interface ManagedProcess extends EventEmitter<ProcessEvents> {
  readonly sessionId: string;
  start(): Promise<StartResult>;
  sendInput(text: string): boolean;
  interrupt(): boolean;
  isRunning(): boolean;
  terminate(): Promise<void>;
  restart(): Promise<StartResult>;
  getProcessInfo(): ProcessInfo;
}

export type ProcessFactory = (config: ProcessConfig) => ManagedProcess;
