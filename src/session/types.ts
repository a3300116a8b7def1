import type { MessageChunk } from '../output/types.js';
import type { ProcessExit } from '../process/types.js';

export type SessionStatus = 'inactive' | 'active' | 'terminated';

export interface TransportHandle {
  channelId: string;
  threadTs: string | null;
  attachedBy: string;
  attachedAt: string;
}

export interface SessionSnapshot {
  id: string;
  status: SessionStatus;
  createdAt: string;
  lastActivity: string;
  commandCount: number;
  outputCount: number;
  workingDirectory: string;
  isActive: boolean;
  transport: TransportHandle | null;
}

export interface SessionStats {
  totalSessions: number;
  activeSessions: number;
  terminatedSessions: number;
  totalCommands: number;
  totalOutputLines: number;
}

export type SessionEvent =
  | { type: 'sessionCreated'; session: SessionSnapshot }
  | { type: 'sessionTerminated'; sessionId: string; transport: TransportHandle | null }
  | { type: 'processExited'; sessionId: string; exit: ProcessExit; transport: TransportHandle | null }
  | { type: 'output'; sessionId: string; chunks: MessageChunk[]; transport: TransportHandle | null };

export type SessionEventHandler = (event: SessionEvent) => void | Promise<void>;
