export type MessageType =
  | 'normal'
  | 'code'
  | 'error'
  | 'success'
  | 'warning'
  | 'info'
  | 'progress';

export type BufferStrategy = 'immediate' | 'line' | 'time' | 'smart';

export type ChunkFormat = 'plain' | 'code_block' | 'inline_code' | 'callout';

export type OutputStream = 'stdout' | 'stderr';

export type SemanticType =
  | 'progress_bar'
  | 'percentage'
  | 'spinner'
  | 'thinking'
  | 'working'
  | 'file_created'
  | 'file_modified'
  | 'file_deleted'
  | 'command_start'
  | 'command_complete'
  | 'error'
  | 'warning'
  | 'success';

export interface LineAnalysis {
  hasAnsi: boolean;
  hasProgress: boolean;
  cleanLength: number;
  ansiOverhead: number;
  semanticTypes: SemanticType[];
}

export interface OutputLineMetadata extends LineAnalysis {
  stream?: OutputStream;
}

export interface OutputLine {
  content: string;
  timestamp: number;
  sessionId: string;
  type: MessageType;
  metadata: OutputLineMetadata;
}

export interface ChunkMetadata {
  index: number;
  total: number;
  /** Length of the input text this chunk carries, before decoration. */
  originalLength: number;
  /** Code fences in that text that were broken up with a zero-width space. */
  escapedFences: number;
  format: ChunkFormat;
  language: string | null;
}

export interface MessageChunk {
  content: string;
  type: MessageType;
  priority: number;
  timestamp: number;
  metadata: ChunkMetadata;
}

export type ChunkSink = (chunks: MessageChunk[]) => void | Promise<void>;

export interface BufferStats {
  sessionId: string;
  totalLines: number;
  pendingLines: number;
  lastFlush: number;
  flushIntervalMs: number;
  burstMode: boolean;
  consecutiveSimilar: number;
  strategy: BufferStrategy;
}
