import { logger } from '../utils/logger.js';
import { MessageChunker } from './chunker.js';
import { analyze, clean, DefaultLineClassifier, looksLikePrompt, type LineClassifier } from './normalizer.js';
import type {
  BufferStats,
  BufferStrategy,
  ChunkSink,
  MessageChunk,
  MessageType,
  OutputLine,
  OutputStream,
} from './types.js';

const log = logger.child({ component: 'output-buffer' });

const GROUP_GAP_MS = 3000;
const MAX_GROUP_SIZE = 20;
const BURST_THRESHOLD = 5;
const BURST_WINDOW_MS = 2000;
const BURST_RESET_MS = 5000;

const GROUP_TYPE_ORDER: MessageType[] = ['error', 'warning', 'success', 'info', 'code', 'progress', 'normal'];

export interface OutputBufferOptions {
  sessionId: string;
  strategy?: BufferStrategy;
  flushIntervalMs?: number;
  /** Capacity of the recent-lines ring. */
  maxBufferSize?: number;
  maxPendingLines?: number;
  /** Pending lines that trigger a flush under the `line` strategy. */
  lineBatchSize?: number;
  burstPollMs?: number;
  idlePollMs?: number;
  chunker?: MessageChunker;
  classifier?: LineClassifier;
  clock?: () => number;
}

/**
 * Collects a session's output lines and turns them into ordered chunk
 * batches for the sink. Deliveries run on one promise chain, so batches
 * reach the sink in the order they were flushed.
 */
export class OutputBuffer {
  readonly sessionId: string;
  readonly strategy: BufferStrategy;
  readonly flushIntervalMs: number;

  private readonly maxBufferSize: number;
  private readonly maxPendingLines: number;
  private readonly lineBatchSize: number;
  private readonly burstPollMs: number;
  private readonly idlePollMs: number;
  private readonly chunker: MessageChunker;
  private readonly classifier: LineClassifier;
  private readonly clock: () => number;

  private lines: OutputLine[] = [];
  private pending: OutputLine[] = [];
  private delivery: Promise<void> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private lastFlush: number;

  private consecutiveSimilar = 0;
  private lastLineType: MessageType | null = null;
  private burstMode = false;
  private burstStart: number;

  constructor(options: OutputBufferOptions, private readonly sink: ChunkSink) {
    this.sessionId = options.sessionId;
    this.strategy = options.strategy ?? 'smart';
    this.flushIntervalMs = options.flushIntervalMs ?? 2000;
    this.maxBufferSize = options.maxBufferSize ?? 1000;
    this.maxPendingLines = options.maxPendingLines ?? 20;
    this.lineBatchSize = options.lineBatchSize ?? 10;
    this.burstPollMs = options.burstPollMs ?? 100;
    this.idlePollMs = options.idlePollMs ?? 500;
    this.chunker = options.chunker ?? new MessageChunker();
    this.classifier = options.classifier ?? new DefaultLineClassifier();
    this.clock = options.clock ?? Date.now;
    this.lastFlush = this.clock();
    this.burstStart = this.lastFlush;
  }

  start(): void {
    if (this.running) return;

    log.debug({ sessionId: this.sessionId, strategy: this.strategy }, 'Starting output buffer');
    this.running = true;
    this.schedule();
  }

  /**
   * Cancel the background loop and flush whatever is still pending.
   */
  async stop(): Promise<MessageChunk[]> {
    log.debug({ sessionId: this.sessionId }, 'Stopping output buffer');
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    return this.flush();
  }

  get isRunning(): boolean {
    return this.running;
  }

  addOutput(content: string, type?: MessageType, stream?: OutputStream): void {
    if (!content) return;

    const analysis = analyze(content);
    const cleaned = clean(content);
    const line: OutputLine = {
      content: cleaned,
      timestamp: this.clock(),
      sessionId: this.sessionId,
      type: type ?? this.classifier.classify(cleaned, analysis),
      metadata: { ...analysis, stream },
    };

    this.lines.push(line);
    if (this.lines.length > this.maxBufferSize) {
      this.lines.shift();
    }
    this.pending.push(line);

    this.updateBurstDetection(line);

    if (this.shouldFlushImmediately(line)) {
      this.flush().catch(err => {
        log.error({ err, sessionId: this.sessionId }, 'Immediate flush failed');
      });
    }
  }

  /**
   * Swap out the pending queue, turn it into chunks and hand them to the
   * sink. Resolves once this batch (and every earlier one) was delivered.
   */
  async flush(): Promise<MessageChunk[]> {
    if (this.pending.length === 0) {
      await this.delivery;
      return [];
    }

    const batch = this.pending;
    this.pending = [];
    this.lastFlush = this.clock();

    const chunks = this.processLines(batch);
    if (chunks.length > 0) {
      this.delivery = this.delivery.then(() => this.deliver(chunks));
    }

    await this.delivery;
    return chunks;
  }

  getStats(): BufferStats {
    return {
      sessionId: this.sessionId,
      totalLines: this.lines.length,
      pendingLines: this.pending.length,
      lastFlush: this.lastFlush,
      flushIntervalMs: this.flushIntervalMs,
      burstMode: this.burstMode,
      consecutiveSimilar: this.consecutiveSimilar,
      strategy: this.strategy,
    };
  }

  getRecentLines(count = 10): OutputLine[] {
    if (count <= 0) return [];
    return this.lines.slice(-count);
  }

  clear(): void {
    this.lines = [];
    this.pending = [];
    log.info({ sessionId: this.sessionId }, 'Output buffer cleared');
  }

  private async deliver(chunks: MessageChunk[]): Promise<void> {
    try {
      await this.sink(chunks);
    } catch (err) {
      log.error({ err, sessionId: this.sessionId, chunks: chunks.length }, 'Output sink failed');
    }
  }

  private schedule(): void {
    if (!this.running) return;

    const delay = this.burstMode ? this.burstPollMs : this.idlePollMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick()
        .catch(err => {
          log.error({ err, sessionId: this.sessionId }, 'Output buffer loop failed');
        })
        .finally(() => this.schedule());
    }, delay);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    if (this.pending.length > 0 && this.clock() - this.lastFlush >= this.flushIntervalMs) {
      await this.flush();
    }
  }

  private updateBurstDetection(line: OutputLine): void {
    const now = this.clock();

    if (this.lastLineType === line.type) {
      this.consecutiveSimilar++;
    } else {
      this.consecutiveSimilar = 0;
      this.lastLineType = line.type;
    }

    if (this.consecutiveSimilar > BURST_THRESHOLD && now - this.burstStart < BURST_WINDOW_MS) {
      if (!this.burstMode) {
        this.burstMode = true;
        log.debug({ sessionId: this.sessionId }, 'Entering burst mode');
        this.reschedule();
      }
    } else if (now - this.burstStart > BURST_RESET_MS) {
      this.burstMode = false;
      this.burstStart = now;
    }
  }

  private reschedule(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
      this.schedule();
    }
  }

  private shouldFlushImmediately(line: OutputLine): boolean {
    if (this.strategy === 'immediate') return true;
    if (line.type === 'error' || line.type === 'success') return true;
    if (looksLikePrompt(line.content)) return true;
    if (this.pending.length > this.maxPendingLines) return true;
    if (this.strategy === 'line' && this.pending.length >= this.lineBatchSize) return true;
    return this.clock() - this.lastFlush > this.flushIntervalMs * 2;
  }

  private processLines(lines: OutputLine[]): MessageChunk[] {
    const chunks: MessageChunk[] = [];

    for (const group of groupLines(lines)) {
      const combined = combineLines(group);
      if (!combined.trim()) continue;

      chunks.push(...this.chunker.format(combined, groupType(group)));
    }

    return chunks;
  }
}

function shouldGroup(previous: OutputLine, current: OutputLine): boolean {
  if (current.timestamp - previous.timestamp > GROUP_GAP_MS) {
    return false;
  }

  if (previous.type !== current.type) {
    if (previous.type === 'error' || current.type === 'error') return false;
    if (previous.type === 'success' || current.type === 'success') return false;
  }

  if (previous.type === 'progress' || current.type === 'progress') {
    return previous.type === current.type;
  }

  return true;
}

export function groupLines(lines: OutputLine[]): OutputLine[][] {
  const groups: OutputLine[][] = [];
  let current: OutputLine[] = [];

  for (const line of lines) {
    const previous = current[current.length - 1];
    if (previous && shouldGroup(previous, line) && current.length < MAX_GROUP_SIZE) {
      current.push(line);
    } else {
      if (current.length > 0) groups.push(current);
      current = [line];
    }
  }

  if (current.length > 0) groups.push(current);
  return groups;
}

export function combineLines(lines: OutputLine[]): string {
  return lines
    .filter(line => line.content.trim())
    .map(line => line.content.trimEnd())
    .join('\n');
}

export function groupType(lines: OutputLine[]): MessageType {
  for (const type of GROUP_TYPE_ORDER) {
    if (lines.some(line => line.type === type)) {
      return type;
    }
  }
  return 'normal';
}
