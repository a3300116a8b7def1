import { OverflowTruncationError } from '../utils/errors.js';
import type { ChunkFormat, MessageChunk, MessageType } from './types.js';

export const DEFAULT_MAX_LENGTH = 1900;

const TYPE_PRIORITY: Record<MessageType, number> = {
  error: 100,
  warning: 80,
  success: 60,
  info: 40,
  code: 30,
  normal: 20,
  progress: 10,
};

const CALLOUT_TYPES: ReadonlySet<MessageType> = new Set(['error', 'warning', 'success', 'info']);

const CODE_INDICATORS = [
  /^\s*def\s+\w+\(/m,
  /\bfunction\s+\w+\s*\(/,
  /^\s*class\s+\w+/m,
  /^\s*import\s+[\w{*]/m,
  /^\s*from\s+\S+\s+import\s/m,
  /^\s*#include\s*</m,
  /^\s*package\s+\w+/m,
  /\{\s*\n[\s\S]*\n\s*\}/,
  /^\s*[{}[\]();]\s*$/m,
  /\w+\.\w+\([^)]*\)\s*;?\s*$/m,
];

const LANGUAGE_PATTERNS: ReadonlyArray<[string, RegExp[]]> = [
  ['python', [/def\s+\w+\(/, /^\s*import\s+\w+\s*$/m, /from\s+\w+\s+import/, /if\s+__name__\s*==/]],
  ['javascript', [/function\s+\w+\(/, /const\s+\w+\s*=/, /let\s+\w+\s*=/, /=>/]],
  ['bash', [/#!\/bin\/(?:ba)?sh/, /^\s*\$\s+/m, /^\s*cd\s+/m, /^\s*ls\s+/m]],
  ['json', [/^\s*\{\s*$/m, /"\w+"\s*:/]],
  ['yaml', [/^\s*-\s+\w+/m, /^\s*\w+:\s*\S*$/m]],
  ['xml', [/<\w+[^>]*>/, /<\/\w+>/]],
  ['sql', [/\bSELECT\s+/i, /\bINSERT\s+INTO\b/i, /\bWHERE\s+/i]],
];

const URGENT_KEYWORDS = ['error', 'failed', 'success', 'complete'];

export function detectCode(text: string): boolean {
  return CODE_INDICATORS.some(pattern => pattern.test(text));
}

export function detectLanguage(text: string): string | null {
  for (const [language, patterns] of LANGUAGE_PATTERNS) {
    if (patterns.some(pattern => pattern.test(text))) {
      return language;
    }
  }
  return null;
}

/**
 * Queue-ordering hint for consumers. Does not affect chunk order.
 */
export function calculatePriority(text: string, type: MessageType): number {
  let priority = TYPE_PRIORITY[type];

  if (text.length < 100) {
    priority += 10;
  }

  const lower = text.toLowerCase();
  if (URGENT_KEYWORDS.some(keyword => lower.includes(keyword))) {
    priority += 20;
  }

  return priority;
}

export function recommendFormat(text: string, type: MessageType): ChunkFormat {
  if (CALLOUT_TYPES.has(type)) {
    return 'callout';
  }
  if (type === 'code' || detectCode(text)) {
    return 'code_block';
  }
  if (type === 'normal' && text.length < 50 && !text.includes('\n') && !text.includes('`')) {
    return 'inline_code';
  }
  return 'plain';
}

type Splitter = (unit: string, budget: number) => string[];

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function hardSplit(unit: string, budget: number): string[] {
  const pieces: string[] = [];
  let start = 0;
  while (start < unit.length) {
    let end = Math.min(start + budget, unit.length);
    if (end < unit.length && end - start > 1 && isHighSurrogate(unit.charCodeAt(end - 1))) {
      end--;
    }
    pieces.push(unit.slice(start, end));
    start = end;
  }
  return pieces;
}

/**
 * Greedily joins units with `separator` while the result fits; a unit that
 * cannot fit on its own is handed to the next, finer splitter.
 */
function packUnits(units: string[], separator: string, budget: number, splitOversized: Splitter): string[] {
  const pieces: string[] = [];
  let current: string | null = null;

  for (const unit of units) {
    if (unit.length > budget) {
      if (current !== null) {
        pieces.push(current);
        current = null;
      }
      pieces.push(...splitOversized(unit, budget));
      continue;
    }

    if (current === null) {
      current = unit;
      continue;
    }

    const candidate: string = current + separator + unit;
    if (candidate.length <= budget) {
      current = candidate;
    } else {
      pieces.push(current);
      current = unit;
    }
  }

  if (current !== null) {
    pieces.push(current);
  }

  return pieces;
}

const splitWords: Splitter = (unit, budget) =>
  packUnits(unit.match(/\S+\s*|\s+/g) ?? [unit], '', budget, hardSplit);

const splitSentences: Splitter = (unit, budget) =>
  packUnits(unit.match(/[^.!?]+(?:[.!?]+\s*)?|[.!?]+\s*/g) ?? [unit], '', budget, splitWords);

/**
 * Split `text` into pieces of at most `budget` characters, preferring line,
 * then sentence, then word boundaries. Line separators at piece boundaries
 * are consumed; nothing else is dropped.
 */
export function splitText(text: string, budget: number): string[] {
  if (text.length <= budget) {
    return [text];
  }
  return packUnits(text.split('\n'), '\n', budget, splitSentences)
    .filter(piece => piece.trim().length > 0);
}

export interface ChunkerOptions {
  maxLength?: number;
  /** Put the detected language after the opening fence. */
  annotateFences?: boolean;
  partHeader?: (index: number, total: number) => string;
  clock?: () => number;
}

const FENCE = /```/g;
const FENCE_ESCAPE = '`\u200b``';

function countFences(text: string): number {
  return text.match(FENCE)?.length ?? 0;
}

const defaultPartHeader = (index: number, total: number): string => `*Part ${index}/${total}*\n`;

export class MessageChunker {
  readonly maxLength: number;
  private readonly annotateFences: boolean;
  private readonly partHeader: (index: number, total: number) => string;
  private readonly clock: () => number;

  constructor(options: ChunkerOptions = {}) {
    this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
    this.annotateFences = options.annotateFences ?? false;
    this.partHeader = options.partHeader ?? defaultPartHeader;
    this.clock = options.clock ?? Date.now;
  }

  format(text: string, type: MessageType = 'normal'): MessageChunk[] {
    if (!text || !text.trim()) {
      return [];
    }

    const format = recommendFormat(text, type);
    const language = format === 'code_block' ? detectLanguage(text) : null;
    const priority = calculatePriority(text, type);
    const timestamp = this.clock();

    const whole = this.render(text, format, language);
    const pieces = whole.length <= this.maxLength ? [text] : this.splitToFit(text, format, language);

    return pieces.map((piece, i) => {
      let content = this.render(piece, format, language);
      if (pieces.length > 1) {
        content = this.partHeader(i + 1, pieces.length) + content;
      }
      if (content.length > this.maxLength) {
        throw new OverflowTruncationError(content.length, this.maxLength);
      }

      return {
        content,
        type,
        priority,
        timestamp,
        metadata: {
          index: i,
          total: pieces.length,
          originalLength: piece.length,
          escapedFences: format === 'code_block' ? countFences(piece) : 0,
          format,
          language,
        },
      };
    });
  }

  /** Decorated text; fences inside a code block get a zero-width space. */
  private render(piece: string, format: ChunkFormat, language: string | null): string {
    const body = format === 'code_block' ? piece.replace(FENCE, FENCE_ESCAPE) : piece;
    return this.decorate(body, format, language);
  }

  private decorate(body: string, format: ChunkFormat, language: string | null): string {
    switch (format) {
      case 'code_block': {
        const tag = this.annotateFences && language ? language : '';
        return '```' + tag + '\n' + body + '\n```';
      }
      case 'inline_code':
        return '`' + body + '`';
      case 'plain':
      case 'callout':
        return body;
    }
  }

  private splitToFit(text: string, format: ChunkFormat, language: string | null): string[] {
    const decoration = this.decorate('', format, language).length;
    let digits = 1;
    let slack = 0;

    for (;;) {
      const widest = 10 ** digits - 1;
      const header = this.partHeader(widest, widest).length;
      const budget = this.maxLength - decoration - header - slack;
      if (budget < 1) {
        throw new OverflowTruncationError(decoration + slack, this.maxLength);
      }

      const pieces = splitText(text, budget);
      const needed = String(pieces.length).length;
      if (needed > digits) {
        digits = needed;
        continue;
      }

      // escaped fences grow a piece past its budget
      const overflow = Math.max(
        0,
        ...pieces.map(piece => header + this.render(piece, format, language).length - this.maxLength)
      );
      if (overflow === 0) {
        return pieces;
      }
      slack += overflow;
    }
  }
}
