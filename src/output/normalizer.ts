import stripAnsi from 'strip-ansi';
import type { LineAnalysis, MessageType, SemanticType } from './types.js';

// OSC, DCS, SOS, PM and APC strings. An unterminated string ends where the
// next escape begins, or at end of input.
const STRING_SEQUENCE = /\x1b[\]PX^_][^\x1b\x07\x9c]*(?:\x07|\x1b\\|\x9c|(?=\x1b)|$)/g;

// nF escapes: charset designation (ESC ( B), DEC line attributes (ESC # 8), etc.
const INTERMEDIATE_ESCAPE = /\x1b[\x20-\x2f]+(?:[\x30-\x7e]|$)/g;

// Fp, Fe and Fs escapes other than CSI: ESC 7, ESC =, ESC M, ESC c, ...
// These go before strip-ansi, whose pattern would also eat the following
// character (ESC 7 s).
const SINGLE_CHAR_ESCAPE = /\x1b[\x30-\x5a\x5c-\x7e]/g;

// CSI cut off before its final byte.
const TRUNCATED_CSI = /(?:\x1b\[|\x9b)[\x30-\x3f]*[\x20-\x2f]*$/;

// Whatever introducer is left once every grammar above has had its turn.
const STRAY_INTRODUCER = /[\x1b\x90\x98\x9b\x9c\x9d\x9e\x9f]/g;

const HAS_ESCAPE = /[\x1b\x9b]/;

/**
 * Remove every terminal control sequence from `text`, leaving all other
 * characters untouched. Idempotent.
 */
export function strip(text: string): string {
  if (!text) return text;

  let result = text.replace(STRING_SEQUENCE, '');
  result = result.replace(INTERMEDIATE_ESCAPE, '');
  result = result.replace(SINGLE_CHAR_ESCAPE, '');
  result = stripAnsi(result);
  result = result.replace(TRUNCATED_CSI, '');
  return result.replace(STRAY_INTRODUCER, '');
}

/**
 * Keep only what a terminal would show after carriage-return overwrites.
 */
export function resolveCarriageReturns(text: string): string {
  if (!text.includes('\r')) return text;

  return text
    .split('\n')
    .map((line) => {
      const withoutCr = line.endsWith('\r') ? line.slice(0, -1) : line;
      const lastCr = withoutCr.lastIndexOf('\r');
      return lastCr === -1 ? withoutCr : withoutCr.slice(lastCr + 1);
    })
    .join('\n');
}

/**
 * Strip escape sequences, then resolve carriage returns and drop NUL and
 * backspace bytes.
 */
export function clean(text: string): string {
  if (!text) return text;
  return resolveCarriageReturns(strip(text)).replace(/[\0\x08]/g, '');
}

const SEMANTIC_PATTERNS: ReadonlyArray<[SemanticType, RegExp]> = [
  ['progress_bar', /[█▉▊▋▌▍▎▏░▒▓]{10,}|\[[=#.-]{3,}\]/],
  ['percentage', /\b\d{1,3}(?:\.\d)?%/],
  ['spinner', /[⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏◐◓◑◒]|^\s*[|/\\-]\s*$/],
  ['thinking', /\b(?:thinking|processing|loading)\b\.*/i],
  ['working', /working on it\.*|please wait\.*/i],
  ['file_created', /\bcreated file:?\s+\S/i],
  ['file_modified', /\bmodified file:?\s+\S/i],
  ['file_deleted', /\bdeleted file:?\s+\S/i],
  ['command_start', /\brunning:?\s+\S/i],
  ['command_complete', /\bcompleted:?\s+\S/i],
  ['error', /\berror:?\s+\S/i],
  ['warning', /\bwarning:?\s+\S/i],
  ['success', /\bsuccess:?\s+\S|✅/i],
];

const PROGRESS_TYPES: ReadonlySet<SemanticType> = new Set([
  'progress_bar',
  'percentage',
  'spinner',
  'thinking',
  'working',
]);

export function semanticTypes(text: string): SemanticType[] {
  const found = new Set<SemanticType>();
  for (const line of text.split('\n')) {
    for (const [type, pattern] of SEMANTIC_PATTERNS) {
      if (pattern.test(line)) {
        found.add(type);
      }
    }
  }
  return Array.from(found);
}

export function isProgressLine(line: string): boolean {
  if (!line.trim()) return false;
  return SEMANTIC_PATTERNS.some(([type, pattern]) => PROGRESS_TYPES.has(type) && pattern.test(line));
}

export function analyze(raw: string): LineAnalysis {
  const stripped = strip(raw);
  const cleaned = clean(raw);
  return {
    hasAnsi: HAS_ESCAPE.test(raw),
    hasProgress: cleaned.split('\n').some(isProgressLine),
    cleanLength: cleaned.length,
    ansiOverhead: raw.length - stripped.length,
    semanticTypes: semanticTypes(cleaned),
  };
}

/**
 * Decides the message type of a single cleaned output line.
 */
export interface LineClassifier {
  classify(content: string, analysis: LineAnalysis): MessageType;
}

export class DefaultLineClassifier implements LineClassifier {
  classify(content: string, analysis: LineAnalysis): MessageType {
    const lower = content.toLowerCase();

    if (['error', 'failed', 'exception'].some(keyword => lower.includes(keyword))) {
      return 'error';
    }
    if (lower.includes('warn')) {
      return 'warning';
    }
    if (/success|complete|\bdone\b|✅/.test(lower)) {
      return 'success';
    }
    if (analysis.hasProgress) {
      return 'progress';
    }
    if (analysis.semanticTypes.some(t => t.startsWith('file_') || t === 'command_start')) {
      return 'info';
    }
    if (analysis.hasAnsi && analysis.semanticTypes.length > 0) {
      return 'code';
    }
    return 'normal';
  }
}

const PROMPT_HINTS = ['?', 'enter', 'continue', 'press', 'confirm'];

/**
 * Loose check used to flush a buffer early: anything that reads like the
 * child is waiting on the user.
 */
export function looksLikePrompt(text: string): boolean {
  const lower = text.toLowerCase();
  return PROMPT_HINTS.some(hint => lower.includes(hint));
}

/**
 * Stricter check for an explicit confirmation prompt.
 */
export function isInteractivePrompt(text: string): boolean {
  const patterns = [
    /\[y\/n\]/i,
    /\(y\/n\)/i,
    /Allow\s+\w+\s+tool/i,
    /Press\s+\w+\s+to\s+(?:allow|continue|confirm)/i,
    /Do you want to (?:proceed|continue)/i,
  ];

  return patterns.some(pattern => pattern.test(text));
}
