import { describe, it, expect } from 'vitest';
import {
  MessageChunker,
  calculatePriority,
  detectLanguage,
  recommendFormat,
  splitText,
} from '../src/output/chunker.js';
import { OverflowTruncationError } from '../src/utils/errors.js';
import type { MessageChunk } from '../src/output/types.js';

const PART_HEADER = /^\*Part \d+\/\d+\*\n/;

function bodies(chunks: MessageChunk[]): string[] {
  return chunks.map(chunk => chunk.content.replace(PART_HEADER, ''));
}

describe('MessageChunker', () => {
  const chunker = new MessageChunker({ clock: () => 1_000 });

  it('returns nothing for empty or blank text', () => {
    expect(chunker.format('')).toEqual([]);
    expect(chunker.format('   \n  ')).toEqual([]);
  });

  it('leaves error text undecorated for the transport to colour', () => {
    const chunks = chunker.format('Error: disk full', 'error');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toEqual({
      content: 'Error: disk full',
      type: 'error',
      priority: 130,
      timestamp: 1_000,
      metadata: { index: 0, total: 1, originalLength: 16, escapedFences: 0, format: 'callout', language: null },
    });
  });

  it('wraps a short single line in inline code', () => {
    const [chunk] = chunker.format('hello', 'normal');
    expect(chunk?.content).toBe('`hello`');
    expect(chunk?.metadata.format).toBe('inline_code');
  });

  it('fences code and records the detected language', () => {
    const [chunk] = chunker.format('const x = 1;\nconsole.log(x);', 'code');

    expect(chunk?.content).toBe('```\nconst x = 1;\nconsole.log(x);\n```');
    expect(chunk?.metadata.format).toBe('code_block');
    expect(chunk?.metadata.language).toBe('javascript');
  });

  it('annotates fences when asked to', () => {
    const annotating = new MessageChunker({ annotateFences: true });
    const [chunk] = annotating.format('def main():\n    pass', 'code');

    expect(chunk?.content).toBe('```python\ndef main():\n    pass\n```');
  });

  it('breaks triple backticks inside fenced content', () => {
    const [chunk] = chunker.format('a```b', 'code');
    expect(chunk?.content).toBe('```\na`\u200b``b\n```');
    expect(chunk?.metadata.originalLength).toBe(5);
    expect(chunk?.metadata.escapedFences).toBe(1);
  });

  it('keeps split chunks within the limit when many fences are escaped', () => {
    const text = Array.from({ length: 600 }, () => '```').join('\n');
    const chunks = chunker.format(text, 'code');

    expect(chunks).toHaveLength(2);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(1900);
    }
    expect(chunks.map(chunk => chunk.metadata.originalLength)).toEqual([1411, 987]);
    expect(chunks.map(chunk => chunk.metadata.escapedFences)).toEqual([353, 247]);

    const restored = bodies(chunks).map(body => body.slice(4, -4).split('`\u200b``').join('```'));
    expect(restored.join('\n')).toBe(text);
  });

  it('keeps text exactly at the limit in one chunk', () => {
    const text = 'a'.repeat(1900);
    const chunks = chunker.format(text, 'normal');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.content).toBe(text);
  });

  it('splits text one character over the limit', () => {
    const chunks = chunker.format('a'.repeat(1901), 'normal');

    expect(chunks).toHaveLength(2);
    expect(chunks[0]?.content).toBe('*Part 1/2*\n' + 'a'.repeat(1889));
    expect(chunks[1]?.content).toBe('*Part 2/2*\n' + 'a'.repeat(12));
  });

  it('splits repeated words at word boundaries and keeps their order', () => {
    const text = 'Line '.repeat(500);
    const chunks = chunker.format(text, 'normal');

    expect(chunks).toHaveLength(2);
    expect(chunks[0]?.content).toBe('*Part 1/2*\n' + 'Line '.repeat(377));
    expect(chunks[1]?.content).toBe('*Part 2/2*\n' + 'Line '.repeat(123));
    expect(chunks.map(chunk => chunk.metadata.index)).toEqual([0, 1]);
    expect(bodies(chunks).join('')).toBe(text);
  });

  it('prefers line boundaries', () => {
    const line = 'x'.repeat(99);
    const text = Array.from({ length: 30 }, () => line).join('\n');
    const chunks = chunker.format(text, 'normal');

    expect(chunks).toHaveLength(2);
    const [first, second] = bodies(chunks);
    expect(first?.split('\n')).toHaveLength(18);
    expect(second?.split('\n')).toHaveLength(12);
    expect(bodies(chunks).join('\n')).toBe(text);
  });

  it('falls back to sentence boundaries for a long line', () => {
    const text = Array.from({ length: 300 }, (_, i) => `Sentence ${i}.`).join(' ');
    const chunks = chunker.format(text, 'normal');

    expect(chunks.length).toBeGreaterThanOrEqual(2);
    for (const body of bodies(chunks)) {
      expect(body.trimEnd().endsWith('.')).toBe(true);
    }
    expect(bodies(chunks).join('')).toBe(text);
  });

  it('never splits a surrogate pair', () => {
    const text = '😀'.repeat(1000);
    const chunks = chunker.format(text, 'normal');
    const loneSurrogate = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

    expect(chunks).toHaveLength(2);
    for (const body of bodies(chunks)) {
      expect(loneSurrogate.test(body)).toBe(false);
    }
    expect(bodies(chunks)[0]).toHaveLength(1888);
    expect(bodies(chunks).join('')).toBe(text);
  });

  it('accounts for a wider part header once there are ten or more parts', () => {
    const text = 'x'.repeat(20_000);
    const chunks = chunker.format(text, 'normal');

    expect(chunks).toHaveLength(11);
    expect(chunks[0]?.content.startsWith('*Part 1/11*\n')).toBe(true);
    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(1900);
      expect(chunk.metadata.total).toBe(11);
    }
    expect(bodies(chunks).join('')).toBe(text);
  });

  it('keeps every split code chunk fenced and within the limit', () => {
    const text = Array.from({ length: 200 }, (_, i) => `const value${i} = ${i};`).join('\n');
    const chunks = chunker.format(text, 'code');

    expect(chunks.length).toBeGreaterThan(1);
    for (const chunk of chunks) {
      expect(chunk.content).toMatch(/^\*Part \d+\/\d+\*\n```\n[\s\S]*\n```$/);
      expect(chunk.content.length).toBeLessThanOrEqual(1900);
      expect(chunk.metadata.language).toBe('javascript');
    }
  });

  it('honours a custom limit', () => {
    const small = new MessageChunker({ maxLength: 100 });
    const chunks = small.format('word '.repeat(100), 'normal');

    for (const chunk of chunks) {
      expect(chunk.content.length).toBeLessThanOrEqual(100);
    }
    expect(bodies(chunks).join('')).toBe('word '.repeat(100));
  });

  it('throws when decoration alone leaves no room', () => {
    const tiny = new MessageChunker({ maxLength: 10 });
    expect(() => tiny.format('a'.repeat(50), 'code')).toThrow(OverflowTruncationError);
  });
});

describe('splitText', () => {
  it('returns short text unchanged', () => {
    expect(splitText('abc', 10)).toEqual(['abc']);
  });

  it('drops blank pieces at line boundaries', () => {
    expect(splitText('aa\n\n\n\n\n\nbb', 2)).toEqual(['aa', 'bb']);
  });
});

describe('recommendFormat', () => {
  it('picks a format from type and content', () => {
    expect(recommendFormat('anything', 'warning')).toBe('callout');
    expect(recommendFormat('import os\nprint(os.name)', 'normal')).toBe('code_block');
    expect(recommendFormat('short', 'normal')).toBe('inline_code');
    expect(recommendFormat('has `ticks`', 'normal')).toBe('plain');
    expect(recommendFormat('two\nlines', 'normal')).toBe('plain');
    expect(recommendFormat('50%', 'progress')).toBe('plain');
  });
});

describe('detectLanguage', () => {
  it('recognises common languages', () => {
    expect(detectLanguage('SELECT id FROM users WHERE id = 1')).toBe('sql');
    expect(detectLanguage('<div>hi</div>')).toBe('xml');
    expect(detectLanguage('plain words')).toBeNull();
  });
});

describe('calculatePriority', () => {
  it('combines type, length and keywords', () => {
    expect(calculatePriority('ok', 'success')).toBe(70);
    expect(calculatePriority('Build complete', 'success')).toBe(90);
    expect(calculatePriority('x'.repeat(150), 'progress')).toBe(10);
  });
});
