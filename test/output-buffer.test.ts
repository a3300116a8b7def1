import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OutputBuffer, groupLines, groupType, type OutputBufferOptions } from '../src/output/buffer.js';
import type { MessageChunk, MessageType, OutputLine } from '../src/output/types.js';

describe('OutputBuffer background loop', () => {
  let startedAt: number;
  let deliveredAt: number[];
  let buffer: OutputBuffer;

  const createRunning = (options: Partial<OutputBufferOptions> = {}) => {
    buffer = new OutputBuffer({ sessionId: 'ABC123', ...options }, () => {
      deliveredAt.push(Date.now() - startedAt);
    });
    buffer.start();
    return buffer;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    startedAt = Date.now();
    deliveredAt = [];
  });

  afterEach(async () => {
    await buffer.stop();
    vi.useRealTimers();
  });

  it('flushes pending output once the interval has passed', async () => {
    createRunning({ flushIntervalMs: 2000 });
    buffer.addOutput('alpha');

    await vi.advanceTimersByTimeAsync(1600);
    expect(deliveredAt).toEqual([]);

    await vi.advanceTimersByTimeAsync(1400);
    expect(deliveredAt).toEqual([2000]);
    expect(buffer.getStats().pendingLines).toBe(0);
  });

  it('polls every 500ms while output is quiet', async () => {
    createRunning({ flushIntervalMs: 2050 });
    buffer.addOutput('alpha');

    await vi.advanceTimersByTimeAsync(3000);

    expect(deliveredAt).toEqual([2500]);
  });

  it('polls every 100ms in burst mode', async () => {
    createRunning({ flushIntervalMs: 2050 });
    for (let i = 0; i < 7; i++) {
      buffer.addOutput(`burst ${i}`);
    }
    expect(buffer.getStats().burstMode).toBe(true);

    await vi.advanceTimersByTimeAsync(3000);

    expect(deliveredAt).toEqual([2100]);
  });
});

describe('OutputBuffer', () => {
  let now: number;
  let batches: MessageChunk[][];

  const clock = () => now;
  const sink = (chunks: MessageChunk[]) => {
    batches.push(chunks);
  };
  const createBuffer = (options: Partial<OutputBufferOptions> = {}) =>
    new OutputBuffer({ sessionId: 'ABC123', clock, ...options }, sink);
  const contents = () => batches.map(batch => batch.map(chunk => chunk.content));

  beforeEach(() => {
    now = 1_000;
    batches = [];
  });

  it('delivers an error line right away with escapes removed', async () => {
    const buffer = createBuffer();

    buffer.addOutput('\x1b[31mError: disk full\x1b[0m');
    await buffer.flush();

    expect(batches).toHaveLength(1);
    expect(batches[0]).toHaveLength(1);
    expect(batches[0]?.[0]?.content).toBe('Error: disk full');
    expect(batches[0]?.[0]?.type).toBe('error');

    const [line] = buffer.getRecentLines(1);
    expect(line?.content).toBe('Error: disk full');
    expect(line?.metadata.hasAnsi).toBe(true);
  });

  it('holds ordinary lines until flushed', async () => {
    const buffer = createBuffer();

    buffer.addOutput('alpha');
    buffer.addOutput('beta');
    expect(batches).toHaveLength(0);
    expect(buffer.getStats().pendingLines).toBe(2);

    const chunks = await buffer.flush();
    expect(chunks.map(chunk => chunk.content)).toEqual(['alpha\nbeta']);
    expect(contents()).toEqual([['alpha\nbeta']]);
    expect(buffer.getStats().pendingLines).toBe(0);
  });

  it('keeps line order and splits groups at an error', async () => {
    const buffer = createBuffer();

    buffer.addOutput('first line');
    buffer.addOutput('second line');
    buffer.addOutput('Build failed');
    await buffer.flush();

    expect(contents()).toEqual([['first line\nsecond line', 'Build failed']]);
    expect(batches[0]?.map(chunk => chunk.type)).toEqual(['normal', 'error']);
  });

  it('flushes when a line looks like a prompt', async () => {
    const buffer = createBuffer();

    buffer.addOutput('Proceed with install?');
    await buffer.flush();

    expect(contents()).toEqual([['`Proceed with install?`']]);
  });

  it('flushes every line under the immediate strategy', async () => {
    const buffer = createBuffer({ strategy: 'immediate' });

    buffer.addOutput('one');
    buffer.addOutput('two');
    await buffer.flush();

    expect(contents()).toEqual([['`one`'], ['`two`']]);
  });

  it('flushes in batches under the line strategy', async () => {
    const buffer = createBuffer({ strategy: 'line', lineBatchSize: 3 });

    buffer.addOutput('l1');
    buffer.addOutput('l2');
    expect(buffer.getStats().pendingLines).toBe(2);

    buffer.addOutput('l3');
    await buffer.flush();

    expect(contents()).toEqual([['l1\nl2\nl3']]);
  });

  it('flushes when output has waited more than two intervals', async () => {
    const buffer = createBuffer({ flushIntervalMs: 2000 });

    buffer.addOutput('a1');
    now += 4001;
    buffer.addOutput('a2');
    await buffer.flush();

    // The gap also puts the lines in separate groups.
    expect(contents()).toEqual([['`a1`', '`a2`']]);
  });

  it('flushes once too many lines are pending and caps group size', async () => {
    const buffer = createBuffer();
    const rows = Array.from({ length: 21 }, (_, i) => `row ${i}`);

    for (const row of rows) {
      buffer.addOutput(row);
    }
    await buffer.flush();

    expect(contents()).toEqual([[rows.slice(0, 20).join('\n'), '`row 20`']]);
  });

  it('emits nothing when stopped empty', async () => {
    const buffer = createBuffer();
    buffer.start();

    expect(await buffer.stop()).toEqual([]);
    expect(batches).toHaveLength(0);
    expect(buffer.isRunning).toBe(false);
  });

  it('flushes pending lines on stop', async () => {
    const buffer = createBuffer();
    buffer.start();
    buffer.addOutput('pending text');

    const chunks = await buffer.stop();

    expect(chunks.map(chunk => chunk.content)).toEqual(['`pending text`']);
    expect(contents()).toEqual([['`pending text`']]);
  });

  it('keeps only the most recent lines', () => {
    const buffer = createBuffer({ maxBufferSize: 3 });

    for (const word of ['v', 'w', 'x', 'y', 'z']) {
      buffer.addOutput(word);
    }

    expect(buffer.getStats().totalLines).toBe(3);
    expect(buffer.getRecentLines(10).map(line => line.content)).toEqual(['x', 'y', 'z']);
    expect(buffer.getRecentLines(0)).toEqual([]);
  });

  it('records the stream and an explicit type', async () => {
    const buffer = createBuffer();

    buffer.addOutput('oops', 'error', 'stderr');
    await buffer.flush();

    const [line] = buffer.getRecentLines(1);
    expect(line?.type).toBe('error');
    expect(line?.metadata.stream).toBe('stderr');
  });

  it('keeps delivering after the sink fails', async () => {
    let calls = 0;
    const delivered: string[] = [];
    const buffer = new OutputBuffer({ sessionId: 'ABC123', clock }, (chunks) => {
      calls++;
      if (calls === 1) {
        throw new Error('transport down');
      }
      delivered.push(...chunks.map(chunk => chunk.content));
    });

    buffer.addOutput('Error one');
    buffer.addOutput('Error two');
    await buffer.flush();

    expect(calls).toBe(2);
    expect(delivered).toEqual(['Error two']);
  });

  it('enters and leaves burst mode', () => {
    const buffer = createBuffer();

    for (let i = 0; i < 7; i++) {
      buffer.addOutput(`burst ${i}`);
    }
    expect(buffer.getStats().burstMode).toBe(true);

    now += 5001;
    buffer.addOutput('later');
    expect(buffer.getStats().burstMode).toBe(false);
  });

  it('clears lines and pending output', () => {
    const buffer = createBuffer();
    buffer.addOutput('something');

    buffer.clear();

    expect(buffer.getStats().totalLines).toBe(0);
    expect(buffer.getStats().pendingLines).toBe(0);
  });
});

describe('line grouping', () => {
  const line = (content: string, type: MessageType, timestamp = 0): OutputLine => ({
    content,
    timestamp,
    sessionId: 'ABC123',
    type,
    metadata: {
      hasAnsi: false,
      hasProgress: type === 'progress',
      cleanLength: content.length,
      ansiOverhead: 0,
      semanticTypes: [],
    },
  });

  it('keeps progress lines apart from other output', () => {
    const groups = groupLines([
      line('a', 'normal'),
      line('50%', 'progress'),
      line('60%', 'progress'),
      line('b', 'info'),
    ]);

    expect(groups.map(group => group.map(l => l.content))).toEqual([['a'], ['50%', '60%'], ['b']]);
  });

  it('groups normal and info lines together', () => {
    const groups = groupLines([line('a', 'normal'), line('b', 'info'), line('c', 'warning')]);
    expect(groups).toHaveLength(1);
  });

  it('picks the most significant type for a group', () => {
    expect(groupType([line('a', 'normal'), line('b', 'warning'), line('c', 'info')])).toBe('warning');
    expect(groupType([line('a', 'normal'), line('b', 'code')])).toBe('code');
  });
});
