import { describe, it, expect, beforeEach } from 'vitest';
import { OutputBuffer } from '../src/output/buffer.js';
import { Session } from '../src/session/session.js';
import { FakeProcess } from './mocks/fake-process.js';

describe('Session', () => {
  let now: number;
  let child: FakeProcess;

  const createSession = (options: { maxHistoryLength?: number; maxOutputHistory?: number } = {}) =>
    new Session({
      id: 'ABC123',
      workingDirectory: '/tmp/work',
      process: child,
      buffer: new OutputBuffer({ sessionId: 'ABC123', clock: () => now }, () => undefined),
      clock: () => now,
      ...options,
    });

  beforeEach(() => {
    now = Date.parse('2026-01-01T00:00:00.000Z');
    child = new FakeProcess({ sessionId: 'ABC123', command: 'cat', workingDirectory: '/tmp/work' });
  });

  it('rejects an empty id', () => {
    expect(() => new Session({
      id: '',
      workingDirectory: '/tmp/work',
      process: child,
      buffer: new OutputBuffer({ sessionId: '' }, () => undefined),
    })).toThrow('Session id cannot be empty');
  });

  it('is active only while marked active and the process runs', async () => {
    const session = createSession();
    expect(session.isActive()).toBe(false);

    await child.start();
    session.activate();
    expect(session.isActive()).toBe(true);

    child.crash();
    expect(session.isActive()).toBe(false);
  });

  it('cannot be reactivated once terminated', async () => {
    const session = createSession();
    await child.start();

    session.markTerminated();
    session.activate();

    expect(session.status).toBe('terminated');
    expect(session.isActive()).toBe(false);
  });

  it('expires after the idle timeout', () => {
    const session = createSession();

    now += 1000;
    expect(session.isExpired(1000)).toBe(false);
    now += 1;
    expect(session.isExpired(1000)).toBe(true);

    session.touch();
    expect(session.isExpired(1000)).toBe(false);
  });

  it('always counts as expired when terminated', () => {
    const session = createSession();
    session.markTerminated();
    expect(session.isExpired(60_000)).toBe(true);
  });

  it('caps command and output history', () => {
    const session = createSession({ maxHistoryLength: 2, maxOutputHistory: 3 });

    for (const command of ['ls', 'pwd', 'whoami']) {
      session.addCommand(command);
    }
    for (const line of ['a', 'b', 'c', 'd']) {
      session.addOutput(line);
    }

    expect(session.getRecentCommands()).toEqual(['pwd', 'whoami']);
    expect(session.getRecentOutput(2)).toEqual(['c', 'd']);
    expect(session.getRecentOutput(0)).toEqual([]);
    expect(session.commandCount).toBe(2);
    expect(session.outputCount).toBe(3);
  });

  it('refreshes activity when history is recorded', () => {
    const session = createSession();
    now += 5000;

    session.addCommand('ls');

    expect(session.lastActivity).toBe(now);
  });

  it('replaces and detaches the transport handle', () => {
    const session = createSession();
    const first = { channelId: 'C1', threadTs: '1.0', attachedBy: 'U1', attachedAt: '2026-01-01T00:00:00.000Z' };
    const second = { ...first, channelId: 'C2' };

    expect(session.attachTransport(first)).toBeNull();
    expect(session.attachTransport(second)).toEqual(first);
    expect(session.detachTransport()).toEqual(second);
    expect(session.transport).toBeNull();
  });

  it('produces a snapshot', async () => {
    const session = createSession();
    await child.start();
    session.activate();
    session.addCommand('ls');

    expect(session.toSnapshot()).toEqual({
      id: 'ABC123',
      status: 'active',
      createdAt: '2026-01-01T00:00:00.000Z',
      lastActivity: '2026-01-01T00:00:00.000Z',
      commandCount: 1,
      outputCount: 0,
      workingDirectory: '/tmp/work',
      isActive: true,
      transport: null,
    });
  });
});
