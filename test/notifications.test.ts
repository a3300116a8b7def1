import { describe, it, expect } from 'vitest';
import { NotificationChannel } from '../src/session/events.js';
import type { SessionEvent } from '../src/session/types.js';

const terminated = (sessionId: string): SessionEvent => ({
  type: 'sessionTerminated',
  sessionId,
  transport: null,
});

function idOf(event: SessionEvent): string {
  return event.type === 'sessionCreated' ? event.session.id : event.sessionId;
}

describe('NotificationChannel', () => {
  it('dispatches events in publish order', async () => {
    const channel = new NotificationChannel();
    const seen: string[] = [];
    channel.subscribe(async (event) => {
      await new Promise<void>(resolve => setTimeout(resolve, 5));
      seen.push(idOf(event));
    });

    channel.publish(terminated('A'));
    channel.publish(terminated('B'));
    channel.publish(terminated('C'));
    await channel.drain();

    expect(seen).toEqual(['A', 'B', 'C']);
    expect(channel.pending).toBe(0);
  });

  it('does not call handlers synchronously', async () => {
    const channel = new NotificationChannel();
    const seen: string[] = [];
    channel.subscribe((event) => {
      seen.push(idOf(event));
    });

    channel.publish(terminated('A'));
    expect(seen).toEqual([]);

    await channel.drain();
    expect(seen).toEqual(['A']);
  });

  it('keeps dispatching after a handler throws', async () => {
    const channel = new NotificationChannel();
    const seen: string[] = [];
    channel.subscribe(() => {
      throw new Error('handler broke');
    });
    channel.subscribe((event) => {
      seen.push(idOf(event));
    });

    channel.publish(terminated('A'));
    channel.publish(terminated('B'));
    await channel.drain();

    expect(seen).toEqual(['A', 'B']);
  });

  it('stops delivering to an unsubscribed handler', async () => {
    const channel = new NotificationChannel();
    const seen: string[] = [];
    const unsubscribe = channel.subscribe((event) => {
      seen.push(idOf(event));
    });

    channel.publish(terminated('A'));
    await channel.drain();
    unsubscribe();
    channel.publish(terminated('B'));
    await channel.drain();

    expect(seen).toEqual(['A']);
  });

  it('delivers events published from within a handler', async () => {
    const channel = new NotificationChannel();
    const seen: string[] = [];
    channel.subscribe((event) => {
      seen.push(idOf(event));
      if (idOf(event) === 'A') {
        channel.publish(terminated('B'));
      }
    });

    channel.publish(terminated('A'));
    await channel.drain();

    expect(seen).toEqual(['A', 'B']);
  });
});
