import { describe, expect, it, vi } from 'vitest';
import { NotificationQueue, type Notifier } from './notification-queue.js';
import { JUP, WIF, makeCandidate } from '../test-support/fixtures.js';
import type { AlertRecord, TokenAlert } from '../types/index.js';

function alertFor(address: string, symbol = 'TEST'): TokenAlert {
  return {
    candidate: makeCandidate({ address, symbol }),
    safetyScore: 90,
    isValid: true,
    verificationSource: 'RpcMetadata',
  };
}

function makeNotifier(outcomes: Array<boolean | Error> = []) {
  const sent: AlertRecord[] = [];
  const sendTokenAlert = vi.fn(async (alert: AlertRecord) => {
    const outcome = outcomes.shift() ?? true;
    if (outcome instanceof Error) throw outcome;
    if (outcome) sent.push(alert);
    return outcome;
  });
  const notifier: Notifier = {
    sendTokenAlert,
    sendMessage: vi.fn(async () => true),
  };
  return { notifier, sendTokenAlert, sent };
}

describe('NotificationQueue', () => {
  const noSleep = vi.fn(async (_ms: number) => {});

  it('delivers queued alerts in order and records them', async () => {
    const { notifier, sent } = makeNotifier();
    const queue = new NotificationQueue(notifier, {
      sleep: noSleep,
      now: () => new Date('2024-05-01T12:00:00.000Z'),
    });

    const first = queue.enqueue(alertFor(WIF, 'WIF'));
    queue.enqueue(alertFor(JUP, 'JUP'));
    await queue.drain();

    expect(sent.map(a => a.candidate.symbol)).toEqual(['WIF', 'JUP']);
    expect(first?.timestamp).toBe('2024-05-01T12:00:00.000Z');
    expect(first?.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(queue.getHistory().map(a => [a.candidate.symbol, a.delivered])).toEqual([
      ['JUP', true],
      ['WIF', true],
    ]);
    expect(queue.depth).toBe(0);
  });

  it('retries with backoff until an attempt succeeds', async () => {
    const { notifier, sendTokenAlert } = makeNotifier([false, new Error('ETELEGRAM: 502'), true]);
    const sleep = vi.fn(async (_ms: number) => {});
    const queue = new NotificationQueue(notifier, { sleep, retryDelayMs: 100 });

    queue.enqueue(alertFor(WIF));
    await queue.drain();

    expect(sendTokenAlert).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
    expect(queue.getHistory()[0]?.delivered).toBe(true);
  });

  it('gives up after the last attempt and keeps the record as undelivered', async () => {
    const { notifier, sendTokenAlert } = makeNotifier([false, false, false]);
    const queue = new NotificationQueue(notifier, { sleep: noSleep });

    queue.enqueue(alertFor(WIF));
    await queue.drain();

    expect(sendTokenAlert).toHaveBeenCalledTimes(3);
    expect(queue.getHistory()[0]?.delivered).toBe(false);
  });

  it('does not queue a second alert for a pending address', async () => {
    const { notifier, sendTokenAlert } = makeNotifier();
    const queue = new NotificationQueue(notifier, { sleep: noSleep });

    expect(queue.enqueue(alertFor(WIF))).not.toBeNull();
    expect(queue.enqueue(alertFor(WIF))).toBeNull();
    await queue.drain();

    expect(sendTokenAlert).toHaveBeenCalledTimes(1);
    expect(queue.enqueue(alertFor(WIF))).not.toBeNull();
    await queue.drain();
    expect(sendTokenAlert).toHaveBeenCalledTimes(2);
  });

  it('keeps only the most recent history entries', async () => {
    const { notifier } = makeNotifier();
    const queue = new NotificationQueue(notifier, { sleep: noSleep, historyLimit: 2 });

    queue.enqueue(alertFor(WIF, 'ONE'));
    queue.enqueue(alertFor(JUP, 'TWO'));
    await queue.drain();
    queue.enqueue(alertFor(WIF, 'THREE'));
    await queue.drain();

    expect(queue.getHistory().map(a => a.candidate.symbol)).toEqual(['THREE', 'TWO']);
    expect(queue.getHistory(1).map(a => a.candidate.symbol)).toEqual(['THREE']);
  });

  it('stops accepting alerts once stopped', async () => {
    const { notifier, sendTokenAlert } = makeNotifier();
    const queue = new NotificationQueue(notifier, { sleep: noSleep });

    queue.enqueue(alertFor(WIF));
    await queue.stop();

    expect(sendTokenAlert).toHaveBeenCalledTimes(1);
    expect(queue.enqueue(alertFor(JUP))).toBeNull();
  });
});
