import assert from 'node:assert/strict';
import { test } from './testHarness';
import { stopInStages, stopWithTimeout } from '../src/runtime/stopWithTimeout';
import type { LogContext } from '../src/shared/logging/logger';

type Entry = { level: 'debug' | 'warn' | 'error'; message: string; context?: LogContext };

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function recordingLog() {
  const entries: Entry[] = [];
  return {
    entries,
    log: {
      debug: (message: string, context?: LogContext) => entries.push({ level: 'debug', message, context }),
      warn: (message: string, context?: LogContext) => entries.push({ level: 'warn', message, context }),
      error: (message: string, context?: LogContext) => entries.push({ level: 'error', message, context }),
    },
  };
}

test('a clean stop reports stopped', async () => {
  const { log, entries } = recordingLog();
  const outcome = await stopWithTimeout({ name: 'session', stop: () => delay(1) }, 50, log);
  assert.equal(outcome, 'stopped');
  assert.deepEqual(entries, [{ level: 'debug', message: 'service stopped', context: { service: 'session' } }]);
});

test('a synchronous stop that throws reports failed', async () => {
  const { log, entries } = recordingLog();
  const outcome = await stopWithTimeout(
    {
      name: 'ui',
      stop: () => {
        throw new Error('boom');
      },
    },
    50,
    log,
  );
  assert.equal(outcome, 'failed');
  assert.deepEqual(entries, [
    { level: 'error', message: 'service stop failed', context: { service: 'ui', message: 'boom' } },
  ]);
});

test('a slow stop times out and a late failure is still logged', async () => {
  const { log, entries } = recordingLog();
  const outcome = await stopWithTimeout(
    {
      name: 'display',
      stop: async () => {
        await delay(20);
        throw new Error('late');
      },
    },
    5,
    log,
  );
  assert.equal(outcome, 'timeout');
  assert.deepEqual(entries, [
    { level: 'warn', message: 'service stop timed out', context: { service: 'display', timeoutMs: 5 } },
  ]);
  await delay(30);
  assert.deepEqual(entries[1], {
    level: 'error',
    message: 'service stop failed',
    context: { service: 'display', message: 'late' },
  });
});

test('stages run in order and a failure does not hold back later stages', async () => {
  const { log } = recordingLog();
  const order: string[] = [];
  const outcomes = await stopInStages(
    [
      [
        { name: 'buttons', stop: async () => { await delay(5); order.push('buttons'); } },
        { name: 'ui', stop: () => { order.push('ui'); } },
      ],
      [{ name: 'session', stop: async () => { order.push('session'); throw new Error('stuck'); } }],
      [{ name: 'display', stop: () => { order.push('display'); } }],
    ],
    50,
    log,
  );
  assert.deepEqual(order, ['ui', 'buttons', 'session', 'display']);
  assert.deepEqual(outcomes, { buttons: 'stopped', ui: 'stopped', session: 'failed', display: 'stopped' });
});
