import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from './testHarness';
import { ConsoleDisplay } from '../src/adapters/display/consoleDisplay';
import { FramebufferDisplay, toRgb565 } from '../src/adapters/display/framebufferDisplay';
import { fitScale, fitText } from '../src/adapters/display/text';
import { buildDisplayFrame, type SessionView } from '../src/application/session/sessionView';
import { createStation } from '../src/domain/station/types';
import type { DisplayFrame } from '../src/ports/DisplayPort';
import { RecordingDisplay } from './fakes/recordingDisplay';

const NOW = Date.UTC(2024, 4, 1, 3, 0, 0);
const TBS = createStation({ id: 'TBS', name: 'TBS Radio', source: 'curated' });

const playingView = (overrides: Partial<SessionView> = {}): SessionView => ({
  snapshot: {
    mode: 'curated',
    station: TBS,
    pending: null,
    stream: { stationId: 'TBS', url: 'http://example/stream', transport: 'player', headers: {} },
    status: 'playing',
    lastError: null,
  },
  nowPlaying: null,
  promptVisible: false,
  shuttingDown: false,
  notice: null,
  now: NOW,
  pollIntervalMs: 10_000,
  ...overrides,
});

const frame = (overrides: Partial<DisplayFrame> = {}): DisplayFrame => ({
  stationName: 'TBS Radio',
  title: 'Now Playing',
  artwork: null,
  statusLine: 'Playing',
  ...overrides,
});

test('fresh now-playing titles are shown, stale ones fall back to the generic label', () => {
  const nowPlaying = {
    stationId: 'TBS',
    title: 'Morning Show',
    artworkUrl: null,
    artwork: null,
    fetchedAt: NOW - 30_000,
  };
  assert.equal(buildDisplayFrame(playingView({ nowPlaying })).title, 'Morning Show');
  assert.equal(
    buildDisplayFrame(playingView({ nowPlaying: { ...nowPlaying, fetchedAt: NOW - 30_001 } })).title,
    'Now Playing',
  );
  assert.equal(
    buildDisplayFrame(playingView({ nowPlaying: { ...nowPlaying, stationId: 'QRR' } })).title,
    'Now Playing',
  );
});

test('an idle session without a station shows the mode label', () => {
  const view = playingView();
  assert.deepEqual(
    buildDisplayFrame({
      ...view,
      snapshot: { ...view.snapshot, mode: 'world', station: null, stream: null, status: 'idle' },
    }),
    { stationName: 'World Radio', title: '', artwork: null, statusLine: 'Stopped' },
  );
});

test('console display prints each distinct frame once', async () => {
  const lines: string[] = [];
  const display = new ConsoleDisplay({ write: (chunk: string) => lines.push(chunk) });

  await display.publish(frame());
  await display.publish(frame());
  await display.publish(frame({ title: 'Song', statusLine: '', artwork: Buffer.from([1, 2, 3]) }));
  await display.close();
  await display.publish(frame({ title: 'Song', statusLine: '', artwork: Buffer.from([1, 2, 3]) }));

  assert.deepEqual(lines, [
    '[display] TBS Radio | Now Playing | Playing\n',
    '[display] TBS Radio | Song | [artwork 3 bytes]\n',
    '[display] TBS Radio | Song | [artwork 3 bytes]\n',
  ]);
});

test('text fitting collapses whitespace and marks truncation', () => {
  assert.equal(fitText('  Hello   world ', 20), 'Hello world');
  assert.equal(fitText('Very long station name', 10), 'Very lo...');
  assert.equal(fitText('abcdef', 3), 'abc');
  assert.equal(fitScale(400, 200, 200, 100), 0.5);
  assert.equal(fitScale(100, 100, 200, 200), 1);
  assert.equal(fitScale(0, 10, 200, 200), 1);
});

test('RGB565 packing is little-endian', () => {
  const rgba = Buffer.from([255, 255, 255, 255, 255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255]);
  assert.deepEqual([...toRgb565(rgba)], [0xff, 0xff, 0x00, 0xf8, 0xe0, 0x07, 0x1f, 0x00]);
});

test('framebuffer display writes a full frame to the device', async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tunedeck-fb-'));
  try {
    const device = path.join(dir, 'fb0');
    const fallback = new RecordingDisplay();
    const display = new FramebufferDisplay({ device, width: 4, height: 4, rotation: 0, fontPath: null }, fallback);
    await display.publish(frame());
    assert.deepEqual(await fs.readFile(device), Buffer.alloc(32));
    assert.equal(fallback.frames.length, 0);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test('framebuffer display hands over to the fallback after a write failure', async () => {
  const fallback = new RecordingDisplay();
  const display = new FramebufferDisplay(
    { device: path.join(os.tmpdir(), 'tunedeck-missing-dir', 'fb0'), width: 4, height: 4, rotation: 0, fontPath: null },
    fallback,
  );
  await display.publish(frame());
  await display.publish(frame({ title: 'Song' }));
  await display.close();
  assert.deepEqual(
    fallback.frames.map((entry) => entry.title),
    ['Now Playing', 'Song'],
  );
  assert.equal(fallback.closed, true);
});
