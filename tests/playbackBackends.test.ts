import assert from 'node:assert/strict';
import net from 'node:net';
import { test } from './testHarness';
import { FfmpegPlayer, buildFfmpegArgs, parseIcyTitle } from '../src/adapters/playback/ffmpegPlayer';
import {
  MpdClient,
  MpdCommandError,
  mpdQuote,
  parseMpdResponse,
  responseValue,
  type MpdResponse,
} from '../src/adapters/playback/mpdClient';
import { MpdPlayer } from '../src/adapters/playback/mpdPlayer';
import { RoutingPlaybackBackend } from '../src/adapters/playback/routingPlaybackBackend';
import { PlaybackBackendError } from '../src/domain/errors';
import type { StreamRef } from '../src/domain/session/types';
import { FakePlaybackBackend } from './fakes/playbackBackend';

const fixedStream: StreamRef = {
  stationId: 'local',
  url: 'http://example/stream',
  transport: 'media-server',
  headers: {},
};

const upstreamStream: StreamRef = {
  stationId: 'TBS',
  url: 'https://media.example/live.m3u8',
  transport: 'player',
  headers: { 'X-Radiko-AuthToken': 'test-token', 'X-Radiko-AreaId': 'JP13' },
};

class ScriptedMpdClient extends MpdClient {
  public readonly calls: string[][] = [];
  public readonly responses = new Map<string, MpdResponse>();
  public failWith: Error | null = null;

  constructor() {
    super({ host: 'localhost', port: 6600 });
  }

  public override async run(commands: string[]): Promise<MpdResponse> {
    this.calls.push(commands);
    if (this.failWith) {
      throw this.failWith;
    }
    return this.responses.get(commands[0]) ?? [];
  }
}

test('ffmpeg arguments carry the request headers and the ALSA sink', () => {
  assert.deepEqual(buildFfmpegArgs(upstreamStream, { alsaDevice: 'hw:1,0' }), [
    '-loglevel',
    'info',
    '-headers',
    'X-Radiko-AuthToken: test-token\r\nX-Radiko-AreaId: JP13\r\n',
    '-i',
    'https://media.example/live.m3u8',
    '-f',
    'alsa',
    '-ac',
    '2',
    '-ar',
    '48000',
    'hw:1,0',
  ]);
  assert.deepEqual(buildFfmpegArgs(fixedStream, { alsaDevice: 'default', logLevel: 'warning' }), [
    '-loglevel',
    'warning',
    '-i',
    'http://example/stream',
    '-f',
    'alsa',
    '-ac',
    '2',
    '-ar',
    '48000',
    'default',
  ]);
});

test('ICY titles are read from the metadata dump', () => {
  assert.equal(parseIcyTitle('  Metadata:\n    StreamTitle     : Artist - Song\r\n'), 'Artist - Song');
  assert.equal(parseIcyTitle('StreamTitle: First\nStreamTitle: Second\n'), 'Second');
  assert.equal(parseIcyTitle('StreamTitle: \n'), null);
  assert.equal(parseIcyTitle('Input #0, hls, from ...'), null);
});

test('a missing ffmpeg binary fails the start', async () => {
  const player = new FfmpegPlayer({ binary: 'tunedeck-missing-ffmpeg-binary', alsaDevice: 'default' });
  await assert.rejects(
    () => player.start(upstreamStream),
    (error: unknown) => error instanceof PlaybackBackendError && error.message.startsWith('ffmpeg failed to start: '),
  );
  assert.equal(await player.status(), 'stopped');
});

test('mpd responses parse into pairs once complete', () => {
  assert.deepEqual(parseMpdResponse('volume: 50\nstate: play\nOK\n'), [
    ['volume', '50'],
    ['state', 'play'],
  ]);
  assert.equal(parseMpdResponse('state: play\nOK'), null);
  assert.throws(
    () => parseMpdResponse('ACK [50@0] {add} No such directory\n'),
    (error: unknown) => error instanceof MpdCommandError && error.message === '[50@0] {add} No such directory',
  );
  assert.equal(responseValue([['Title', 'Song']], 'title'), 'Song');
  assert.equal(responseValue([], 'title'), null);
  assert.equal(mpdQuote('say "hi" \\ there'), '"say \\"hi\\" \\\\ there"');
});

test('mpd client waits for the greeting and sends a command list', async () => {
  const received: string[] = [];
  const server = net.createServer((socket) => {
    socket.setEncoding('utf8');
    socket.write('OK MPD 0.23.5\n');
    let buffer = '';
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      if (buffer.endsWith('command_list_end\n')) {
        received.push(buffer);
        socket.write('state: play\nOK\n');
      }
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  assert.ok(address && typeof address === 'object');
  try {
    const client = new MpdClient({ host: '127.0.0.1', port: address.port });
    assert.deepEqual(await client.run(['clear', 'play']), [['state', 'play']]);
    assert.deepEqual(received, ['command_list_begin\nclear\nplay\ncommand_list_end\n']);
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

test('mpd player refuses streams that need headers', async () => {
  const client = new ScriptedMpdClient();
  const player = new MpdPlayer({ host: 'localhost', port: 6600 }, client);
  await assert.rejects(() => player.start(upstreamStream), {
    name: 'PlaybackBackendError',
    message: 'mpd cannot attach request headers',
  });
  assert.deepEqual(client.calls, []);
});

test('mpd player replaces the queue and stops only when active', async () => {
  const client = new ScriptedMpdClient();
  const player = new MpdPlayer({ host: 'localhost', port: 6600, watchIntervalMs: 3_600_000 }, client);

  await player.stop();
  assert.deepEqual(client.calls, []);

  await player.start(fixedStream);
  client.responses.set('currentsong', [
    ['file', 'http://example/stream'],
    ['Name', 'Local FM'],
  ]);
  assert.equal(await player.currentTitle(), 'Local FM');
  client.responses.set('status', [['state', 'pause']]);
  assert.equal(await player.status(), 'stopped');
  await player.stop();

  assert.deepEqual(client.calls, [
    ['clear', 'add "http://example/stream"', 'play'],
    ['currentsong'],
    ['status'],
    ['stop'],
  ]);
  assert.equal(await player.currentTitle(), null);
});

test('mpd player wraps command failures', async () => {
  const client = new ScriptedMpdClient();
  client.failWith = new MpdCommandError('[50@0] {add} No such directory');
  const player = new MpdPlayer({ host: 'localhost', port: 6600 }, client);
  await assert.rejects(() => player.start(fixedStream), {
    message: 'mpd refused the stream: [50@0] {add} No such directory',
  });
});

test('mpd player reports a stream that stopped on its own', async () => {
  const client = new ScriptedMpdClient();
  client.responses.set('status', [['state', 'stop']]);
  const player = new MpdPlayer({ host: 'localhost', port: 6600, watchIntervalMs: 5 }, client);
  const stopped = new Promise<string>((resolve) => {
    player.onUnexpectedStop(resolve);
  });
  await player.start(fixedStream);
  assert.equal(await stopped, 'mpd is no longer playing');
  assert.equal(await player.currentTitle(), null);
});

test('routing backend sends each transport to its backend', async () => {
  const mediaServer = new FakePlaybackBackend();
  const player = new FakePlaybackBackend();
  const router = new RoutingPlaybackBackend(mediaServer, player);
  const reasons: string[] = [];
  router.onUnexpectedStop((reason) => reasons.push(reason));

  await router.start(fixedStream);
  assert.equal(mediaServer.starts.length, 1);
  await router.start(upstreamStream);
  assert.equal(mediaServer.stops, 1);
  assert.equal(player.starts.length, 1);

  player.title = 'Song';
  assert.equal(await router.currentTitle(), 'Song');

  mediaServer.crash('stale');
  assert.deepEqual(reasons, []);
  player.crash('gone');
  assert.deepEqual(reasons, ['gone']);
  assert.equal(await router.status(), 'stopped');

  player.failNextStarts = 1;
  await assert.rejects(() => router.start(upstreamStream), PlaybackBackendError);
  assert.equal(await router.status(), 'stopped');
});
