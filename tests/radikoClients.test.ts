import assert from 'node:assert/strict';
import { test } from './testHarness';
import { RadikoAuthClient, parseAreaId } from '../src/adapters/content/radiko/radikoAuthClient';
import { RadikoStreamClient } from '../src/adapters/content/radiko/radikoStreamClient';
import {
  RadikoProgramClient,
  parseNowOnAir,
  parseSchedule,
  parseStationList,
} from '../src/adapters/content/radiko/radikoProgramClient';
import { broadcastDateKey, parseJstTimestamp } from '../src/adapters/content/radiko/broadcastTime';
import { UpstreamRejectedError } from '../src/domain/errors';
import { findProgramAt } from '../src/ports/ProgramGuidePort';
import { makeScriptedFetch, textResponse } from './fakes/fetch';

const identity = {
  app: 'pc_html5',
  appVersion: '0.0.1',
  device: 'pc',
  user: 'dummy_user',
  cookie: null,
};

test('auth1 skips refused endpoints and reads the challenge headers', async () => {
  const { fetch, requests } = makeScriptedFetch([
    (req) => (req.url === 'https://a.example/auth1' ? textResponse('busy', 503) : undefined),
    (req) =>
      req.url === 'https://b.example/auth1'
        ? textResponse('', 200, {
            'X-Radiko-AuthToken': 'test-token',
            'X-Radiko-KeyOffset': '8',
            'X-Radiko-KeyLength': '16',
          })
        : undefined,
  ]);
  const client = new RadikoAuthClient({
    ...identity,
    auth1Urls: ['https://a.example/auth1', 'https://b.example/auth1'],
    auth2Urls: [],
    fetch,
  });

  const challenge = await client.requestChallenge();
  assert.deepEqual(challenge, { token: 'test-token', keyOffset: 8, keyLength: 16 });
  assert.equal(requests.length, 2);
  assert.equal(requests[0].headers['x-radiko-app'], 'pc_html5');
  assert.equal(requests[0].headers['x-radiko-user'], 'dummy_user');
});

test('auth1 reports the last failure when no endpoint answers', async () => {
  const { fetch } = makeScriptedFetch([() => textResponse('<html>denied</html>', 403)]);
  const client = new RadikoAuthClient({ ...identity, auth1Urls: ['https://a.example/auth1'], auth2Urls: [], fetch });
  await assert.rejects(() => client.requestChallenge(), { message: 'auth1 rejected: HTTP 403' });
});

test('auth2 falls back to GET and reads the area code', async () => {
  const { fetch, requests } = makeScriptedFetch([
    (req) => (req.method === 'POST' ? textResponse('', 405) : undefined),
    () => textResponse('JP13,tokyo Japan,tokyo,JP13'),
  ]);
  const client = new RadikoAuthClient({ ...identity, auth1Urls: [], auth2Urls: ['https://a.example/auth2'], fetch });

  const confirmation = await client.confirm({ token: 'test-token', keyOffset: 0, keyLength: 4 }, 'YmNkMQ==');
  assert.deepEqual(confirmation, { areaId: 'JP13' });
  assert.deepEqual(
    requests.map((req) => req.method),
    ['POST', 'GET'],
  );
  assert.equal(requests[0].body, '\r\n');
  assert.equal(requests[1].headers['x-radiko-authtoken'], 'test-token');
  assert.equal(requests[1].headers['x-radiko-partialkey'], 'YmNkMQ==');
});

test('auth2 failure on every endpoint rejects', async () => {
  const { fetch } = makeScriptedFetch([() => textResponse('', 500)]);
  const client = new RadikoAuthClient({ ...identity, auth1Urls: [], auth2Urls: ['https://a.example/auth2'], fetch });
  await assert.rejects(() => client.confirm({ token: 't', keyOffset: 0, keyLength: 4 }, 'k'), {
    message: 'auth2 rejected: HTTP 500',
  });
});

test('area code parsing', () => {
  assert.equal(parseAreaId('JP27,osaka Japan'), 'JP27');
  assert.equal(parseAreaId('OUT,somewhere JP13'), 'JP13');
  assert.equal(parseAreaId('OUT'), null);
});

test('stream descriptor: 404 everywhere is not found, 401 is a rejection', async () => {
  const notFound = makeScriptedFetch([() => textResponse('', 404)]);
  const client = new RadikoStreamClient({
    descriptorUrls: ['https://a.example/{station}.xml', 'https://b.example/{station}.xml'],
    fetch: notFound.fetch,
  });
  assert.deepEqual(await client.fetchStreamDescriptor('NOPE', {}), { kind: 'not_found' });
  assert.deepEqual(
    notFound.requests.map((req) => req.url),
    ['https://a.example/NOPE.xml', 'https://b.example/NOPE.xml'],
  );

  const rejected = makeScriptedFetch([() => textResponse('', 401)]);
  const strict = new RadikoStreamClient({ descriptorUrls: ['https://a.example/{station}.xml'], fetch: rejected.fetch });
  await assert.rejects(
    () => strict.fetchStreamDescriptor('TBS', {}),
    (error: unknown) => error instanceof UpstreamRejectedError && error.status === 401,
  );
});

test('stream descriptor: first 200 wins, other statuses throw', async () => {
  const { fetch } = makeScriptedFetch([
    (req) => (req.url.startsWith('https://a.example') ? textResponse('', 500) : undefined),
    () => textResponse('<urls/>'),
  ]);
  const client = new RadikoStreamClient({
    descriptorUrls: ['https://a.example/{station}.xml', 'https://b.example/{station}.xml'],
    fetch,
  });
  assert.deepEqual(await client.fetchStreamDescriptor('TBS', {}), {
    kind: 'ok',
    xml: '<urls/>',
    url: 'https://b.example/TBS.xml',
  });

  const broken = makeScriptedFetch([() => textResponse('', 500)]);
  const failing = new RadikoStreamClient({ descriptorUrls: ['https://a.example/{station}.xml'], fetch: broken.fetch });
  await assert.rejects(() => failing.fetchStreamDescriptor('TBS', {}), {
    message: 'stream descriptor unavailable for TBS (HTTP 500)',
  });
});

test('playlist creation retries a refused POST as GET with a query string', async () => {
  const { fetch, requests } = makeScriptedFetch([
    (req) => (req.method === 'POST' ? textResponse('', 405) : undefined),
    () => textResponse('#EXTM3U\nhttps://media.example/live.m3u8\n'),
  ]);
  const client = new RadikoStreamClient({ fetch });
  const result = await client.createPlaylist(
    'https://live.example/playlist.m3u8',
    { station_id: 'TBS', l: '15' },
    { 'X-Radiko-AuthToken': 'test-token' },
  );

  assert.deepEqual(result, {
    kind: 'ok',
    body: '#EXTM3U\nhttps://media.example/live.m3u8\n',
    url: 'https://live.example/playlist.m3u8',
  });
  assert.equal(requests[0].body, 'station_id=TBS&l=15');
  assert.equal(requests[0].headers['content-type'], 'application/x-www-form-urlencoded');
  assert.equal(requests[1].url, 'https://live.example/playlist.m3u8?station_id=TBS&l=15');
});

test('playlist creation maps 403 to forbidden and other errors to failed', async () => {
  const forbidden = new RadikoStreamClient({ fetch: makeScriptedFetch([() => textResponse('', 403)]).fetch });
  assert.deepEqual(await forbidden.createPlaylist('https://x.example/p', {}, {}), { kind: 'forbidden', status: 403 });

  const failed = new RadikoStreamClient({ fetch: makeScriptedFetch([() => textResponse('', 400)]).fetch });
  assert.deepEqual(await failed.createPlaylist('https://x.example/p', {}, {}), { kind: 'failed', status: 400 });
});

test('broadcast day starts at 05:00 local time', () => {
  // 03:00 JST on May 2nd
  assert.equal(broadcastDateKey(Date.UTC(2024, 4, 1, 18, 0, 0)), '20240501');
  // 05:00 JST on May 2nd
  assert.equal(broadcastDateKey(Date.UTC(2024, 4, 1, 20, 0, 0)), '20240502');
  assert.equal(parseJstTimestamp('20240502050000'), Date.UTC(2024, 4, 1, 20, 0, 0));
  assert.equal(parseJstTimestamp('2024-05-02'), null);
});

const SCHEDULE = `<?xml version="1.0" encoding="UTF-8"?>
<radiko><stations><station id="TBS"><progs>
  <prog id="1" ft="20240501120000" to="20240501130000">
    <title>Lunch &amp; Talk</title>
    <img>https://img.example/lunch.png</img>
  </prog>
  <prog id="2" ft="20240501130000" to="20240501150000">
    <title>Afternoon</title>
    <img></img>
  </prog>
  <prog id="3" ft="bad" to="20240501160000"><title>Broken</title></prog>
</progs></station></stations></radiko>`;

test('schedule parsing keeps well-formed programs and decodes entities', () => {
  const programs = parseSchedule(SCHEDULE);
  assert.deepEqual(programs, [
    {
      title: 'Lunch & Talk',
      imageUrl: 'https://img.example/lunch.png',
      startsAt: Date.UTC(2024, 4, 1, 3, 0, 0),
      endsAt: Date.UTC(2024, 4, 1, 4, 0, 0),
    },
    {
      title: 'Afternoon',
      imageUrl: null,
      startsAt: Date.UTC(2024, 4, 1, 4, 0, 0),
      endsAt: Date.UTC(2024, 4, 1, 6, 0, 0),
    },
  ]);
  assert.equal(findProgramAt(programs, Date.UTC(2024, 4, 1, 4, 0, 0))?.title, 'Afternoon');
  assert.equal(findProgramAt(programs, Date.UTC(2024, 4, 1, 7, 0, 0)), null);
});

test('schedule request uses the broadcast day of the given instant', async () => {
  const { fetch, requests } = makeScriptedFetch([() => textResponse(SCHEDULE)]);
  const client = new RadikoProgramClient({ fetch });
  await client.fetchSchedule('TBS', Date.UTC(2024, 4, 1, 18, 0, 0));
  assert.equal(requests[0].url, 'https://radiko.jp/v3/program/station/date/20240501/TBS.xml');
});

test('now-on-air and station list parsing', async () => {
  assert.equal(
    parseNowOnAir('<noa><item ft="20240501120000" title="Song" artist="Band"/></noa>'),
    'Song / Band',
  );
  assert.equal(parseNowOnAir('<noa><item title=""/></noa>'), null);
  assert.equal(parseNowOnAir('<noa></noa>'), null);

  assert.deepEqual(
    parseStationList(
      '<stations area_id="JP13"><station><id>TBS</id><name>TBS Radio</name><ascii_name>TBS</ascii_name></station>' +
        '<station><id></id><name>Nameless</name></station></stations>',
    ),
    [{ id: 'TBS', name: 'TBS Radio' }],
  );

  const failing = new RadikoProgramClient({ fetch: makeScriptedFetch([() => textResponse('', 500)]).fetch });
  await assert.rejects(() => failing.fetchNowOnAir('TBS'), {
    message: 'HTTP 500 for https://radiko.jp/v3/feed/pc/noa/TBS.xml',
  });
});
