import assert from 'node:assert/strict';
import { test } from './testHarness';
import { StationRegistry } from '../src/application/stations/stationRegistry';
import { hydrateStationNames, needsNameHydration } from '../src/application/stations/stationNames';
import { createStation, parseStationFile, type StationDescriptor } from '../src/domain/station/types';
import { FakeDirectory } from './fakes/upstream';

const curated = (ids: string[]): StationDescriptor[] =>
  ids.map((id) => createStation({ id, name: `${id} name`, source: 'curated' }));

const world = (ids: string[]): StationDescriptor[] =>
  ids.map((id) => createStation({ id, name: id, streamUrl: `http://example/${id}`, source: 'world' }));

test('registry cursor tracks next/previous modulo the list length', async () => {
  const registry = new StationRegistry(curated(['A1', 'A2', 'A3']), new FakeDirectory());
  const moves = [1, 1, 1, 1, -1, -1, -1, -1, -1, -1, 1, -1, -1];
  let net = 0;
  for (const move of moves) {
    const station = move > 0 ? await registry.next() : await registry.previous();
    net += move;
    const expected = ((net % 3) + 3) % 3;
    assert.equal(registry.getCursor(), expected);
    assert.equal(station?.id, `A${expected + 1}`);
    assert.equal(registry.current()?.id, `A${expected + 1}`);
  }
});

test('registry wraps backwards from the first entry', async () => {
  const registry = new StationRegistry(curated(['A1', 'A2']), new FakeDirectory());
  const station = await registry.previous();
  assert.equal(station?.id, 'A2');
});

test('registry rejects an empty curated list', () => {
  assert.throws(() => new StationRegistry([], new FakeDirectory()), /station list is empty/);
});

test('world mode picks from a fresh lookup and avoids the current station', async () => {
  const directory = new FakeDirectory(world(['w1', 'w2', 'w3']));
  const registry = new StationRegistry(curated(['A1']), directory, { random: () => 0 });
  const first = await registry.setMode('world');
  assert.equal(first?.id, 'w1');
  assert.equal(directory.lookups, 1);

  const second = await registry.next();
  assert.equal(second?.id, 'w2');
  const third = await registry.previous();
  assert.equal(third?.id, 'w1');
  assert.equal(directory.lookups, 3);
});

test('toggling back to curated keeps the cursor and the world station', async () => {
  const directory = new FakeDirectory(world(['w1', 'w2']));
  const registry = new StationRegistry(curated(['A1', 'A2', 'A3']), directory, { random: () => 0.99 });
  await registry.next();
  const picked = await registry.setMode('world');
  assert.equal(picked?.id, 'w2');

  const back = await registry.setMode('curated');
  assert.equal(back?.id, 'A2');
  const again = await registry.setMode('world');
  assert.equal(again?.id, 'w2');
  assert.equal(directory.lookups, 1);
});

test('an empty directory answer is a lookup failure', async () => {
  const registry = new StationRegistry(curated(['A1']), new FakeDirectory([]));
  await assert.rejects(registry.setMode('world'), /no stations/);
});

test('a superseded world lookup resolves to null', async () => {
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const stations = world(['w1', 'w2']);
  let calls = 0;
  const registry = new StationRegistry(
    curated(['A1']),
    {
      lookup: async () => {
        calls += 1;
        if (calls === 1) {
          await gate;
        }
        return stations;
      },
    },
    { random: () => 0 },
  );
  registry.enterMode('world');
  const slow = registry.next();
  const fast = await registry.next();
  release();
  assert.equal(await slow, null);
  assert.equal(fast?.id, 'w1');
  assert.equal(registry.current()?.id, 'w1');
});

test('restore seeds cursor and falls back to the first entry for unknown ids', () => {
  const registry = new StationRegistry(curated(['A1', 'A2', 'A3']), new FakeDirectory());
  registry.restore({ stationId: 'A3', mode: 'curated' });
  assert.equal(registry.current()?.id, 'A3');

  const fallback = new StationRegistry(curated(['A1', 'A2']), new FakeDirectory());
  fallback.restore({ stationId: 'gone', mode: 'curated' });
  assert.equal(fallback.getCursor(), 0);
  assert.equal(fallback.current()?.id, 'A1');
});

test('restore rebuilds a persisted world station', () => {
  const registry = new StationRegistry(curated(['A1']), new FakeDirectory());
  registry.restore({
    stationId: 'uuid-1',
    mode: 'world',
    station: { name: 'Far Away FM', streamUrl: 'http://example/far' },
  });
  assert.equal(registry.getMode(), 'world');
  assert.deepEqual(registry.current(), {
    id: 'uuid-1',
    name: 'Far Away FM',
    streamUrl: 'http://example/far',
    source: 'world',
  });
  assert.equal(registry.find('uuid-1')?.name, 'Far Away FM');
});

test('replaceCurated keeps the cursor on the same station id', async () => {
  const registry = new StationRegistry(curated(['A1', 'A2', 'A3']), new FakeDirectory());
  await registry.next();
  await registry.next();
  registry.replaceCurated(curated(['A3', 'A1']));
  assert.equal(registry.current()?.id, 'A3');
  assert.equal(registry.getCursor(), 0);
});

test('station file parsing keeps first duplicates and defaults names to ids', () => {
  const stations = parseStationFile([
    { id: 'TBS', stream_url: 'http://example/stream' },
    { id: ' QRR ', name: 'Bunka' },
    { id: 'TBS', name: 'duplicate' },
  ]);
  assert.deepEqual(stations, [
    { id: 'TBS', name: 'TBS', streamUrl: 'http://example/stream', source: 'curated' },
    { id: 'QRR', name: 'Bunka', source: 'curated' },
  ]);
  assert.throws(() => parseStationFile({ id: 'x' }), /invalid station file/);
  assert.throws(() => parseStationFile([{ name: 'no id' }]), /invalid station file \(0\.id: Required\)/);
});

test('station names are filled in only for id-only upstream entries', () => {
  const stations = parseStationFile([
    { id: 'TBS' },
    { id: 'QRR', name: 'Mine' },
    { id: 'FIX', stream_url: 'http://example/fix' },
  ]);
  assert.equal(needsNameHydration(stations), true);
  const hydrated = hydrateStationNames(stations, [
    { id: 'TBS', name: 'TBS Radio' },
    { id: 'QRR', name: 'Bunka Housou' },
    { id: 'FIX', name: 'Fixed' },
  ]);
  assert.deepEqual(
    hydrated.map((station) => station.name),
    ['TBS Radio', 'Mine', 'FIX'],
  );
  assert.equal(needsNameHydration(hydrated), false);
});
