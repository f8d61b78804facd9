// Tests for snapshot persistence. File tests use a throwaway temp directory.

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSnapshotStore, InMemorySnapshotStore, snapshotFileName } from '../memory/snapshot-store.js';
import { makeDecision, makeResult, makeReview } from './helpers/fixtures.js';

describe('snapshotFileName', () => {
  it('percent-encodes unsafe characters', () => {
    expect(snapshotFileName('7203.T')).toBe('7203%2ET.json');
    expect(snapshotFileName('AB/C D')).toBe('AB%2FC%20D.json');
    expect(snapshotFileName('..')).toBe('%2E%2E.json');
    expect(snapshotFileName('A*')).toBe('A%2A.json');
  });

  it('gives distinct ids distinct names', () => {
    expect(snapshotFileName('BRK/B')).toBe('BRK%2FB.json');
    expect(snapshotFileName('BRK_B')).toBe('BRK_B.json');
    expect(snapshotFileName('BRK%2FB')).toBe('BRK%252FB.json');
  });
});

describe('FileSnapshotStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'signal-desk-snapshots-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('round-trips a result and overwrites the previous snapshot', async () => {
    const store = new FileSnapshotStore(join(dir, 'nested'));
    const first = makeResult({ decision: makeDecision({ action: 'HOLD' }) });
    const second = makeResult({
      decision: makeDecision({ action: 'BUY', confidence: 0.8, keyFacts: [{ fact: 'Close 1,000.00', source: 'PRICE' }] }),
      riskReview: makeReview({ concerns: ['FX exposure'] }),
      rawData: { stock_price: { close: 1000 } },
      phaseErrors: { debate: 'overloaded' },
    });

    await store.save(first);
    await store.save(second);

    expect(await store.load('7203')).toEqual(second);
  });

  it('returns null when no snapshot exists', async () => {
    expect(await new FileSnapshotStore(dir).load('9999')).toBeNull();
  });

  it('ignores a corrupt snapshot', async () => {
    const store = new FileSnapshotStore(dir);
    await writeFile(store.pathFor('7203'), '{"entityId": "7203", ', 'utf-8');

    expect(await store.load('7203')).toBeNull();
  });

  it('ignores a snapshot with the wrong shape', async () => {
    const store = new FileSnapshotStore(dir);
    await writeFile(store.pathFor('7203'), JSON.stringify({ entityId: '7203', decision: 'BUY' }), 'utf-8');

    expect(await store.load('7203')).toBeNull();
  });

  it('keeps entities with similar ids apart', async () => {
    const store = new FileSnapshotStore(dir);
    await store.save(makeResult({ entityId: 'BRK/B', decision: makeDecision({ action: 'SELL', confidence: 0.9 }) }));

    expect(await store.load('BRK_B')).toBeNull();
    expect((await store.load('BRK/B'))?.decision?.action).toBe('SELL');
  });

  it('ignores a snapshot recorded for another entity', async () => {
    const store = new FileSnapshotStore(dir);
    await writeFile(store.pathFor('6758'), JSON.stringify(makeResult({ entityId: '7203' })), 'utf-8');

    expect(await store.load('6758')).toBeNull();
  });

  it('does not throw when the directory cannot be created', async () => {
    const blocker = join(dir, 'blocker');
    await writeFile(blocker, 'not a directory', 'utf-8');
    const store = new FileSnapshotStore(join(blocker, 'snapshots'));

    await expect(store.save(makeResult())).resolves.toBeUndefined();
    expect(await store.load('7203')).toBeNull();
  });
});

describe('InMemorySnapshotStore', () => {
  it('keeps the latest result per entity', async () => {
    const store = new InMemorySnapshotStore();
    await store.save(makeResult({ entityId: 'A' }));
    await store.save(makeResult({ entityId: 'A', decision: null }));
    await store.save(makeResult({ entityId: 'B' }));

    expect(store.size).toBe(2);
    expect((await store.load('A'))?.decision).toBeNull();
    expect(await store.load('C')).toBeNull();
  });
});
