import test from 'node:test';
import assert from 'node:assert/strict';

import { InMemoryWagerLedger, WagerError, type Leg, type NewWager } from '../src/index.js';

const leg: Leg = { league: 'NFL', lineType: 'game', eventRef: 'evt-1', participant: 'Bears', opponent: 'Packers', market: 'Spread +3.5', americanOdds: 200 };
const draft = (overrides: Partial<NewWager> = {}): NewWager => ({
  owner: 'u1',
  group: 'g1',
  kind: 'straight',
  stake: 2,
  price: 3,
  americanPrice: 200,
  legs: [leg],
  league: 'NFL',
  destination: 'picks',
  ...overrides,
});

const createLedger = (start = Date.UTC(2026, 0, 15)) => {
  let nowMs = start;
  let seq = 0;
  const ledger = new InMemoryWagerLedger({ clock: () => new Date(nowMs), idFactory: () => `id-${++seq}` });
  return { ledger, setNow: (ms: number) => { nowMs = ms; } };
};

const conflict = (error: unknown) => error instanceof WagerError && error.code === 'LedgerConflict';

test('InMemoryWagerLedger walks a wager from created to posted', async () => {
  const { ledger } = createLedger();
  const id = await ledger.create(draft());
  assert.equal(id, 'id-1');
  const created = await ledger.get(id);
  assert.equal(created?.status, 'confirmed');
  assert.equal(created?.acceptedAt, null);
  assert.equal(created?.postedMessageRef, null);

  const updated = await ledger.updateStakeAndDestination(id, 1.5, 'main');
  assert.equal(updated.stake, 1.5);
  assert.equal(updated.destination, 'main');

  const accepted = await ledger.confirm(id);
  assert.deepEqual(accepted.acceptedAt, new Date(Date.UTC(2026, 0, 15)));
  const posted = await ledger.markPosted(id, 'msg-1');
  assert.equal(posted.status, 'posted');
  assert.equal((await ledger.findByArtifactRef('msg-1'))?.id, id);
  assert.equal(await ledger.findByArtifactRef('msg-unknown'), null);

  await assert.rejects(ledger.updateStakeAndDestination(id, 2, 'main'), conflict);
  await assert.rejects(ledger.confirm('missing'), conflict);
  const other = await ledger.create(draft());
  await assert.rejects(ledger.markPosted(other, 'msg-1'), conflict);
});

test('InMemoryWagerLedger rejects drafts without legs', async () => {
  const { ledger } = createLedger();
  await assert.rejects(ledger.create(draft({ legs: [] })), (error: unknown) => error instanceof WagerError && error.code === 'IncompleteWager');
});

test('settlement writes are compare-and-swap on status', async () => {
  const { ledger } = createLedger();
  const id = await ledger.create(draft());
  assert.equal(await ledger.recordSettlement(id, { status: 'settled-won', record: null }), null);
  await ledger.confirm(id);
  await ledger.markPosted(id, 'msg-1');

  const write = { status: 'settled-won' as const, record: { stakeApplied: 2, priceApplied: 3, resultValue: 4 } };
  const applied = await ledger.recordSettlement(id, write);
  assert.equal(applied?.wager.status, 'settled-won');
  assert.equal(applied?.record?.id, 'id-2');
  assert.equal(applied?.record?.owner, 'u1');
  assert.equal(await ledger.recordSettlement(id, write), null);
  assert.equal((await ledger.listRecords(id)).length, 1);

  assert.equal(await ledger.reverseSettlement(id, 'settled-lost'), null);
  const reversed = await ledger.reverseSettlement(id, 'settled-won');
  assert.equal(reversed?.wager.status, 'posted');
  assert.deepEqual(reversed?.removed.map((record) => record.id), ['id-2']);
  assert.deepEqual(await ledger.listRecords(id), []);

  const trail = await ledger.auditTrail(id);
  assert.deepEqual(trail.map((entry) => entry.action), ['created', 'accepted', 'posted', 'settled', 'reversed']);
  assert.equal(trail[3]?.recordId, 'id-2');
  assert.equal(trail[4]?.recordId, 'id-2');
  assert.equal(trail[4]?.resultValue, 4);
});

test('delete drops the row and frees its artifact reference', async () => {
  const { ledger } = createLedger();
  const id = await ledger.create(draft());
  await ledger.confirm(id);
  await ledger.markPosted(id, 'msg-1');
  assert.equal(await ledger.delete(id), true);
  assert.equal(await ledger.get(id), null);
  assert.equal(await ledger.findByArtifactRef('msg-1'), null);
  assert.equal(await ledger.delete(id), false);
  assert.deepEqual((await ledger.auditTrail(id)).map((entry) => entry.action), ['created', 'accepted', 'posted', 'deleted']);
});

test('totals sum settlement records by group, owner and month', async () => {
  const { ledger, setNow } = createLedger();
  const settle = async (owner: string, ref: string, status: 'settled-won' | 'settled-lost' | 'settled-push', stake: number, result: number) => {
    const id = await ledger.create(draft({ owner, stake }));
    await ledger.confirm(id);
    await ledger.markPosted(id, ref);
    await ledger.recordSettlement(id, { status, record: { stakeApplied: stake, priceApplied: 3, resultValue: result } });
  };

  await settle('u1', 'msg-a', 'settled-won', 2, 4);
  setNow(Date.UTC(2026, 1, 3));
  await settle('u2', 'msg-b', 'settled-lost', 1, -1);
  await settle('u1', 'msg-c', 'settled-push', 1, 0);

  assert.deepEqual(await ledger.totals({ group: 'g1' }), { net: 3, records: 3, wins: 1, losses: 1, pushes: 1 });
  assert.deepEqual(await ledger.totals({ group: 'g1', owner: 'u1' }), { net: 4, records: 2, wins: 1, losses: 0, pushes: 1 });
  assert.deepEqual(await ledger.totals({ group: 'g1', year: 2026, month: 2 }), { net: -1, records: 2, wins: 0, losses: 1, pushes: 1 });
  assert.deepEqual(await ledger.totals({ group: 'g2' }), { net: 0, records: 0, wins: 0, losses: 0, pushes: 0 });
});
