import test from 'node:test';
import assert from 'node:assert/strict';

import { EngineMetrics, InMemoryWagerLedger, SettlementEngine, toDecimal, type OutcomeKind } from '../src/index.js';
import { recordingLogger, testPolicy } from './fixtures.js';

const setup = async () => {
  let seq = 0;
  const ledger = new InMemoryWagerLedger({ idFactory: () => `id-${++seq}` });
  const metrics = new EngineMetrics();
  const { logger, lines } = recordingLogger();
  const engine = new SettlementEngine({ ledger, policy: testPolicy(), logger, metrics });
  const id = await ledger.create({
    owner: 'u1',
    group: 'g1',
    kind: 'straight',
    stake: 2,
    price: toDecimal(-110),
    americanPrice: -110,
    legs: [{ league: 'NBA', lineType: 'game', eventRef: null, participant: 'Knicks', opponent: 'Nets', market: 'Spread -3.5', americanOdds: -110 }],
    league: 'NBA',
    destination: 'picks',
  });
  await ledger.confirm(id);
  await ledger.markPosted(id, 'msg-1');
  return { ledger, engine, metrics, lines, id };
};

const signal = (kind: OutcomeKind, actorId = 'u1') => ({ artifactRef: 'msg-1', kind, actorId });

test('a win settles once and a repeated signal is a no-op', async () => {
  const { ledger, engine, metrics, id } = await setup();
  const applied = await engine.onOutcomeSignalAdded(signal('won'));
  assert.equal(applied.type, 'applied');
  if (applied.type !== 'applied') return;
  assert.equal(applied.wager.status, 'settled-won');
  assert.ok(Math.abs((applied.record?.resultValue ?? 0) - 20 / 11) < 1e-9);
  assert.equal(applied.record?.stakeApplied, 2);

  assert.deepEqual(await engine.onOutcomeSignalAdded(signal('won')), { type: 'ignored', reason: 'staleState' });
  assert.equal((await ledger.listRecords(id)).length, 1);
  assert.equal(metrics.count('signalApplied'), 1);
  assert.equal(metrics.count('signalStale'), 1);
});

test('adding then removing a signal restores the wager', async () => {
  const { ledger, engine, id } = await setup();
  await engine.onOutcomeSignalAdded(signal('won'));
  const reversed = await engine.onOutcomeSignalRemoved(signal('won'));
  assert.equal(reversed.type, 'reversed');
  const wager = await ledger.get(id);
  assert.equal(wager?.status, 'posted');
  assert.deepEqual(await ledger.listRecords(id), []);
  assert.deepEqual(await ledger.totals({ group: 'g1' }), { net: 0, records: 0, wins: 0, losses: 0, pushes: 0 });
});

test('removing a different outcome than the settled one is ignored', async () => {
  const { ledger, engine, id } = await setup();
  await engine.onOutcomeSignalAdded(signal('won'));
  assert.deepEqual(await engine.onOutcomeSignalRemoved(signal('lost')), { type: 'ignored', reason: 'staleState' });
  assert.equal((await ledger.get(id))?.status, 'settled-won');
  assert.deepEqual(await engine.onOutcomeSignalRemoved(signal('won', 'u2')), { type: 'ignored', reason: 'notOwner' });
});

test('a retracted loss leaves an audit trail of the removed record', async () => {
  const { ledger, engine, id } = await setup();
  const applied = await engine.onOutcomeSignalAdded(signal('lost'));
  assert.equal(applied.type === 'applied' ? applied.record?.resultValue : null, -2);
  await engine.onOutcomeSignalRemoved(signal('lost'));

  const trail = await ledger.auditTrail(id);
  assert.deepEqual(trail.map((entry) => [entry.action, entry.status, entry.resultValue]), [
    ['created', 'confirmed', undefined],
    ['accepted', 'confirmed', undefined],
    ['posted', 'posted', undefined],
    ['settled', 'settled-lost', -2],
    ['reversed', 'posted', -2],
  ]);
  assert.equal(trail[3]?.recordId, trail[4]?.recordId);
});

test('signals from anyone but the owner are ignored', async () => {
  const { ledger, engine, metrics, id } = await setup();
  assert.deepEqual(await engine.onOutcomeSignalAdded(signal('won', 'u2')), { type: 'ignored', reason: 'notOwner' });
  assert.equal((await ledger.get(id))?.status, 'posted');
  assert.equal(metrics.count('signalNotOwner'), 1);
});

test('push records zero and void writes no record', async () => {
  const { ledger, engine, id } = await setup();
  const pushed = await engine.onOutcomeSignalAdded(signal('push'));
  assert.equal(pushed.type === 'applied' ? pushed.record?.resultValue : null, 0);
  assert.equal((await ledger.get(id))?.status, 'settled-push');
  await engine.onOutcomeSignalRemoved(signal('push'));

  const voided = await engine.onOutcomeSignalAdded(signal('void'));
  assert.equal(voided.type === 'applied' ? voided.record : 'missing', null);
  assert.equal((await ledger.get(id))?.status, 'voided');
  assert.deepEqual(await ledger.listRecords(id), []);
  const restored = await engine.onOutcomeSignalRemoved(signal('void'));
  assert.deepEqual(restored.type === 'reversed' ? restored.removed : 'missing', []);
  assert.equal((await ledger.get(id))?.status, 'posted');
});

test('unknown artifacts and reactions are ignored at debug level', async () => {
  const { engine, lines } = await setup();
  assert.deepEqual(await engine.onOutcomeSignalAdded({ artifactRef: 'msg-404', kind: 'won', actorId: 'u1' }), { type: 'ignored', reason: 'notFound' });
  assert.deepEqual(await engine.onReactionAdded({ artifactRef: 'msg-1', emoji: '👍', actorId: 'u1' }), { type: 'ignored', reason: 'unrecognized' });
  assert.deepEqual(await engine.onReactionRemoved({ artifactRef: 'msg-1', emoji: '👍', actorId: 'u1' }), { type: 'ignored', reason: 'unrecognized' });
  assert.deepEqual(lines.map((line) => line.level), ['debug', 'debug', 'debug']);
  assert.equal(lines[0]?.message, '[SettlementEngine] signal on msg-404 ignored: notFound');
});

test('reactions map onto outcome signals', async () => {
  const { ledger, engine, id } = await setup();
  const applied = await engine.onReactionAdded({ artifactRef: 'msg-1', emoji: '☑️', actorId: 'u1' });
  assert.equal(applied.type, 'applied');
  assert.equal((await ledger.get(id))?.status, 'settled-won');
  const reversed = await engine.onReactionRemoved({ artifactRef: 'msg-1', emoji: '✅', actorId: 'u1' });
  assert.equal(reversed.type, 'reversed');
  assert.equal((await ledger.get(id))?.status, 'posted');
});

test('signals racing on one artifact apply in arrival order', async () => {
  const { ledger, engine, id } = await setup();
  const results = await Promise.all([
    engine.onOutcomeSignalAdded(signal('won')),
    engine.onOutcomeSignalRemoved(signal('won')),
    engine.onOutcomeSignalAdded(signal('lost')),
    engine.onOutcomeSignalAdded(signal('won')),
  ]);
  assert.deepEqual(results.map((result) => result.type), ['applied', 'reversed', 'applied', 'ignored']);
  assert.equal((await ledger.get(id))?.status, 'settled-lost');
  assert.deepEqual((await ledger.listRecords(id)).map((record) => record.resultValue), [-2]);
});
