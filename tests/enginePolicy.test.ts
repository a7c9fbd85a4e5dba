import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';

import type { ConfigSnapshot, Plain } from '../src/core/configManager.js';
import { EnginePolicy, WagerError, parseSettings } from '../src/index.js';
import { recordingLogger } from './fixtures.js';

const snapshotOf = (data: Plain, hash = 'hash'): ConfigSnapshot => ({ data, sources: {}, hash, loadedAt: new Date() });

const snapshot = snapshotOf({
  engine: { catalog: { events_ttl_ms: 1_000, participants_ttl_ms: 2_000 } },
  wizard: {
    stake: { min: 0.5, max: 3, step: 0.5 },
    timeouts: { straight_ms: 600_000, parlay_ms: 1_800_000 },
    parlay: { max_legs: 4 },
    odds: { min: -5_000, max: 5_000 },
  },
  leagues: {
    other_label: 'Other',
    catalogue: [
      { key: 'NFL', name: 'NFL', sport: 'American Football', sport_type: 'team' },
      { key: 'Tennis', name: 'Tennis', sport: 'Tennis', sport_type: 'individual' },
    ],
  },
  settlement: { reactions: { won: ['✅'], lost: ['❌'], push: ['🅿️'], void: ['🚫'] } },
  presenter: { post_timeout_ms: 2_500 },
});

class StubManager extends EventEmitter {
  constructor(private snap: ConfigSnapshot) {
    super();
  }

  getSnapshot(): ConfigSnapshot {
    return this.snap;
  }

  publish(next: ConfigSnapshot): void {
    this.snap = next;
    this.emit('reload', next);
  }
}

const code = (expected: string) => (error: unknown) => error instanceof WagerError && error.code === expected;

const manager = new StubManager(snapshot);
const { logger, lines } = recordingLogger();
const policy = new EnginePolicy(manager, logger);

assert.deepEqual(policy.stakeOptions(), [0.5, 1, 1.5, 2, 2.5, 3]);
assert.equal(policy.validateStake(1.5), 1.5);
assert.throws(() => policy.validateStake(0.75), code('InvalidStake'));
assert.throws(() => policy.validateStake(3.5), code('InvalidStake'));
assert.throws(() => policy.validateStake(Number.NaN), code('InvalidStake'));

assert.equal(policy.validateOdds(-110), -110);
assert.throws(() => policy.validateOdds(50), code('InvalidOdds'));
assert.throws(() => policy.validateOdds(7_500), code('InvalidOdds'));

assert.equal(policy.maxParlayLegs(), 4);
assert.equal(policy.timeoutFor('parlay'), 1_800_000);
assert.deepEqual(policy.leagueChoices(), ['NFL', 'Tennis', 'Other']);
assert.equal(policy.isOtherLeague('Other'), true);
assert.equal(policy.isIndividualSport('Tennis'), true);
assert.equal(policy.isIndividualSport('NFL'), false);
assert.equal(policy.isIndividualSport('Other'), false);
assert.equal(policy.league('NFL')?.sport, 'American Football');
assert.equal(policy.reactionSignal('✅'), 'won');
assert.equal(policy.reactionSignal(' 🚫 '), 'void');
assert.equal(policy.reactionSignal('👍'), null);
assert.equal(policy.postTimeoutMs(), 2_500);
assert.deepEqual(policy.catalogTtl(), { eventsMs: 1_000, participantsMs: 2_000 });

manager.publish(snapshotOf({ wizard: { stake: { min: 1, max: 2, step: 1 } } }, 'next'));
assert.deepEqual(policy.stakeOptions(), [1, 2]);
assert.equal(policy.getSettings().hash, 'next');
assert.equal(policy.maxParlayLegs(), 10);
assert.deepEqual(policy.leagueChoices(), ['Other']);

// a broken edit on disk leaves the running settings in place
manager.publish(snapshotOf({ wizard: { stake: { min: 3, max: 1, step: 0.5 } } }, 'broken'));
assert.deepEqual(policy.stakeOptions(), [1, 2]);
assert.equal(policy.getSettings().hash, 'next');
assert.deepEqual(lines, [
  { level: 'error', message: '[EnginePolicy] reload broken rejected, keeping next: WagerError: EnginePolicy: invalid stake bounds' },
]);

assert.throws(() => parseSettings(snapshotOf({ wizard: { stake: { min: 3, max: 1, step: 0.5 } } })), code('ConfigInvalid'));
assert.throws(() => parseSettings(snapshotOf({ wizard: { parlay: { max_legs: 1 } } })), code('ConfigInvalid'));
assert.throws(() => parseSettings(snapshotOf({ leagues: { catalogue: [{ key: 'X', sport_type: 'relay' }] } })), code('ConfigInvalid'));
assert.throws(
  () => parseSettings(snapshotOf({ settlement: { reactions: { won: ['✅'], lost: ['✅'] } } })),
  code('ConfigInvalid'),
);
