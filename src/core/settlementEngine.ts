import type { EngineMetrics, MetricEvent } from '../ops/metrics.js';
import type { Logger } from '../ops/logger.js';
import type { EnginePolicy } from './enginePolicy.js';
import { KeyedSerializer } from './gates.js';
import type { WagerLedger } from './ledger.js';
import { resultValue, type OutcomeKind } from './odds.js';
import { SETTLED_STATUS, type SettlementRecord, type Wager } from './types.js';

export type OutcomeSignal = { artifactRef: string; kind: OutcomeKind; actorId: string };
export type ReactionSignal = { artifactRef: string; emoji: string; actorId: string };

export type IgnoredReason = 'notFound' | 'notOwner' | 'staleState' | 'unrecognized';

export type SettlementResult =
  | { type: 'applied'; wager: Wager; record: SettlementRecord | null }
  | { type: 'reversed'; wager: Wager; removed: SettlementRecord[] }
  | { type: 'ignored'; reason: IgnoredReason };

export type SettlementEngineOptions = {
  ledger: WagerLedger;
  policy: Pick<EnginePolicy, 'reactionSignal'>;
  logger?: Logger;
  metrics?: EngineMetrics;
};

const IGNORED_METRIC: Record<IgnoredReason, MetricEvent> = {
  notFound: 'signalNotFound',
  notOwner: 'signalNotOwner',
  staleState: 'signalStale',
  unrecognized: 'signalUnrecognized',
};

/**
 * Applies retractable outcome signals to posted wagers.
 *
 * Signals for one artifact run in arrival order; the ledger's compare-and-swap on status
 * makes a repeated or late signal a no-op instead of a second settlement.
 */
export class SettlementEngine {
  private readonly serializer = new KeyedSerializer();
  private readonly logger: Logger;

  constructor(private readonly options: SettlementEngineOptions) {
    this.logger = options.logger ?? console;
  }

  onOutcomeSignalAdded(signal: OutcomeSignal): Promise<SettlementResult> {
    return this.serializer.run(signal.artifactRef, () => this.settle(signal));
  }

  onOutcomeSignalRemoved(signal: OutcomeSignal): Promise<SettlementResult> {
    return this.serializer.run(signal.artifactRef, () => this.reverse(signal));
  }

  onReactionAdded(reaction: ReactionSignal): Promise<SettlementResult> {
    const kind = this.options.policy.reactionSignal(reaction.emoji);
    if (!kind) return Promise.resolve(this.ignored(reaction.artifactRef, 'unrecognized'));
    return this.onOutcomeSignalAdded({ artifactRef: reaction.artifactRef, kind, actorId: reaction.actorId });
  }

  onReactionRemoved(reaction: ReactionSignal): Promise<SettlementResult> {
    const kind = this.options.policy.reactionSignal(reaction.emoji);
    if (!kind) return Promise.resolve(this.ignored(reaction.artifactRef, 'unrecognized'));
    return this.onOutcomeSignalRemoved({ artifactRef: reaction.artifactRef, kind, actorId: reaction.actorId });
  }

  private async settle(signal: OutcomeSignal): Promise<SettlementResult> {
    const wager = await this.options.ledger.findByArtifactRef(signal.artifactRef);
    if (!wager) return this.ignored(signal.artifactRef, 'notFound');
    if (wager.owner !== signal.actorId) return this.ignored(signal.artifactRef, 'notOwner');
    if (wager.status !== 'posted') return this.ignored(signal.artifactRef, 'staleState');

    const record =
      signal.kind === 'void'
        ? null
        : { stakeApplied: wager.stake, priceApplied: wager.price, resultValue: resultValue(wager.stake, wager.price, signal.kind) };
    const applied = await this.options.ledger.recordSettlement(wager.id, { status: SETTLED_STATUS[signal.kind], record });
    if (!applied) return this.ignored(signal.artifactRef, 'staleState');

    this.options.metrics?.record('signalApplied');
    this.logger.info(`[SettlementEngine] wager ${wager.id} ${applied.wager.status} result=${applied.record?.resultValue ?? 0}`);
    return { type: 'applied', wager: applied.wager, record: applied.record };
  }

  private async reverse(signal: OutcomeSignal): Promise<SettlementResult> {
    const wager = await this.options.ledger.findByArtifactRef(signal.artifactRef);
    if (!wager) return this.ignored(signal.artifactRef, 'notFound');
    if (wager.owner !== signal.actorId) return this.ignored(signal.artifactRef, 'notOwner');
    const expected = SETTLED_STATUS[signal.kind];
    if (wager.status !== expected) return this.ignored(signal.artifactRef, 'staleState');

    const reversed = await this.options.ledger.reverseSettlement(wager.id, expected);
    if (!reversed) return this.ignored(signal.artifactRef, 'staleState');

    this.options.metrics?.record('signalReversed');
    this.logger.info(`[SettlementEngine] wager ${wager.id} reverted from ${expected}, removed ${reversed.removed.length} record(s)`);
    return { type: 'reversed', wager: reversed.wager, removed: reversed.removed };
  }

  private ignored(artifactRef: string, reason: IgnoredReason): SettlementResult {
    this.options.metrics?.record(IGNORED_METRIC[reason]);
    this.logger.debug(`[SettlementEngine] signal on ${artifactRef} ignored: ${reason}`);
    return { type: 'ignored', reason };
  }
}
