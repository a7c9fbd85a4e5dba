import type { OutcomeKind } from './odds.js';

export type WagerKind = 'straight' | 'parlay';
export type LineType = 'game' | 'player';

export type WagerStatus = 'draft' | 'confirmed' | 'posted' | 'settled-won' | 'settled-lost' | 'settled-push' | 'voided';
export type SettledStatus = Extract<WagerStatus, 'settled-won' | 'settled-lost' | 'settled-push' | 'voided'>;

export const SETTLED_STATUS: Record<OutcomeKind, SettledStatus> = {
  won: 'settled-won',
  lost: 'settled-lost',
  push: 'settled-push',
  void: 'voided',
};

export type Leg = {
  league: string;
  lineType: LineType;
  eventRef: string | null;
  participant: string;
  opponent: string;
  market: string;
  americanOdds: number;
};

export type Wager = {
  id: string;
  owner: string;
  group: string;
  kind: WagerKind;
  status: Exclude<WagerStatus, 'draft'>;
  stake: number;
  price: number;
  americanPrice: number;
  legs: readonly Leg[];
  league: string;
  destination: string;
  postedMessageRef: string | null;
  acceptedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

/** What a session hands to the ledger the first time it reaches review. */
export type NewWager = Pick<Wager, 'owner' | 'group' | 'kind' | 'stake' | 'price' | 'americanPrice' | 'legs' | 'league' | 'destination'>;

export type SettlementRecord = {
  id: string;
  wagerId: string;
  owner: string;
  group: string;
  stakeApplied: number;
  priceApplied: number;
  resultValue: number;
  createdAt: Date;
};

export type SettlementRecordInput = Pick<SettlementRecord, 'stakeApplied' | 'priceApplied' | 'resultValue'>;

export type LedgerAction = 'created' | 'updated' | 'accepted' | 'posted' | 'settled' | 'reversed' | 'deleted';

export type LedgerAuditEntry = {
  wagerId: string;
  action: LedgerAction;
  status: WagerStatus | 'deleted';
  recordId?: string;
  resultValue?: number;
  at: Date;
};

export type SportEvent = {
  ref: string;
  league: string;
  home: string;
  away: string;
  startsAt: Date;
};

export type Roster = { sideA: string[]; sideB: string[] };

export type Destination = { id: string; label: string };
