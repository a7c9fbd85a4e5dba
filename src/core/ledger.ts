import { randomUUID } from 'node:crypto';

import { WagerError } from './errors.js';
import type {
  LedgerAction,
  LedgerAuditEntry,
  NewWager,
  SettledStatus,
  SettlementRecord,
  SettlementRecordInput,
  Wager,
} from './types.js';

export type SettlementWrite = { status: SettledStatus; record: SettlementRecordInput | null };
export type SettlementApplied = { wager: Wager; record: SettlementRecord | null };
export type SettlementReversed = { wager: Wager; removed: SettlementRecord[] };

export type UnitTotalsQuery = { group: string; owner?: string; year?: number; month?: number };
export type UnitTotals = { net: number; records: number; wins: number; losses: number; pushes: number };

/**
 * Persistence boundary for wagers and their settlement records.
 *
 * Every mutation is atomic per row. `recordSettlement` and `reverseSettlement` are
 * compare-and-swap operations on the wager status and resolve to `null` when the row is
 * missing or no longer in the expected source state.
 */
export interface WagerLedger {
  create(draft: NewWager): Promise<string>;
  get(id: string): Promise<Wager | null>;
  /** Stamps the user's final acceptance on a `confirmed` row. */
  confirm(id: string): Promise<Wager>;
  updateStakeAndDestination(id: string, stake: number, destination: string): Promise<Wager>;
  markPosted(id: string, artifactRef: string): Promise<Wager>;
  findByArtifactRef(artifactRef: string): Promise<Wager | null>;
  recordSettlement(id: string, write: SettlementWrite): Promise<SettlementApplied | null>;
  reverseSettlement(id: string, expected: SettledStatus): Promise<SettlementReversed | null>;
  delete(id: string): Promise<boolean>;
  listRecords(wagerId: string): Promise<SettlementRecord[]>;
  auditTrail(wagerId: string): Promise<LedgerAuditEntry[]>;
  totals(query: UnitTotalsQuery): Promise<UnitTotals>;
}

export type InMemoryWagerLedgerOptions = { clock?: () => Date; idFactory?: () => string };

const copyWager = (wager: Wager): Wager => ({ ...wager, legs: wager.legs.map((leg) => ({ ...leg })) });

/** Reference ledger kept in process memory; used by tests and single-process deployments. */
export class InMemoryWagerLedger implements WagerLedger {
  private readonly wagers = new Map<string, Wager>();
  private readonly records = new Map<string, SettlementRecord[]>();
  private readonly artifacts = new Map<string, string>();
  private readonly audit = new Map<string, LedgerAuditEntry[]>();
  private readonly clock: () => Date;
  private readonly idFactory: () => string;

  constructor(options: InMemoryWagerLedgerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.idFactory = options.idFactory ?? (() => randomUUID());
  }

  async create(draft: NewWager): Promise<string> {
    if (!draft.legs.length) throw new WagerError('IncompleteWager', 'a wager needs at least one leg');
    const id = this.idFactory();
    if (this.wagers.has(id)) throw new WagerError('LedgerConflict', `wager ${id} already exists`, { id });
    const now = this.clock();
    this.wagers.set(id, {
      ...draft,
      legs: draft.legs.map((leg) => ({ ...leg })),
      id,
      status: 'confirmed',
      postedMessageRef: null,
      acceptedAt: null,
      createdAt: now,
      updatedAt: now,
    });
    this.trail(id, 'created', 'confirmed');
    return id;
  }

  async get(id: string): Promise<Wager | null> {
    const wager = this.wagers.get(id);
    return wager ? copyWager(wager) : null;
  }

  async confirm(id: string): Promise<Wager> {
    const wager = this.require(id, 'confirmed');
    wager.acceptedAt = wager.acceptedAt ?? this.clock();
    wager.updatedAt = this.clock();
    this.trail(id, 'accepted', wager.status);
    return copyWager(wager);
  }

  async updateStakeAndDestination(id: string, stake: number, destination: string): Promise<Wager> {
    if (!Number.isFinite(stake) || stake <= 0) throw new WagerError('InvalidStake', 'stake must be a positive number', { stake });
    if (!destination) throw new WagerError('IncompleteWager', 'destination is required');
    const wager = this.require(id, 'confirmed');
    wager.stake = stake;
    wager.destination = destination;
    wager.updatedAt = this.clock();
    this.trail(id, 'updated', wager.status);
    return copyWager(wager);
  }

  async markPosted(id: string, artifactRef: string): Promise<Wager> {
    if (!artifactRef) throw new WagerError('LedgerConflict', 'artifact reference is required', { id });
    const wager = this.require(id, 'confirmed');
    const owner = this.artifacts.get(artifactRef);
    if (owner && owner !== id) throw new WagerError('LedgerConflict', `artifact ${artifactRef} already belongs to wager ${owner}`, { id, artifactRef });
    wager.status = 'posted';
    wager.postedMessageRef = artifactRef;
    wager.updatedAt = this.clock();
    this.artifacts.set(artifactRef, id);
    this.trail(id, 'posted', 'posted');
    return copyWager(wager);
  }

  async findByArtifactRef(artifactRef: string): Promise<Wager | null> {
    const id = this.artifacts.get(artifactRef);
    return id ? this.get(id) : null;
  }

  async recordSettlement(id: string, write: SettlementWrite): Promise<SettlementApplied | null> {
    const wager = this.wagers.get(id);
    if (!wager || wager.status !== 'posted') return null;
    const now = this.clock();
    let record: SettlementRecord | null = null;
    if (write.record) {
      record = { ...write.record, id: this.idFactory(), wagerId: id, owner: wager.owner, group: wager.group, createdAt: now };
      this.records.set(id, [...(this.records.get(id) ?? []), record]);
    }
    wager.status = write.status;
    wager.updatedAt = now;
    this.trail(id, 'settled', write.status, record ?? undefined);
    return { wager: copyWager(wager), record: record ? { ...record } : null };
  }

  async reverseSettlement(id: string, expected: SettledStatus): Promise<SettlementReversed | null> {
    const wager = this.wagers.get(id);
    if (!wager || wager.status !== expected) return null;
    const removed = this.records.get(id) ?? [];
    this.records.delete(id);
    wager.status = 'posted';
    wager.updatedAt = this.clock();
    if (!removed.length) this.trail(id, 'reversed', 'posted');
    for (const record of removed) this.trail(id, 'reversed', 'posted', record);
    return { wager: copyWager(wager), removed: removed.map((record) => ({ ...record })) };
  }

  async delete(id: string): Promise<boolean> {
    const wager = this.wagers.get(id);
    if (!wager) return false;
    if (wager.postedMessageRef) this.artifacts.delete(wager.postedMessageRef);
    this.wagers.delete(id);
    this.records.delete(id);
    this.trail(id, 'deleted', 'deleted');
    return true;
  }

  async listRecords(wagerId: string): Promise<SettlementRecord[]> {
    return (this.records.get(wagerId) ?? []).map((record) => ({ ...record }));
  }

  async auditTrail(wagerId: string): Promise<LedgerAuditEntry[]> {
    return (this.audit.get(wagerId) ?? []).map((entry) => ({ ...entry }));
  }

  async totals(query: UnitTotalsQuery): Promise<UnitTotals> {
    const totals: UnitTotals = { net: 0, records: 0, wins: 0, losses: 0, pushes: 0 };
    for (const list of this.records.values()) {
      for (const record of list) {
        if (record.group !== query.group) continue;
        if (query.owner !== undefined && record.owner !== query.owner) continue;
        if (query.year !== undefined && record.createdAt.getUTCFullYear() !== query.year) continue;
        if (query.month !== undefined && record.createdAt.getUTCMonth() + 1 !== query.month) continue;
        totals.net += record.resultValue;
        totals.records += 1;
        if (record.resultValue > 0) totals.wins += 1;
        else if (record.resultValue < 0) totals.losses += 1;
        else totals.pushes += 1;
      }
    }
    return totals;
  }

  private require(id: string, status: Wager['status']): Wager {
    const wager = this.wagers.get(id);
    if (!wager) throw new WagerError('LedgerConflict', `wager ${id} not found`, { id });
    if (wager.status !== status) throw new WagerError('LedgerConflict', `wager ${id} is ${wager.status}, expected ${status}`, { id, status: wager.status });
    return wager;
  }

  private trail(wagerId: string, action: LedgerAction, status: LedgerAuditEntry['status'], record?: SettlementRecord): void {
    const entry: LedgerAuditEntry = { wagerId, action, status, at: this.clock() };
    if (record) {
      entry.recordId = record.id;
      entry.resultValue = record.resultValue;
    }
    this.audit.set(wagerId, [...(this.audit.get(wagerId) ?? []), entry]);
  }
}
