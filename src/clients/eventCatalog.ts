import type { Roster, SportEvent } from '../core/types.js';

/** Sports-data collaborator. Implementations call the upstream API; the engine only reads. */
export interface EventDataSource {
  listUpcomingEvents(league: string): Promise<SportEvent[]>;
  listParticipants(eventRef: string): Promise<Roster>;
}

export type EventLookup = {
  upcomingEvents(league: string): Promise<SportEvent[]>;
  participants(eventRef: string): Promise<Roster>;
};

export type EventCatalogTtls = { eventsMs: number; participantsMs: number };
export type EventCatalogOptions = { source: EventDataSource; ttl: EventCatalogTtls | (() => EventCatalogTtls); clock?: () => number; maxEvents?: number };

type CacheEntry<T> = { value: T; expiresAt: number };
type CacheSlot<T> = { entry: CacheEntry<T> | null; pending: Promise<T> | null };

const createSlot = <T>(): CacheSlot<T> => ({ entry: null, pending: null });
const DEFAULT_MAX_EVENTS = 24;

/**
 * Read-through cache in front of the event-data collaborator. Concurrent wizards asking
 * for the same league share one in-flight request, and answers are reused until their TTL.
 */
export class EventCatalog implements EventLookup {
  private readonly eventSlots = new Map<string, CacheSlot<SportEvent[]>>();
  private readonly rosterSlots = new Map<string, CacheSlot<Roster>>();
  private readonly now: () => number;
  private readonly maxEvents: number;

  constructor(private readonly options: EventCatalogOptions) {
    this.now = options.clock ?? (() => Date.now());
    this.maxEvents = options.maxEvents ?? DEFAULT_MAX_EVENTS;
    for (const [key, ttl] of Object.entries(this.ttl())) {
      if (!Number.isFinite(ttl) || ttl <= 0) {
        throw new Error(`EventCatalog: ttl.${key} must be > 0`);
      }
    }
  }

  async upcomingEvents(league: string): Promise<SportEvent[]> {
    if (typeof league !== 'string' || league.length === 0) {
      throw new Error('EventCatalog: league required for events');
    }
    const events = await this.resolve(this.slotFor(this.eventSlots, league), this.ttl().eventsMs, async () => {
      const listed = await this.options.source.listUpcomingEvents(league);
      const cutoff = this.now();
      return listed
        .filter((event) => event.startsAt.getTime() > cutoff)
        .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime())
        .slice(0, this.maxEvents);
    });
    return [...events];
  }

  async participants(eventRef: string): Promise<Roster> {
    if (typeof eventRef !== 'string' || eventRef.length === 0) {
      throw new Error('EventCatalog: event reference required for participants');
    }
    const roster = await this.resolve(this.slotFor(this.rosterSlots, eventRef), this.ttl().participantsMs, () => this.options.source.listParticipants(eventRef));
    return { sideA: [...roster.sideA], sideB: [...roster.sideB] };
  }

  /** Number of cached or in-flight lookups. */
  get size(): number {
    return this.eventSlots.size + this.rosterSlots.size;
  }

  invalidate(): void {
    for (const slot of [...this.eventSlots.values(), ...this.rosterSlots.values()]) {
      slot.entry = null;
      slot.pending = null;
    }
    this.eventSlots.clear();
    this.rosterSlots.clear();
  }

  private ttl(): EventCatalogTtls {
    return typeof this.options.ttl === 'function' ? this.options.ttl() : this.options.ttl;
  }

  private slotFor<T>(slots: Map<string, CacheSlot<T>>, key: string): CacheSlot<T> {
    this.prune(slots);
    const slot = slots.get(key) ?? createSlot<T>();
    slots.set(key, slot);
    return slot;
  }

  /** Drops slots with nothing fresh and nothing loading. */
  private prune<T>(slots: Map<string, CacheSlot<T>>): void {
    const now = this.now();
    for (const [key, slot] of slots) {
      if (!slot.pending && !(slot.entry && slot.entry.expiresAt > now)) slots.delete(key);
    }
  }

  private resolve<T>(slot: CacheSlot<T>, ttlMs: number, loader: () => Promise<T>): Promise<T> {
    const entry = slot.entry;
    const now = this.now();
    if (entry && entry.expiresAt > now) return Promise.resolve(entry.value);
    if (slot.pending) return slot.pending;
    const pending = loader()
      .then((value) => {
        slot.entry = { value, expiresAt: this.now() + ttlMs };
        slot.pending = null;
        return value;
      })
      .catch((error: unknown) => {
        slot.pending = null;
        throw error;
      });
    slot.pending = pending;
    return pending;
  }
}
