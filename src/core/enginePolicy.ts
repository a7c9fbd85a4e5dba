import type { EventEmitter } from 'node:events';
import type { ConfigManager, ConfigSnapshot, Plain } from './configManager.js';
import { isRecord } from './configManager.js';
import { WagerError } from './errors.js';
import { describeError, type Logger } from '../ops/logger.js';
import { OddsConversionError, toDecimal, type OutcomeKind } from './odds.js';
import type { WagerKind } from './types.js';

export type StakeRules = { min: number; max: number; step: number };
export type SportType = 'team' | 'individual';
export type LeagueProfile = { key: string; name: string; sport: string; sportType: SportType };
export type EngineSettings = {
  hash: string;
  stake: StakeRules;
  timeouts: Record<WagerKind, number>;
  maxParlayLegs: number;
  oddsBounds: { min: number; max: number };
  leagues: LeagueProfile[];
  otherLeague: string;
  reactions: Map<string, OutcomeKind>;
  postTimeoutMs: number;
  catalogTtl: { eventsMs: number; participantsMs: number };
};

export type ConfigSource = Pick<ConfigManager, 'getSnapshot'> & Pick<EventEmitter, 'on'>;

const OUTCOMES: readonly OutcomeKind[] = ['won', 'lost', 'push', 'void'];
const isSportType = (value: unknown): value is SportType => value === 'team' || value === 'individual';
const STEP_EPSILON = 1e-9;

const section = (value: unknown, path: string): Plain => {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new WagerError('ConfigInvalid', `EnginePolicy: expected mapping at ${path}`);
  return value;
};
const num = (value: unknown, path: string, fallback: number): number => {
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || Number.isNaN(value)) throw new WagerError('ConfigInvalid', `EnginePolicy: expected number at ${path}`);
  return value;
};
const positive = (value: unknown, path: string, fallback: number): number => {
  const parsed = num(value, path, fallback);
  if (!(parsed > 0)) throw new WagerError('ConfigInvalid', `EnginePolicy: ${path} must be > 0`);
  return parsed;
};
const str = (value: unknown, path: string, fallback?: string): string => {
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'string' || !value.trim()) throw new WagerError('ConfigInvalid', `EnginePolicy: expected string at ${path}`);
  return value;
};
const strArray = (value: unknown, path: string): string[] => {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new WagerError('ConfigInvalid', `EnginePolicy: expected array at ${path}`);
  return value.map((entry, index) => str(entry, `${path}[${index}]`));
};

const parseLeagues = (raw: unknown): LeagueProfile[] => {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) throw new WagerError('ConfigInvalid', 'EnginePolicy: expected array at leagues.catalogue');
  return raw.map((entry, index) => {
    const path = `leagues.catalogue[${index}]`;
    const league = section(entry, path);
    const sportType = league.sport_type ?? 'team';
    if (!isSportType(sportType)) throw new WagerError('ConfigInvalid', `EnginePolicy: ${path}.sport_type must be team|individual`);
    const key = str(league.key, `${path}.key`);
    return { key, name: str(league.name, `${path}.name`, key), sport: str(league.sport, `${path}.sport`, key), sportType };
  });
};

const parseReactions = (raw: Plain): Map<string, OutcomeKind> => {
  const reactions = new Map<string, OutcomeKind>();
  for (const outcome of OUTCOMES) {
    for (const emoji of strArray(raw[outcome], `settlement.reactions.${outcome}`)) {
      const existing = reactions.get(emoji);
      if (existing && existing !== outcome) throw new WagerError('ConfigInvalid', `EnginePolicy: reaction ${emoji} mapped to both ${existing} and ${outcome}`);
      reactions.set(emoji, outcome);
    }
  }
  return reactions;
};

export const parseSettings = (snapshot: ConfigSnapshot): EngineSettings => {
  const engine = section(snapshot.data.engine, 'engine');
  const wizard = section(snapshot.data.wizard, 'wizard');
  const leagues = section(snapshot.data.leagues, 'leagues');
  const settlement = section(snapshot.data.settlement, 'settlement');
  const presenter = section(snapshot.data.presenter, 'presenter');

  const stakeRaw = section(wizard.stake, 'wizard.stake');
  const stake: StakeRules = {
    min: positive(stakeRaw.min, 'wizard.stake.min', 0.5),
    max: positive(stakeRaw.max, 'wizard.stake.max', 3),
    step: positive(stakeRaw.step, 'wizard.stake.step', 0.5),
  };
  if (stake.min > stake.max) throw new WagerError('ConfigInvalid', 'EnginePolicy: invalid stake bounds');
  const timeouts = section(wizard.timeouts, 'wizard.timeouts');
  const odds = section(wizard.odds, 'wizard.odds');
  const oddsBounds = { min: num(odds.min, 'wizard.odds.min', -10_000), max: num(odds.max, 'wizard.odds.max', 10_000) };
  if (oddsBounds.min > -100 || oddsBounds.max < 100) throw new WagerError('ConfigInvalid', 'EnginePolicy: odds bounds must include -100 and +100');
  const maxParlayLegs = num(section(wizard.parlay, 'wizard.parlay').max_legs, 'wizard.parlay.max_legs', 10);
  if (!Number.isInteger(maxParlayLegs) || maxParlayLegs < 2) throw new WagerError('ConfigInvalid', 'EnginePolicy: wizard.parlay.max_legs must be an integer >= 2');
  const catalog = section(engine.catalog, 'engine.catalog');

  return {
    hash: snapshot.hash,
    stake,
    timeouts: {
      straight: positive(timeouts.straight_ms, 'wizard.timeouts.straight_ms', 600_000),
      parlay: positive(timeouts.parlay_ms, 'wizard.timeouts.parlay_ms', 1_800_000),
    },
    maxParlayLegs,
    oddsBounds,
    leagues: parseLeagues(leagues.catalogue),
    otherLeague: str(leagues.other_label, 'leagues.other_label', 'Other'),
    reactions: parseReactions(section(settlement.reactions, 'settlement.reactions')),
    postTimeoutMs: positive(presenter.post_timeout_ms, 'presenter.post_timeout_ms', 15_000),
    catalogTtl: {
      eventsMs: positive(catalog.events_ttl_ms, 'engine.catalog.events_ttl_ms', 300_000),
      participantsMs: positive(catalog.participants_ttl_ms, 'engine.catalog.participants_ttl_ms', 600_000),
    },
  };
};

/** Typed, validated view of the engine configuration that follows config reloads. */
export class EnginePolicy {
  private current: EngineSettings;

  constructor(private readonly source: ConfigSource, private readonly logger: Logger = console) {
    this.current = parseSettings(source.getSnapshot());
    this.source.on('reload', (next: ConfigSnapshot) => this.apply(next));
  }

  /** A rejected reload keeps the settings already in force. */
  private apply(next: ConfigSnapshot): void {
    try {
      this.current = parseSettings(next);
    } catch (error) {
      this.logger.error(`[EnginePolicy] reload ${next.hash.slice(0, 12)} rejected, keeping ${this.current.hash.slice(0, 12)}: ${describeError(error)}`);
    }
  }

  getSettings(): EngineSettings { return this.current; }

  stakeOptions(): number[] {
    const { min, max, step } = this.current.stake;
    const options: number[] = [];
    for (let index = 0; min + index * step <= max + STEP_EPSILON; index += 1) {
      options.push(Math.round((min + index * step) * 1e6) / 1e6);
    }
    return options;
  }

  validateStake(stake: number): number {
    if (!Number.isFinite(stake)) throw new WagerError('InvalidStake', 'stake must be a number', { stake });
    const { min, max } = this.current.stake;
    const match = this.stakeOptions().find((option) => Math.abs(option - stake) < STEP_EPSILON);
    if (match === undefined) throw new WagerError('InvalidStake', `stake must be between ${min} and ${max} units in steps of ${this.current.stake.step}`, { stake });
    return match;
  }

  validateOdds(americanOdds: number): number {
    // throws InvalidOdds inside -100..+100
    toDecimal(americanOdds);
    const { min, max } = this.current.oddsBounds;
    if (americanOdds < min || americanOdds > max) throw new OddsConversionError('InvalidOdds', `odds must be between ${min} and +${max}`, { americanOdds });
    return americanOdds;
  }

  timeoutFor(kind: WagerKind): number { return this.current.timeouts[kind]; }

  maxParlayLegs(): number { return this.current.maxParlayLegs; }

  leagueChoices(): string[] { return [...this.current.leagues.map((league) => league.key), this.current.otherLeague]; }

  isOtherLeague(key: string): boolean { return key === this.current.otherLeague; }

  league(key: string): LeagueProfile | null { return this.current.leagues.find((league) => league.key === key) ?? null; }

  isIndividualSport(key: string): boolean { return this.league(key)?.sportType === 'individual'; }

  reactionSignal(emoji: string): OutcomeKind | null { return this.current.reactions.get(emoji.trim()) ?? null; }

  postTimeoutMs(): number { return this.current.postTimeoutMs; }

  catalogTtl(): EngineSettings['catalogTtl'] { return this.current.catalogTtl; }
}
