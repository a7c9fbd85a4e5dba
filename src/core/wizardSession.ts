import type { EnginePolicy } from './enginePolicy.js';
import { WagerError } from './errors.js';
import { formatAmerican, parseAmerican, priceLegs, toAmerican } from './odds.js';
import type { Destination, Leg, LineType, NewWager, Roster, SportEvent, WagerKind } from './types.js';

export type WizardStep =
  | 'selectLineType'
  | 'selectLeague'
  | 'selectEvent'
  | 'selectParticipant'
  | 'enterLegDetails'
  | 'legDecision'
  | 'selectStake'
  | 'selectDestination'
  | 'review'
  | 'confirmed'
  | 'cancelled'
  | 'timedOut';

export type TerminalStep = Extract<WizardStep, 'confirmed' | 'cancelled' | 'timedOut'>;

export type LegDetails = { participant?: string; opponent?: string; market: string; odds: string | number };

export type WizardInput =
  | { kind: 'lineType'; lineType: LineType }
  | { kind: 'league'; league: string }
  | { kind: 'event'; eventRef: string }
  | { kind: 'manualEntry' }
  | { kind: 'participant'; side: keyof Roster; name: string }
  | { kind: 'legDetails'; values: LegDetails }
  | { kind: 'addLeg' }
  | { kind: 'finalize' }
  | { kind: 'stake'; stake: number }
  | { kind: 'destination'; destination: string }
  | { kind: 'confirm' }
  | { kind: 'editStake' }
  | { kind: 'editDestination' }
  | { kind: 'cancel' };

export type Choice = { value: WizardInput; label: string; description?: string };
export type FormField = { name: string; label: string; required: boolean; placeholder?: string; value?: string };

export type DraftView = {
  kind: WagerKind;
  owner: string;
  group: string;
  legs: readonly Leg[];
  stake: number | null;
  destination: string | null;
  price: number | null;
  americanPrice: number | null;
  wagerId: string | null;
  accepted: boolean;
};

export type StepPrompt =
  | { mode: 'choices'; step: WizardStep; title: string; choices: Choice[]; summary?: DraftView }
  | { mode: 'form'; step: WizardStep; title: string; fields: FormField[]; legNumber: number | null };

/** Follow-up work the controller performs after a transition is accepted. */
export type SessionEffect =
  | { type: 'none' }
  | { type: 'loadEvents'; league: string }
  | { type: 'loadParticipants'; event: SportEvent }
  | { type: 'loadDestinations' }
  | { type: 'persist'; draft: NewWager }
  | { type: 'update'; wagerId: string; stake: number; destination: string }
  | { type: 'accept'; wagerId: string }
  | { type: 'discard'; wagerId: string | null };

export type SessionRules = Pick<
  EnginePolicy,
  'leagueChoices' | 'isOtherLeague' | 'league' | 'isIndividualSport' | 'stakeOptions' | 'validateStake' | 'validateOdds' | 'maxParlayLegs'
>;

type LegInProgress = {
  lineType: LineType | null;
  league: string | null;
  event: SportEvent | null;
  roster: Roster | null;
  participant: { side: keyof Roster; name: string } | null;
};

const TERMINAL: ReadonlySet<WizardStep> = new Set(['confirmed', 'cancelled', 'timedOut']);
const CANCEL: Choice = { value: { kind: 'cancel' }, label: 'Cancel' };
const UNKNOWN_OPPONENT = 'unknown';

const freshLeg = (): LegInProgress => ({ lineType: null, league: null, event: null, roster: null, participant: null });
const clean = (value: string | undefined): string => (value ?? '').trim();
const same = (a: string, b: string): boolean => a.localeCompare(b, undefined, { sensitivity: 'accent' }) === 0;
const unitsLabel = (stake: number): string => `${stake} Unit${stake === 1 ? '' : 's'}`;
const eventLabel = (event: SportEvent): string => `${event.away} @ ${event.home} (${event.startsAt.toISOString().slice(5, 16).replace('T', ' ')} UTC)`;

/**
 * Finite-state machine for one wager placement attempt.
 *
 * `apply` validates an input against the current step and either throws (leaving the
 * session untouched) or advances and returns the effect the caller has to carry out.
 * Effects that need an I/O result come back through `offerEvents`, `offerRoster`,
 * `offerDestinations` and `enterReview`.
 */
export class WizardSession {
  private current: WizardStep = 'selectLineType';
  private readonly legs: Leg[] = [];
  private leg: LegInProgress = freshLeg();
  private events: SportEvent[] = [];
  private destinations: Destination[] = [];
  private stake: number | null = null;
  private destination: string | null = null;
  private price: number | null = null;
  private wagerId: string | null = null;
  private accepted = false;
  private editing = false;
  private reviewPending = false;

  constructor(
    readonly owner: string,
    readonly group: string,
    readonly kind: WagerKind,
    private readonly rules: SessionRules,
  ) {}

  get step(): WizardStep { return this.current; }

  get terminal(): boolean { return TERMINAL.has(this.current); }

  get persistedId(): string | null { return this.wagerId; }

  get isAccepted(): boolean { return this.accepted; }

  apply(input: WizardInput): SessionEffect {
    if (this.terminal) throw new WagerError('SessionClosed', 'this bet session has already ended', { step: this.current });
    if (this.reviewPending) throw new WagerError('UnexpectedInput', 'the previous step is still being saved', { step: this.current });
    if (input.kind === 'cancel') return this.finish('cancelled');

    switch (this.current) {
      case 'selectLineType':
        if (input.kind !== 'lineType') break;
        this.leg.lineType = input.lineType;
        return this.goto('selectLeague');
      case 'selectLeague': {
        if (input.kind !== 'league') break;
        if (!this.rules.leagueChoices().includes(input.league)) throw this.unexpected(input, `unknown league ${input.league}`);
        this.leg.league = input.league;
        if (this.rules.isOtherLeague(input.league)) return this.goto('enterLegDetails');
        this.events = [];
        this.current = 'selectEvent';
        return { type: 'loadEvents', league: input.league };
      }
      case 'selectEvent': {
        if (input.kind === 'manualEntry') return this.goto('enterLegDetails');
        if (input.kind !== 'event') break;
        const event = this.events.find((candidate) => candidate.ref === input.eventRef);
        if (!event) throw this.unexpected(input, `event ${input.eventRef} is not on offer`);
        this.leg.event = event;
        if (this.leg.lineType === 'player') {
          this.leg.roster = null;
          this.current = 'selectParticipant';
          return { type: 'loadParticipants', event };
        }
        return this.goto('enterLegDetails');
      }
      case 'selectParticipant': {
        if (input.kind === 'manualEntry') return this.goto('enterLegDetails');
        if (input.kind !== 'participant') break;
        const listed = this.leg.roster?.[input.side].find((name) => same(name, input.name));
        if (!listed) throw this.unexpected(input, `${input.name} is not listed for this event`);
        this.leg.participant = { side: input.side, name: listed };
        return this.goto('enterLegDetails');
      }
      case 'enterLegDetails':
        if (input.kind !== 'legDetails') break;
        this.legs.push(this.buildLeg(input.values));
        this.leg = freshLeg();
        return this.goto(this.kind === 'parlay' ? 'legDecision' : 'selectStake');
      case 'legDecision':
        if (input.kind === 'addLeg') {
          if (this.legs.length >= this.rules.maxParlayLegs()) throw this.unexpected(input, `a parlay can have at most ${this.rules.maxParlayLegs()} legs`);
          return this.goto('selectLineType');
        }
        if (input.kind !== 'finalize') break;
        if (this.legs.length < 2) throw this.unexpected(input, 'a parlay needs at least two legs before it can be finalized');
        return this.goto('selectStake');
      case 'selectStake':
        if (input.kind !== 'stake') break;
        this.stake = this.rules.validateStake(input.stake);
        if (this.editing) return this.requestReview();
        this.destinations = [];
        this.current = 'selectDestination';
        return { type: 'loadDestinations' };
      case 'selectDestination': {
        if (input.kind !== 'destination') break;
        const destination = clean(input.destination);
        if (!destination) throw this.unexpected(input, 'a destination is required');
        if (this.destinations.length && !this.destinations.some((candidate) => candidate.id === destination)) {
          throw this.unexpected(input, `destination ${destination} is not available`);
        }
        this.destination = destination;
        return this.requestReview();
      }
      case 'review':
        if (input.kind === 'confirm') {
          const wagerId = this.requireComplete();
          return { type: 'accept', wagerId };
        }
        if (input.kind !== 'editStake' && input.kind !== 'editDestination') break;
        if (this.accepted) throw this.unexpected(input, 'the wager was already accepted and can no longer be changed');
        this.editing = true;
        if (input.kind === 'editStake') return this.goto('selectStake');
        this.destinations = [];
        this.current = 'selectDestination';
        return { type: 'loadDestinations' };
      default:
        break;
    }
    throw this.unexpected(input);
  }

  offerEvents(events: readonly SportEvent[]): void {
    this.expect('selectEvent');
    this.events = [...events];
  }

  /** Falls through to free-text entry when the roster lists nobody. */
  offerRoster(roster: Roster | null): void {
    this.expect('selectParticipant');
    if (!roster || (!roster.sideA.length && !roster.sideB.length)) {
      this.leg.roster = null;
      this.current = 'enterLegDetails';
      return;
    }
    this.leg.roster = { sideA: [...roster.sideA], sideB: [...roster.sideB] };
  }

  offerDestinations(destinations: readonly Destination[]): void {
    this.expect('selectDestination');
    this.destinations = [...destinations];
  }

  /** Completes a pending `persist` or `update` effect. */
  enterReview(wagerId: string): void {
    if (!this.reviewPending) throw new WagerError('UnexpectedInput', 'no review is pending', { step: this.current });
    if (this.wagerId && this.wagerId !== wagerId) throw new WagerError('UnexpectedInput', 'review belongs to another wager', { wagerId });
    this.wagerId = wagerId;
    this.reviewPending = false;
    this.editing = false;
    this.current = 'review';
  }

  /** Drops a pending `persist` or `update` that failed, keeping the step for a retry. */
  abandonReview(): void { this.reviewPending = false; }

  markAccepted(): void {
    this.expect('review');
    this.accepted = true;
  }

  complete(): void {
    this.expect('review');
    if (!this.accepted) throw new WagerError('UnexpectedInput', 'wager has not been accepted', { step: this.current });
    this.current = 'confirmed';
  }

  expire(): SessionEffect {
    if (this.terminal) return { type: 'none' };
    return this.finish('timedOut');
  }

  draft(): DraftView {
    return {
      kind: this.kind,
      owner: this.owner,
      group: this.group,
      legs: this.legs.map((leg) => ({ ...leg })),
      stake: this.stake,
      destination: this.destination,
      price: this.price,
      americanPrice: this.price === null ? null : toAmerican(this.price),
      wagerId: this.wagerId,
      accepted: this.accepted,
    };
  }

  prompt(): StepPrompt {
    const step = this.current;
    const choices = (title: string, options: Choice[], summary?: DraftView): StepPrompt => ({
      mode: 'choices',
      step,
      title,
      choices: [...options, CANCEL],
      summary,
    });
    switch (step) {
      case 'selectLineType':
        return choices(this.legTitle('Select line type'), [
          { value: { kind: 'lineType', lineType: 'game' }, label: 'Game Line', description: 'Moneyline, spread or total' },
          { value: { kind: 'lineType', lineType: 'player' }, label: 'Player Prop', description: 'Bet on player performance' },
        ]);
      case 'selectLeague':
        return choices(
          this.legTitle('Select league'),
          this.rules.leagueChoices().map((key) => ({ value: { kind: 'league', league: key }, label: this.rules.league(key)?.name ?? key })),
        );
      case 'selectEvent': {
        const manual: Choice = { value: { kind: 'manualEntry' }, label: 'Other (Manual Entry)' };
        if (!this.events.length) return choices(`No upcoming events for ${this.leg.league ?? 'this league'}. Enter the event manually?`, [manual]);
        return choices(this.legTitle(`Select event for ${this.leg.league ?? 'league'}`), [
          ...this.events.map((event): Choice => ({ value: { kind: 'event', eventRef: event.ref }, label: eventLabel(event) })),
          manual,
        ]);
      }
      case 'selectParticipant': {
        const event = this.leg.event;
        const roster = this.leg.roster ?? { sideA: [], sideB: [] };
        const sideChoices = (side: keyof Roster, team: string): Choice[] =>
          roster[side].map((name) => ({ value: { kind: 'participant', side, name }, label: name, description: team }));
        return choices(this.legTitle(event ? `Select a player from ${event.home} or ${event.away}` : 'Select a player'), [
          ...sideChoices('sideA', event?.home ?? 'Side A'),
          ...sideChoices('sideB', event?.away ?? 'Side B'),
          { value: { kind: 'manualEntry' }, label: 'Player not listed' },
        ]);
      }
      case 'enterLegDetails':
        return { mode: 'form', step, title: this.legTitle('Enter bet details'), fields: this.legFields(), legNumber: this.legs.length + 1 };
      case 'legDecision': {
        const options: Choice[] = [];
        if (this.legs.length < this.rules.maxParlayLegs()) options.push({ value: { kind: 'addLeg' }, label: 'Add Leg' });
        if (this.legs.length >= 2) options.push({ value: { kind: 'finalize' }, label: 'Finalize' });
        return choices(`Leg ${this.legs.length} added. Add another leg or finalize the parlay?`, options);
      }
      case 'selectStake':
        return choices(
          this.kind === 'parlay' ? 'Select units for the parlay' : 'Select units',
          this.rules.stakeOptions().map((stake) => ({ value: { kind: 'stake', stake }, label: unitsLabel(stake) })),
        );
      case 'selectDestination':
        if (!this.destinations.length) {
          return { mode: 'form', step, title: 'Where should the bet be posted?', fields: [{ name: 'destination', label: 'Destination', required: true, value: this.destination ?? undefined }], legNumber: null };
        }
        return choices(
          'Select destination to post the bet',
          this.destinations.map((destination) => ({ value: { kind: 'destination', destination: destination.id }, label: destination.label })),
        );
      case 'review': {
        const summary = this.draft();
        const options: Choice[] = [{ value: { kind: 'confirm' }, label: 'Confirm & Post' }];
        if (!this.accepted) {
          options.push({ value: { kind: 'editStake' }, label: 'Change Units' }, { value: { kind: 'editDestination' }, label: 'Change Destination' });
        }
        const odds = summary.americanPrice === null ? '' : ` at ${formatAmerican(summary.americanPrice)}`;
        return choices(`Review ${this.kind} bet: ${unitsLabel(summary.stake ?? 0)}${odds} to ${summary.destination ?? '?'}`, options, summary);
      }
      case 'confirmed':
      case 'cancelled':
      case 'timedOut':
        return { mode: 'choices', step, title: 'This bet session has ended.', choices: [] };
    }
  }

  private buildLeg(values: LegDetails): Leg {
    const lineType = this.leg.lineType;
    const league = this.leg.league;
    if (!lineType || !league) throw new WagerError('UnexpectedInput', 'line type and league must be chosen first', { step: this.current });
    const market = clean(values.market);
    if (!market) throw new WagerError('UnexpectedInput', 'the line is required', { field: 'market' });
    const americanOdds = this.rules.validateOdds(typeof values.odds === 'number' ? values.odds : parseAmerican(values.odds));

    const event = this.leg.event;
    const typedParticipant = clean(values.participant);
    const typedOpponent = clean(values.opponent);
    if (!event) {
      if (!typedParticipant) throw new WagerError('UnexpectedInput', 'the team or player is required', { field: 'participant' });
      const opponentOptional = lineType === 'player' || this.rules.isIndividualSport(league);
      if (!typedOpponent && !opponentOptional) throw new WagerError('UnexpectedInput', 'the opponent is required', { field: 'opponent' });
      return { league, lineType, eventRef: null, participant: typedParticipant, opponent: typedOpponent || UNKNOWN_OPPONENT, market, americanOdds };
    }

    if (lineType === 'game') {
      const pick = [event.home, event.away].find((side) => same(side, typedParticipant));
      if (!pick) throw new WagerError('UnexpectedInput', `pick ${event.home} or ${event.away}`, { field: 'participant' });
      return { league, lineType, eventRef: event.ref, participant: pick, opponent: pick === event.home ? event.away : event.home, market, americanOdds };
    }

    const chosen = this.leg.participant;
    const participant = chosen?.name ?? typedParticipant;
    if (!participant) throw new WagerError('UnexpectedInput', 'the player is required', { field: 'participant' });
    const opponent = chosen ? (chosen.side === 'sideA' ? event.away : event.home) : typedOpponent || `${event.away} @ ${event.home}`;
    return { league, lineType, eventRef: event.ref, participant, opponent, market, americanOdds };
  }

  private legFields(): FormField[] {
    const { lineType, league, event, participant } = this.leg;
    const individual = league !== null && this.rules.isIndividualSport(league);
    const fields: FormField[] = [];
    if (!event) {
      fields.push({ name: 'participant', label: lineType === 'player' ? 'Player' : individual ? 'Competitor' : 'Team', required: true });
      fields.push({ name: 'opponent', label: 'Opponent', required: lineType === 'game' && !individual });
    } else if (lineType === 'game') {
      fields.push({ name: 'participant', label: `Pick (${event.home} or ${event.away})`, required: true });
    } else if (!participant) {
      fields.push({ name: 'participant', label: 'Player', required: true });
    }
    fields.push({ name: 'market', label: 'Line', required: true, placeholder: lineType === 'player' ? 'e.g. Points Over 25.5' : 'e.g. Spread -7.5, Total O/U 48.5' });
    fields.push({ name: 'odds', label: 'Odds', required: true, placeholder: 'e.g. -110 or +150' });
    return fields;
  }

  private requestReview(): SessionEffect {
    const wagerId = this.requireCompleteForReview();
    this.price = priceLegs(this.legs.map((leg) => leg.americanOdds));
    this.reviewPending = true;
    if (wagerId === null) return { type: 'persist', draft: this.toNewWager() };
    return { type: 'update', wagerId, stake: this.requireStake(), destination: this.requireDestination() };
  }

  private requireCompleteForReview(): string | null {
    this.requireLegs();
    this.requireStake();
    this.requireDestination();
    return this.wagerId;
  }

  private requireComplete(): string {
    const wagerId = this.requireCompleteForReview();
    if (!wagerId || this.price === null) throw new WagerError('IncompleteWager', 'the wager has not been saved yet', { step: this.current });
    return wagerId;
  }

  private requireLegs(): void {
    if (!this.legs.length) throw new WagerError('IncompleteWager', 'a wager needs at least one leg');
    if (this.kind === 'parlay' && this.legs.length < 2) throw new WagerError('IncompleteWager', 'a parlay needs at least two legs');
  }

  private requireStake(): number {
    if (this.stake === null) throw new WagerError('IncompleteWager', 'units have not been selected');
    return this.stake;
  }

  private requireDestination(): string {
    if (this.destination === null) throw new WagerError('IncompleteWager', 'a destination has not been selected');
    return this.destination;
  }

  private toNewWager(): NewWager {
    const price = this.price ?? priceLegs(this.legs.map((leg) => leg.americanOdds));
    return {
      owner: this.owner,
      group: this.group,
      kind: this.kind,
      stake: this.requireStake(),
      price,
      americanPrice: toAmerican(price),
      legs: this.legs.map((leg) => ({ ...leg })),
      league: this.legs[0]?.league ?? '',
      destination: this.requireDestination(),
    };
  }

  private finish(step: TerminalStep): SessionEffect {
    this.current = step;
    this.reviewPending = false;
    return { type: 'discard', wagerId: this.accepted ? null : this.wagerId };
  }

  private goto(step: WizardStep): SessionEffect {
    this.current = step;
    return { type: 'none' };
  }

  private expect(step: WizardStep): void {
    if (this.current !== step) throw new WagerError('UnexpectedInput', `expected step ${step}, session is at ${this.current}`, { step: this.current });
  }

  private legTitle(title: string): string {
    return this.kind === 'parlay' ? `Leg ${this.legs.length + 1}: ${title}` : title;
  }

  private unexpected(input: WizardInput, reason?: string): WagerError {
    return new WagerError('UnexpectedInput', reason ?? `${input.kind} is not valid while the session is at ${this.current}`, { step: this.current, input: input.kind });
  }
}
