import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';

import type { EventLookup } from '../clients/eventCatalog.js';
import { PostTimeoutError, type ArtifactPoster, type DestinationDirectory } from '../clients/presenter.js';
import type { EngineMetrics } from '../ops/metrics.js';
import { describeError, type Logger } from '../ops/logger.js';
import type { EnginePolicy } from './enginePolicy.js';
import { isValidationError, isWagerError, WagerError, type WagerErrorCode } from './errors.js';
import { SingleFlight } from './gates.js';
import type { WagerLedger } from './ledger.js';
import type { Destination, Roster, SportEvent, Wager, WagerKind } from './types.js';
import { WizardSession, type SessionEffect, type StepPrompt, type WizardInput, type WizardStep } from './wizardSession.js';

export type SessionHandle = { readonly id: string; readonly owner: string; readonly group: string; readonly kind: WagerKind };

export type AdvanceResult =
  | { type: 'prompt'; prompt: StepPrompt }
  | { type: 'confirmed'; wager: Wager }
  | { type: 'cancelled'; reason: 'user' | 'timeout' }
  | { type: 'error'; code: WagerErrorCode | 'Internal'; message: string; prompt: StepPrompt | null }
  | { type: 'dropped' };

export type TimeoutEvent = { handle: SessionHandle; step: WizardStep };

/** Arms a one-shot timer and returns its cancel function. */
export type Scheduler = { schedule(ms: number, task: () => void): () => void };

export const timerScheduler: Scheduler = {
  schedule(ms, task) {
    const timer = setTimeout(task, ms);
    timer.unref();
    return () => clearTimeout(timer);
  },
};

export type WizardControllerOptions = {
  ledger: WagerLedger;
  policy: EnginePolicy;
  catalog: EventLookup;
  poster: Pick<ArtifactPoster, 'post'>;
  destinations?: DestinationDirectory;
  scheduler?: Scheduler;
  logger?: Logger;
  metrics?: EngineMetrics;
  idFactory?: () => string;
};

type ManagedSession = {
  handle: SessionHandle;
  session: WizardSession;
  gate: SingleFlight;
  cancelTimer: (() => void) | null;
};

/** A post whose artifact the ledger has not recorded yet. `artifactRef` is null until it lands. */
type UnrecordedPost = { artifactRef: string | null; settled: boolean };

const POST_RETRY_HINT = 'Choose Confirm & Post to try again.';

/**
 * Owns every open wizard session: routes inputs through each session's single-flight
 * slot, carries out the effects the session asks for and enforces idle timeouts.
 * Emits `timeout` with a {@link TimeoutEvent} when a session expires.
 */
export class WizardController extends EventEmitter {
  private readonly sessions = new Map<string, ManagedSession>();
  private readonly unrecorded = new Map<string, UnrecordedPost>();
  private readonly scheduler: Scheduler;
  private readonly logger: Logger;
  private readonly idFactory: () => string;

  constructor(private readonly options: WizardControllerOptions) {
    super();
    this.scheduler = options.scheduler ?? timerScheduler;
    this.logger = options.logger ?? console;
    this.idFactory = options.idFactory ?? (() => randomUUID());
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  createSession(owner: string, group: string, options: { kind?: WagerKind } = {}): SessionHandle {
    if (!owner || !group) throw new WagerError('UnexpectedInput', 'owner and group are required to start a bet');
    const kind = options.kind ?? 'straight';
    const handle: SessionHandle = { id: this.idFactory(), owner, group, kind };
    const managed: ManagedSession = {
      handle,
      session: new WizardSession(owner, group, kind, this.options.policy),
      gate: new SingleFlight(),
      cancelTimer: null,
    };
    this.sessions.set(handle.id, managed);
    this.arm(managed);
    this.options.metrics?.record('sessionStarted');
    this.logger.debug(`[WizardController] session ${handle.id} started kind=${kind} owner=${owner}`);
    return handle;
  }

  currentPrompt(handle: SessionHandle): StepPrompt | null {
    return this.sessions.get(handle.id)?.session.prompt() ?? null;
  }

  async advance(handle: SessionHandle, input: WizardInput): Promise<AdvanceResult> {
    const managed = this.sessions.get(handle.id);
    if (!managed) return { type: 'error', code: 'SessionClosed', message: 'this bet session has already ended', prompt: null };
    const outcome = await managed.gate.run(() => this.step(managed, input));
    if (!outcome.ran) {
      this.options.metrics?.record('inputDropped');
      this.logger.debug(`[WizardController] session ${handle.id} dropped ${input.kind} while busy`);
      return { type: 'dropped' };
    }
    return outcome.value;
  }

  /** Ends the session as timed out. Resolves `false` when it already ended or is mid-transition. */
  async expire(handle: SessionHandle): Promise<boolean> {
    const managed = this.sessions.get(handle.id);
    if (!managed) return false;
    const outcome = await managed.gate.run(async () => {
      const step = managed.session.step;
      const effect = managed.session.expire();
      if (effect.type === 'none') return false;
      this.close(managed);
      if (effect.type === 'discard') await this.discard(managed, effect.wagerId);
      this.options.metrics?.record('sessionTimedOut');
      this.logger.info(`[WizardController] session ${handle.id} timed out at ${step}`);
      const event: TimeoutEvent = { handle, step };
      this.emit('timeout', event);
      return true;
    });
    return outcome.ran && outcome.value;
  }

  dispose(): void {
    for (const managed of this.sessions.values()) managed.cancelTimer?.();
    this.sessions.clear();
  }

  private async step(managed: ManagedSession, input: WizardInput): Promise<AdvanceResult> {
    let result: AdvanceResult;
    try {
      result = await this.perform(managed, managed.session.apply(input));
    } catch (error) {
      result = this.failure(managed, error);
    }
    if (managed.session.terminal) this.close(managed);
    else this.arm(managed);
    return result;
  }

  private async perform(managed: ManagedSession, effect: SessionEffect): Promise<AdvanceResult> {
    const { session } = managed;
    switch (effect.type) {
      case 'none':
        break;
      case 'loadEvents':
        session.offerEvents(await this.loadEvents(managed, effect.league));
        break;
      case 'loadParticipants':
        session.offerRoster(await this.loadRoster(managed, effect.event));
        break;
      case 'loadDestinations':
        session.offerDestinations(await this.loadDestinations(managed));
        break;
      case 'persist': {
        let wagerId: string;
        try {
          wagerId = await this.options.ledger.create(effect.draft);
        } catch (error) {
          session.abandonReview();
          throw error;
        }
        session.enterReview(wagerId);
        this.logger.debug(`[WizardController] session ${managed.handle.id} saved wager ${wagerId}`);
        break;
      }
      case 'update':
        try {
          await this.options.ledger.updateStakeAndDestination(effect.wagerId, effect.stake, effect.destination);
        } catch (error) {
          session.abandonReview();
          throw error;
        }
        session.enterReview(effect.wagerId);
        break;
      case 'accept':
        return this.accept(managed, effect.wagerId);
      case 'discard':
        await this.discard(managed, effect.wagerId);
        this.options.metrics?.record('sessionCancelled');
        this.logger.info(`[WizardController] session ${managed.handle.id} cancelled by ${managed.handle.owner}`);
        return { type: 'cancelled', reason: 'user' };
    }
    return { type: 'prompt', prompt: session.prompt() };
  }

  private async accept(managed: ManagedSession, wagerId: string): Promise<AdvanceResult> {
    const { session } = managed;
    // a retry after a failed post finds the row already accepted
    const accepted = session.isAccepted ? await this.settleEarlierPost(wagerId) : await this.options.ledger.confirm(wagerId);
    if (!accepted) throw new WagerError('LedgerConflict', `wager ${wagerId} disappeared before posting`, { wagerId });
    session.markAccepted();

    const posted = accepted.postedMessageRef ? accepted : await this.post(accepted);
    session.complete();
    this.options.metrics?.record('sessionConfirmed');
    this.logger.info(`[WizardController] wager ${wagerId} posted as ${posted.postedMessageRef} (${posted.kind}, ${posted.stake}u)`);
    return { type: 'confirmed', wager: posted };
  }

  private async post(wager: Wager): Promise<Wager> {
    let artifactRef: string;
    try {
      artifactRef = await this.options.poster.post(wager);
    } catch (error) {
      this.options.metrics?.record('postFailed');
      if (error instanceof PostTimeoutError) this.trackLatePost(wager.id, error.late);
      throw error;
    }
    return this.record(wager.id, artifactRef);
  }

  /** Records a posted artifact; when the ledger refuses, the reference is kept so a retry does not post again. */
  private async record(wagerId: string, artifactRef: string): Promise<Wager> {
    try {
      return await this.options.ledger.markPosted(wagerId, artifactRef);
    } catch (error) {
      this.unrecorded.set(wagerId, { artifactRef, settled: true });
      this.logger.error(`[WizardController] wager ${wagerId} posted as ${artifactRef} but not recorded: ${describeError(error)}`);
      throw new WagerError('PostFailure', `the bet slip was posted as ${artifactRef} but could not be saved`, { wagerId, artifactRef });
    }
  }

  private trackLatePost(wagerId: string, late: Promise<string | null>): void {
    const pending: UnrecordedPost = { artifactRef: null, settled: false };
    this.unrecorded.set(wagerId, pending);
    void late.then(async (artifactRef) => {
      if (artifactRef !== null) {
        this.logger.warn(`[WizardController] wager ${wagerId} post landed after the timeout as ${artifactRef}`);
        try {
          await this.options.ledger.markPosted(wagerId, artifactRef);
        } catch (error) {
          this.logger.error(`[WizardController] wager ${wagerId} posted as ${artifactRef} but not recorded: ${describeError(error)}`);
          pending.artifactRef = artifactRef;
        }
      }
      pending.settled = true;
      if (pending.artifactRef === null && this.unrecorded.get(wagerId) === pending) this.unrecorded.delete(wagerId);
    });
  }

  /** Resolves what an earlier attempt left behind before anything is posted again. */
  private async settleEarlierPost(wagerId: string): Promise<Wager | null> {
    const earlier = this.unrecorded.get(wagerId);
    if (earlier && !earlier.settled) {
      throw new WagerError('PostFailure', 'the previous post is still in progress', { wagerId });
    }
    this.unrecorded.delete(wagerId);
    if (earlier?.artifactRef) return this.record(wagerId, earlier.artifactRef);
    return this.options.ledger.get(wagerId);
  }

  private async discard(managed: ManagedSession, wagerId: string | null): Promise<void> {
    if (wagerId === null) return;
    try {
      await this.options.ledger.delete(wagerId);
    } catch (error) {
      this.logger.error(`[WizardController] session ${managed.handle.id} could not delete wager ${wagerId}: ${describeError(error)}`);
    }
  }

  private async loadEvents(managed: ManagedSession, league: string): Promise<SportEvent[]> {
    try {
      return await this.options.catalog.upcomingEvents(league);
    } catch (error) {
      this.logger.warn(`[WizardController] session ${managed.handle.id} events for ${league} unavailable: ${describeError(error)}`);
      return [];
    }
  }

  private async loadRoster(managed: ManagedSession, event: SportEvent): Promise<Roster | null> {
    try {
      return await this.options.catalog.participants(event.ref);
    } catch (error) {
      this.logger.warn(`[WizardController] session ${managed.handle.id} participants for ${event.ref} unavailable: ${describeError(error)}`);
      return null;
    }
  }

  private async loadDestinations(managed: ManagedSession): Promise<Destination[]> {
    const directory = this.options.destinations;
    if (!directory) return [];
    try {
      return await directory.listDestinations(managed.handle.group);
    } catch (error) {
      this.logger.warn(`[WizardController] session ${managed.handle.id} destinations unavailable: ${describeError(error)}`);
      return [];
    }
  }

  private failure(managed: ManagedSession, error: unknown): AdvanceResult {
    const { session, handle } = managed;
    const prompt = session.terminal ? null : session.prompt();
    if (isValidationError(error)) {
      this.options.metrics?.record('inputRejected');
      return { type: 'error', code: error.code, message: error.message, prompt };
    }
    if (isWagerError(error)) {
      this.logger.warn(`[WizardController] session ${handle.id} ${error.code} at ${session.step}: ${error.message}`);
      const message = error.code === 'PostFailure' ? `${error.message}. ${POST_RETRY_HINT}` : error.message;
      return { type: 'error', code: error.code, message, prompt };
    }
    this.logger.error(`[WizardController] session ${handle.id} failed at ${session.step}: ${describeError(error)}`);
    return { type: 'error', code: 'Internal', message: 'something went wrong, please try again', prompt };
  }

  private arm(managed: ManagedSession): void {
    managed.cancelTimer?.();
    const { handle } = managed;
    managed.cancelTimer = this.scheduler.schedule(this.options.policy.timeoutFor(handle.kind), () => {
      this.expire(handle).catch((error: unknown) => {
        this.logger.error(`[WizardController] session ${handle.id} timeout handling failed: ${describeError(error)}`);
      });
    });
  }

  private close(managed: ManagedSession): void {
    managed.cancelTimer?.();
    managed.cancelTimer = null;
    this.sessions.delete(managed.handle.id);
  }
}
