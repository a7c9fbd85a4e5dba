import { WagerError } from '../core/errors.js';
import type { Destination, Wager } from '../core/types.js';
import type { StepPrompt, WizardInput } from '../core/wizardSession.js';
import { describeError, type Logger } from '../ops/logger.js';

export type ChoicePrompt = Extract<StepPrompt, { mode: 'choices' }>;
export type FormPrompt = Extract<StepPrompt, { mode: 'form' }>;
export type FormValues = Record<string, string>;
export type ArtifactReceipt = { artifactRef: string };

/**
 * Chat-platform rendering layer. `presentForm` resolves to `null` when the user dismisses
 * the form; `postArtifact` renders the bet slip, posts it to `wager.destination` and throws
 * when posting fails.
 */
export interface Presenter {
  presentChoices(prompt: ChoicePrompt): Promise<WizardInput>;
  presentForm(prompt: FormPrompt): Promise<FormValues | null>;
  postArtifact(wager: Wager): Promise<ArtifactReceipt>;
  notify(owner: string, message: string): Promise<void>;
}

export interface DestinationDirectory {
  listDestinations(group: string): Promise<Destination[]>;
}

export type ArtifactPosterOptions = { presenter: Pick<Presenter, 'postArtifact'>; timeoutMs: number | (() => number); logger?: Logger };

/**
 * Posting outlived its timeout. The presenter call is not cancelled: `late` resolves to the
 * artifact reference if it still lands, or `null` if it fails.
 */
export class PostTimeoutError extends WagerError {
  constructor(readonly late: Promise<string | null>, details: Record<string, unknown>) {
    super('PostFailure', 'posting timed out', details);
    this.name = 'PostTimeoutError';
  }
}

/** Posts finalized wagers through the presenter, bounding each attempt by a timeout. */
export class ArtifactPoster {
  private readonly logger: Logger;

  constructor(private readonly options: ArtifactPosterOptions) {
    this.logger = options.logger ?? console;
  }

  async post(wager: Wager): Promise<string> {
    const timeoutMs = typeof this.options.timeoutMs === 'function' ? this.options.timeoutMs() : this.options.timeoutMs;
    let receipt: ArtifactReceipt;
    try {
      receipt = await this.withTimeout(wager, timeoutMs);
    } catch (error) {
      this.logger.warn(`[ArtifactPoster] wager ${wager.id} post to ${wager.destination} failed: ${describeError(error)}`);
      if (error instanceof WagerError && error.code === 'PostFailure') throw error;
      throw new WagerError('PostFailure', 'the bet slip could not be posted', { wagerId: wager.id, destination: wager.destination, cause: describeError(error) });
    }
    if (!receipt.artifactRef) {
      throw new WagerError('PostFailure', 'the presenter returned no artifact reference', { wagerId: wager.id, destination: wager.destination });
    }
    return receipt.artifactRef;
  }

  private withTimeout(wager: Wager, ms: number): Promise<ArtifactReceipt> {
    const attempt = (async () => this.options.presenter.postArtifact(wager))();
    if (!(ms > 0 && Number.isFinite(ms))) return attempt;
    return new Promise<ArtifactReceipt>((resolve, reject) => {
      const timer = setTimeout(() => {
        const late = attempt.then(
          (receipt) => receipt.artifactRef || null,
          (error: unknown) => {
            this.logger.warn(`[ArtifactPoster] wager ${wager.id} late post failed: ${describeError(error)}`);
            return null;
          },
        );
        reject(new PostTimeoutError(late, { wagerId: wager.id, timeoutMs: ms }));
      }, ms);
      attempt.then(
        (value) => { clearTimeout(timer); resolve(value); },
        (error: unknown) => { clearTimeout(timer); reject(error); },
      );
    });
  }
}
