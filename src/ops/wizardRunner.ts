import type { Presenter } from '../clients/presenter.js';
import type { AdvanceResult, TimeoutEvent, WizardController } from '../core/wizardController.js';
import type { StepPrompt, WizardInput } from '../core/wizardSession.js';
import type { WagerKind } from '../core/types.js';

export type RunWizardOptions = { kind?: WagerKind; maxSteps?: number };
export type WizardOutcome = Extract<AdvanceResult, { type: 'confirmed' | 'cancelled' | 'error' }>;

const DEFAULT_MAX_STEPS = 200;

const toInput = async (presenter: Presenter, prompt: StepPrompt): Promise<WizardInput> => {
  if (prompt.mode === 'choices') return presenter.presentChoices(prompt);
  const values = await presenter.presentForm(prompt);
  if (!values) return { kind: 'cancel' };
  if (prompt.step === 'selectDestination') return { kind: 'destination', destination: values.destination ?? '' };
  return {
    kind: 'legDetails',
    values: { participant: values.participant, opponent: values.opponent, market: values.market ?? '', odds: values.odds ?? '' },
  };
};

/**
 * Drives one placement attempt end to end: shows each prompt through the presenter, feeds
 * the answer back into the controller and reports rejected input to the owner.
 */
export async function runWizard(
  controller: WizardController,
  presenter: Presenter,
  owner: string,
  group: string,
  options: RunWizardOptions = {},
): Promise<WizardOutcome> {
  const handle = controller.createSession(owner, group, { kind: options.kind });
  let timedOut = false;
  const onTimeout = (event: TimeoutEvent): void => {
    if (event.handle.id === handle.id) timedOut = true;
  };
  controller.on('timeout', onTimeout);
  try {
    let prompt = controller.currentPrompt(handle);
    for (let steps = 0; steps < (options.maxSteps ?? DEFAULT_MAX_STEPS); steps += 1) {
      if (timedOut || !prompt) return { type: 'cancelled', reason: 'timeout' };
      const result = await controller.advance(handle, await toInput(presenter, prompt));
      if (timedOut) return { type: 'cancelled', reason: 'timeout' };
      switch (result.type) {
        case 'prompt':
          prompt = result.prompt;
          break;
        case 'dropped':
          prompt = controller.currentPrompt(handle);
          break;
        case 'error':
          await presenter.notify(owner, result.message);
          if (!result.prompt) return result;
          prompt = result.prompt;
          break;
        case 'confirmed':
        case 'cancelled':
          return result;
      }
    }
    const stopped = await controller.advance(handle, { kind: 'cancel' });
    await presenter.notify(owner, 'The bet was cancelled after too many steps.');
    return stopped.type === 'cancelled' || stopped.type === 'error' || stopped.type === 'confirmed'
      ? stopped
      : { type: 'cancelled', reason: 'user' };
  } finally {
    controller.off('timeout', onTimeout);
  }
}
