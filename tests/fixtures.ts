import { EventEmitter } from 'node:events';

import type { ConfigSnapshot, Plain } from '../src/core/configManager.js';
import {
  EnginePolicy,
  type ArtifactReceipt,
  type EventDataSource,
  type FormValues,
  type Logger,
  type Presenter,
  type Roster,
  type Scheduler,
  type SportEvent,
  type StepPrompt,
  type Wager,
  type WizardInput,
} from '../src/index.js';

export const TEST_CONFIG: Plain = {
  engine: { catalog: { events_ttl_ms: 60_000, participants_ttl_ms: 60_000 } },
  wizard: {
    stake: { min: 0.5, max: 3, step: 0.5 },
    timeouts: { straight_ms: 1_000, parlay_ms: 3_000 },
    parlay: { max_legs: 3 },
    odds: { min: -10_000, max: 10_000 },
  },
  leagues: {
    other_label: 'Other',
    catalogue: [
      { key: 'NBA', name: 'NBA', sport: 'Basketball', sport_type: 'team' },
      { key: 'Tennis', name: 'Tennis', sport: 'Tennis', sport_type: 'individual' },
    ],
  },
  settlement: { reactions: { won: ['✅', '☑️'], lost: ['❌'], push: ['🅿️'], void: ['🚫'] } },
  presenter: { post_timeout_ms: 1_000 },
};

class StaticConfig extends EventEmitter {
  constructor(private readonly snapshot: ConfigSnapshot) {
    super();
  }

  getSnapshot(): ConfigSnapshot {
    return this.snapshot;
  }
}

export const testPolicy = (data: Plain = TEST_CONFIG): EnginePolicy =>
  new EnginePolicy(new StaticConfig({ data, sources: {}, hash: 'test', loadedAt: new Date(0) }));

export const LAKERS_CELTICS: SportEvent = {
  ref: 'evt-1',
  league: 'NBA',
  home: 'Lakers',
  away: 'Celtics',
  startsAt: new Date('2099-01-01T00:00:00Z'),
};

export const ROSTER: Roster = { sideA: ['LeBron James'], sideB: ['Jayson Tatum'] };

export const fakeEventSource = (events: SportEvent[] = [LAKERS_CELTICS], roster: Roster = ROSTER): EventDataSource => ({
  listUpcomingEvents: async (league) => events.filter((event) => event.league === league),
  listParticipants: async () => roster,
});

/** Collects scheduled tasks so tests decide when a timer fires. */
export class ManualScheduler implements Scheduler {
  readonly pending: Array<{ ms: number; task: () => void; cancelled: boolean }> = [];

  schedule(ms: number, task: () => void): () => void {
    const entry = { ms, task, cancelled: false };
    this.pending.push(entry);
    return () => {
      entry.cancelled = true;
    };
  }

  get armed(): Array<{ ms: number }> {
    return this.pending.filter((entry) => !entry.cancelled);
  }

  fireAll(): void {
    for (const entry of this.pending.splice(0)) {
      if (!entry.cancelled) entry.task();
    }
  }
}

export type LogLine = { level: keyof Logger; message: string };

export const recordingLogger = (): { logger: Logger; lines: LogLine[] } => {
  const lines: LogLine[] = [];
  const push = (level: keyof Logger) => (message: string) => {
    lines.push({ level, message });
  };
  return { lines, logger: { debug: push('debug'), info: push('info'), warn: push('warn'), error: push('error') } };
};

export type ScriptStep = WizardInput | { form: FormValues } | null;

const canonical = (value: object): string => JSON.stringify(Object.entries(value).sort(([a], [b]) => a.localeCompare(b)));

/** Presenter double that answers prompts from a script and records what it was shown. */
export class ScriptedPresenter implements Presenter {
  readonly shown: StepPrompt[] = [];
  readonly notices: string[] = [];
  readonly posted: Wager[] = [];
  failPosts = 0;
  private artifactSeq = 0;

  constructor(private readonly script: ScriptStep[]) {}

  async presentChoices(prompt: Extract<StepPrompt, { mode: 'choices' }>): Promise<WizardInput> {
    this.shown.push(prompt);
    const answer = this.next();
    if (!answer || 'form' in answer) throw new Error(`expected a choice for ${prompt.step}`);
    const picked = prompt.choices.find((choice) => canonical(choice.value) === canonical(answer));
    if (!picked) throw new Error(`${canonical(answer)} is not offered at ${prompt.step}`);
    return picked.value;
  }

  async presentForm(prompt: Extract<StepPrompt, { mode: 'form' }>): Promise<FormValues | null> {
    this.shown.push(prompt);
    const answer = this.next();
    if (answer === null) return null;
    if (!('form' in answer)) throw new Error(`expected form values for ${prompt.step}`);
    return answer.form;
  }

  async postArtifact(wager: Wager): Promise<ArtifactReceipt> {
    if (this.failPosts > 0) {
      this.failPosts -= 1;
      throw new Error('destination rejected the post');
    }
    this.posted.push(wager);
    this.artifactSeq += 1;
    return { artifactRef: `msg-${this.artifactSeq}` };
  }

  async notify(_owner: string, message: string): Promise<void> {
    this.notices.push(message);
  }

  private next(): ScriptStep {
    if (!this.script.length) throw new Error('presenter script exhausted');
    return this.script.shift() ?? null;
  }
}
