import { EventCatalog, type EventDataSource } from './clients/eventCatalog.js';
import { ArtifactPoster, type DestinationDirectory, type Presenter } from './clients/presenter.js';
import { ConfigManager } from './core/configManager.js';
import { EnginePolicy } from './core/enginePolicy.js';
import { InMemoryWagerLedger, type WagerLedger } from './core/ledger.js';
import { SettlementEngine } from './core/settlementEngine.js';
import { WizardController, type Scheduler } from './core/wizardController.js';
import type { Logger } from './ops/logger.js';
import { EngineMetrics } from './ops/metrics.js';

export type EngineOptions = {
  rootDir: string;
  eventSource: EventDataSource;
  presenter: Presenter;
  ledger?: WagerLedger;
  destinations?: DestinationDirectory;
  scheduler?: Scheduler;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  watchConfig?: boolean;
};

export type Engine = {
  config: ConfigManager;
  policy: EnginePolicy;
  ledger: WagerLedger;
  catalog: EventCatalog;
  controller: WizardController;
  settlement: SettlementEngine;
  metrics: EngineMetrics;
  stop(): void;
};

/** Loads `config/` under `rootDir` and wires the wizard and settlement paths onto one ledger. */
export async function createEngine(options: EngineOptions): Promise<Engine> {
  const logger = options.logger ?? console;
  const config = new ConfigManager({ rootDir: options.rootDir, watch: options.watchConfig ?? false, env: options.env, logger });
  await config.start();
  const policy = new EnginePolicy(config, logger);
  const ledger = options.ledger ?? new InMemoryWagerLedger();
  const metrics = new EngineMetrics();
  const catalog = new EventCatalog({ source: options.eventSource, ttl: () => policy.catalogTtl() });
  const poster = new ArtifactPoster({ presenter: options.presenter, timeoutMs: () => policy.postTimeoutMs(), logger });
  const controller = new WizardController({
    ledger,
    policy,
    catalog,
    poster,
    destinations: options.destinations,
    scheduler: options.scheduler,
    logger,
    metrics,
  });
  const settlement = new SettlementEngine({ ledger, policy, logger, metrics });
  logger.info(`[Engine] ready config=${policy.getSettings().hash.slice(0, 12)} leagues=${policy.leagueChoices().length}`);
  return {
    config,
    policy,
    ledger,
    catalog,
    controller,
    settlement,
    metrics,
    stop() {
      controller.dispose();
      config.stop();
    },
  };
}
