export { ConfigManager, type ConfigManagerOptions, type ConfigSnapshot } from './core/configManager.js';
export {
  EnginePolicy,
  parseSettings,
  type ConfigSource,
  type EngineSettings,
  type LeagueProfile,
  type SportType,
  type StakeRules,
} from './core/enginePolicy.js';
export { WagerError, isWagerError, isValidationError, type WagerErrorCode } from './core/errors.js';
export {
  OddsConversionError,
  toDecimal,
  toAmerican,
  combineLegs,
  priceLegs,
  resultValue,
  formatAmerican,
  parseAmerican,
  type OddsErrorCode,
  type OutcomeKind,
} from './core/odds.js';
export {
  SETTLED_STATUS,
  type Destination,
  type Leg,
  type LedgerAction,
  type LedgerAuditEntry,
  type LineType,
  type NewWager,
  type Roster,
  type SettledStatus,
  type SettlementRecord,
  type SportEvent,
  type Wager,
  type WagerKind,
  type WagerStatus,
} from './core/types.js';
export {
  InMemoryWagerLedger,
  type InMemoryWagerLedgerOptions,
  type SettlementWrite,
  type UnitTotals,
  type UnitTotalsQuery,
  type WagerLedger,
} from './core/ledger.js';
export { SingleFlight, KeyedSerializer } from './core/gates.js';
export {
  WizardSession,
  type DraftView,
  type LegDetails,
  type SessionEffect,
  type StepPrompt,
  type WizardInput,
  type WizardStep,
} from './core/wizardSession.js';
export {
  WizardController,
  timerScheduler,
  type AdvanceResult,
  type Scheduler,
  type SessionHandle,
  type TimeoutEvent,
  type WizardControllerOptions,
} from './core/wizardController.js';
export {
  SettlementEngine,
  type IgnoredReason,
  type OutcomeSignal,
  type ReactionSignal,
  type SettlementEngineOptions,
  type SettlementResult,
} from './core/settlementEngine.js';
export { EventCatalog, type EventCatalogOptions, type EventDataSource, type EventLookup } from './clients/eventCatalog.js';
export {
  ArtifactPoster,
  PostTimeoutError,
  type ArtifactPosterOptions,
  type ArtifactReceipt,
  type DestinationDirectory,
  type FormValues,
  type Presenter,
} from './clients/presenter.js';
export { EngineMetrics, type MetricEvent, type MetricsSnapshot } from './ops/metrics.js';
export { runWizard, type RunWizardOptions, type WizardOutcome } from './ops/wizardRunner.js';
export { silentLogger, type Logger } from './ops/logger.js';
export { createEngine, type Engine, type EngineOptions } from './engine.js';
