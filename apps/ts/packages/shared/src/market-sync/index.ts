/**
 * Market Sync - Public API
 */

export { type ChangeSet, changedSymbols, createChangeSet } from './change-set';
export { JsonFileSymbolSource, type PriceFetcher, type SymbolFile, SymbolFileSchema, type SymbolSource } from './fetcher';
export { isProcessAlive, type LockHolder, RunLock, type RunLockOptions } from './run-lock';
export {
  type BackendSummary,
  buildRunSummary,
  type FailedSymbol,
  type RunCounts,
  type RunStatus,
  type RunSummary,
  successRate,
} from './run-summary';
export {
  type StalenessDecision,
  StalenessPolicy,
  type StalenessPolicyOptions,
  type StalenessReason,
} from './staleness-policy';
export {
  type SymbolUpdateOutcome,
  type SymbolUpdateStatus,
  type UpdateOptions,
  UpdateOrchestrator,
  type UpdateOrchestratorDeps,
  type UpdateProgressCallback,
  type UpdateResult,
} from './update-orchestrator';
export {
  type RunOptions,
  type RunResult,
  type SyncPendingResult,
  WarehouseRunner,
  type WarehouseRunnerDeps,
} from './warehouse-runner';
