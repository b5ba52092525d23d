/**
 * Main entry point - exports all public APIs
 */

export * from './types';
export { RentalSession, cappedRate, elapsedHours, sortedSlots } from './rental_session';
export type { NewSessionParams, HourlyEstimate } from './rental_session';
export {
    isSlotCode,
    isOccupied,
    parseOccupancy,
    parseOccupancyLenient,
    padOccupancy,
    formatOccupancy,
    diffOccupancy,
    occupiedCount,
} from './occupancy';
export type { OccupancyDiff, ParsedOccupancy } from './occupancy';
export { estimatePauseBudget, consumePauseBudget, storedCounts } from './pause_budget';
export type { PauseBudget } from './pause_budget';
export {
    SessionRegistry,
    emptyRegistry,
    formatSessionId,
    coerceRegistry,
    serializeRegistry,
    deserializeRegistry,
} from './session_registry';
export { reconcile, needsReconcile, observedFingerprint, rateForCode, selectCandidate } from './reconciler';
export type { ReconcileOptions, ReconcileResult, MatchKind } from './reconciler';
export { seedRegistry, needsSeeding, splitIndices } from './seeding';
export type { SeedResult } from './seeding';
export { summarizeMachine, renderEarningsReport } from './summary';
export { RegistryStore } from './registry_store';
export type { RegistryStoreOptions, CommitResult, StoreMetrics } from './registry_store';
export { MachineClient, normalizeMachine } from './machine_client';
export type { MachineClientOptions, FetchReport } from './machine_client';
export { RentalMonitor, applyHealth } from './monitor_loop';
export type { MonitorOptions, CycleReport, MachineSource } from './monitor_loop';
export * from './notifications';
export { loadConfig, parseConfig } from './config';
export type { AppConfig, NotifyConfig, TargetConfig } from './config';
export { ERRORS, ErrorFactory, MonitorError } from './structured_error';
export type { StructuredError, ErrorCode } from './structured_error';
export { createLogger, configureLogging } from './logger';
export type { Logger } from './logger';
