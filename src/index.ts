/**
 * Flightmill diagnostics
 *
 * Trial-level change classification and per-set aggregation for flight-mill
 * experiments.
 *
 * @packageDocumentation
 */

// Data model
export type * from './signal/types.js';
export { METRICS } from './signal/types.js';
export { assertGroupable, comboKey, formatTrialId, trialLabel } from './signal/trial-id.js';
export { parseTrials, parseTrialsJson } from './signal/trial-input.js';

// Detection
export { detect, detectSegment, leadingSegment, validateSignal, circumference } from './detect/change-detector.js';
export type { DetectOptions } from './detect/change-detector.js';

// Classification
export { selfBaseline, setMedianBaseline, DEFAULT_MIN_TRIALS } from './classify/baseline.js';
export { classify, changeLevel, relativeDeviation, validateThresholds } from './classify/anomaly-classifier.js';

// Aggregation
export {
  aggregate,
  accumulate,
  createAccumulator,
  mergeAccumulators,
  finalizeAccumulator,
} from './aggregate/set-aggregator.js';
export type { SetAccumulator, AggregateResult } from './aggregate/set-aggregator.js';

// Reporting
export * from './report/diagnostics-report.js';
export { toCsv, parseCsv } from './report/csv.js';
export type { Table, TableCell } from './report/csv.js';

// Pipeline
export { runDiagnostics } from './pipeline/run-diagnostics.js';
export type { RunDiagnosticsOptions, DiagnosticsRun, TrialFailure, SetFailure } from './pipeline/run-diagnostics.js';

// Configuration
export { loadConfig, toRuntimeConfig, validateExternalConfig } from './config/loader.js';
export type { ExternalConfig, LoadConfigOptions } from './config/loader.js';
export { DEFAULT_CONFIG, getConfig, validateConfig, resolvePath } from './config/diagnostics-config.js';
export type { DiagnosticsConfig } from './config/diagnostics-config.js';

// Storage
export * from './storage/index.js';

// Utils
export * from './utils/errors.js';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger.js';
