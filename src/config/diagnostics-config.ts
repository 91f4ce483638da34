/**
 * Runtime configuration for a diagnostics run.
 */

import type { BaselineReference, SpeedBounds } from '../signal/types.js';

/**
 * Complete diagnostics configuration.
 */
export interface DiagnosticsConfig {
  // Classification
  /** Relative deviation at or below which a change is noise */
  smallBand: number;
  /** Relative deviation above which a change is large */
  largeBand: number;
  /** Baseline policy */
  reference: BaselineReference;
  /** Minimum trials needed for a set median */
  minTrials: number;
  /** Leading fraction of a trial used as its own baseline */
  selfFraction: number;

  // Apparatus
  /** Default mill arm length in metres, used when a trial carries none */
  armLength: number;
  /** Instantaneous speed limits for counted intervals */
  speedBounds: SpeedBounds;

  // Processing
  /** Maximum trials detected at once */
  concurrency: number;

  // Output
  /** Directory for CSV tables */
  outDir: string;
  /** Path to SQLite run store */
  dbPath: string;
}

/**
 * Default configuration values.
 * Arm length 0.1 m gives the 0.6283 m flight path of the reference mill.
 */
export const DEFAULT_CONFIG: DiagnosticsConfig = {
  smallBand: 0.1,
  largeBand: 0.5,
  reference: 'set-median',
  minTrials: 2,
  selfFraction: 0.5,

  armLength: 0.1,
  speedBounds: {},

  concurrency: 4,

  outDir: './diagnostics',
  dbPath: '~/.flightmill/diagnostics.db',
};

/**
 * Get configuration with overrides applied.
 */
export function getConfig(overrides: Partial<DiagnosticsConfig> = {}): DiagnosticsConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

/**
 * Resolve ~ to home directory in paths.
 */
export function resolvePath(path: string): string {
  if (path.startsWith('~')) {
    const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
    return path.replace('~', home);
  }
  return path;
}

/**
 * Validate configuration values.
 */
export function validateConfig(config: DiagnosticsConfig): string[] {
  const errors: string[] = [];

  if (config.smallBand < 0) {
    errors.push('smallBand cannot be negative');
  }
  if (config.largeBand <= config.smallBand) {
    errors.push('largeBand must be greater than smallBand');
  }
  if (config.minTrials < 1) {
    errors.push('minTrials must be at least 1');
  }
  if (config.selfFraction <= 0 || config.selfFraction > 1) {
    errors.push('selfFraction must be in (0, 1]');
  }
  if (config.armLength <= 0) {
    errors.push('armLength must be positive');
  }
  if (!Number.isFinite(config.concurrency) || config.concurrency < 1) {
    errors.push('concurrency must be at least 1');
  }

  return errors;
}
