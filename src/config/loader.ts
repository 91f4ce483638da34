/**
 * Configuration loader with priority-based resolution.
 *
 * Priority (highest to lowest):
 * 1. CLI flags (passed directly)
 * 2. Environment variables (FLIGHTMILL_*)
 * 3. Project config file (./flightmill.config.json)
 * 4. User config file (~/.flightmill/config.json)
 * 5. Built-in defaults
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { resolvePath, DEFAULT_CONFIG, type DiagnosticsConfig } from './diagnostics-config.js';
import { createLogger } from '../utils/logger.js';
import type { BaselineReference } from '../signal/types.js';

const log = createLogger('config-loader');

/** External config file structure */
export interface ExternalConfig {
  thresholds?: {
    smallBand?: number;
    largeBand?: number;
  };
  baseline?: {
    reference?: BaselineReference;
    /** Minimum trials for a set median. Default: 2 */
    minTrials?: number;
    /** Leading fraction used by the 'self' baseline. Default: 0.5 */
    selfFraction?: number;
  };
  apparatus?: {
    /** Mill arm length in metres. Default: 0.1 */
    armLength?: number;
    /** Coasting threshold in m/s. Unset = no lower bound */
    minSpeed?: number;
    /** Glitch threshold in m/s. Unset = no upper bound */
    maxSpeed?: number;
  };
  processing?: {
    concurrency?: number;
  };
  output?: {
    outDir?: string;
    dbPath?: string;
  };
}

/** Default external config values */
const EXTERNAL_DEFAULTS: Required<ExternalConfig> = {
  thresholds: {
    smallBand: DEFAULT_CONFIG.smallBand,
    largeBand: DEFAULT_CONFIG.largeBand,
  },
  baseline: {
    reference: DEFAULT_CONFIG.reference,
    minTrials: DEFAULT_CONFIG.minTrials,
    selfFraction: DEFAULT_CONFIG.selfFraction,
  },
  apparatus: {
    armLength: DEFAULT_CONFIG.armLength,
  },
  processing: {
    concurrency: DEFAULT_CONFIG.concurrency,
  },
  output: {
    outDir: DEFAULT_CONFIG.outDir,
    dbPath: DEFAULT_CONFIG.dbPath,
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isReference(value: unknown): value is BaselineReference {
  return value === 'self' || value === 'set-median';
}

function numberField(section: unknown, key: string): number | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'number' ? value : undefined;
}

function stringField(section: unknown, key: string): string | undefined {
  if (!isRecord(section)) return undefined;
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Keep only known fields of the expected type from a parsed config file.
 * Unknown keys are dropped; wrongly typed values are dropped with a warning.
 */
function fromJson(raw: Record<string, unknown>, path: string): ExternalConfig {
  const reference: unknown = isRecord(raw.baseline) ? raw.baseline.reference : undefined;
  if (reference !== undefined && !isReference(reference)) {
    log.warn(`Ignoring baseline.reference in ${path}`, { value: String(reference) });
  }

  const config: ExternalConfig = {
    thresholds: {
      smallBand: numberField(raw.thresholds, 'smallBand'),
      largeBand: numberField(raw.thresholds, 'largeBand'),
    },
    baseline: {
      reference: isReference(reference) ? reference : undefined,
      minTrials: numberField(raw.baseline, 'minTrials'),
      selfFraction: numberField(raw.baseline, 'selfFraction'),
    },
    apparatus: {
      armLength: numberField(raw.apparatus, 'armLength'),
      minSpeed: numberField(raw.apparatus, 'minSpeed'),
      maxSpeed: numberField(raw.apparatus, 'maxSpeed'),
    },
    processing: {
      concurrency: numberField(raw.processing, 'concurrency'),
    },
    output: {
      outDir: stringField(raw.output, 'outDir'),
      dbPath: stringField(raw.output, 'dbPath'),
    },
  };

  return config;
}

/**
 * Load config from a JSON file.
 */
function loadConfigFile(path: string): ExternalConfig | null {
  const resolvedPath = resolvePath(path);
  if (!existsSync(resolvedPath)) {
    return null;
  }

  try {
    const content = readFileSync(resolvedPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      log.warn(`Config file ${path} is not a JSON object`);
      return null;
    }
    return fromJson(parsed, path);
  } catch (error) {
    log.warn(`Failed to parse config file ${path}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

/**
 * Load config from environment variables.
 * Variables are prefixed with FLIGHTMILL_ and use underscores for nesting.
 * Examples:
 *   FLIGHTMILL_THRESHOLDS_SMALL_BAND=0.05
 *   FLIGHTMILL_BASELINE_REFERENCE=self
 *   FLIGHTMILL_OUTPUT_DIR=./out
 */
function loadEnvConfig(): ExternalConfig {
  const config: ExternalConfig = {};
  const env = process.env;

  // Thresholds
  if (env.FLIGHTMILL_THRESHOLDS_SMALL_BAND) {
    config.thresholds = config.thresholds ?? {};
    config.thresholds.smallBand = parseFloat(env.FLIGHTMILL_THRESHOLDS_SMALL_BAND);
  }
  if (env.FLIGHTMILL_THRESHOLDS_LARGE_BAND) {
    config.thresholds = config.thresholds ?? {};
    config.thresholds.largeBand = parseFloat(env.FLIGHTMILL_THRESHOLDS_LARGE_BAND);
  }

  // Baseline
  const reference = env.FLIGHTMILL_BASELINE_REFERENCE;
  if (reference) {
    if (isReference(reference)) {
      config.baseline = config.baseline ?? {};
      config.baseline.reference = reference;
    } else {
      log.warn(`Ignoring FLIGHTMILL_BASELINE_REFERENCE=${reference}`);
    }
  }
  if (env.FLIGHTMILL_BASELINE_MIN_TRIALS) {
    config.baseline = config.baseline ?? {};
    config.baseline.minTrials = parseInt(env.FLIGHTMILL_BASELINE_MIN_TRIALS, 10);
  }
  if (env.FLIGHTMILL_BASELINE_SELF_FRACTION) {
    config.baseline = config.baseline ?? {};
    config.baseline.selfFraction = parseFloat(env.FLIGHTMILL_BASELINE_SELF_FRACTION);
  }

  // Apparatus
  if (env.FLIGHTMILL_APPARATUS_ARM_LENGTH) {
    config.apparatus = config.apparatus ?? {};
    config.apparatus.armLength = parseFloat(env.FLIGHTMILL_APPARATUS_ARM_LENGTH);
  }
  if (env.FLIGHTMILL_APPARATUS_MIN_SPEED) {
    config.apparatus = config.apparatus ?? {};
    config.apparatus.minSpeed = parseFloat(env.FLIGHTMILL_APPARATUS_MIN_SPEED);
  }
  if (env.FLIGHTMILL_APPARATUS_MAX_SPEED) {
    config.apparatus = config.apparatus ?? {};
    config.apparatus.maxSpeed = parseFloat(env.FLIGHTMILL_APPARATUS_MAX_SPEED);
  }

  // Processing
  if (env.FLIGHTMILL_PROCESSING_CONCURRENCY) {
    config.processing = config.processing ?? {};
    config.processing.concurrency = parseInt(env.FLIGHTMILL_PROCESSING_CONCURRENCY, 10);
  }

  // Output
  if (env.FLIGHTMILL_OUTPUT_DIR) {
    config.output = config.output ?? {};
    config.output.outDir = env.FLIGHTMILL_OUTPUT_DIR;
  }
  if (env.FLIGHTMILL_OUTPUT_DB_PATH) {
    config.output = config.output ?? {};
    config.output.dbPath = env.FLIGHTMILL_OUTPUT_DB_PATH;
  }

  return config;
}

/**
 * Deep merge two config objects, with source overriding target.
 * Undefined source values never clear a target value.
 */
function deepMerge(target: ExternalConfig, source: ExternalConfig): ExternalConfig {
  return {
    thresholds: {
      smallBand: source.thresholds?.smallBand ?? target.thresholds?.smallBand,
      largeBand: source.thresholds?.largeBand ?? target.thresholds?.largeBand,
    },
    baseline: {
      reference: source.baseline?.reference ?? target.baseline?.reference,
      minTrials: source.baseline?.minTrials ?? target.baseline?.minTrials,
      selfFraction: source.baseline?.selfFraction ?? target.baseline?.selfFraction,
    },
    apparatus: {
      armLength: source.apparatus?.armLength ?? target.apparatus?.armLength,
      minSpeed: source.apparatus?.minSpeed ?? target.apparatus?.minSpeed,
      maxSpeed: source.apparatus?.maxSpeed ?? target.apparatus?.maxSpeed,
    },
    processing: {
      concurrency: source.processing?.concurrency ?? target.processing?.concurrency,
    },
    output: {
      outDir: source.output?.outDir ?? target.output?.outDir,
      dbPath: source.output?.dbPath ?? target.output?.dbPath,
    },
  };
}

/**
 * Validate the external config structure.
 */
export function validateExternalConfig(config: ExternalConfig): string[] {
  const errors: string[] = [];

  // Threshold validation
  const smallBand = config.thresholds?.smallBand;
  const largeBand = config.thresholds?.largeBand;
  if (smallBand !== undefined && !(smallBand >= 0)) {
    errors.push('thresholds.smallBand must be >= 0');
  }
  if (largeBand !== undefined && !(largeBand >= 0)) {
    errors.push('thresholds.largeBand must be >= 0');
  }
  if (smallBand !== undefined && largeBand !== undefined && smallBand >= largeBand) {
    errors.push('thresholds.smallBand must be less than thresholds.largeBand');
  }

  // Baseline validation
  const reference: unknown = config.baseline?.reference;
  if (reference !== undefined && !isReference(reference)) {
    errors.push("baseline.reference must be 'self' or 'set-median'");
  }
  if (config.baseline?.minTrials !== undefined && !(config.baseline.minTrials >= 1)) {
    errors.push('baseline.minTrials must be at least 1');
  }
  const selfFraction = config.baseline?.selfFraction;
  if (selfFraction !== undefined && !(selfFraction > 0 && selfFraction <= 1)) {
    errors.push('baseline.selfFraction must be in (0, 1]');
  }

  // Apparatus validation
  if (config.apparatus?.armLength !== undefined && !(config.apparatus.armLength > 0)) {
    errors.push('apparatus.armLength must be positive');
  }
  const { minSpeed, maxSpeed } = config.apparatus ?? {};
  if (minSpeed !== undefined && maxSpeed !== undefined && minSpeed >= maxSpeed) {
    errors.push('apparatus.minSpeed must be less than apparatus.maxSpeed');
  }

  // Processing validation
  if (config.processing?.concurrency !== undefined && !(config.processing.concurrency >= 1)) {
    errors.push('processing.concurrency must be at least 1');
  }

  return errors;
}

export interface LoadConfigOptions {
  /** CLI overrides (highest priority) */
  cliOverrides?: ExternalConfig;
  /** Skip loading environment variables */
  skipEnv?: boolean;
  /** Skip loading project config file */
  skipProjectConfig?: boolean;
  /** Skip loading user config file */
  skipUserConfig?: boolean;
  /** Custom project config path */
  projectConfigPath?: string;
  /** Custom user config path */
  userConfigPath?: string;
}

/**
 * Load configuration with priority-based resolution.
 */
export function loadConfig(options: LoadConfigOptions = {}): Required<ExternalConfig> {
  let config: ExternalConfig = deepMerge({}, EXTERNAL_DEFAULTS);

  // 4. User config file
  if (!options.skipUserConfig) {
    const userConfigPath = options.userConfigPath ?? '~/.flightmill/config.json';
    const userConfig = loadConfigFile(userConfigPath);
    if (userConfig) {
      config = deepMerge(config, userConfig);
    }
  }

  // 3. Project config file
  if (!options.skipProjectConfig) {
    const projectConfigPath =
      options.projectConfigPath ?? join(process.cwd(), 'flightmill.config.json');
    const projectConfig = loadConfigFile(projectConfigPath);
    if (projectConfig) {
      config = deepMerge(config, projectConfig);
    }
  }

  // 2. Environment variables
  if (!options.skipEnv) {
    config = deepMerge(config, loadEnvConfig());
  }

  // 1. CLI overrides
  if (options.cliOverrides) {
    config = deepMerge(config, options.cliOverrides);
  }

  return {
    thresholds: config.thresholds ?? {},
    baseline: config.baseline ?? {},
    apparatus: config.apparatus ?? {},
    processing: config.processing ?? {},
    output: config.output ?? {},
  };
}

/**
 * Convert ExternalConfig to DiagnosticsConfig (the runtime format).
 */
export function toRuntimeConfig(external: Required<ExternalConfig>): DiagnosticsConfig {
  return {
    ...DEFAULT_CONFIG,

    // Classification
    smallBand: external.thresholds.smallBand ?? DEFAULT_CONFIG.smallBand,
    largeBand: external.thresholds.largeBand ?? DEFAULT_CONFIG.largeBand,
    reference: external.baseline.reference ?? DEFAULT_CONFIG.reference,
    minTrials: external.baseline.minTrials ?? DEFAULT_CONFIG.minTrials,
    selfFraction: external.baseline.selfFraction ?? DEFAULT_CONFIG.selfFraction,

    // Apparatus
    armLength: external.apparatus.armLength ?? DEFAULT_CONFIG.armLength,
    speedBounds: {
      min: external.apparatus.minSpeed,
      max: external.apparatus.maxSpeed,
    },

    // Processing
    concurrency: external.processing.concurrency ?? DEFAULT_CONFIG.concurrency,

    // Output
    outDir: external.output.outDir ?? DEFAULT_CONFIG.outDir,
    dbPath: external.output.dbPath ?? DEFAULT_CONFIG.dbPath,
  };
}

// Re-export for convenience
export { EXTERNAL_DEFAULTS };
