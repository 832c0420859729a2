/**
 * Environment variable overrides for options input.
 *
 * Supports CHECKOPTS_* environment variables. Environment variables take
 * precedence over explicit input layers, which take precedence over defaults.
 *
 * Override precedence: env > input layers > defaults
 *
 * @packageDocumentation
 */

import { mergeOptionsInputs } from './merge.js';
import {
  CHANNEL_MODES,
  COMPONENT_SYNTAX_LEVELS,
  MODULE_SYSTEMS,
  SAVED_STATE_FETCHERS,
  type BooleanOptionKey,
  type OptionsInput,
} from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

type Writable<T> = { -readonly [K in keyof T]: T[K] };

type EnvValueType = 'string' | 'number' | 'boolean' | 'enum';

interface EnvVarMapping {
  readonly type: EnvValueType;
  readonly description: string;
  readonly apply: (overrides: Writable<OptionsInput>, raw: string, envVar: string) => void;
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value is empty or not numeric.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

const TRUTHY = ['true', '1', 'yes', 'on'];
const FALSY = ['false', '0', 'no', 'off'];

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  if (TRUTHY.includes(trimmed)) {
    return true;
  }

  if (FALSY.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...TRUTHY, ...FALSY].join(', ')}`
  );
}

function coerceToVariant<T extends string>(value: string, envVar: string, variants: readonly T[]): T {
  const trimmed = value.trim();
  const match = variants.find((variant) => variant === trimmed);
  if (match === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      `one of ${variants.join(', ')}`,
      `Cannot coerce '${envVar}' value '${value}'. Expected one of: ${variants.join(', ')}`
    );
  }
  return match;
}

function booleanVar(key: BooleanOptionKey, description: string): EnvVarMapping {
  return {
    type: 'boolean',
    description,
    apply: (overrides, raw, envVar) => {
      overrides[key] = coerceToBoolean(raw, envVar);
    },
  };
}

function numberVar(
  key: 'maxWorkers' | 'maxFilesCheckedPerWorker' | 'maxSecondsForCheckPerWorker' | 'mergeTimeout' | 'recursionLimit' | 'traces',
  description: string
): EnvVarMapping {
  return {
    type: 'number',
    description,
    apply: (overrides, raw, envVar) => {
      overrides[key] = coerceToNumber(raw, envVar);
    },
  };
}

function stringVar(key: 'root' | 'tempDir' | 'logFile' | 'configName', description: string): EnvVarMapping {
  return {
    type: 'string',
    description,
    apply: (overrides, raw) => {
      overrides[key] = raw;
    },
  };
}

/**
 * Supported variables, in application order. Shortcuts come first so that the
 * full name wins when both are set.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvVarMapping> = new Map<string, EnvVarMapping>([
  // Shortcuts
  ['CHECKOPTS_WORKERS', numberVar('maxWorkers', 'Worker count (shortcut for CHECKOPTS_MAX_WORKERS)')],

  // Paths
  ['CHECKOPTS_ROOT', stringVar('root', 'Project root directory')],
  ['CHECKOPTS_TEMP_DIR', stringVar('tempDir', 'Directory for sockets, logs and saved state')],
  ['CHECKOPTS_LOG_FILE', stringVar('logFile', 'Server log file')],
  ['CHECKOPTS_CONFIG_NAME', stringVar('configName', 'Name of the project configuration file')],

  // Workers
  ['CHECKOPTS_MAX_WORKERS', numberVar('maxWorkers', 'Worker count')],
  ['CHECKOPTS_MAX_FILES_CHECKED_PER_WORKER', numberVar('maxFilesCheckedPerWorker', 'Files per worker batch')],
  ['CHECKOPTS_MAX_SECONDS_FOR_CHECK_PER_WORKER', numberVar('maxSecondsForCheckPerWorker', 'Seconds per worker batch')],
  ['CHECKOPTS_MERGE_TIMEOUT', numberVar('mergeTimeout', 'Merge timeout in seconds')],
  ['CHECKOPTS_LONG_LIVED_WORKERS', booleanVar('longLivedWorkers', 'Keep workers alive between rechecks (true/false)')],
  ['CHECKOPTS_DISTRIBUTED', booleanVar('distributed', 'Run checks on remote workers (true/false)')],

  // Checking
  ['CHECKOPTS_TRACES', numberVar('traces', 'Maximum error trace depth')],
  ['CHECKOPTS_RECURSION_LIMIT', numberVar('recursionLimit', 'Type recursion limit')],
  ['CHECKOPTS_LAZY_MODE', booleanVar('lazyMode', 'Only check files touched since startup (true/false)')],
  ['CHECKOPTS_INCLUDE_WARNINGS', booleanVar('includeWarnings', 'Report warnings as well as errors (true/false)')],
  ['CHECKOPTS_WAIT_FOR_RECHECK', booleanVar('waitForRecheck', 'Block queries until a recheck finishes (true/false)')],
  [
    'CHECKOPTS_MODULE_SYSTEM',
    {
      type: 'enum',
      description: `Module resolution strategy (${MODULE_SYSTEMS.join(', ')})`,
      apply: (overrides, raw, envVar) => {
        overrides.moduleSystem = coerceToVariant(raw, envVar, MODULE_SYSTEMS);
      },
    },
  ],
  [
    'CHECKOPTS_COMPONENT_SYNTAX',
    {
      type: 'enum',
      description: `Component syntax support (${COMPONENT_SYNTAX_LEVELS.join(', ')})`,
      apply: (overrides, raw, envVar) => {
        overrides.componentSyntax = coerceToVariant(raw, envVar, COMPONENT_SYNTAX_LEVELS);
      },
    },
  ],

  // Output
  ['CHECKOPTS_QUIET', booleanVar('quiet', 'Suppress non-essential output, including profiling (true/false)')],
  ['CHECKOPTS_PROFILE', booleanVar('profile', 'Emit profiling output unless quiet (true/false)')],
  ['CHECKOPTS_DEBUG', booleanVar('debug', 'Enable debug output (true/false)')],
  ['CHECKOPTS_STRIP_ROOT', booleanVar('stripRoot', 'Print paths relative to the root (true/false)')],
  [
    'CHECKOPTS_CHANNEL_MODE',
    {
      type: 'enum',
      description: `Server transport (${CHANNEL_MODES.join(', ')})`,
      apply: (overrides, raw, envVar) => {
        overrides.channelMode = coerceToVariant(raw, envVar, CHANNEL_MODES);
      },
    },
  ],

  // Saved state
  [
    'CHECKOPTS_SAVED_STATE_FETCHER',
    {
      type: 'enum',
      description: `Saved state source (${SAVED_STATE_FETCHERS.join(', ')})`,
      apply: (overrides, raw, envVar) => {
        overrides.savedStateFetcher = coerceToVariant(raw, envVar, SAVED_STATE_FETCHERS);
      },
    },
  ],
  ['CHECKOPTS_SAVED_STATE_FORCE_RECHECK', booleanVar('savedStateForceRecheck', 'Recheck changed files after loading saved state (true/false)')],
  ['CHECKOPTS_SAVED_STATE_NO_FALLBACK', booleanVar('savedStateNoFallback', 'Fail instead of a full init when saved state is unavailable (true/false)')],
  ['CHECKOPTS_SAVED_STATE_SKIP_VERSION_CHECK', booleanVar('savedStateSkipVersionCheck', 'Accept saved state from another build (true/false)')],
  ['CHECKOPTS_SAVED_STATE_VERIFY', booleanVar('savedStateVerify', 'Verify saved state against a full check (true/false)')],
]);

/**
 * Gets the default environment from Node.js process.env.
 */
function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Input layer holding the values from environment variables. */
  overrides: OptionsInput;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads CHECKOPTS_* environment variables into an input layer.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - With `collectErrors`, coercion failures are returned
 *   instead of thrown.
 * @throws EnvCoercionError on the first bad value unless collecting.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ CHECKOPTS_MAX_WORKERS: '4' });
 * overrides.maxWorkers; // 4
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: Writable<OptionsInput> = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Layers environment overrides on top of an input.
 *
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(input: OptionsInput, env: EnvRecord = getDefaultEnv()): OptionsInput {
  const { overrides } = readEnvOverrides(env);
  return mergeOptionsInputs(input, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
