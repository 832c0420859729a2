/**
 * One-call construction from input layers and the environment.
 *
 * @packageDocumentation
 */

import { silentLogger } from '../utils/logger.js';
import { buildOptions, type BuildOptionsSettings } from './builder.js';
import { readEnvOverrides, type EnvRecord } from './env.js';
import { mergeOptionsInputs } from './merge.js';
import type { Options, OptionsInput } from './types.js';

export interface LoadOptionsSettings extends BuildOptionsSettings {
  /** Environment to read CHECKOPTS_* overrides from; defaults to process.env. */
  env?: EnvRecord;
}

/**
 * Merges input layers in order, applies environment overrides on top, and
 * builds the record.
 *
 * Override precedence: env > later layers > earlier layers > defaults
 *
 * @param layers - Input layers, lowest precedence first (e.g. file, then CLI).
 * @param settings - Environment plus {@link BuildOptionsSettings}.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 * @throws OptionsBuildError if the merged input is invalid.
 *
 * @example
 * ```typescript
 * const options = loadOptions([fileInput, cliInput]);
 * ```
 */
export function loadOptions(
  layers: readonly OptionsInput[],
  settings: LoadOptionsSettings = {}
): Options {
  const logger = (settings.logger ?? silentLogger).child('OptionsLoader');
  const { overrides, appliedVars } =
    settings.env === undefined ? readEnvOverrides() : readEnvOverrides(settings.env);

  for (const envVar of appliedVars) {
    logger.debug('env_override_applied', { envVar });
  }

  return buildOptions(mergeOptionsInputs(...layers, overrides), settings);
}
