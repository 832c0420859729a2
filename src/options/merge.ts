/**
 * Merging of options input layers.
 *
 * @packageDocumentation
 */

import type { OptionsInput } from './types.js';

/**
 * Copies the keys of `layer` whose value is not `undefined`. A key set to
 * `undefined` means "not given" and must not erase an earlier layer's value.
 */
function definedKeys<T extends object>(layer: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(layer)) {
    const value: unknown = Reflect.get(layer, key);
    if (value !== undefined) {
      Reflect.set(result, key, value);
    }
  }
  return result;
}

function mergeNested<T extends object>(base: T | undefined, layer: T | undefined): T | undefined {
  if (base === undefined) {
    return layer;
  }
  if (layer === undefined) {
    return base;
  }
  return { ...base, ...definedKeys(layer) };
}

function mergeTwo(base: OptionsInput, layer: OptionsInput): OptionsInput {
  const lintSeverities = mergeNested(base.lintSeverities, layer.lintSeverities);
  const severities = mergeNested(base.lintSeverities?.severities, layer.lintSeverities?.severities);

  return {
    ...base,
    ...definedKeys(layer),
    fileOptions: mergeNested(base.fileOptions, layer.fileOptions),
    format: mergeNested(base.format, layer.format),
    gcWorker: mergeNested(base.gcWorker, layer.gcWorker),
    lintSeverities:
      lintSeverities === undefined ? undefined : { ...lintSeverities, severities },
    slowToCheckLogging: mergeNested(base.slowToCheckLogging, layer.slowToCheckLogging),
    verbose: mergeNested(base.verbose, layer.verbose),
  };
}

/**
 * Merges input layers left to right; later layers win. A field a layer sets
 * to `undefined` counts as omitted and leaves the earlier value in place.
 *
 * Nested settings (`format`, `gcWorker`, `fileOptions`, `slowToCheckLogging`,
 * `verbose`, and the `lintSeverities` table) are merged key by key. Lists,
 * pattern lists and keyed maps are replaced as a whole, since their order and
 * membership are part of their meaning.
 *
 * @example
 * ```typescript
 * const input = mergeOptionsInputs(
 *   { maxWorkers: 4, format: { singleQuotes: true } },
 *   { format: { bracketSpacing: false } }
 * );
 * // { maxWorkers: 4, format: { singleQuotes: true, bracketSpacing: false } }
 * ```
 */
export function mergeOptionsInputs(...layers: readonly OptionsInput[]): OptionsInput {
  return layers.reduce<OptionsInput>((merged, layer) => mergeTwo(merged, layer), {});
}
