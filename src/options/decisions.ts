/**
 * Decisions derived from two or more option fields.
 *
 * Every function here is total over a built record: nothing throws, nothing
 * is cached, and nothing has side effects. Path-based decisions take a
 * {@link FileKey} and compare against its host-normalised path.
 *
 * @packageDocumentation
 */

import { fileKeyToString, normalizeFilenameDirSep, type FileKey } from '../files/file-key.js';
import type {
  ComponentSyntax,
  LintKind,
  LogSaving,
  Options,
  PatternEntry,
  PatternList,
  Severity,
} from './types.js';

/**
 * Result of looking a string up in a pattern list.
 *
 * A match whose value is the empty string is still a match; callers fall back
 * to their own behaviour only on `matched: false`.
 */
export type PatternMatch<V> =
  | { readonly matched: true; readonly value: V; readonly entry: PatternEntry<V> }
  | { readonly matched: false };

const NO_MATCH: PatternMatch<never> = Object.freeze({ matched: false });

/**
 * Whether component syntax is fully type-checked at this level.
 *
 * The switches below list every level and have no default branch, so a new
 * level fails to compile until each decision handles it.
 */
export function componentSyntaxTypechecked(level: ComponentSyntax): boolean {
  switch (level) {
    case 'off':
    case 'parsing':
      return false;
    case 'full':
      return true;
  }
}

/**
 * Whether component syntax is accepted by the parser at this level.
 */
export function componentSyntaxParsed(level: ComponentSyntax): boolean {
  switch (level) {
    case 'off':
      return false;
    case 'parsing':
    case 'full':
      return true;
  }
}

export function typecheckComponentSyntax(options: Options): boolean {
  return componentSyntaxTypechecked(options.componentSyntax);
}

export function parseComponentSyntax(options: Options): boolean {
  return componentSyntaxParsed(options.componentSyntax);
}

/**
 * Whether the normalised path of `file` starts with any of `prefixes`.
 *
 * This is a raw, case-sensitive string prefix test, not a path-segment test:
 * the prefix `src/foo` matches `src/foobar/x.js`.
 */
export function fileHasPrefix(file: FileKey, prefixes: readonly string[], sep?: string): boolean {
  if (prefixes.length === 0) {
    return false;
  }
  const filename = normalizeFilenameDirSep(fileKeyToString(file), sep);
  return prefixes.some((prefix) => filename.startsWith(prefix));
}

/**
 * Whether component syntax is type-checked in `file`: globally enabled, or
 * the file falls under a `componentSyntaxIncludes` prefix.
 *
 * @param sep - Host separator override, for callers checking paths of another host.
 */
export function typecheckComponentSyntaxInFile(options: Options, file: FileKey, sep?: string): boolean {
  return typecheckComponentSyntax(options) || fileHasPrefix(file, options.componentSyntaxIncludes, sep);
}

/**
 * Whether render types are validated in `file`. Same prefix semantics as
 * {@link typecheckComponentSyntaxInFile}.
 */
export function rendersTypeValidationInFile(options: Options, file: FileKey, sep?: string): boolean {
  return options.rendersTypeValidation || fileHasPrefix(file, options.rendersTypeValidationIncludes, sep);
}

/**
 * Whether strict ES module import/export rules apply to `file`.
 */
export function strictEs6ImportExportInFile(options: Options, file: FileKey, sep?: string): boolean {
  return options.strictEs6ImportExport && !fileHasPrefix(file, options.strictEs6ImportExportExcludes, sep);
}

/**
 * Profiling output is produced only when requested and not in quiet mode.
 */
export function shouldProfile(options: Options): boolean {
  return options.profile && !options.quiet;
}

/**
 * Finds the first entry whose pattern matches `input`.
 */
export function resolvePattern<V>(list: PatternList<V>, input: string): PatternMatch<V> {
  for (const entry of list) {
    if (entry.pattern.test(input)) {
      return { matched: true, value: entry.value, entry };
    }
  }
  return NO_MATCH;
}

/**
 * Replaces every match of `pattern` in `input`. Stored patterns never carry
 * the `g` flag, so a global copy is made for the call.
 */
function replaceEveryMatch(input: string, pattern: RegExp, template: string): string {
  return input.replaceAll(new RegExp(pattern.source, `${pattern.flags}g`), template);
}

/**
 * Rewrites a module name with the first matching mapper. Every match of that
 * mapper's pattern is replaced, and the replacement may refer to capture
 * groups as `$1`, `$2`, ...
 *
 * @returns The mapped name, or `undefined` when no mapper matches.
 *
 * @example
 * ```typescript
 * // moduleNameMappers: [['^@app/(.*)$', 'src/$1']]
 * mapModuleName(options, '@app/util'); // 'src/util'
 * ```
 */
export function mapModuleName(options: Options, name: string): string | undefined {
  const match = resolvePattern(options.moduleNameMappers, name);
  if (!match.matched) {
    return undefined;
  }
  return replaceEveryMatch(name, match.entry.pattern, match.value);
}

/**
 * Returns the generator target for a module that could not be resolved.
 */
export function missingModuleGeneratorFor(options: Options, name: string): string | undefined {
  const match = resolvePattern(options.missingModuleGenerators, name);
  return match.matched ? match.value : undefined;
}

/**
 * Derives a haste module name from a path. Unlike the other pattern lists,
 * every reducer is applied in order, each to the previous result, and each
 * replaces every match of its pattern.
 */
export function reduceHasteName(options: Options, filePath: string): string {
  return options.hasteNameReducers.reduce(
    (name, { pattern, value }) => replaceEveryMatch(name, pattern, value),
    filePath
  );
}

/**
 * Whether the relay integration applies to `file`.
 *
 * Relay patterns are regular expressions tested against the path exactly as
 * the file key holds it, without separator normalisation. Unlike the prefix
 * lists, a pattern can accept either separator itself (`[\\/]`).
 */
export function relayIntegrationEnabledInFile(options: Options, file: FileKey): boolean {
  if (!options.enableRelayIntegration) {
    return false;
  }
  const filename = fileKeyToString(file);
  return !options.relayIntegrationExcludes.some(({ pattern }) => pattern.test(filename));
}

/**
 * Module prefix used for generated relay artifacts referenced from `file`.
 * An empty includes list admits every file.
 */
export function relayModulePrefixForFile(options: Options, file: FileKey): string | undefined {
  const prefix = options.relayIntegrationModulePrefix;
  if (prefix === undefined || !relayIntegrationEnabledInFile(options, file)) {
    return undefined;
  }
  const includes = options.relayIntegrationModulePrefixIncludes;
  if (includes.length === 0) {
    return prefix;
  }
  const filename = fileKeyToString(file);
  return includes.some(({ pattern }) => pattern.test(filename)) ? prefix : undefined;
}

/**
 * Variant configured for a rollout, or `undefined` when it is not enabled.
 */
export function rolloutValue(options: Options, name: string): string | undefined {
  return options.enabledRollouts.get(name);
}

export function isRolloutVariant(options: Options, name: string, variant: string): boolean {
  return options.enabledRollouts.get(name) === variant;
}

export function lintSeverity(options: Options, kind: LintKind): Severity {
  return options.lintSeverities.severities.get(kind) ?? options.lintSeverities.defaultSeverity;
}

/**
 * Lint severity in a given file; rules in the strict-mode set are errors in
 * strict files.
 */
export function effectiveLintSeverity(
  options: Options,
  kind: LintKind,
  context: { readonly strict: boolean }
): Severity {
  if (context.strict && options.strictMode.has(kind)) {
    return 'error';
  }
  return lintSeverity(options, kind);
}

export function logSavingFor(options: Options, event: string): LogSaving | undefined {
  return options.logSaving.get(event);
}

/**
 * Whether a log for an operation should be saved.
 *
 * @param settings - Sampling rule for the event.
 * @param elapsedMs - Duration of the operation.
 * @param savedCount - Logs already saved for this event.
 * @param roll - Uniform sample in [0, 100).
 */
export function shouldSaveLog(
  settings: LogSaving,
  elapsedMs: number,
  savedCount: number,
  roll: number
): boolean {
  if (elapsedMs < settings.thresholdTimeMs) {
    return false;
  }
  if (settings.limit !== undefined && savedCount >= settings.limit) {
    return false;
  }
  return roll < settings.rate;
}

export function isSuppressionType(options: Options, name: string): boolean {
  return options.suppressTypes.has(name);
}
