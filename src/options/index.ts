/**
 * Checker options: the immutable record, its accessors and the decisions
 * derived from it.
 *
 * Override precedence: env > input layers > defaults
 *
 * @packageDocumentation
 */

export * from './accessors.js';
export {
  componentSyntaxParsed,
  componentSyntaxTypechecked,
  effectiveLintSeverity,
  fileHasPrefix,
  isRolloutVariant,
  isSuppressionType,
  lintSeverity,
  logSavingFor,
  mapModuleName,
  missingModuleGeneratorFor,
  parseComponentSyntax,
  reduceHasteName,
  relayIntegrationEnabledInFile,
  relayModulePrefixForFile,
  rendersTypeValidationInFile,
  resolvePattern,
  rolloutValue,
  shouldProfile,
  shouldSaveLog,
  strictEs6ImportExportInFile,
  typecheckComponentSyntax,
  typecheckComponentSyntaxInFile,
} from './decisions.js';
export type { PatternMatch } from './decisions.js';
export { OptionsBuildError, buildOptions } from './builder.js';
export type { BuildOptionsSettings, PathChecker } from './builder.js';
export {
  DEFAULT_FILE_OPTIONS,
  DEFAULT_FORMAT,
  DEFAULT_GC_CONTROL,
  DEFAULT_LINT_SEVERITIES,
  DEFAULT_MAX_FILES_CHECKED_PER_WORKER,
  DEFAULT_MAX_HEADER_TOKENS,
  DEFAULT_MAX_LITERAL_LENGTH,
  DEFAULT_MAX_SECONDS_FOR_CHECK_PER_WORKER,
  DEFAULT_MERGE_TIMEOUT_SECONDS,
  DEFAULT_RECURSION_LIMIT,
  DEFAULT_SLOW_TO_CHECK_LOGGING,
  DEFAULT_VERBOSE,
  createDefaultOptions,
  detectHostDefaults,
  logFileForRoot,
} from './defaults.js';
export type { HostDefaults } from './defaults.js';
export { EnvCoercionError, applyEnvOverrides, getEnvVarDocumentation, readEnvOverrides } from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export { canonicalEncoding, optionsFingerprint } from './fingerprint.js';
export { loadOptions } from './load.js';
export type { LoadOptionsSettings } from './load.js';
export { mergeOptionsInputs } from './merge.js';
export {
  CASTING_SYNTAXES,
  CHANNEL_MODES,
  COMPONENT_SYNTAX_LEVELS,
  LINT_KINDS,
  MODULE_SYSTEMS,
  REACT_RUNTIMES,
  SAVED_STATE_FETCHERS,
  SEVERITIES,
} from './types.js';
export type {
  BooleanOptionKey,
  CastingSyntax,
  ChannelMode,
  CompiledPattern,
  ComponentSyntax,
  FileOptions,
  FileOptionsInput,
  FormatOptions,
  GcControl,
  JsxMode,
  LintKind,
  LintSeverities,
  LogSaving,
  ModuleSystem,
  Options,
  OptionsInput,
  PatternEntry,
  PatternInput,
  PatternList,
  PatternSource,
  ReactRuntime,
  SavedStateFetcher,
  Severity,
  SlowToCheckLogging,
  StrictModeSettings,
  VerboseOptions,
} from './types.js';
