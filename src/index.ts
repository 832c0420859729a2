/**
 * checkopts
 *
 * The immutable options record of a static type checker, with its accessors
 * and the per-file decisions derived from it.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export * from './options/index.js';
export {
  fileKeyToString,
  jsonFile,
  libFile,
  normalizeFilenameDirSep,
  resourceFile,
  sourceFile,
} from './files/index.js';
export type { FileKey, FileKind } from './files/index.js';
export { FrozenMap, FrozenSet } from './utils/frozen-collections.js';
export { Logger, silentLogger } from './utils/logger.js';
export type { LogEntry, LogLevel, LogSink, LoggerOptions } from './utils/logger.js';
