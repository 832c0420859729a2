/**
 * File identity helpers.
 *
 * @packageDocumentation
 */

export {
  fileKeyToString,
  jsonFile,
  libFile,
  normalizeFilenameDirSep,
  resourceFile,
  sourceFile,
} from './file-key.js';
export type { FileKey, FileKind } from './file-key.js';
