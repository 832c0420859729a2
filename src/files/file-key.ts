/**
 * File identity as seen by the decision layer.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';

/**
 * Kind of file a key refers to.
 * - `source`: a checked source file
 * - `lib`: a library definition file
 * - `json`: a JSON module
 * - `resource`: a non-code asset imported by path
 */
export type FileKind = 'source' | 'lib' | 'json' | 'resource';

/**
 * Opaque identifier of a file. Only its path is ever consulted by options
 * decisions.
 */
export interface FileKey {
  readonly kind: FileKind;
  readonly path: string;
}

export function sourceFile(filePath: string): FileKey {
  return { kind: 'source', path: filePath };
}

export function libFile(filePath: string): FileKey {
  return { kind: 'lib', path: filePath };
}

export function jsonFile(filePath: string): FileKey {
  return { kind: 'json', path: filePath };
}

export function resourceFile(filePath: string): FileKey {
  return { kind: 'resource', path: filePath };
}

/**
 * Returns the path string of a file key.
 */
export function fileKeyToString(key: FileKey): string {
  return key.path;
}

/**
 * Normalises directory separators for the host.
 *
 * On hosts whose separator is `\`, every `/` becomes `\`. Elsewhere the path is
 * returned unchanged, so a `\` in a POSIX file name is kept as part of the name.
 *
 * @param filename - Path to normalise.
 * @param sep - Host separator, defaults to `path.sep`.
 */
export function normalizeFilenameDirSep(filename: string, sep: string = path.sep): string {
  if (sep === '\\') {
    return filename.replaceAll('/', '\\');
  }
  return filename;
}
