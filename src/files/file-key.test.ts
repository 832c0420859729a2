import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import {
  fileKeyToString,
  jsonFile,
  libFile,
  normalizeFilenameDirSep,
  resourceFile,
  sourceFile,
} from './file-key.js';

describe('file keys', () => {
  it('should tag each constructor with its kind', () => {
    expect([sourceFile('a.js'), libFile('b.js'), jsonFile('c.json'), resourceFile('d.css')].map((k) => k.kind)).toEqual([
      'source',
      'lib',
      'json',
      'resource',
    ]);
  });

  it('should expose the path as its string form', () => {
    expect(fileKeyToString(libFile('/project/lib/core.js'))).toBe('/project/lib/core.js');
  });
});

describe('normalizeFilenameDirSep', () => {
  it('should convert forward slashes on a backslash host', () => {
    expect(normalizeFilenameDirSep('src/foo/x.js', '\\')).toBe('src\\foo\\x.js');
  });

  it('should leave paths unchanged on a slash host', () => {
    expect(normalizeFilenameDirSep('src\\foo/x.js', '/')).toBe('src\\foo/x.js');
  });

  it('should leave no forward slashes on a backslash host', () => {
    fc.assert(
      fc.property(fc.string(), (filename) => !normalizeFilenameDirSep(filename, '\\').includes('/'))
    );
  });

  it('should preserve length', () => {
    fc.assert(
      fc.property(fc.string(), fc.constantFrom('/', '\\'), (filename, sep) => {
        return normalizeFilenameDirSep(filename, sep).length === filename.length;
      })
    );
  });
});
