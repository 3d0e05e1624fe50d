/**
 * Include path resolution.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { IncludeError } from '../errors/index.js';
import { safeIsFileSync } from '../utils/safe-fs.js';
import { DEFAULT_EXTENSION } from './defaults.js';

/**
 * Predicate deciding whether a candidate path is an existing file.
 */
export type FileChecker = (candidate: string) => boolean;

/**
 * Lists the candidate files for an include path, in search order.
 *
 * For every root the path is tried as written and, when it has no extension,
 * with `.cfgpp` appended. The directory of the including file, when known, is
 * searched before the configured roots.
 *
 * @param includePath - Path as written in the directive.
 * @param roots - Configured include roots.
 * @param fromFile - Absolute path of the including file, if any.
 * @returns Absolute candidate paths without duplicates.
 */
export function includeCandidates(
  includePath: string,
  roots: readonly string[],
  fromFile?: string
): string[] {
  const searchRoots = fromFile === undefined ? [...roots] : [path.dirname(fromFile), ...roots];
  const names =
    path.extname(includePath) === ''
      ? [includePath, includePath + DEFAULT_EXTENSION]
      : [includePath];

  const candidates: string[] = [];
  for (const root of searchRoots) {
    for (const name of names) {
      const candidate = path.resolve(root, name);
      if (!candidates.includes(candidate)) {
        candidates.push(candidate);
      }
    }
  }
  return candidates;
}

/**
 * Resolves an include path to the first existing candidate file.
 *
 * @param includePath - Path as written in the directive.
 * @param roots - Configured include roots.
 * @param fromFile - Absolute path of the including file, if any.
 * @param isFile - Existence check (defaults to a path-validated stat).
 * @returns Absolute path of the file to include.
 * @throws IncludeError if no candidate exists or a candidate cannot be checked.
 */
export function resolveInclude(
  includePath: string,
  roots: readonly string[],
  fromFile?: string,
  isFile: FileChecker = safeIsFileSync
): string {
  if (includePath === '') {
    throw new IncludeError(includePath, 'Include path is empty');
  }
  if (includePath.includes('\0')) {
    throw new IncludeError(includePath, 'Include path contains null bytes');
  }

  const found = includeCandidates(includePath, roots, fromFile).find((candidate) => {
    try {
      return isFile(candidate);
    } catch (error) {
      if (error instanceof Error) {
        throw new IncludeError(includePath, `Cannot access '${candidate}': ${error.message}`);
      }
      throw error;
    }
  });
  if (found === undefined) {
    throw new IncludeError(includePath, 'File not found in include paths');
  }
  return found;
}
