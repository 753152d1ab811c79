/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs, type Stats } from 'node:fs';
import { basename, join } from 'node:path';
import fg from 'fast-glob';
import picomatch from 'picomatch';
import { LogDigestError, toFileSystemError } from '../core/errors.js';

export interface ResolveSourcesOptions {
  recursive?: boolean;
  /** Glob patterns a file must match. Defaults to `['*']`. */
  include?: readonly string[];
  exclude?: readonly string[];
}

const DEFAULT_INCLUDE = ['*'];

// bash mode lets a single `*` span `/`, so `archive/*` also covers `archive/2023/old.log`.
const GLOB_OPTIONS: picomatch.PicomatchOptions = { dot: true, bash: true };

/**
 * A pattern matches when it matches either the file name or the path relative to the root.
 */
export const matchesAny = (
  patterns: readonly string[],
  relativePath: string,
  name: string,
): boolean =>
  patterns.some(
    (pattern) =>
      picomatch.isMatch(relativePath, pattern, GLOB_OPTIONS) ||
      picomatch.isMatch(name, pattern, GLOB_OPTIONS),
  );

export const isSelected = (
  relativePath: string,
  name: string,
  include: readonly string[],
  exclude: readonly string[],
): boolean =>
  matchesAny(include, relativePath, name) && !matchesAny(exclude, relativePath, name);

/**
 * Turns a file or directory path plus include/exclude filters into a sorted list of log files.
 *
 * @param root - File or directory to read logs from
 * @returns Selected file paths, sorted ascending by full path
 * @throws LogDigestError not-found when `root` does not exist
 */
export async function resolveLogSources(
  root: string,
  options: ResolveSourcesOptions = {},
): Promise<string[]> {
  const include = options.include && options.include.length > 0 ? options.include : DEFAULT_INCLUDE;
  const exclude = options.exclude ?? [];

  let stats: Stats;
  try {
    stats = await fs.stat(root);
  } catch (error) {
    throw toFileSystemError(error, root);
  }

  if (stats.isFile()) {
    const name = basename(root);
    return isSelected(name, name, include, exclude) ? [root] : [];
  }
  if (!stats.isDirectory()) {
    throw new LogDigestError('not-found', `No such file or directory: ${root}`, { path: root });
  }

  let candidates: string[];
  try {
    candidates = await fg(options.recursive ? '**/*' : '*', {
      cwd: root,
      onlyFiles: true,
      dot: true,
      unique: true,
    });
  } catch (error) {
    throw toFileSystemError(error, root);
  }

  const files = candidates
    .filter((relativePath) =>
      isSelected(relativePath, relativePath.split('/').pop() ?? relativePath, include, exclude),
    )
    .map((relativePath) => join(root, relativePath));
  files.sort();
  return files;
}
