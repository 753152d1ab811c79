/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import { fileURLToPath } from 'node:url';

export const UNKNOWN_VERSION = 'unknown';

const defaultPackageJsonPath = (): string =>
  fileURLToPath(new URL('../package.json', import.meta.url));

/**
 * Reads the `version` field of the package manifest, or `unknown` when it cannot be read.
 */
export async function readPackageVersion(
  packageJsonPath: string = defaultPackageJsonPath(),
): Promise<string> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.readFile(packageJsonPath, 'utf8'));
  } catch {
    return UNKNOWN_VERSION;
  }
  if (
    typeof data === 'object' &&
    data !== null &&
    'version' in data &&
    typeof data.version === 'string' &&
    data.version
  ) {
    return data.version;
  }
  return UNKNOWN_VERSION;
}
