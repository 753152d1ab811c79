/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './types/index.js';
export * from './ingest/index.js';
export * from './runner/index.js';
export * from './prompts/index.js';
export * from './llm/index.js';
export { LogDigestError, isLogDigestError, formatErrorMessage, type LogDigestErrorKind } from './core/errors.js';
export { logConsole, formatLogBlock, indentLines, type LogSink } from './core/logging.js';
export { readPackageVersion } from './version.js';
