/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './source-resolver.js';
export * from './line-reader.js';
export * from './entry-parser.js';
