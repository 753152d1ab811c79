/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export * from './aimlapi-client.js';
export * from './gemini-client.js';
export * from './canned-client.js';
export * from './analyzer.js';
export * from './config.js';
