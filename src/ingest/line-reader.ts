/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { promises as fs } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import readline from 'node:readline';
import { Transform, type TransformCallback } from 'node:stream';
import { LogDigestError, toFileSystemError } from '../core/errors.js';

/**
 * Strict UTF-8 decoding: an invalid byte sequence fails the stream with `invalid-encoding`.
 * A byte-order mark is kept as text.
 */
const createUtf8Decoder = (filePath: string): Transform => {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  const decode = (callback: TransformCallback, bytes?: Buffer): void => {
    let text: string;
    try {
      text = bytes ? decoder.decode(bytes, { stream: true }) : decoder.decode();
    } catch (error) {
      callback(
        new LogDigestError('invalid-encoding', `Invalid UTF-8 in ${filePath}`, {
          path: filePath,
          cause: error,
        }),
      );
      return;
    }
    callback(null, text);
  };
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      decode(callback, chunk);
    },
    flush(callback) {
      decode(callback);
    },
  });
};

/**
 * Streams the lines of one UTF-8 file with line terminators stripped.
 * The file is opened up front so a missing or unreadable file fails before any line is yielded.
 *
 * @throws LogDigestError not-found / permission-denied / invalid-encoding
 */
export async function* readLogLines(filePath: string): AsyncGenerator<string> {
  let handle: FileHandle;
  try {
    handle = await fs.open(filePath, 'r');
  } catch (error) {
    throw toFileSystemError(error, filePath);
  }
  const stream = handle.createReadStream();
  const decoded = stream.pipe(createUtf8Decoder(filePath));
  stream.once('error', (error) => decoded.destroy(error));
  const rl = readline.createInterface({
    input: decoded,
    crlfDelay: Infinity,
  });
  try {
    for await (const line of rl) {
      yield line;
    }
  } catch (error) {
    throw toFileSystemError(error, filePath);
  } finally {
    rl.close();
    decoded.destroy();
    stream.close();
    await handle.close();
  }
}

/**
 * Concatenates the lines of every file, in the given order. Each file is drained and
 * closed before the next one is opened.
 */
export async function* readLogLinesFromPaths(paths: Iterable<string>): AsyncGenerator<string> {
  for (const filePath of paths) {
    yield* readLogLines(filePath);
  }
}
