#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React from 'react';
import { render } from 'ink';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import type { LogAnalyzer } from '../types/index.js';
import type { LogDigestOptions, LogDigestResult } from '../runner/index.js';
import { renderReport, runLogDigest, writeReport } from '../runner/index.js';
import { LlmLogAnalyzer, createLlmClient, resolveLlmConfigFromEnv, type Env } from '../llm/index.js';
import { LogDigestError, formatErrorMessage, isLogDigestError } from '../core/errors.js';
import { logConsole, type LogSink } from '../core/logging.js';
import { readPackageVersion } from '../version.js';
import { DigestApp } from '../ui/digest-app.js';
import { USAGE, assertInputPath, parseArgs, type AnalyzeOptions } from './args.js';
import { runInteractiveSetup } from './interactive.js';

interface Writer {
  write(chunk: string): unknown;
}

export interface CliIo {
  stdout: Writer;
  stderr: Writer;
  env: Env;
  /** Renders the ink progress view on process.stderr when true. */
  progress: boolean;
  /** Overrides the analyzer built from the environment. */
  analyzer?: LogAnalyzer;
}

const defaultIo = (): CliIo => ({
  stdout: process.stdout,
  stderr: process.stderr,
  env: process.env,
  progress: Boolean(process.stderr.isTTY),
});

const createAnalyzer = (options: AnalyzeOptions, env: Env): LogAnalyzer => {
  const client = createLlmClient(resolveLlmConfigFromEnv(env, options.model));
  if (!client) {
    throw new LogDigestError(
      'analysis-failure',
      'LLM client not configured. Set AIMLAPI_API_KEY or GEMINI_API_KEY (or LOG_DIGEST_MOCK_LLM=1) before running.',
    );
  }
  return new LlmLogAnalyzer(client);
};

async function runWithProgress(options: Omit<LogDigestOptions, 'observer'>): Promise<LogDigestResult> {
  let result: LogDigestResult | undefined;
  const onResult = (value: LogDigestResult): void => {
    result = value;
  };
  const { waitUntilExit } = render(<DigestApp options={options} onResult={onResult} />, {
    stdout: process.stderr,
  });
  await waitUntilExit();
  if (!result) {
    throw new Error('Log digest finished without a result.');
  }
  return result;
}

async function analyze(options: AnalyzeOptions, io: CliIo): Promise<void> {
  if (options.interactive) {
    await runInteractiveSetup(options, io.env);
  }
  assertInputPath(options.inputPath);

  const digestOptions: Omit<LogDigestOptions, 'observer'> = {
    inputPath: options.inputPath,
    analyzer: io.analyzer ?? (() => createAnalyzer(options, io.env)),
    format: options.format,
    maxTokens: options.maxTokens,
    recursive: options.recursive,
    include: options.include,
    exclude: options.exclude,
  };

  const result =
    io.progress && !options.quiet
      ? await runWithProgress(digestOptions)
      : await runLogDigest(digestOptions);

  const body = renderReport(result, options.output);
  if (options.outFile) {
    await writeReport(options.outFile, body);
  } else {
    io.stdout.write(`${body}\n`);
  }

  if (!options.quiet && !io.progress) {
    const sink: LogSink = (_level, output) => {
      io.stderr.write(`${output}\n`);
    };
    logConsole(
      'info',
      'Analysis complete',
      [
        ['files', result.files.length],
        ['entries', result.entryCount],
        ['chunks', result.chunkCount],
        ['out-file', options.outFile],
      ],
      sink,
    );
  }
}

/**
 * Runs one CLI invocation and resolves to its exit code.
 */
export const runCli = async (argv: string[], io: CliIo = defaultIo()): Promise<number> => {
  try {
    const command = parseArgs(argv);
    switch (command.command) {
      case 'help':
        io.stdout.write(`${USAGE}\n`);
        return 0;
      case 'version':
        io.stdout.write(`log-digest version ${await readPackageVersion()}\n`);
        return 0;
      case 'analyze':
        await analyze(command, io);
        return 0;
    }
  } catch (error) {
    io.stderr.write(`Error: ${formatErrorMessage(error)}\n`);
    if (isLogDigestError(error, 'invalid-arguments')) {
      io.stderr.write(`\n${USAGE}\n`);
    }
    return 1;
  }
};

export const main = async (): Promise<void> => {
  process.exitCode = await runCli(process.argv.slice(2));
};

if (process.argv[1] && import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href) {
  main().catch((error: unknown) => {
    console.error('Failed to run log digest:', error);
    process.exit(1);
  });
}
