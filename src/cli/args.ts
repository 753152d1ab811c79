/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { LogDigestError } from '../core/errors.js';
import { DEFAULT_MAX_TOKENS } from '../runner/chunk-manager.js';
import {
  LOG_FORMATS,
  REPORT_STYLES,
  type LogFormat,
  type ReportStyle,
} from '../types/index.js';

export interface AnalyzeOptions {
  command: 'analyze';
  inputPath: string;
  format: LogFormat;
  output: ReportStyle;
  maxTokens: number;
  outFile?: string;
  recursive: boolean;
  include: string[];
  exclude: string[];
  model?: string;
  quiet: boolean;
  interactive: boolean;
}

export type CliCommand = AnalyzeOptions | { command: 'help' } | { command: 'version' };

export const USAGE = [
  'Usage: log-digest analyze <path> [options]',
  '',
  'Summarize a log file, or every matching file in a directory, with an LLM.',
  '',
  'Options:',
  '  --format <auto|json|text>   Log line format (default: auto)',
  '  --output <text|json>        Report style (default: text)',
  `  --max-tokens <n>            Estimated tokens per chunk (default: ${DEFAULT_MAX_TOKENS})`,
  '  --out-file <path>           Write the report to a file instead of stdout',
  '  -r, --recursive             Walk subdirectories when <path> is a directory',
  '  --include <glob>            Only read files matching the glob (repeatable)',
  '  --exclude <glob>            Skip files matching the glob (repeatable)',
  '  --model <name>              Model passed to the LLM provider',
  '  -q, --quiet                 Do not render progress',
  '  --interactive               Prompt for path, model and API keys',
  '  -v, --version               Show the version and exit',
  '  -h, --help                  Show this help and exit',
].join('\n');

const invalid = (message: string): LogDigestError => new LogDigestError('invalid-arguments', message);

const oneOf = <T extends string>(flag: string, value: string, allowed: readonly T[]): T => {
  const match = allowed.find((candidate) => candidate === value);
  if (!match) {
    throw invalid(`Invalid value for ${flag}: ${value} (expected one of ${allowed.join(', ')})`);
  }
  return match;
};

const parseInteger = (flag: string, value: string): number => {
  if (!/^-?\d+$/.test(value.trim())) {
    throw invalid(`Invalid value for ${flag}: ${value} (expected an integer)`);
  }
  return Number(value);
};

export const parseArgs = (argv: string[]): CliCommand => {
  const options: AnalyzeOptions = {
    command: 'analyze',
    inputPath: '',
    format: 'auto',
    output: 'text',
    maxTokens: DEFAULT_MAX_TOKENS,
    recursive: false,
    include: [],
    exclude: [],
    quiet: false,
    interactive: false,
  };
  let sawCommand = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const eq = token.startsWith('--') ? token.indexOf('=') : -1;
    const arg = eq === -1 ? token : token.slice(0, eq);
    const inline = eq === -1 ? undefined : token.slice(eq + 1);
    const next = (): string => {
      if (inline !== undefined) {
        return inline;
      }
      i += 1;
      if (i >= argv.length) {
        throw invalid(`Missing value for ${arg}`);
      }
      return argv[i];
    };

    switch (arg) {
      case '--help':
      case '-h':
        return { command: 'help' };
      case '--version':
      case '-v':
        return { command: 'version' };
      case '--format':
        options.format = oneOf(arg, next(), LOG_FORMATS);
        break;
      case '--output':
        options.output = oneOf(arg, next(), REPORT_STYLES);
        break;
      case '--max-tokens':
        options.maxTokens = parseInteger(arg, next());
        break;
      case '--out-file':
        options.outFile = resolve(next());
        break;
      case '--recursive':
      case '-r':
        options.recursive = true;
        break;
      case '--include':
        options.include.push(next());
        break;
      case '--exclude':
        options.exclude.push(next());
        break;
      case '--model':
        options.model = next();
        break;
      case '--quiet':
      case '-q':
        options.quiet = true;
        break;
      case '--interactive':
        options.interactive = true;
        break;
      default:
        if (arg !== '-' && arg.startsWith('-')) {
          throw invalid(`Unknown argument: ${arg}`);
        }
        if (!sawCommand) {
          if (arg !== 'analyze') {
            throw invalid(`Unknown command: ${arg}`);
          }
          sawCommand = true;
        } else if (!options.inputPath) {
          options.inputPath = arg;
        } else {
          throw invalid(`Unexpected argument: ${arg}`);
        }
    }
  }

  if (!sawCommand) {
    return { command: 'help' };
  }
  return options;
};

/**
 * Checks the input path once interactive answers have been applied.
 */
export const assertInputPath = (inputPath: string): void => {
  if (inputPath === '-') {
    throw invalid('Reading logs from standard input is not supported; pass a file or directory path.');
  }
  if (!inputPath) {
    throw invalid('Missing <path> argument.');
  }
};
