/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import React, { useEffect, useState } from 'react';
import { Box, Text, useApp } from 'ink';
import type { LogDigestOptions, LogDigestResult } from '../runner/index.js';
import { runLogDigest } from '../runner/index.js';
import type { PipelineObserver } from '../types/index.js';
import { formatErrorMessage } from '../core/errors.js';

interface Progress {
  files: number;
  entries: number;
  analyzed: number;
  chunks: number;
}

interface AppState {
  progress: Progress;
  lastEvent: string;
}

const initialState: AppState = {
  progress: { files: 0, entries: 0, analyzed: 0, chunks: 0 },
  lastEvent: 'Initializing...',
};

export type RunDigest = (options: LogDigestOptions) => Promise<LogDigestResult>;

export interface DigestAppProps {
  options: Omit<LogDigestOptions, 'observer'>;
  onResult: (result: LogDigestResult) => void;
  run?: RunDigest;
}

export const DigestApp: React.FC<DigestAppProps> = ({ options, onResult, run = runLogDigest }) => {
  const [state, setState] = useState<AppState>(initialState);
  const [result, setResult] = useState<LogDigestResult | undefined>();
  const [error, setError] = useState<unknown>();
  const { exit } = useApp();

  useEffect(() => {
    let cancelled = false;

    const observer: PipelineObserver = {
      onFilesResolved: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, files: info.files.length },
        }));
      },

      onEntriesParsed: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, entries: info.entries },
        }));
      },

      onChunksPlanned: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, chunks: info.chunks },
        }));
      },

      onChunkAnalyzed: (info) => {
        if (cancelled) return;
        setState((prev) => ({
          ...prev,
          progress: { ...prev.progress, analyzed: info.current, chunks: info.total },
        }));
      },

      onStage: (event) => {
        if (cancelled) return;
        setState((prev) => ({ ...prev, lastEvent: `[${event.stage}] ${event.message}` }));
      },
    };

    run({ ...options, observer })
      .then((res) => {
        if (cancelled) return;
        onResult(res);
        setResult(res);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        setError(err ?? new Error('Unknown failure'));
      });

    return () => {
      cancelled = true;
    };
  }, [options, onResult, run]);

  useEffect(() => {
    if (result || error !== undefined) {
      const failure = error === undefined ? undefined : error instanceof Error ? error : new Error(String(error));
      const timer = setTimeout(() => exit(failure), 50);
      return () => clearTimeout(timer);
    }
    return undefined;
  }, [result, error, exit]);

  const percent = calculateProgress(state.progress);

  return (
    <Box flexDirection="column">
      <Box borderStyle="round" borderColor="cyan" paddingX={1}>
        <Text bold color="cyanBright">
          LOG DIGEST
        </Text>
      </Box>

      <Box borderStyle="single" borderColor="gray" flexDirection="column" paddingX={1}>
        <Box>
          <Text dimColor>Files: </Text>
          <Text>{state.progress.files}</Text>
          <Text dimColor> | Entries: </Text>
          <Text>{state.progress.entries}</Text>
          <Text dimColor> | Chunks: </Text>
          <Text color="cyan">
            {state.progress.analyzed}/{state.progress.chunks || '?'}
          </Text>
        </Box>
        <Box>
          <Text dimColor>Progress: </Text>
          <Text color="greenBright">{renderBar(percent, 30)}</Text>
          <Text> {percent}%</Text>
        </Box>
      </Box>

      <Box borderStyle="single" borderColor="magenta" paddingX={1}>
        <Text bold color="magenta">
          Activity:{' '}
        </Text>
        <Text>{state.lastEvent}</Text>
      </Box>

      {result && (
        <Text color="greenBright">
          ✓ Analyzed {result.entryCount} entries from {result.files.length} file(s) in {result.chunkCount} chunk(s)
        </Text>
      )}

      {error !== undefined && <Text color="redBright">ERROR: {formatErrorMessage(error)}</Text>}
    </Box>
  );
};

export function calculateProgress(progress: Progress): number {
  if (progress.chunks === 0) return 0;
  return Math.round((progress.analyzed / progress.chunks) * 100);
}

export function renderBar(percent: number, width: number): string {
  const filled = Math.round((percent / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}
