/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useCallback, useEffect, useRef, useState } from 'react';
import {
  SetupCancelledError,
  type ProjectIdPrompter,
  type SetupEvent,
} from '@workshop-setup/core';
import type { LogEntry, SetupPhase, SetupRunner } from '../types.js';

interface PendingPrompt {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

function toLogEntry(event: SetupEvent, id: number): LogEntry {
  switch (event.type) {
    case 'step':
      return { id, type: 'step', title: event.title };
    case 'trial-accounts':
      return {
        id,
        type: 'trial-accounts',
        candidates: event.candidates,
        selected: event.selected,
      };
    default:
      return { id, type: event.type, message: event.message };
  }
}

/**
 * Starts the setup flow once and exposes its log and phase to the UI.
 * When `externalPrompt` is given the project id is read through it
 * instead of the interactive prompt.
 */
export const useProjectSetup = (
  runSetup: SetupRunner,
  externalPrompt?: ProjectIdPrompter,
) => {
  const [entries, setEntries] = useState<LogEntry[]>([]);
  const [phase, setPhase] = useState<SetupPhase>({ kind: 'running' });
  const pendingPrompt = useRef<PendingPrompt | null>(null);
  const started = useRef(false);

  useEffect(() => {
    if (started.current) {
      return;
    }
    started.current = true;

    const onEvent = (event: SetupEvent) => {
      setEntries((prev) => [...prev, toLogEntry(event, prev.length)]);
    };

    const promptProjectId: ProjectIdPrompter = externalPrompt
      ? (suggestedId) => {
          onEvent({ type: 'info', message: `Suggested project ID: ${suggestedId}` });
          onEvent({
            type: 'info',
            message: 'Enter project ID on stdin (an empty line takes the suggestion):',
          });
          return externalPrompt(suggestedId);
        }
      : (suggestedId) =>
          new Promise<string>((resolve, reject) => {
            pendingPrompt.current = { resolve, reject };
            setPhase({ kind: 'prompt', suggestedId });
          });

    void runSetup({ promptProjectId, onEvent }).then(
      (result) => setPhase({ kind: 'done', result }),
      (error: unknown) => setPhase({ kind: 'failed', error }),
    );
  }, [runSetup, externalPrompt]);

  const settlePrompt = useCallback((settle: (pending: PendingPrompt) => void) => {
    const pending = pendingPrompt.current;
    if (!pending) {
      return;
    }
    pendingPrompt.current = null;
    setPhase({ kind: 'running' });
    settle(pending);
  }, []);

  const submitProjectId = useCallback(
    (answer: string) => settlePrompt((pending) => pending.resolve(answer)),
    [settlePrompt],
  );

  const cancelPrompt = useCallback(
    () => settlePrompt((pending) => pending.reject(new SetupCancelledError())),
    [settlePrompt],
  );

  const currentStep = [...entries]
    .reverse()
    .find((entry): entry is Extract<LogEntry, { type: 'step' }> => entry.type === 'step');

  return {
    entries,
    phase,
    currentStep: currentStep?.title,
    submitProjectId,
    cancelPrompt,
  };
};
