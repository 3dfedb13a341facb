/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs an executable to completion. Implementations resolve with the exit
 * code of the process and reject only when it could not be started.
 */
export interface CommandRunner {
  run(executable: string, args: readonly string[]): Promise<CommandResult>;
}

export class ExecutableNotFoundError extends Error {
  constructor(readonly executable: string) {
    super(`Executable not found: ${executable}`);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Spawns the command without a shell, so arguments are passed through
 * verbatim. stdin is closed; gcloud must never wait on a prompt here.
 */
export class SpawnCommandRunner implements CommandRunner {
  run(executable: string, args: readonly string[]): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(executable, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        if (isErrnoException(error) && error.code === 'ENOENT') {
          reject(new ExecutableNotFoundError(executable));
          return;
        }
        reject(error);
      });

      child.on('close', (code) => {
        resolve({ exitCode: code, stdout, stderr });
      });
    });
  }
}
