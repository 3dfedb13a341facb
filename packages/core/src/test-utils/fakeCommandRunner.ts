/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CommandResult,
  CommandRunner,
} from '../gcloud/commandRunner.js';

export interface RecordedCommand {
  executable: string;
  args: string[];
}

type Response = Partial<CommandResult> | (() => Promise<CommandResult>);

/**
 * In-process stand-in for gcloud. Responses are keyed by the argument
 * prefix they answer, e.g. `'projects create'`; the longest matching
 * prefix wins. Unmatched commands succeed with empty output.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];
  private readonly responses = new Map<string, Response>();

  respond(prefix: string, response: Response): this {
    this.responses.set(prefix, response);
    return this;
  }

  async run(executable: string, args: readonly string[]): Promise<CommandResult> {
    this.calls.push({ executable, args: [...args] });
    const commandLine = args.join(' ');

    let match: Response | undefined;
    let matchLength = -1;
    for (const [prefix, response] of this.responses) {
      if (
        (commandLine === prefix || commandLine.startsWith(`${prefix} `)) &&
        prefix.length > matchLength
      ) {
        match = response;
        matchLength = prefix.length;
      }
    }

    if (typeof match === 'function') {
      return match();
    }
    return {
      exitCode: match?.exitCode ?? 0,
      stdout: match?.stdout ?? '',
      stderr: match?.stderr ?? '',
    };
  }

  /** Argument lines of every call that starts with `prefix`. */
  callsTo(prefix: string): string[] {
    return this.calls
      .map((call) => call.args.join(' '))
      .filter((line) => line === prefix || line.startsWith(`${prefix} `));
  }
}
