/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as fsp from 'node:fs/promises';
import * as dotenv from 'dotenv';

export type EnvWriteOutcome =
  | 'updated'
  | 'appended'
  | 'created-from-template'
  | 'created';

export interface PersistEnvValueOptions {
  envFile: string;
  templateFile: string;
  key: string;
  value: string;
}

export interface UpsertResult {
  content: string;
  replaced: boolean;
}

async function readOptionalFile(filePath: string): Promise<string | undefined> {
  try {
    return await fsp.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

interface WriteTarget {
  path: string;
  /** Permission bits of the file being replaced. */
  mode?: number;
}

/**
 * Follows symlinks to the file that is actually written and keeps its
 * permission bits. A missing file (or dangling link) is written as given.
 */
async function resolveWriteTarget(filePath: string): Promise<WriteTarget> {
  try {
    const realPath = await fsp.realpath(filePath);
    const stats = await fsp.stat(realPath);
    return { path: realPath, mode: stats.mode & 0o777 };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return { path: filePath };
    }
    throw error;
  }
}

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const target = await resolveWriteTarget(filePath);
  const tmpPath = `${target.path}.tmp`;
  await fsp.writeFile(tmpPath, content, 'utf8');
  if (target.mode !== undefined) {
    await fsp.chmod(tmpPath, target.mode);
  }
  await fsp.rename(tmpPath, target.path);
}

/**
 * Reads one key from an environment file. A missing file, a missing key and
 * an empty value all read as undefined.
 */
export async function readEnvValue(
  envFile: string,
  key: string,
): Promise<string | undefined> {
  const content = await readOptionalFile(envFile);
  if (content === undefined) {
    return undefined;
  }
  const value = dotenv.parse(content)[key]?.trim();
  return value ? value : undefined;
}

/**
 * Replaces every `KEY=` line with `KEY=value`, or appends one when the key
 * is absent. All other lines, their order and their line endings are kept.
 */
export function upsertEnvValue(
  content: string,
  key: string,
  value: string,
): UpsertResult {
  const prefix = `${key}=`;
  let replaced = false;

  const lines = content.split('\n').map((line) => {
    if (!line.startsWith(prefix)) {
      return line;
    }
    replaced = true;
    const carriageReturn = line.endsWith('\r') ? '\r' : '';
    return `${prefix}${value}${carriageReturn}`;
  });

  if (replaced) {
    return { content: lines.join('\n'), replaced };
  }

  const base =
    content.length === 0 || content.endsWith('\n') ? content : `${content}\n`;
  return { content: `${base}${prefix}${value}\n`, replaced };
}

/**
 * Writes `key=value` into the environment file. An existing file is edited
 * in place; otherwise the template is copied first when present; otherwise
 * a new file holding only that line is created.
 */
export async function persistEnvValue(
  options: PersistEnvValueOptions,
): Promise<EnvWriteOutcome> {
  const { envFile, templateFile, key, value } = options;

  const existing = await readOptionalFile(envFile);
  if (existing !== undefined) {
    const result = upsertEnvValue(existing, key, value);
    await writeFileAtomic(envFile, result.content);
    return result.replaced ? 'updated' : 'appended';
  }

  const template = await readOptionalFile(templateFile);
  if (template !== undefined) {
    await writeFileAtomic(envFile, upsertEnvValue(template, key, value).content);
    return 'created-from-template';
  }

  await writeFileAtomic(envFile, `${key}=${value}\n`);
  return 'created';
}
