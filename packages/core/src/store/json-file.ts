/**
 * JSON document I/O. Reads validate against a zod schema; writes go through a
 * temp file in the same directory followed by a rename, so a crash mid-write
 * leaves the previous version in place.
 */

import { closeSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { CorruptDataError, IOError } from '../errors.js';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** "[2].priority: Invalid enum value ..." for the first issue */
export function describeIssues(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unexpected structure';
  const path = issue.path
    .map(p => (typeof p === 'number' ? `[${p}]` : `.${p}`))
    .join('')
    .replace(/^\./, '');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Read and validate a JSON document.
 * Returns null when the file does not exist; any other failure is a CorruptDataError.
 */
export function readJsonDocument<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> | null {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return null;
    throw new CorruptDataError(filePath, 'file is not readable', err);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err: unknown) {
    throw new CorruptDataError(filePath, 'file is not valid JSON', err);
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new CorruptDataError(filePath, describeIssues(parsed.error), parsed.error);
  }
  return parsed.data;
}

/** Write-temp, fsync, rename. The temp file is removed if anything fails. */
export function writeFileAtomic(filePath: string, content: string): void {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    const fd = openSync(tmpPath, 'w');
    try {
      writeFileSync(fd, content, 'utf8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tmpPath, filePath);
  } catch (err: unknown) {
    rmSync(tmpPath, { force: true });
    throw new IOError(filePath, 'write', err);
  }
}

/** Pretty-printed with a trailing newline */
export function writeJsonDocument(filePath: string, data: unknown): void {
  writeFileAtomic(filePath, JSON.stringify(data, null, 2) + '\n');
}
