/**
 * Disable/enable via a marker file in the data directory, and uninstall
 * (removal of the whole data directory).
 */

import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { IOError, readJsonDocument, writeJsonDocument } from '@tinytask/core';

export const DISABLED_MARKER = '.disabled';

const DisabledInfoSchema = z.object({
  disabled_at: z.string(),
  reason: z.string(),
});

export type DisabledInfo = z.output<typeof DisabledInfoSchema>;

export function getMarkerPath(dataDir: string): string {
  return join(dataDir, DISABLED_MARKER);
}

export function isDisabled(dataDir: string): boolean {
  return existsSync(getMarkerPath(dataDir));
}

export function readDisabledInfo(dataDir: string): DisabledInfo | null {
  return readJsonDocument(getMarkerPath(dataDir), DisabledInfoSchema);
}

export function disable(dataDir: string, reason?: string, now: Date = new Date()): DisabledInfo {
  const info: DisabledInfo = {
    disabled_at: now.toISOString(),
    reason: reason?.trim() || 'manually disabled',
  };
  writeJsonDocument(getMarkerPath(dataDir), info);
  return info;
}

/** Returns false when tinytask was not disabled */
export function enable(dataDir: string): boolean {
  const marker = getMarkerPath(dataDir);
  if (!existsSync(marker)) return false;
  try {
    rmSync(marker);
  } catch (err: unknown) {
    throw new IOError(marker, 'remove', err);
  }
  return true;
}

/** Delete the data directory. Returns false when it did not exist. */
export function uninstall(dataDir: string): boolean {
  if (!existsSync(dataDir)) return false;
  try {
    rmSync(dataDir, { recursive: true, force: true });
  } catch (err: unknown) {
    throw new IOError(dataDir, 'remove', err);
  }
  return true;
}
