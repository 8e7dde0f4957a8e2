/**
 * Atomic JSON persistence
 *
 * Artifacts are written to a temp file beside the target and renamed into
 * place, so a reader never observes a half-written document.
 */

import { mkdir, readFile, rename, rm, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { ZodType, ZodTypeDef } from 'zod';

export type JsonReadResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'missing' }
  | { ok: false; reason: 'corrupt'; detail: string };

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Write `value` as pretty-printed JSON via temp file + rename
 */
export async function writeJsonAtomic(filePath: string, value: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf-8');
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Read and validate a JSON artifact. Missing files and documents that fail
 * to parse or validate are reported, never thrown.
 */
export async function readJsonFile<T>(
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<JsonReadResult<T>> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return { ok: false, reason: 'missing' };
    }
    return { ok: false, reason: 'corrupt', detail: error instanceof Error ? error.message : String(error) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return { ok: false, reason: 'corrupt', detail: error instanceof Error ? error.message : String(error) };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const detail = result.error.errors
      .map((err) => `${err.path.join('.') || 'root'}: ${err.message}`)
      .join('; ');
    return { ok: false, reason: 'corrupt', detail };
  }

  return { ok: true, value: result.data };
}

/**
 * Delete a file; false when it did not exist
 */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}
