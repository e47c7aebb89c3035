import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { PersistenceError, errMsg } from '../../lib/errors';

/**
 * Read and validate a JSON document. A missing file yields `empty()`; a file
 * that exists but cannot be parsed or validated throws, so a later save never
 * clobbers data we failed to read.
 */
export function readJsonDocument<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  empty: () => T
): T {
  if (!fs.existsSync(filePath)) {
    return empty();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new PersistenceError(filePath, `Could not read JSON: ${errMsg(error)}`, { cause: error });
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unknown issue';
    throw new PersistenceError(filePath, `Invalid document (${where})`);
  }
  return result.data;
}

/**
 * Write a JSON document (2-space indent, trailing newline), creating parent
 * directories. Writes to a temp file first and renames over the target.
 */
export function writeJsonDocument(filePath: string, data: unknown): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = `${filePath}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (error) {
    throw new PersistenceError(filePath, `Could not write JSON: ${errMsg(error)}`, { cause: error });
  }
}
