import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

/**
 * Ensures that the given directory path exists on disk.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Reads a JSON file and returns its parsed value (or undefined if missing or invalid).
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed = safeJsonParse<unknown>(content, undefined, {
      log,
      label: 'json parse failed',
      context: { filePath },
    });
    if (parsed === undefined) {
      log.warn('failed to read json', { filePath, error: 'invalid json' });
    }
    return parsed;
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      const message = error instanceof Error ? error.message : String(error);
      log.warn('failed to read json', { filePath, error: message });
    }
    return undefined;
  }
}

/**
 * Serializes an object to JSON and writes it to disk (pretty printed).
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}
