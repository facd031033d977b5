import fs from 'node:fs/promises';
import path from 'node:path';
import { CACHE_RELATIVE_PATH } from './constants.js';
import { type LoadResult } from './types.js';

const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

const errorCode = (err: unknown): string | undefined => {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const cachePath = (cwd: string): string => path.join(cwd, CACHE_RELATIVE_PATH);

export async function loadCache(cwd: string): Promise<LoadResult> {
  const file = cachePath(cwd);

  try {
    await fs.stat(file);
  } catch (err) {
    const code = errorCode(err);
    if (code && MISSING_CODES.has(code)) {
      return { kind: 'missing' };
    }
    return { kind: 'read-error', message: errorMessage(err) };
  }

  try {
    const text = await fs.readFile(file, 'utf8');
    return { kind: 'loaded', text };
  } catch (err) {
    return { kind: 'read-error', message: errorMessage(err) };
  }
}
