import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { ReadError } from './errors.js';

/**
 * MD5 hex digest, shared by the archive indexer and the directory scanner
 */
export function hashContent(data: Uint8Array): string {
  return createHash('md5').update(data).digest('hex');
}

export async function hashFile(path: string): Promise<string> {
  let data: Buffer;
  try {
    data = await readFile(path);
  } catch (error) {
    throw new ReadError(`Unable to read '${path}'`, path, error);
  }
  return hashContent(data);
}
