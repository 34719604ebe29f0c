import { createReadStream } from 'fs';
import * as fs from 'fs/promises';
import * as readline from 'readline';
import { MissingFileError } from '../common/Errors';

/**
 * Produces a fresh single-pass sequence of lines each time it is called.
 * Every counting pass calls the producer itself instead of sharing one
 * iterator.
 */
export type LineProducer = () => AsyncIterable<string>;

/**
 * Lines of a UTF-8 text file. Undecodable bytes come through as U+FFFD.
 */
export function fileLines(filePath: string): LineProducer {
  return () => readline.createInterface({
    input: createReadStream(filePath, { encoding: 'utf8' }),
    crlfDelay: Infinity,
  });
}

export async function ensureFileExists(filePath: string): Promise<void> {
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      throw new MissingFileError(filePath);
    }
  } catch (error) {
    if (error instanceof MissingFileError) {
      throw error;
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MissingFileError(filePath);
    }
    throw error;
  }
}
