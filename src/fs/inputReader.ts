import { readFile } from 'fs/promises';
import { IOError } from '../core/errors.js';
import { logger } from '../util/logger.js';

/**
 * Reads the exported HTML document as UTF-8 text.
 *
 * @throws {IOError} when the file is missing or unreadable
 */
export async function readInputFile(filePath: string): Promise<string> {
  try {
    const content = await readFile(filePath, 'utf8');
    logger.debug('Read input file', { path: filePath, size: content.length });
    return content;
  } catch (error) {
    throw new IOError(filePath, 'read', error);
  }
}
