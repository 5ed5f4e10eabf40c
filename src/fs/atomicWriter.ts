import { writeFile, mkdir, rename, unlink } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { IOError } from '../core/errors.js';
import { logger } from '../util/logger.js';

export interface AtomicWriteOptions {
  encoding?: BufferEncoding;
  ensureDir?: boolean;
}

/**
 * Writes `content` to a temporary file beside `filePath` and renames it into
 * place, so the destination holds either the old file or the complete new one.
 *
 * @throws {IOError} when the directory, the temporary file or the rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { encoding = 'utf8', ensureDir = true } = options;
  const tempPath = generateTempPath(filePath);

  try {
    if (ensureDir) {
      await mkdir(dirname(filePath), { recursive: true });
    }

    await writeFile(tempPath, content, { encoding });
    await rename(tempPath, filePath);

    logger.debug('Atomic write completed', {
      path: filePath,
      size: content.length,
      tempPath
    });
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      // ENOENT: the temporary file was never created
      if (!(cleanupError instanceof Error && 'code' in cleanupError && cleanupError.code === 'ENOENT')) {
        logger.warn('Failed to cleanup temp file', {
          tempPath,
          error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError)
        });
      }
    }

    throw new IOError(filePath, 'write', error);
  }
}

function generateTempPath(filePath: string): string {
  const randomSuffix = randomBytes(8).toString('hex');
  return join(dirname(filePath), `.${basename(filePath)}.tmp-${randomSuffix}`);
}
