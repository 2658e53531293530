import * as fs from 'fs/promises';
import { errorMessage } from '@/lib/errors';
import { getLogger } from '@/lib/logger';

/**
 * Delete machine files, collecting failures as messages. Missing files are fine.
 */
export async function removeFiles(files: string[]): Promise<string[]> {
  const logger = getLogger('machine');
  const messages: string[] = [];
  for (const file of files) {
    try {
      await fs.rm(file, { force: true, recursive: true });
    } catch (error) {
      logger.warn({ file, err: error }, 'Failed to remove machine file');
      messages.push(`could not remove ${file}: ${errorMessage(error)}`);
    }
  }
  return messages;
}
