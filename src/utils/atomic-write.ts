import { promises as fs } from 'fs';
import * as path from 'path';
import { logger } from '../logger';

export interface FileWrite {
  path: string;
  content: string;
}

/**
 * Write files through temporary siblings and renames, so a reader never sees half a
 * document. Every temporary file is written before the first rename, and a failed write
 * leaves all the targets as they were.
 */
export async function writeFilesAtomic(files: FileWrite[]): Promise<void> {
  for (const file of files) {
    await fs.mkdir(path.dirname(file.path), { recursive: true });
  }

  const staged = files.map(file => ({ ...file, tempPath: tempPathOf(file.path) }));
  try {
    for (const file of staged) {
      await fs.writeFile(file.tempPath, file.content, 'utf8');
    }
    for (const file of staged) {
      await fs.rename(file.tempPath, file.path);
    }
  } catch (err) {
    for (const { tempPath } of staged) {
      await fs.rm(tempPath, { force: true }).catch(cleanupErr => {
        logger.debug(
          `Failed to remove ${tempPath}: ${cleanupErr instanceof Error ? cleanupErr.message : String(cleanupErr)}`
        );
      });
    }
    throw err;
  }
}

function tempPathOf(filePath: string): string {
  return path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.tmp`);
}
