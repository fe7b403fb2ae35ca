import fs from 'fs';
import path from 'path';
import { FORMATS } from '../constants/config';
import { Errors, FolderNotFoundError } from '../utils/errorHandler';
import { naturalSort } from '../utils/naturalSort';
import { logger } from './logger';

const scanLogger = logger.withScope('FolderScanner');

const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set<string>([
  ...FORMATS.AUDIO_EXTENSIONS,
  ...FORMATS.VIDEO_EXTENSIONS,
]);

export function isMediaFile(fileName: string): boolean {
  return MEDIA_EXTENSIONS.has(path.extname(fileName).toLowerCase());
}

async function isRegularFile(folderPath: string, entry: fs.Dirent): Promise<boolean> {
  if (entry.isFile()) {
    return true;
  }
  if (!entry.isSymbolicLink()) {
    return false;
  }
  try {
    const stats = await fs.promises.stat(path.join(folderPath, entry.name));
    return stats.isFile();
  } catch (error) {
    scanLogger.debug('Skipping dangling link:', entry.name, error);
    return false;
  }
}

/**
 * List the playable files directly inside a folder, in natural order.
 * Returns file names relative to the folder.
 *
 * @throws FolderNotFoundError when the folder is missing, is not a
 * directory, or cannot be read
 */
export async function scanFolder(folderPath: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    const stats = await fs.promises.stat(folderPath);
    if (!stats.isDirectory()) {
      throw Errors.folderNotFound(folderPath);
    }
    entries = await fs.promises.readdir(folderPath, { withFileTypes: true });
  } catch (error) {
    if (error instanceof FolderNotFoundError) {
      throw error;
    }
    throw Errors.folderNotFound(folderPath, error instanceof Error ? error : undefined);
  }

  const names: string[] = [];
  for (const entry of entries) {
    if (isMediaFile(entry.name) && await isRegularFile(folderPath, entry)) {
      names.push(entry.name);
    }
  }

  scanLogger.debug(`Found ${names.length} media files in`, folderPath);
  return naturalSort(names);
}
