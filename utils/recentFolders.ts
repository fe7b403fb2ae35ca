import { PLAYLIST } from '../constants/config';

/**
 * Move folderPath to the front of the list. Entries past the bound are
 * evicted oldest first; their playlist states are left alone.
 */
export function addRecentFolder(
  recentFolders: readonly string[],
  folderPath: string,
  maxEntries: number = PLAYLIST.MAX_RECENT_FOLDERS
): string[] {
  return [folderPath, ...recentFolders.filter(entry => entry !== folderPath)].slice(0, maxEntries);
}

/**
 * Drop duplicates (keeping the most recent occurrence) and trim to the bound
 */
export function normalizeRecentFolders(
  recentFolders: readonly string[],
  maxEntries: number = PLAYLIST.MAX_RECENT_FOLDERS
): string[] {
  return [...new Set(recentFolders)].slice(0, maxEntries);
}
