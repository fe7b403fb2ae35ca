/**
 * Plain-text rendering of the player view for the terminal interface
 */

import { UI } from '../constants/config';
import type { Notice, PlayerView } from '../types';

const BLANK_MARKER = ' '.repeat(UI.CURRENT_MARKER.length);

export function formatPosition(positionMs: number): string {
  const totalSeconds = Math.floor(positionMs / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

export function formatStatusLine(view: PlayerView): string {
  return [
    `Shuffle: ${view.shuffleEnabled ? 'on' : 'off'}`,
    `Loop: ${view.loopEnabled ? 'on' : 'off'}`,
    `Volume: ${view.volume}`,
    `Zoom: ${Math.round(view.zoomLevel * 100)}%`,
  ].join(' | ');
}

export function formatView(view: PlayerView): string[] {
  const lines: string[] = [];
  if (view.role === 'reader') {
    lines.push('[read-only]');
  }

  if (view.folder === null) {
    lines.push('No folder open');
    lines.push(formatStatusLine(view));
    return lines;
  }

  lines.push(`Folder: ${view.folder}`);
  if (view.folderMissing) {
    lines.push('(folder not found)');
  }
  lines.push(formatStatusLine(view));
  if (view.filter !== null) {
    lines.push(`Filter: "${view.filter}" (${view.entries.length} of ${view.trackCount})`);
  }

  if (view.currentTrack !== null) {
    lines.push(`Current: ${view.currentTrack} @ ${formatPosition(view.playbackPositionMs)}`);
  }

  if (view.entries.length === 0) {
    if (view.folderMissing) {
      return lines;
    }
    lines.push(view.trackCount > 0 ? '(no matching tracks)' : '(no playable files)');
    return lines;
  }

  // Filtered lists keep full-list numbers, so pad to the whole folder
  const width = String(view.trackCount).length;
  for (const entry of view.entries) {
    const marker = entry.current ? UI.CURRENT_MARKER : BLANK_MARKER;
    const number = String(entry.displayPosition + 1).padStart(width, ' ');
    lines.push(`${marker}${number}. ${entry.fileName}`);
  }
  return lines;
}

export function formatRecentFolders(recentFolders: readonly string[]): string[] {
  if (recentFolders.length === 0) {
    return ['No recent folders'];
  }
  return recentFolders.map((folder, index) => `${index + 1}. ${folder}`);
}

export function formatNotice(notice: Notice): string {
  return `[${notice.level}] ${notice.message}`;
}
