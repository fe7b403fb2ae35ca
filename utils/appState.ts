/**
 * AppState aggregate helpers
 */

import { UI } from '../constants/config';
import type { AppState, PlaylistState } from '../types';
import { createPlaylistState } from './playlistOrder';

export function createDefaultAppState(): AppState {
  return {
    recentFolders: [],
    playlists: {},
    volume: UI.DEFAULT_VOLUME,
    zoomLevel: UI.DEFAULT_ZOOM,
  };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Get the playlist state of a folder, creating it on first use
 */
export function getOrCreatePlaylist(
  state: AppState,
  folderPath: string
): { playlist: PlaylistState; created: boolean } {
  const existing = state.playlists[folderPath];
  if (existing) {
    return { playlist: existing, created: false };
  }
  const playlist = createPlaylistState();
  state.playlists[folderPath] = playlist;
  return { playlist, created: true };
}

export function setVolume(state: AppState, volume: number): number {
  state.volume = Math.round(clamp(volume, UI.MIN_VOLUME, UI.MAX_VOLUME));
  return state.volume;
}

/** Relative change, clamped like setVolume */
export function stepVolume(state: AppState, delta: number): number {
  return setVolume(state, state.volume + delta);
}

// Tenths only, so repeated steps do not accumulate float drift
function roundZoom(value: number): number {
  return Math.round(value * 10) / 10;
}

export function setZoom(state: AppState, zoomLevel: number): number {
  state.zoomLevel = roundZoom(clamp(zoomLevel, UI.MIN_ZOOM, UI.MAX_ZOOM));
  return state.zoomLevel;
}

export function zoomIn(state: AppState): number {
  return setZoom(state, state.zoomLevel + UI.ZOOM_STEP);
}

export function zoomOut(state: AppState): number {
  return setZoom(state, state.zoomLevel - UI.ZOOM_STEP);
}

export function resetZoom(state: AppState): number {
  return setZoom(state, UI.DEFAULT_ZOOM);
}
