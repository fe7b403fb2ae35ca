import { STATE } from '../constants/config';
import type { AppState, PlaylistState } from '../types';

/**
 * On-disk shape of a playlist. Absent or null shuffle_order means straight
 * mode.
 */
export interface PersistedPlaylist {
  current_index: number;
  shuffle_order: number[] | null;
  loop_enabled: boolean;
  playback_position_ms: number;
}

export interface PersistedState {
  recent_folders: string[];
  playlists: Record<string, PersistedPlaylist>;
  volume: number;
  zoom_level: number;
}

function buildPersistedPlaylist(playlist: PlaylistState): PersistedPlaylist {
  return {
    current_index: playlist.currentIndex,
    shuffle_order: playlist.shuffleOrder ? [...playlist.shuffleOrder] : null,
    loop_enabled: playlist.loopEnabled,
    playback_position_ms: playlist.playbackPositionMs,
  };
}

export function buildPersistedState(state: AppState): PersistedState {
  const playlists: Record<string, PersistedPlaylist> = {};
  for (const [folderPath, playlist] of Object.entries(state.playlists)) {
    playlists[folderPath] = buildPersistedPlaylist(playlist);
  }
  return {
    recent_folders: [...state.recentFolders],
    playlists,
    volume: state.volume,
    zoom_level: state.zoomLevel,
  };
}

export function serializeState(state: AppState): string {
  return `${JSON.stringify(buildPersistedState(state), null, STATE.INDENT)}\n`;
}
