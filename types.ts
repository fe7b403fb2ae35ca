export interface PlaylistState {
  /** Index into the display order */
  currentIndex: number;
  /** Permutation of natural indices; null means straight mode */
  shuffleOrder: number[] | null;
  loopEnabled: boolean;
  playbackPositionMs: number;
}

export interface AppState {
  recentFolders: string[]; // most recent first
  playlists: Record<string, PlaylistState>;
  volume: number; // 0-100
  zoomLevel: number; // 0.5-2.0
}

export type InstanceRole = 'writer' | 'reader';

export type ReshufflePolicy = 'keep-current' | 'restart';

export type AppEvent =
  | { type: 'folder.open'; path: string }
  | { type: 'track.changed'; index: number }
  | { type: 'track.next' }
  | { type: 'track.previous' }
  | { type: 'track.ended' }
  | { type: 'position.updated'; positionMs: number }
  | { type: 'position.seek'; offsetMs: number }
  | { type: 'track.restart' }
  | { type: 'shuffle.toggle'; enabled: boolean }
  | { type: 'shuffle.reshuffle' }
  | { type: 'loop.toggle' }
  | { type: 'volume.set'; volume: number }
  | { type: 'volume.step'; delta: number }
  | { type: 'playlist.filter'; query: string | null }
  | { type: 'zoom.in' }
  | { type: 'zoom.out' }
  | { type: 'zoom.reset' };

export type NoticeCode =
  | 'read-only'
  | 'state-reset'
  | 'save-failed'
  | 'folder-missing'
  | 'end-of-playlist'
  | 'invalid-event';

export interface Notice {
  level: 'info' | 'warning';
  code: NoticeCode;
  message: string;
}

export interface PlaylistViewEntry {
  displayPosition: number;
  fileName: string;
  current: boolean;
}

export interface PlayerView {
  role: InstanceRole;
  folder: string | null;
  folderMissing: boolean;
  /** Entries matching the filter, in display order */
  entries: PlaylistViewEntry[];
  /** Number of tracks in the folder, filtered or not */
  trackCount: number;
  filter: string | null;
  currentTrack: string | null;
  shuffleEnabled: boolean;
  loopEnabled: boolean;
  playbackPositionMs: number;
  volume: number;
  zoomLevel: number;
  recentFolders: string[];
}

/**
 * Boundary of the media backend. Implementations report the end of a track
 * through the listeners registered with onEnd.
 */
export interface PlaybackEngine {
  play(filePath: string, startPositionMs: number): void;
  load(filePath: string, startPositionMs: number): void;
  pause(): void;
  resume(): void;
  stop(): void;
  seek(positionMs: number): void;
  setVolume(volume: number): void;
  getPositionMs(): number;
  onEnd(listener: () => void): () => void;
}
