/**
 * Application-wide constants
 *
 * Fixed values for persistence, playlist limits and the media allow-list.
 * Runtime overrides (state directory, log level, policies) are resolved by
 * services/settingsManager.
 */

/**
 * State file configuration
 */
export const STATE = {
  /** Name of the persisted state document */
  FILE_NAME: 'state.json',

  /** Name of the advisory lock resource, next to the state file */
  LOCK_NAME: 'state.lock',

  /** Default directory name under the user's config directory */
  DIR_NAME: 'folder-player',

  /** JSON indentation of the state document */
  INDENT: 2,
} as const;

/**
 * Playlist and recent folder limits
 */
export const PLAYLIST = {
  /** Maximum number of remembered recent folders */
  MAX_RECENT_FOLDERS: 10,
} as const;

/**
 * Autosave configuration
 */
export const AUTOSAVE = {
  /** Periodic save interval in milliseconds */
  INTERVAL_MS: 5000,
} as const;

/**
 * Playback configuration
 */
export const PLAYBACK = {
  /** How often the playing position is copied into the playlist state */
  POSITION_POLL_MS: 1000,

  /** Default jump for a relative seek */
  SEEK_STEP_MS: 5000,
} as const;

/**
 * Volume and zoom limits
 */
export const UI = {
  DEFAULT_VOLUME: 80,
  MIN_VOLUME: 0,
  MAX_VOLUME: 100,

  /** Default change for a relative volume step */
  VOLUME_STEP: 5,

  DEFAULT_ZOOM: 1.0,
  MIN_ZOOM: 0.5,
  MAX_ZOOM: 2.0,

  /** Zoom change per zoom in/out step */
  ZOOM_STEP: 0.1,

  /** Marker printed in front of the current track */
  CURRENT_MARKER: '>> ',
} as const;

/**
 * File format constants
 */
export const FORMATS = {
  /** Supported audio file extensions */
  AUDIO_EXTENSIONS: ['.mp3', '.wav', '.flac', '.aac', '.ogg', '.wma', '.m4a', '.opus', '.aiff'],

  /** Supported video file extensions */
  VIDEO_EXTENSIONS: ['.mp4', '.mkv', '.avi', '.mov', '.wmv', '.flv', '.webm', '.m4v', '.mpeg', '.mpg'],
} as const;

/**
 * Application metadata
 */
export const APP = {
  /** Application name */
  NAME: 'folder-player',

  /** Application version */
  VERSION: '1.0.0',
} as const;
