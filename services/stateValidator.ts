/**
 * State Validator Service
 * Turns a parsed state document into an AppState.
 *
 * Structural violations (wrong JSON types) reject the document with a
 * ValidationError. Out-of-range values are clamped, missing fields take
 * their defaults, and a shuffle order that is not a permutation is dropped
 * for that folder only.
 */

import { UI } from '../constants/config';
import type { AppState, PlaylistState } from '../types';
import { clamp, createDefaultAppState } from '../utils/appState';
import { Errors } from '../utils/errorHandler';
import { isValidPermutation } from '../utils/playlistOrder';
import { normalizeRecentFolders } from '../utils/recentFolders';
import { logger } from './logger';

const validatorLogger = logger.withScope('StateValidator');

// ========== Error Reporting ==========

export class ValidationError extends Error {
  constructor(message: string, public readonly field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ========== Field Readers ==========

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(obj: JsonObject, key: string, field: string, fallback: number): number {
  const value = obj[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number`, field);
  }
  return value;
}

function readInteger(obj: JsonObject, key: string, field: string, fallback: number): number {
  const value = readNumber(obj, key, field, fallback);
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, field);
  }
  return value;
}

function readBoolean(obj: JsonObject, key: string, field: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`, field);
  }
  return value;
}

function readShuffleOrder(obj: JsonObject, field: string): number[] | null {
  const value = obj.shuffle_order;
  if (value === undefined || value === null) {
    return null;
  }
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array or null`, field);
  }
  const order: number[] = [];
  for (const entry of value) {
    if (typeof entry !== 'number' || !Number.isInteger(entry)) {
      throw new ValidationError(`${field} must contain integers`, field);
    }
    order.push(entry);
  }
  return order;
}

function readRecentFolders(obj: JsonObject): string[] {
  const value = obj.recent_folders;
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ValidationError('recent_folders must be an array', 'recent_folders');
  }
  const folders: string[] = [];
  for (const entry of value) {
    if (typeof entry !== 'string') {
      throw new ValidationError('recent_folders must contain strings', 'recent_folders');
    }
    if (entry.length === 0 || entry.includes('\0')) {
      validatorLogger.warn('Skipping invalid recent folder entry');
      continue;
    }
    folders.push(entry);
  }
  return normalizeRecentFolders(folders);
}

// ========== Playlist Validation ==========

export function validatePlaylist(folderPath: string, data: unknown): PlaylistState {
  const prefix = `playlists[${JSON.stringify(folderPath)}]`;
  if (!isJsonObject(data)) {
    throw new ValidationError(`${prefix} must be an object`, prefix);
  }

  let shuffleOrder = readShuffleOrder(data, `${prefix}.shuffle_order`);
  if (shuffleOrder !== null && !isValidPermutation(shuffleOrder, shuffleOrder.length)) {
    validatorLogger.warn(Errors.invalidPermutation(folderPath, shuffleOrder.length).message);
    shuffleOrder = null;
  }

  return {
    currentIndex: Math.max(0, readInteger(data, 'current_index', `${prefix}.current_index`, 0)),
    shuffleOrder,
    loopEnabled: readBoolean(data, 'loop_enabled', `${prefix}.loop_enabled`, false),
    playbackPositionMs: Math.max(
      0,
      Math.round(readNumber(data, 'playback_position_ms', `${prefix}.playback_position_ms`, 0))
    ),
  };
}

// ========== State Validation ==========

/**
 * Validate a parsed state document
 * @throws ValidationError when the document does not have the state shape
 */
export function validateAppState(data: unknown): AppState {
  if (!isJsonObject(data)) {
    throw new ValidationError('State document must be an object');
  }

  const defaults = createDefaultAppState();

  const playlistsData = data.playlists === undefined ? {} : data.playlists;
  if (!isJsonObject(playlistsData)) {
    throw new ValidationError('playlists must be an object', 'playlists');
  }

  const playlists: Record<string, PlaylistState> = {};
  for (const [folderPath, playlistData] of Object.entries(playlistsData)) {
    if (folderPath.length === 0 || folderPath === '__proto__') {
      validatorLogger.warn(`Skipping playlist with invalid key: ${JSON.stringify(folderPath)}`);
      continue;
    }
    playlists[folderPath] = validatePlaylist(folderPath, playlistData);
  }

  const volume = readNumber(data, 'volume', 'volume', defaults.volume);
  const zoomLevel = readNumber(data, 'zoom_level', 'zoom_level', defaults.zoomLevel);

  return {
    recentFolders: readRecentFolders(data),
    playlists,
    volume: Math.round(clamp(volume, UI.MIN_VOLUME, UI.MAX_VOLUME)),
    zoomLevel: clamp(zoomLevel, UI.MIN_ZOOM, UI.MAX_ZOOM),
  };
}
