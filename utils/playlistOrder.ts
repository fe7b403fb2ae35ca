/**
 * Playlist ordering state machine
 *
 * A playlist is either straight (display order = natural order) or shuffled
 * (display order = shuffleOrder, a permutation of natural indices).
 * currentIndex always points into the display order. The functions here
 * mutate the PlaylistState they are given; the caller owns scheduling and
 * persistence.
 */

import type { PlaylistState, ReshufflePolicy } from '../types';
import { Errors } from './errorHandler';

export type RandomSource = () => number;

export type StepDirection = 1 | -1;

export type StepResult =
  | { type: 'moved'; index: number; wrapped: boolean }
  | { type: 'end-of-playlist'; index: number }
  | { type: 'empty' };

export interface ReconcileResult {
  shuffleDiscarded: boolean;
  indexClamped: boolean;
}

export function createPlaylistState(): PlaylistState {
  return {
    currentIndex: 0,
    shuffleOrder: null,
    loopEnabled: false,
    playbackPositionMs: 0,
  };
}

export function isShuffled(state: PlaylistState): boolean {
  return state.shuffleOrder !== null;
}

/**
 * True when order contains every index of 0..trackCount-1 exactly once
 */
export function isValidPermutation(order: readonly unknown[], trackCount: number): boolean {
  if (order.length !== trackCount) {
    return false;
  }
  const seen = new Set<number>();
  for (const value of order) {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value >= trackCount) {
      return false;
    }
    if (seen.has(value)) {
      return false;
    }
    seen.add(value);
  }
  return true;
}

export function getDisplayOrder(state: PlaylistState, trackCount: number): number[] {
  if (state.shuffleOrder !== null) {
    return [...state.shuffleOrder];
  }
  return Array.from({ length: trackCount }, (_, index) => index);
}

/**
 * Natural index of the current track, or null for an empty playlist
 */
export function getCurrentNaturalIndex(state: PlaylistState, trackCount: number): number | null {
  if (trackCount === 0) {
    return null;
  }
  if (state.shuffleOrder !== null) {
    const natural = state.shuffleOrder[state.currentIndex];
    return natural === undefined ? null : natural;
  }
  return state.currentIndex < trackCount ? state.currentIndex : null;
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffleIndices(indices: readonly number[], random: RandomSource = Math.random): number[] {
  const result = [...indices];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Random permutation of 0..trackCount-1. When first is given it is placed
 * at position 0 and only the remaining indices are shuffled.
 */
export function generateShuffleOrder(
  trackCount: number,
  first: number | null,
  random: RandomSource = Math.random
): number[] {
  const pinned = first !== null && first >= 0 && first < trackCount ? first : null;
  const rest: number[] = [];
  for (let index = 0; index < trackCount; index++) {
    if (index !== pinned) {
      rest.push(index);
    }
  }
  const shuffled = shuffleIndices(rest, random);
  return pinned === null ? shuffled : [pinned, ...shuffled];
}

/**
 * Bring a stored state in line with a freshly scanned track count.
 * An invalid shuffle order is dropped (straight mode) and currentIndex is
 * clamped into range; a clamped index also restarts the position.
 */
export function reconcilePlaylist(state: PlaylistState, trackCount: number): ReconcileResult {
  let shuffleDiscarded = false;
  if (state.shuffleOrder !== null && !isValidPermutation(state.shuffleOrder, trackCount)) {
    state.shuffleOrder = null;
    shuffleDiscarded = true;
  }

  const maxIndex = Math.max(0, trackCount - 1);
  const current = Number.isInteger(state.currentIndex) ? state.currentIndex : 0;
  const clamped = Math.min(Math.max(current, 0), maxIndex);

  let indexClamped = false;
  if (clamped !== state.currentIndex) {
    state.currentIndex = clamped;
    state.playbackPositionMs = 0;
    indexClamped = true;
  }

  return { shuffleDiscarded, indexClamped };
}

/**
 * Switch to shuffle mode keeping the playing track first.
 * Returns false when nothing changed.
 */
export function enableShuffle(
  state: PlaylistState,
  trackCount: number,
  random: RandomSource = Math.random
): boolean {
  if (state.shuffleOrder !== null || trackCount === 0) {
    return false;
  }
  state.shuffleOrder = generateShuffleOrder(trackCount, getCurrentNaturalIndex(state, trackCount), random);
  state.currentIndex = 0;
  return true;
}

/**
 * Back to natural order; currentIndex becomes the natural rank of the
 * track that was playing.
 */
export function disableShuffle(state: PlaylistState, trackCount: number): boolean {
  if (state.shuffleOrder === null) {
    return false;
  }
  const natural = getCurrentNaturalIndex(state, trackCount);
  state.shuffleOrder = null;
  state.currentIndex = natural ?? 0;
  return true;
}

export function reshuffle(
  state: PlaylistState,
  trackCount: number,
  policy: ReshufflePolicy,
  random: RandomSource = Math.random
): boolean {
  if (state.shuffleOrder === null || trackCount === 0) {
    return false;
  }

  if (policy === 'restart') {
    state.shuffleOrder = generateShuffleOrder(trackCount, null, random);
    state.playbackPositionMs = 0;
  } else {
    state.shuffleOrder = generateShuffleOrder(trackCount, getCurrentNaturalIndex(state, trackCount), random);
  }
  state.currentIndex = 0;
  return true;
}

/**
 * Move one step through the display order, wrapping when loop is enabled
 */
export function stepTrack(state: PlaylistState, trackCount: number, direction: StepDirection): StepResult {
  if (trackCount === 0) {
    return { type: 'empty' };
  }

  let target = state.currentIndex + direction;
  let wrapped = false;

  if (target < 0 || target >= trackCount) {
    if (!state.loopEnabled) {
      return { type: 'end-of-playlist', index: state.currentIndex };
    }
    target = direction === 1 ? 0 : trackCount - 1;
    wrapped = true;
  }

  state.currentIndex = target;
  state.playbackPositionMs = 0;
  return { type: 'moved', index: target, wrapped };
}

/**
 * Jump to a display position
 * @throws AppError (INVALID_ARGUMENT) for an index outside the playlist
 */
export function changeTrack(state: PlaylistState, trackCount: number, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= trackCount) {
    throw Errors.invalidArgument('index', `integer in [0, ${trackCount})`);
  }
  if (index !== state.currentIndex) {
    state.playbackPositionMs = 0;
  }
  state.currentIndex = index;
}

export function updatePosition(state: PlaylistState, positionMs: number): void {
  if (!Number.isFinite(positionMs)) {
    throw Errors.invalidArgument('positionMs', 'finite number');
  }
  state.playbackPositionMs = Math.max(0, Math.round(positionMs));
}

export function toggleLoop(state: PlaylistState): boolean {
  state.loopEnabled = !state.loopEnabled;
  return state.loopEnabled;
}
