import { describe, it, expect } from 'vitest';
import type { PlaylistState } from '../types';
import { AppError, ErrorCode } from './errorHandler';
import {
  changeTrack,
  createPlaylistState,
  disableShuffle,
  enableShuffle,
  generateShuffleOrder,
  getCurrentNaturalIndex,
  getDisplayOrder,
  isValidPermutation,
  reconcilePlaylist,
  reshuffle,
  shuffleIndices,
  stepTrack,
  toggleLoop,
  updatePosition,
} from './playlistOrder';

const alwaysZero = () => 0;

function playlist(overrides: Partial<PlaylistState> = {}): PlaylistState {
  return { ...createPlaylistState(), ...overrides };
}

describe('isValidPermutation', () => {
  it('accepts every index exactly once', () => {
    expect(isValidPermutation([2, 0, 1], 3)).toBe(true);
    expect(isValidPermutation([], 0)).toBe(true);
  });

  it('rejects wrong length, duplicates and out-of-range values', () => {
    expect(isValidPermutation([0, 1], 3)).toBe(false);
    expect(isValidPermutation([0, 0, 1], 3)).toBe(false);
    expect(isValidPermutation([0, 1, 3], 3)).toBe(false);
    expect(isValidPermutation([0, 1.5, 2], 3)).toBe(false);
    expect(isValidPermutation([0, '1', 2], 3)).toBe(false);
  });
});

describe('shuffle orders', () => {
  it('shuffles with the given random source', () => {
    expect(shuffleIndices([0, 1, 2, 3], alwaysZero)).toEqual([1, 2, 3, 0]);
  });

  it('pins the first index and shuffles the rest', () => {
    expect(generateShuffleOrder(5, 2, alwaysZero)).toEqual([2, 1, 3, 4, 0]);
  });

  it('produces a permutation for any track count', () => {
    for (const count of [0, 1, 2, 7, 50]) {
      expect(isValidPermutation(generateShuffleOrder(count, null), count)).toBe(true);
      expect(isValidPermutation(generateShuffleOrder(count, 0), count)).toBe(true);
    }
  });

  it('ignores a pinned index outside the playlist', () => {
    const order = generateShuffleOrder(3, 9, alwaysZero);
    expect(isValidPermutation(order, 3)).toBe(true);
  });
});

describe('display order', () => {
  it('is natural order when not shuffled', () => {
    expect(getDisplayOrder(playlist(), 3)).toEqual([0, 1, 2]);
  });

  it('is the shuffle order when shuffled', () => {
    expect(getDisplayOrder(playlist({ shuffleOrder: [2, 0, 1] }), 3)).toEqual([2, 0, 1]);
  });

  it('maps the current index to a natural index', () => {
    expect(getCurrentNaturalIndex(playlist({ currentIndex: 1, shuffleOrder: [2, 0, 1] }), 3)).toBe(0);
    expect(getCurrentNaturalIndex(playlist({ currentIndex: 2 }), 3)).toBe(2);
    expect(getCurrentNaturalIndex(playlist(), 0)).toBeNull();
  });
});

describe('enableShuffle / disableShuffle', () => {
  it('keeps the playing track at the front of the new order', () => {
    const state = playlist({ currentIndex: 3, playbackPositionMs: 4200 });
    expect(enableShuffle(state, 6)).toBe(true);

    expect(state.shuffleOrder?.[0]).toBe(3);
    expect(state.currentIndex).toBe(0);
    expect(state.playbackPositionMs).toBe(4200);
    expect(isValidPermutation(state.shuffleOrder ?? [], 6)).toBe(true);
  });

  it('does nothing when already shuffled or empty', () => {
    const shuffled = playlist({ shuffleOrder: [1, 0] });
    expect(enableShuffle(shuffled, 2)).toBe(false);
    expect(shuffled.shuffleOrder).toEqual([1, 0]);

    const empty = playlist();
    expect(enableShuffle(empty, 0)).toBe(false);
    expect(empty.shuffleOrder).toBeNull();
  });

  it('returns to natural order on the playing track', () => {
    const state = playlist({ currentIndex: 1, shuffleOrder: [2, 0, 1] });
    expect(disableShuffle(state, 3)).toBe(true);
    expect(state).toEqual({ currentIndex: 0, shuffleOrder: null, loopEnabled: false, playbackPositionMs: 0 });
  });

  it('reports no change when not shuffled', () => {
    expect(disableShuffle(playlist(), 3)).toBe(false);
  });
});

describe('reshuffle', () => {
  it('keeps the current track first by default', () => {
    const state = playlist({ currentIndex: 2, shuffleOrder: [3, 1, 0, 2], playbackPositionMs: 500 });
    expect(reshuffle(state, 4, 'keep-current', alwaysZero)).toBe(true);

    expect(state.shuffleOrder).toEqual([0, 2, 3, 1]);
    expect(state.currentIndex).toBe(0);
    expect(state.playbackPositionMs).toBe(500);
  });

  it('starts over from a fresh order with the restart policy', () => {
    const state = playlist({ currentIndex: 2, shuffleOrder: [3, 1, 0, 2], playbackPositionMs: 500 });
    expect(reshuffle(state, 4, 'restart', alwaysZero)).toBe(true);

    expect(state.shuffleOrder).toEqual([1, 2, 3, 0]);
    expect(state.currentIndex).toBe(0);
    expect(state.playbackPositionMs).toBe(0);
  });

  it('is a no-op in straight mode', () => {
    const state = playlist({ currentIndex: 1 });
    expect(reshuffle(state, 3, 'keep-current')).toBe(false);
    expect(state.currentIndex).toBe(1);
  });
});

describe('stepTrack', () => {
  it('moves forward and resets the position', () => {
    const state = playlist({ currentIndex: 0, playbackPositionMs: 900 });
    expect(stepTrack(state, 3, 1)).toEqual({ type: 'moved', index: 1, wrapped: false });
    expect(state.playbackPositionMs).toBe(0);
  });

  it('stops at the end without loop', () => {
    const state = playlist({ currentIndex: 2, playbackPositionMs: 900 });
    expect(stepTrack(state, 3, 1)).toEqual({ type: 'end-of-playlist', index: 2 });
    expect(state.currentIndex).toBe(2);
    expect(state.playbackPositionMs).toBe(900);
  });

  it('stops at the start without loop', () => {
    const state = playlist({ currentIndex: 0 });
    expect(stepTrack(state, 3, -1)).toEqual({ type: 'end-of-playlist', index: 0 });
  });

  it('wraps around with loop enabled', () => {
    const state = playlist({ currentIndex: 2, loopEnabled: true });
    expect(stepTrack(state, 3, 1)).toEqual({ type: 'moved', index: 0, wrapped: true });
    expect(stepTrack(state, 3, -1)).toEqual({ type: 'moved', index: 2, wrapped: true });
  });

  it('steps through the shuffle order, not the natural order', () => {
    const state = playlist({ currentIndex: 0, shuffleOrder: [2, 0, 1] });
    stepTrack(state, 3, 1);
    expect(getCurrentNaturalIndex(state, 3)).toBe(0);
  });

  it('reports an empty playlist', () => {
    expect(stepTrack(playlist(), 0, 1)).toEqual({ type: 'empty' });
  });
});

describe('reconcilePlaylist', () => {
  it('drops a shuffle order that no longer matches the folder', () => {
    const state = playlist({ currentIndex: 1, shuffleOrder: [0, 1, 2] });
    expect(reconcilePlaylist(state, 4)).toEqual({ shuffleDiscarded: true, indexClamped: false });
    expect(state.shuffleOrder).toBeNull();
    expect(state.currentIndex).toBe(1);
  });

  it('clamps the current index after files were removed', () => {
    const state = playlist({ currentIndex: 5, playbackPositionMs: 3000 });
    expect(reconcilePlaylist(state, 3)).toEqual({ shuffleDiscarded: false, indexClamped: true });
    expect(state.currentIndex).toBe(2);
    expect(state.playbackPositionMs).toBe(0);
  });

  it('keeps a valid state untouched', () => {
    const state = playlist({ currentIndex: 1, shuffleOrder: [2, 0, 1], playbackPositionMs: 3000 });
    expect(reconcilePlaylist(state, 3)).toEqual({ shuffleDiscarded: false, indexClamped: false });
    expect(state).toEqual({ currentIndex: 1, shuffleOrder: [2, 0, 1], loopEnabled: false, playbackPositionMs: 3000 });
  });

  it('keeps index 0 for an empty folder', () => {
    const state = playlist();
    expect(reconcilePlaylist(state, 0)).toEqual({ shuffleDiscarded: false, indexClamped: false });
    expect(state.currentIndex).toBe(0);
  });
});

describe('changeTrack', () => {
  it('jumps to a display position and resets the position', () => {
    const state = playlist({ currentIndex: 0, playbackPositionMs: 1500 });
    changeTrack(state, 3, 2);
    expect(state.currentIndex).toBe(2);
    expect(state.playbackPositionMs).toBe(0);
  });

  it('keeps the position when selecting the current track', () => {
    const state = playlist({ currentIndex: 1, playbackPositionMs: 1500 });
    changeTrack(state, 3, 1);
    expect(state.playbackPositionMs).toBe(1500);
  });

  it('rejects an index outside the playlist', () => {
    const state = playlist();
    expect(() => changeTrack(state, 3, 3)).toThrow(AppError);
    try {
      changeTrack(state, 3, -1);
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error instanceof AppError ? error.code : null).toBe(ErrorCode.INVALID_ARGUMENT);
    }
    expect(state.currentIndex).toBe(0);
  });
});

describe('updatePosition / toggleLoop', () => {
  it('rounds and clamps positions', () => {
    const state = playlist();
    updatePosition(state, 1234.6);
    expect(state.playbackPositionMs).toBe(1235);
    updatePosition(state, -50);
    expect(state.playbackPositionMs).toBe(0);
  });

  it('rejects non-finite positions', () => {
    expect(() => updatePosition(playlist(), Number.NaN)).toThrow('Invalid argument: positionMs');
  });

  it('flips the loop flag', () => {
    const state = playlist();
    expect(toggleLoop(state)).toBe(true);
    expect(toggleLoop(state)).toBe(false);
  });
});
