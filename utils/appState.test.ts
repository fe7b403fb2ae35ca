import { describe, it, expect } from 'vitest';
import {
  createDefaultAppState,
  getOrCreatePlaylist,
  resetZoom,
  setVolume,
  setZoom,
  stepVolume,
  zoomIn,
  zoomOut,
} from './appState';

describe('createDefaultAppState', () => {
  it('starts empty with default volume and zoom', () => {
    expect(createDefaultAppState()).toEqual({
      recentFolders: [],
      playlists: {},
      volume: 80,
      zoomLevel: 1,
    });
  });
});

describe('getOrCreatePlaylist', () => {
  it('creates a playlist once and reuses it', () => {
    const state = createDefaultAppState();
    const first = getOrCreatePlaylist(state, '/music/a');
    expect(first.created).toBe(true);
    expect(first.playlist).toEqual({ currentIndex: 0, shuffleOrder: null, loopEnabled: false, playbackPositionMs: 0 });

    first.playlist.currentIndex = 4;
    const second = getOrCreatePlaylist(state, '/music/a');
    expect(second.created).toBe(false);
    expect(second.playlist.currentIndex).toBe(4);
    expect(Object.keys(state.playlists)).toEqual(['/music/a']);
  });
});

describe('volume', () => {
  it('rounds and clamps into 0-100', () => {
    const state = createDefaultAppState();
    expect(setVolume(state, 42.4)).toBe(42);
    expect(setVolume(state, 150)).toBe(100);
    expect(setVolume(state, -3)).toBe(0);
    expect(state.volume).toBe(0);
  });

  it('steps from the current volume', () => {
    const state = createDefaultAppState();
    expect(stepVolume(state, -5)).toBe(75);
    expect(stepVolume(state, 30)).toBe(100);
    expect(stepVolume(state, -200)).toBe(0);
  });
});

describe('zoom', () => {
  it('steps by tenths without drift', () => {
    const state = createDefaultAppState();
    zoomIn(state);
    zoomIn(state);
    zoomIn(state);
    expect(state.zoomLevel).toBe(1.3);
    zoomOut(state);
    expect(state.zoomLevel).toBe(1.2);
  });

  it('stays within 0.5 and 2.0', () => {
    const state = createDefaultAppState();
    for (let i = 0; i < 20; i++) {
      zoomIn(state);
    }
    expect(state.zoomLevel).toBe(2);
    for (let i = 0; i < 30; i++) {
      zoomOut(state);
    }
    expect(state.zoomLevel).toBe(0.5);
    expect(setZoom(state, 7)).toBe(2);
  });

  it('resets to 100%', () => {
    const state = createDefaultAppState();
    setZoom(state, 1.7);
    expect(resetZoom(state)).toBe(1);
  });
});
