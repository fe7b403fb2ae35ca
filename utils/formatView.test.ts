import { describe, it, expect } from 'vitest';
import type { PlayerView } from '../types';
import { formatNotice, formatPosition, formatRecentFolders, formatView } from './formatView';

function view(overrides: Partial<PlayerView> = {}): PlayerView {
  return {
    role: 'writer',
    folder: null,
    folderMissing: false,
    entries: [],
    trackCount: overrides.entries ? overrides.entries.length : 0,
    filter: null,
    currentTrack: null,
    shuffleEnabled: false,
    loopEnabled: false,
    playbackPositionMs: 0,
    volume: 80,
    zoomLevel: 1,
    recentFolders: [],
    ...overrides,
  };
}

describe('formatPosition', () => {
  it('renders minutes and seconds', () => {
    expect(formatPosition(0)).toBe('0:00');
    expect(formatPosition(65_400)).toBe('1:05');
    expect(formatPosition(3_600_000)).toBe('60:00');
  });
});

describe('formatView', () => {
  it('renders the playlist with the current track marked', () => {
    const lines = formatView(view({
      folder: '/music/a',
      entries: [
        { displayPosition: 0, fileName: 'a.mp3', current: false },
        { displayPosition: 1, fileName: 'b.mp3', current: true },
      ],
      currentTrack: 'b.mp3',
      loopEnabled: true,
      playbackPositionMs: 65_000,
    }));

    expect(lines).toEqual([
      'Folder: /music/a',
      'Shuffle: off | Loop: on | Volume: 80 | Zoom: 100%',
      'Current: b.mp3 @ 1:05',
      '   1. a.mp3',
      '>> 2. b.mp3',
    ]);
  });

  it('pads list numbers to the widest position', () => {
    const entries = Array.from({ length: 10 }, (_, index) => ({
      displayPosition: index,
      fileName: `t${index}.mp3`,
      current: index === 0,
    }));
    const lines = formatView(view({ folder: '/music/long', entries, currentTrack: 't0.mp3', shuffleEnabled: true }));

    expect(lines[1]).toBe('Shuffle: on | Loop: off | Volume: 80 | Zoom: 100%');
    expect(lines[3]).toBe('>>  1. t0.mp3');
    expect(lines[12]).toBe('   10. t9.mp3');
  });

  it('keeps full-list numbers and padding for a filtered list', () => {
    const lines = formatView(view({
      folder: '/music/long',
      entries: [
        { displayPosition: 2, fileName: 'live-3.mp3', current: false },
        { displayPosition: 11, fileName: 'live-12.mp3', current: true },
      ],
      trackCount: 12,
      filter: 'live',
      currentTrack: 'live-12.mp3',
    }));

    expect(lines).toEqual([
      'Folder: /music/long',
      'Shuffle: off | Loop: off | Volume: 80 | Zoom: 100%',
      'Filter: "live" (2 of 12)',
      'Current: live-12.mp3 @ 0:00',
      '    3. live-3.mp3',
      '>> 12. live-12.mp3',
    ]);
  });

  it('reports a filter without matches', () => {
    expect(formatView(view({ folder: '/music/a', trackCount: 3, filter: 'zzz' }))).toEqual([
      'Folder: /music/a',
      'Shuffle: off | Loop: off | Volume: 80 | Zoom: 100%',
      'Filter: "zzz" (0 of 3)',
      '(no matching tracks)',
    ]);
  });

  it('marks a reader with no folder open', () => {
    expect(formatView(view({ role: 'reader', zoomLevel: 1.1, volume: 35 }))).toEqual([
      '[read-only]',
      'No folder open',
      'Shuffle: off | Loop: off | Volume: 35 | Zoom: 110%',
    ]);
  });

  it('reports a missing folder', () => {
    expect(formatView(view({ folder: '/music/gone', folderMissing: true }))).toEqual([
      'Folder: /music/gone',
      '(folder not found)',
      'Shuffle: off | Loop: off | Volume: 80 | Zoom: 100%',
    ]);
  });

  it('reports a folder without media files', () => {
    expect(formatView(view({ folder: '/music/empty' }))).toEqual([
      'Folder: /music/empty',
      'Shuffle: off | Loop: off | Volume: 80 | Zoom: 100%',
      '(no playable files)',
    ]);
  });
});

describe('formatRecentFolders / formatNotice', () => {
  it('numbers recent folders', () => {
    expect(formatRecentFolders(['/music/a', '/music/b'])).toEqual(['1. /music/a', '2. /music/b']);
    expect(formatRecentFolders([])).toEqual(['No recent folders']);
  });

  it('prefixes notices with their level', () => {
    expect(formatNotice({ level: 'warning', code: 'save-failed', message: 'Could not save' })).toBe(
      '[warning] Could not save'
    );
  });
});
