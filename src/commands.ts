import { PLAYBACK, UI } from '../constants/config';
import type { AppEvent } from '../types';

export type SessionCommand =
  | { kind: 'event'; event: AppEvent }
  | { kind: 'status' }
  | { kind: 'recent' }
  | { kind: 'pause' }
  | { kind: 'resume' }
  | { kind: 'end-track' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'error'; message: string };

export const HELP_LINES = [
  'open <folder>        open a folder and remember it',
  'next | prev          move through the playlist',
  'play <n>             jump to position n of the list',
  'shuffle on|off       toggle shuffle mode',
  'reshuffle            new random order (shuffle mode only)',
  'loop                 toggle looping at the ends of the list',
  'volume <0-100>       set the volume',
  'volume +N | -N       raise or lower the volume (+ and - alone: 5)',
  'seek +S | -S         jump S seconds forward or back (+ and - alone: 5)',
  'restart              play the current track from the start',
  'find <text> | find   filter the list by name, or clear the filter',
  'zoom in|out|reset    change the zoom level',
  'pause | resume       control playback',
  'end                  report the current track as finished',
  'status | recent      show the playlist or the recent folders',
  'quit                 save and exit',
];

function parseWholeNumber(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) {
    return null;
  }
  return Number(value);
}

/**
 * "+N" / "-N" as a signed number; a bare sign stands for the default step
 */
function parseSignedStep(value: string | undefined, defaultStep: number): number | null {
  if (value === '+' || value === '-') {
    return value === '+' ? defaultStep : -defaultStep;
  }
  if (value === undefined || !/^[+-]\d+$/.test(value)) {
    return null;
  }
  return Number(value);
}

export function parsePlayPosition(value: string | undefined): SessionCommand {
  const position = parseWholeNumber(value);
  if (position === null || position < 1) {
    return { kind: 'error', message: 'play expects a list position starting at 1' };
  }
  return { kind: 'event', event: { type: 'track.changed', index: position - 1 } };
}

export function parseShuffle(value: string | undefined): SessionCommand {
  if (value === 'on' || value === 'off') {
    return { kind: 'event', event: { type: 'shuffle.toggle', enabled: value === 'on' } };
  }
  return { kind: 'error', message: 'shuffle expects "on" or "off"' };
}

export function parseVolume(value: string | undefined): SessionCommand {
  const delta = parseSignedStep(value, UI.VOLUME_STEP);
  if (delta !== null) {
    return { kind: 'event', event: { type: 'volume.step', delta } };
  }
  const volume = parseWholeNumber(value);
  if (volume === null || volume > UI.MAX_VOLUME) {
    return { kind: 'error', message: 'volume expects a number from 0 to 100, or +N / -N' };
  }
  return { kind: 'event', event: { type: 'volume.set', volume } };
}

export function parseSeek(value: string | undefined): SessionCommand {
  const defaultSeconds = PLAYBACK.SEEK_STEP_MS / 1000;
  const seconds = parseSignedStep(value, defaultSeconds) ?? parseWholeNumber(value);
  if (seconds === null) {
    return { kind: 'error', message: 'seek expects seconds such as +10 or -5' };
  }
  return { kind: 'event', event: { type: 'position.seek', offsetMs: seconds * 1000 } };
}

export function parseFind(text: string): SessionCommand {
  const query = text.trim();
  return { kind: 'event', event: { type: 'playlist.filter', query: query.length > 0 ? query : null } };
}

export function parseZoom(value: string | undefined): SessionCommand {
  switch (value) {
    case 'in':
      return { kind: 'event', event: { type: 'zoom.in' } };
    case 'out':
      return { kind: 'event', event: { type: 'zoom.out' } };
    case 'reset':
      return { kind: 'event', event: { type: 'zoom.reset' } };
    default:
      return { kind: 'error', message: 'zoom expects "in", "out" or "reset"' };
  }
}

/**
 * Parse one line typed into the interactive session
 */
export function parseSessionLine(line: string): SessionCommand | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return null;
  }

  const [verb, ...rest] = trimmed.split(/\s+/);
  const argument = rest[0];

  switch (verb.toLowerCase()) {
    case 'open': {
      // Folder names may contain spaces
      const folder = trimmed.slice(verb.length).trim();
      if (!folder) {
        return { kind: 'error', message: 'open expects a folder path' };
      }
      return { kind: 'event', event: { type: 'folder.open', path: folder } };
    }
    case 'find':
      return parseFind(trimmed.slice(verb.length));
    case 'seek':
      return parseSeek(argument);
    case 'restart':
      return { kind: 'event', event: { type: 'track.restart' } };
    case 'next':
      return { kind: 'event', event: { type: 'track.next' } };
    case 'prev':
    case 'previous':
      return { kind: 'event', event: { type: 'track.previous' } };
    case 'play':
      return parsePlayPosition(argument);
    case 'shuffle':
      return parseShuffle(argument);
    case 'reshuffle':
      return { kind: 'event', event: { type: 'shuffle.reshuffle' } };
    case 'loop':
      return { kind: 'event', event: { type: 'loop.toggle' } };
    case 'volume':
      return parseVolume(argument);
    case 'zoom':
      return parseZoom(argument);
    case 'pause':
      return { kind: 'pause' };
    case 'resume':
      return { kind: 'resume' };
    case 'end':
      return { kind: 'end-track' };
    case 'status':
      return { kind: 'status' };
    case 'recent':
      return { kind: 'recent' };
    case 'help':
    case '?':
      return { kind: 'help' };
    case 'quit':
    case 'exit':
      return { kind: 'quit' };
    default:
      return { kind: 'error', message: `Unknown command: ${verb} (type "help")` };
  }
}
