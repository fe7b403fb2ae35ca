/**
 * Application controller
 *
 * Owns the AppState for the lifetime of the process. Interface commands,
 * playback notifications and the position poll all enter through
 * dispatch(), which applies events strictly one at a time in arrival order.
 * Once shutdown has begun, dispatch() no longer applies anything.
 * Mutations mark the state dirty; folder, track, shuffle and loop changes
 * also request an immediate save.
 */

import path from 'path';
import { PLAYBACK } from '../constants/config';
import type {
  AppEvent,
  AppState,
  Notice,
  NoticeCode,
  PlaybackEngine,
  PlayerView,
  PlaylistState,
  ReshufflePolicy,
} from '../types';
import { getOrCreatePlaylist, resetZoom, setVolume, stepVolume, zoomIn, zoomOut } from '../utils/appState';
import {
  AppError,
  ErrorCode,
  Errors,
  FolderNotFoundError,
  StateLoadError,
  handleError,
} from '../utils/errorHandler';
import {
  changeTrack,
  disableShuffle,
  enableShuffle,
  getCurrentNaturalIndex,
  getDisplayOrder,
  reconcilePlaylist,
  reshuffle,
  stepTrack,
  toggleLoop,
  updatePosition,
  type RandomSource,
  type StepDirection,
  type StepResult,
} from '../utils/playlistOrder';
import { addRecentFolder } from '../utils/recentFolders';
import { AutosaveScheduler, type SaveOutcome, type SaveReason, type StateWriter } from './autosaveScheduler';
import { scanFolder } from './folderScanner';
import type { LockDecision } from './lockCoordinator';
import { logger } from './logger';

const controllerLogger = logger.withScope('AppController');

export type FolderScanner = (folderPath: string) => Promise<string[]>;

export type ControllerUpdate =
  | { type: 'notice'; notice: Notice }
  | { type: 'view'; view: PlayerView };

export type ControllerListener = (update: ControllerUpdate) => void;

export interface EventResult {
  changed: boolean;
  step?: StepResult;
}

export interface AppControllerOptions {
  state: AppState;
  lock: LockDecision;
  writer: StateWriter;
  engine: PlaybackEngine;
  scanFolder?: FolderScanner;
  reshufflePolicy?: ReshufflePolicy;
  random?: RandomSource;
  autosaveIntervalMs?: number;
  positionPollMs?: number;
  /** Set when the state file was rejected at startup */
  loadError?: StateLoadError | null;
}

interface OpenFolder {
  path: string;
  tracks: string[];
  /** The folder could not be scanned; its saved state is left untouched */
  missing: boolean;
}

const UNCHANGED: EventResult = { changed: false };

export class AppController {
  private readonly state: AppState;
  private readonly lock: LockDecision;
  private readonly engine: PlaybackEngine;
  private readonly scheduler: AutosaveScheduler;
  private readonly scan: FolderScanner;
  private readonly reshufflePolicy: ReshufflePolicy;
  private readonly random: RandomSource;
  private readonly positionPollMs: number;
  private readonly loadError: StateLoadError | null;
  private readonly listeners = new Set<ControllerListener>();

  private queue: Promise<void> = Promise.resolve();
  private openFolder: OpenFolder | null = null;
  /** Lower-cased name filter for the view; never persisted */
  private filter: string | null = null;
  private pollTimer: NodeJS.Timeout | null = null;
  private unsubscribeEnd: (() => void) | null = null;
  private started = false;
  private shutdownPromise: Promise<SaveOutcome> | null = null;

  constructor(options: AppControllerOptions) {
    this.state = options.state;
    this.lock = options.lock;
    this.engine = options.engine;
    this.scan = options.scanFolder ?? scanFolder;
    this.reshufflePolicy = options.reshufflePolicy ?? 'keep-current';
    this.random = options.random ?? Math.random;
    this.positionPollMs = options.positionPollMs ?? PLAYBACK.POSITION_POLL_MS;
    this.loadError = options.loadError ?? null;
    this.scheduler = new AutosaveScheduler({
      writer: options.writer,
      getState: () => this.state,
      canWrite: options.lock.role === 'writer',
      intervalMs: options.autosaveIntervalMs,
      onSaveFailed: (error) => {
        this.publishNotice('warning', 'save-failed', `Could not save state: ${error.message}`);
      },
    });
  }

  /**
   * Start timers and listeners, then reopen the most recent folder
   */
  async start(options: { restoreLastFolder?: boolean } = {}): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    if (this.lock.role === 'reader') {
      this.publishNotice('info', 'read-only', 'Another instance is running; changes will not be saved');
    }
    if (this.loadError) {
      this.publishNotice('warning', 'state-reset', `${this.loadError.message}; starting with defaults`);
    }

    this.engine.setVolume(this.state.volume);
    this.unsubscribeEnd = this.engine.onEnd(() => {
      void this.dispatch({ type: 'track.ended' });
    });
    this.scheduler.start();
    this.pollTimer = setInterval(() => this.pollPosition(), this.positionPollMs);
    this.pollTimer.unref();

    const lastFolder = this.state.recentFolders[0];
    if (lastFolder && options.restoreLastFolder !== false) {
      await this.dispatch({ type: 'folder.open', path: lastFolder });
    }
  }

  subscribe(listener: ControllerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Queue an event. Resolves once it has been applied; saves it requested
   * may still be running (see whenIdle).
   */
  dispatch(event: AppEvent): Promise<EventResult> {
    if (this.shutdownPromise) {
      controllerLogger.debug('Ignoring event after shutdown:', event.type);
      return Promise.resolve(UNCHANGED);
    }
    return this.enqueue(event);
  }

  private enqueue(event: AppEvent): Promise<EventResult> {
    const run = this.queue.then(() => this.apply(event));
    this.queue = run.then(() => undefined);
    return run;
  }

  /**
   * Resolves when every queued event is applied and no save is running
   */
  async whenIdle(): Promise<void> {
    await this.queue;
    await this.scheduler.idle();
  }

  getState(): Readonly<AppState> {
    return this.state;
  }

  getRole(): LockDecision['role'] {
    return this.lock.role;
  }

  isDirty(): boolean {
    return this.scheduler.isDirty();
  }

  getView(): PlayerView {
    const folder = this.openFolder;
    const playlist = folder ? this.state.playlists[folder.path] : undefined;

    let entries: PlayerView['entries'] = [];
    let trackCount = 0;
    let currentTrack: string | null = null;
    if (folder && playlist && !folder.missing) {
      trackCount = folder.tracks.length;
      entries = getDisplayOrder(playlist, trackCount).map((natural, displayPosition) => ({
        displayPosition,
        fileName: folder.tracks[natural],
        current: displayPosition === playlist.currentIndex,
      }));
      const filter = this.filter;
      if (filter) {
        entries = entries.filter(entry => entry.fileName.toLowerCase().includes(filter));
      }
      const natural = getCurrentNaturalIndex(playlist, trackCount);
      currentTrack = natural === null ? null : folder.tracks[natural];
    }

    return {
      role: this.lock.role,
      folder: folder ? folder.path : null,
      folderMissing: folder ? folder.missing : false,
      entries,
      trackCount,
      filter: this.filter,
      currentTrack,
      shuffleEnabled: playlist ? playlist.shuffleOrder !== null : false,
      loopEnabled: playlist ? playlist.loopEnabled : false,
      playbackPositionMs: playlist ? playlist.playbackPositionMs : 0,
      volume: this.state.volume,
      zoomLevel: this.state.zoomLevel,
      recentFolders: [...this.state.recentFolders],
    };
  }

  /**
   * Stop timers, apply queued events, write a final save. Idempotent.
   */
  shutdown(): Promise<SaveOutcome> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<SaveOutcome> {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.unsubscribeEnd?.();
    this.unsubscribeEnd = null;

    this.pollPosition();
    await this.queue;
    this.engine.stop();

    const outcome = await this.scheduler.shutdown();
    controllerLogger.info('Shutdown complete, final save:', outcome.status);
    return outcome;
  }

  private async apply(event: AppEvent): Promise<EventResult> {
    try {
      return await this.applyEvent(event);
    } catch (error) {
      const appError = handleError(error, 'AppController', { code: ErrorCode.INVALID_STATE });
      this.publishNotice('warning', 'invalid-event', appError.message);
      return UNCHANGED;
    }
  }

  private async applyEvent(event: AppEvent): Promise<EventResult> {
    switch (event.type) {
      case 'folder.open':
        return this.openFolderAt(event.path);
      case 'track.changed':
        return this.changeTrackTo(event.index);
      case 'track.next':
        return this.step(1, false);
      case 'track.previous':
        return this.step(-1, false);
      case 'track.ended':
        return this.step(1, true);
      case 'position.updated':
        return this.updatePositionTo(event.positionMs);
      case 'position.seek':
        return this.seekBy(event.offsetMs);
      case 'track.restart':
        return this.seekTo(0);
      case 'shuffle.toggle':
        return this.toggleShuffle(event.enabled);
      case 'shuffle.reshuffle':
        return this.reshuffleCurrent();
      case 'loop.toggle': {
        const { playlist } = this.requireOpenFolder();
        toggleLoop(playlist);
        this.commit('loop-toggled');
        return { changed: true };
      }
      case 'volume.set': {
        this.engine.setVolume(setVolume(this.state, event.volume));
        this.commit();
        return { changed: true };
      }
      case 'volume.step': {
        this.engine.setVolume(stepVolume(this.state, event.delta));
        this.commit();
        return { changed: true };
      }
      case 'playlist.filter':
        return this.setFilter(event.query);
      case 'zoom.in':
        zoomIn(this.state);
        this.commit();
        return { changed: true };
      case 'zoom.out':
        zoomOut(this.state);
        this.commit();
        return { changed: true };
      case 'zoom.reset':
        resetZoom(this.state);
        this.commit();
        return { changed: true };
    }
  }

  private async openFolderAt(requestedPath: string): Promise<EventResult> {
    if (typeof requestedPath !== 'string' || requestedPath.trim().length === 0 || requestedPath.includes('\0')) {
      throw Errors.invalidArgument('path', 'folder path');
    }
    const folderPath = path.resolve(requestedPath);

    let tracks: string[] = [];
    let missing = false;
    try {
      tracks = await this.scan(folderPath);
    } catch (error) {
      if (!(error instanceof FolderNotFoundError)) {
        throw error;
      }
      missing = true;
      this.publishNotice('warning', 'folder-missing', error.message);
    }

    this.state.recentFolders = addRecentFolder(this.state.recentFolders, folderPath);
    const { playlist, created } = getOrCreatePlaylist(this.state, folderPath);

    if (!missing) {
      const result = reconcilePlaylist(playlist, tracks.length);
      if (result.shuffleDiscarded) {
        controllerLogger.warn(Errors.invalidPermutation(folderPath, tracks.length).message, '- using natural order');
      }
      if (result.indexClamped) {
        controllerLogger.debug('Current index clamped to', playlist.currentIndex);
      }
    }

    this.openFolder = { path: folderPath, tracks, missing };
    this.filter = null;
    controllerLogger.debug(created ? 'New playlist for' : 'Reopened', folderPath, `(${tracks.length} tracks)`);

    this.engine.stop();
    const trackPath = this.currentTrackPath();
    if (trackPath) {
      this.engine.load(trackPath, playlist.playbackPositionMs);
    }

    this.commit('folder-opened');
    return { changed: true };
  }

  private changeTrackTo(index: number): EventResult {
    const { folder, playlist } = this.requireOpenFolder();
    changeTrack(playlist, folder.tracks.length, index);
    this.playCurrent(playlist);
    this.commit('track-changed');
    return { changed: true };
  }

  private step(direction: StepDirection, fromPlayback: boolean): EventResult {
    const { folder, playlist } = this.requireOpenFolder();
    const step = stepTrack(playlist, folder.tracks.length, direction);

    if (step.type === 'moved') {
      this.playCurrent(playlist);
      this.commit('track-changed');
      return { changed: true, step };
    }

    if (step.type === 'end-of-playlist') {
      if (fromPlayback) {
        this.engine.stop();
      }
      this.publishNotice('info', 'end-of-playlist', direction === 1 ? 'End of playlist' : 'Start of playlist');
    }
    return { changed: false, step };
  }

  private updatePositionTo(positionMs: number): EventResult {
    const folder = this.openFolder;
    const playlist = folder ? this.state.playlists[folder.path] : undefined;
    if (!folder || !playlist || this.currentTrackPath() === null) {
      return UNCHANGED;
    }
    const before = playlist.playbackPositionMs;
    updatePosition(playlist, positionMs);
    if (playlist.playbackPositionMs === before) {
      return UNCHANGED;
    }
    this.commit();
    return { changed: true };
  }

  private seekBy(offsetMs: number): EventResult {
    if (!Number.isFinite(offsetMs)) {
      throw Errors.invalidArgument('offsetMs', 'finite number');
    }
    if (this.currentTrackPath() === null) {
      return UNCHANGED;
    }
    return this.seekTo(this.engine.getPositionMs() + offsetMs);
  }

  // The track length is unknown here, so only the start is clamped
  private seekTo(positionMs: number): EventResult {
    const folder = this.openFolder;
    const playlist = folder ? this.state.playlists[folder.path] : undefined;
    if (!playlist || this.currentTrackPath() === null) {
      return UNCHANGED;
    }
    updatePosition(playlist, positionMs);
    this.engine.seek(playlist.playbackPositionMs);
    this.commit();
    return { changed: true };
  }

  private setFilter(query: string | null): EventResult {
    const normalized = query === null ? '' : query.trim().toLowerCase();
    const next = normalized.length > 0 ? normalized : null;
    if (next === this.filter) {
      return UNCHANGED;
    }
    this.filter = next;
    this.publish({ type: 'view', view: this.getView() });
    return { changed: true };
  }

  private toggleShuffle(enabled: boolean): EventResult {
    const { folder, playlist } = this.requireOpenFolder();
    if (folder.missing) {
      return UNCHANGED;
    }
    const changed = enabled
      ? enableShuffle(playlist, folder.tracks.length, this.random)
      : disableShuffle(playlist, folder.tracks.length);
    if (!changed) {
      return UNCHANGED;
    }
    this.commit('shuffle-toggled');
    return { changed: true };
  }

  private reshuffleCurrent(): EventResult {
    const { folder, playlist } = this.requireOpenFolder();
    if (!reshuffle(playlist, folder.tracks.length, this.reshufflePolicy, this.random)) {
      return UNCHANGED;
    }
    if (this.reshufflePolicy === 'restart') {
      this.playCurrent(playlist);
    }
    this.commit('reshuffled');
    return { changed: true };
  }

  private requireOpenFolder(): { folder: OpenFolder; playlist: PlaylistState } {
    const folder = this.openFolder;
    const playlist = folder ? this.state.playlists[folder.path] : undefined;
    if (!folder || !playlist) {
      throw new AppError('No folder is open', ErrorCode.INVALID_STATE);
    }
    return { folder, playlist };
  }

  private currentTrackPath(): string | null {
    const folder = this.openFolder;
    const playlist = folder ? this.state.playlists[folder.path] : undefined;
    if (!folder || !playlist) {
      return null;
    }
    const natural = getCurrentNaturalIndex(playlist, folder.tracks.length);
    return natural === null ? null : path.join(folder.path, folder.tracks[natural]);
  }

  private playCurrent(playlist: PlaylistState): void {
    const trackPath = this.currentTrackPath();
    if (trackPath) {
      this.engine.play(trackPath, playlist.playbackPositionMs);
    }
  }

  private pollPosition(): void {
    const folder = this.openFolder;
    const playlist = folder ? this.state.playlists[folder.path] : undefined;
    if (!playlist || this.currentTrackPath() === null) {
      return;
    }
    const positionMs = Math.round(this.engine.getPositionMs());
    if (positionMs !== playlist.playbackPositionMs) {
      void this.enqueue({ type: 'position.updated', positionMs });
    }
  }

  private commit(saveReason?: SaveReason): void {
    this.scheduler.markDirty();
    this.publish({ type: 'view', view: this.getView() });
    if (saveReason) {
      void this.scheduler.requestSave(saveReason);
    }
  }

  private publishNotice(level: Notice['level'], code: NoticeCode, message: string): void {
    this.publish({ type: 'notice', notice: { level, code, message } });
  }

  private publish(update: ControllerUpdate): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(update);
      } catch (error) {
        handleError(error, 'AppController listener');
      }
    }
  }
}
