/**
 * Autosave scheduling
 *
 * Saves on a fixed interval when the state changed since the last save, and
 * immediately when asked. Saves are single-flight: while one runs, further
 * requests collapse into one follow-up save. Readers never write.
 */

import { AUTOSAVE } from '../constants/config';
import type { AppState } from '../types';
import {
  ErrorCode,
  errorResult,
  handleError,
  isErrorResult,
  type ErrorResult,
  type Result,
} from '../utils/errorHandler';
import { logger } from './logger';
import type { SavedState } from './stateStore';

const autosaveLogger = logger.withScope('Autosave');

export type SaveReason =
  | 'periodic'
  | 'folder-opened'
  | 'track-changed'
  | 'shuffle-toggled'
  | 'reshuffled'
  | 'loop-toggled'
  | 'shutdown';

export type SaveStatus = 'saved' | 'clean' | 'suppressed' | 'failed';

export interface SaveOutcome {
  status: SaveStatus;
  reason: SaveReason;
  error?: ErrorResult['error'];
}

export interface StateWriter {
  save(state: AppState): Promise<Result<SavedState>>;
}

export interface AutosaveOptions {
  writer: StateWriter;
  getState: () => AppState;
  /** False for reader instances: every request is suppressed */
  canWrite: boolean;
  intervalMs?: number;
  onSaveFailed?: (error: ErrorResult['error']) => void;
}

export class AutosaveScheduler {
  private readonly writer: StateWriter;
  private readonly getState: () => AppState;
  private readonly canWrite: boolean;
  private readonly intervalMs: number;
  private readonly onSaveFailed?: (error: ErrorResult['error']) => void;

  private timer: NodeJS.Timeout | null = null;
  private revision = 0;
  private savedRevision = 0;
  private inFlight: Promise<SaveOutcome> | null = null;
  private pending: { reason: SaveReason; force: boolean } | null = null;

  constructor(options: AutosaveOptions) {
    this.writer = options.writer;
    this.getState = options.getState;
    this.canWrite = options.canWrite;
    this.intervalMs = options.intervalMs ?? AUTOSAVE.INTERVAL_MS;
    this.onSaveFailed = options.onSaveFailed;
  }

  /**
   * Record that the state changed since the last save
   */
  markDirty(): void {
    this.revision++;
  }

  isDirty(): boolean {
    return this.revision !== this.savedRevision;
  }

  isSaving(): boolean {
    return this.inFlight !== null;
  }

  start(): void {
    if (this.timer || !this.canWrite) {
      return;
    }
    this.timer = setInterval(() => {
      void this.requestSave('periodic');
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Save now if the state is dirty. A forced request saves even when clean.
   * Never rejects.
   */
  requestSave(reason: SaveReason, force = false): Promise<SaveOutcome> {
    if (!this.canWrite) {
      return Promise.resolve({ status: 'suppressed', reason });
    }

    if (this.inFlight) {
      this.pending = {
        reason,
        force: force || (this.pending?.force ?? false),
      };
      return this.inFlight;
    }

    this.inFlight = this.drain(reason, force);
    return this.inFlight;
  }

  /**
   * Resolves once no save is running
   */
  async idle(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Stop the timer, let a running save finish, then write one final time
   */
  async shutdown(): Promise<SaveOutcome> {
    this.stop();
    await this.idle();
    return this.requestSave('shutdown', true);
  }

  private async drain(reason: SaveReason, force: boolean): Promise<SaveOutcome> {
    try {
      let outcome = await this.saveOnce(reason, force);
      while (this.pending) {
        const next = this.pending;
        this.pending = null;
        outcome = await this.saveOnce(next.reason, next.force);
      }
      return outcome;
    } finally {
      this.inFlight = null;
    }
  }

  private async saveOnce(reason: SaveReason, force: boolean): Promise<SaveOutcome> {
    if (!force && !this.isDirty()) {
      return { status: 'clean', reason };
    }

    const revision = this.revision;
    let result: Result<SavedState>;
    try {
      result = await this.writer.save(this.getState());
    } catch (error) {
      result = errorResult(handleError(error, 'Autosave', { code: ErrorCode.STATE_SAVE_FAILED }));
    }

    if (isErrorResult(result)) {
      autosaveLogger.warn(`Save failed (${reason}), will retry on the next trigger`);
      this.onSaveFailed?.(result.error);
      return { status: 'failed', reason, error: result.error };
    }

    this.savedRevision = Math.max(this.savedRevision, revision);
    autosaveLogger.debug(`Saved (${reason})`);
    return { status: 'saved', reason };
  }
}
