/**
 * State file persistence
 * Reads and validates the state document, and writes it atomically:
 * temporary file in the same directory, fsync, then rename over the target.
 */

import { randomBytes } from 'crypto';
import fs from 'fs';
import path from 'path';
import type { AppState } from '../types';
import { createDefaultAppState } from '../utils/appState';
import {
  Errors,
  StateLoadError,
  errorResult,
  handleError,
  successResult,
  type Result,
} from '../utils/errorHandler';
import { logger } from './logger';
import { serializeState } from './stateSerializer';
import { ValidationError, validateAppState } from './stateValidator';

const storeLogger = logger.withScope('StateStore');

const TEMP_SUFFIX = '.tmp';

export interface SavedState {
  filePath: string;
  bytes: number;
}

export interface LoadOutcome {
  state: AppState;
  /** Set when an existing file was rejected and defaults were used */
  error: StateLoadError | null;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class StateStore {
  readonly filePath: string;
  private readonly directory: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
    this.directory = path.dirname(this.filePath);
  }

  /**
   * Load state from disk. A missing file yields the default state.
   * @throws StateLoadError when the file is unreadable, not JSON, or not a
   * state document
   */
  async load(): Promise<AppState> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        storeLogger.debug('No state file, starting fresh:', this.filePath);
        return createDefaultAppState();
      }
      throw Errors.stateLoadFailed(this.filePath, 'unreadable', error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw Errors.stateLoadFailed(this.filePath, 'invalid JSON', error);
    }

    try {
      const state = validateAppState(data);
      storeLogger.debug('State loaded, playlists:', Object.keys(state.playlists).length);
      return state;
    } catch (error) {
      if (error instanceof ValidationError) {
        throw Errors.stateLoadFailed(this.filePath, error.message, error);
      }
      throw error;
    }
  }

  /**
   * Load state, substituting the default state for a rejected file
   */
  async loadOrDefault(): Promise<LoadOutcome> {
    try {
      return { state: await this.load(), error: null };
    } catch (error) {
      if (error instanceof StateLoadError) {
        storeLogger.warn(error.message, '- using default state');
        return { state: createDefaultAppState(), error };
      }
      throw error;
    }
  }

  /**
   * Write the full state atomically. Failures are reported, not thrown; the
   * previous file is left as it was.
   */
  async save(state: AppState): Promise<Result<SavedState>> {
    const content = serializeState(state);
    const tempPath = this.createTempPath();

    try {
      await fs.promises.mkdir(this.directory, { recursive: true });

      const handle = await fs.promises.open(tempPath, 'wx');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      return errorResult(handleError(Errors.stateSaveFailed(this.filePath, error), 'StateStore'));
    }

    await this.syncDirectory();

    const bytes = Buffer.byteLength(content, 'utf-8');
    storeLogger.debug('State saved:', this.filePath, `(${bytes} bytes)`);
    return successResult({ filePath: this.filePath, bytes });
  }

  /**
   * Remove temporary files left behind by an interrupted save. Only the
   * writer may call this: a reader could delete a save in progress.
   */
  async removeStaleTempFiles(): Promise<number> {
    const prefix = `${path.basename(this.filePath)}.`;
    let names: string[];
    try {
      names = await fs.promises.readdir(this.directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return 0;
      }
      storeLogger.warn('Could not list state directory:', error);
      return 0;
    }

    const stale = names.filter(name => name.startsWith(prefix) && name.endsWith(TEMP_SUFFIX));
    for (const name of stale) {
      await this.removeTempFile(path.join(this.directory, name));
    }
    if (stale.length > 0) {
      storeLogger.info(`Removed ${stale.length} stale temporary file(s)`);
    }
    return stale.length;
  }

  private createTempPath(): string {
    const unique = `${process.pid}.${randomBytes(4).toString('hex')}`;
    return path.join(this.directory, `${path.basename(this.filePath)}.${unique}${TEMP_SUFFIX}`);
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.promises.rm(tempPath, { force: true });
    } catch (error) {
      storeLogger.warn('Could not remove temporary file:', tempPath, error);
    }
  }

  // Persist the rename itself; not supported for directories on Windows
  private async syncDirectory(): Promise<void> {
    if (process.platform === 'win32') {
      return;
    }
    try {
      const handle = await fs.promises.open(this.directory, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (error) {
      storeLogger.debug('Directory sync skipped:', error);
    }
  }
}
