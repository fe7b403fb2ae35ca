/**
 * Console playback engine
 * Stands in for a media backend: it records what would play and keeps a
 * running position clock, but produces no audio.
 */

import path from 'path';
import type { PlaybackEngine } from '../types';
import { logger } from './logger';

const playbackLogger = logger.withScope('Playback');

type EngineStatus = 'stopped' | 'paused' | 'playing';

export class ConsolePlaybackEngine implements PlaybackEngine {
  private status: EngineStatus = 'stopped';
  private filePath: string | null = null;
  private basePositionMs = 0;
  private startedAt = 0;
  private volume = 100;
  private readonly endListeners = new Set<() => void>();

  constructor(private readonly now: () => number = Date.now) {}

  play(filePath: string, startPositionMs: number): void {
    this.filePath = filePath;
    this.basePositionMs = Math.max(0, startPositionMs);
    this.startedAt = this.now();
    this.status = 'playing';
    playbackLogger.info('Playing', path.basename(filePath), `from ${this.basePositionMs} ms`);
  }

  load(filePath: string, startPositionMs: number): void {
    this.filePath = filePath;
    this.basePositionMs = Math.max(0, startPositionMs);
    this.status = 'paused';
    playbackLogger.info('Loaded', path.basename(filePath), `at ${this.basePositionMs} ms (paused)`);
  }

  pause(): void {
    if (this.status !== 'playing') {
      return;
    }
    this.basePositionMs = this.getPositionMs();
    this.status = 'paused';
  }

  resume(): void {
    if (this.status !== 'paused' || !this.filePath) {
      return;
    }
    this.startedAt = this.now();
    this.status = 'playing';
  }

  stop(): void {
    this.status = 'stopped';
    this.filePath = null;
    this.basePositionMs = 0;
  }

  seek(positionMs: number): void {
    this.basePositionMs = Math.max(0, positionMs);
    this.startedAt = this.now();
  }

  setVolume(volume: number): void {
    this.volume = Math.max(0, Math.min(100, Math.round(volume)));
  }

  getVolume(): number {
    return this.volume;
  }

  getPositionMs(): number {
    if (this.status === 'playing') {
      return this.basePositionMs + (this.now() - this.startedAt);
    }
    return this.basePositionMs;
  }

  getStatus(): EngineStatus {
    return this.status;
  }

  getCurrentFile(): string | null {
    return this.filePath;
  }

  onEnd(listener: () => void): () => void {
    this.endListeners.add(listener);
    return () => {
      this.endListeners.delete(listener);
    };
  }

  /**
   * Report the current track as finished, as a media backend would
   */
  finishTrack(): void {
    if (!this.filePath) {
      return;
    }
    this.status = 'stopped';
    for (const listener of [...this.endListeners]) {
      listener();
    }
  }
}
