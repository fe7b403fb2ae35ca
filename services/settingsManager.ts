import os from 'os';
import path from 'path';
import { AUTOSAVE, STATE } from '../constants/config';
import type { ReshufflePolicy } from '../types';
import { LogLevel, logger, parseLogLevel } from './logger';

export interface RuntimeSettings {
  stateDir: string;
  stateFile: string;
  lockFile: string;
  logLevel: LogLevel;
  reshufflePolicy: ReshufflePolicy;
  autosaveIntervalMs: number;
}

export interface SettingsOverrides {
  stateDir?: string;
  verbose?: boolean;
}

type Environment = Record<string, string | undefined>;

function parseReshufflePolicy(value: string | undefined): ReshufflePolicy | null {
  if (value === 'keep-current' || value === 'restart') {
    return value;
  }
  return null;
}

function parseInterval(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value.trim())) {
    return null;
  }
  const interval = Number(value.trim());
  return interval > 0 ? interval : null;
}

class SettingsManager {
  constructor(private readonly env: Environment = process.env) {}

  // Order: --state-dir, FOLDER_PLAYER_HOME, XDG_CONFIG_HOME, ~/.config
  getDefaultStateDir(): string {
    const fromEnv = this.env.FOLDER_PLAYER_HOME;
    if (fromEnv) {
      return path.resolve(fromEnv);
    }
    const configHome = this.env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
    return path.join(configHome, STATE.DIR_NAME);
  }

  resolve(overrides: SettingsOverrides = {}): RuntimeSettings {
    const stateDir = overrides.stateDir ? path.resolve(overrides.stateDir) : this.getDefaultStateDir();

    const reshuffleSetting = this.env.FOLDER_PLAYER_RESHUFFLE;
    const reshufflePolicy = parseReshufflePolicy(reshuffleSetting);
    if (reshuffleSetting && !reshufflePolicy) {
      logger.warn('[SettingsManager] Unknown reshuffle policy, using keep-current:', reshuffleSetting);
    }

    const intervalSetting = this.env.FOLDER_PLAYER_AUTOSAVE_MS;
    const autosaveIntervalMs = parseInterval(intervalSetting);
    if (intervalSetting && autosaveIntervalMs === null) {
      logger.warn('[SettingsManager] Ignoring invalid autosave interval:', intervalSetting);
    }

    const logLevel = overrides.verbose
      ? LogLevel.DEBUG
      : parseLogLevel(this.env.LOG_LEVEL) ?? logger.getLevel();

    return {
      stateDir,
      stateFile: path.join(stateDir, STATE.FILE_NAME),
      lockFile: path.join(stateDir, STATE.LOCK_NAME),
      logLevel,
      reshufflePolicy: reshufflePolicy ?? 'keep-current',
      autosaveIntervalMs: autosaveIntervalMs ?? AUTOSAVE.INTERVAL_MS,
    };
  }
}

export { SettingsManager };

export const settingsManager = new SettingsManager();
