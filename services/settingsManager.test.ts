import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { LogLevel, logger } from './logger';
import { SettingsManager } from './settingsManager';

describe('SettingsManager', () => {
  it('uses FOLDER_PLAYER_HOME for the state directory', () => {
    const settings = new SettingsManager({ FOLDER_PLAYER_HOME: '/tmp/fp-home' }).resolve();
    const stateDir = path.resolve('/tmp/fp-home');

    expect(settings).toEqual({
      stateDir,
      stateFile: path.join(stateDir, 'state.json'),
      lockFile: path.join(stateDir, 'state.lock'),
      logLevel: logger.getLevel(),
      reshufflePolicy: 'keep-current',
      autosaveIntervalMs: 5000,
    });
  });

  it('falls back to the XDG config directory, then ~/.config', () => {
    expect(new SettingsManager({ XDG_CONFIG_HOME: '/tmp/xdg' }).getDefaultStateDir()).toBe(
      path.join('/tmp/xdg', 'folder-player')
    );
    expect(new SettingsManager({}).getDefaultStateDir()).toBe(path.join(os.homedir(), '.config', 'folder-player'));
  });

  it('lets --state-dir win over the environment', () => {
    const settings = new SettingsManager({ FOLDER_PLAYER_HOME: '/tmp/fp-home' }).resolve({ stateDir: '/tmp/override' });
    expect(settings.stateFile).toBe(path.join(path.resolve('/tmp/override'), 'state.json'));
  });

  it('reads the reshuffle policy', () => {
    expect(new SettingsManager({ FOLDER_PLAYER_RESHUFFLE: 'restart' }).resolve().reshufflePolicy).toBe('restart');
    expect(new SettingsManager({ FOLDER_PLAYER_RESHUFFLE: 'sometimes' }).resolve().reshufflePolicy).toBe('keep-current');
  });

  it('reads the autosave interval', () => {
    expect(new SettingsManager({ FOLDER_PLAYER_AUTOSAVE_MS: '250' }).resolve().autosaveIntervalMs).toBe(250);
    expect(new SettingsManager({ FOLDER_PLAYER_AUTOSAVE_MS: 'soon' }).resolve().autosaveIntervalMs).toBe(5000);
    expect(new SettingsManager({ FOLDER_PLAYER_AUTOSAVE_MS: '0' }).resolve().autosaveIntervalMs).toBe(5000);
  });

  it('picks the log level from --verbose, then LOG_LEVEL', () => {
    expect(new SettingsManager({ LOG_LEVEL: 'error' }).resolve({ verbose: true }).logLevel).toBe(LogLevel.DEBUG);
    expect(new SettingsManager({ LOG_LEVEL: 'error' }).resolve().logLevel).toBe(LogLevel.ERROR);
    expect(new SettingsManager({ LOG_LEVEL: 'chatty' }).resolve().logLevel).toBe(logger.getLevel());
  });
});
