import type { PlaybackEngine } from '../types';
import { AppController } from './appController';
import { LockCoordinator, type LockDecision, type LockStrategy } from './lockCoordinator';
import { logger } from './logger';
import type { RuntimeSettings } from './settingsManager';
import { StateStore } from './stateStore';
import type { SaveOutcome } from './autosaveScheduler';

const bootLogger = logger.withScope('Bootstrap');

export interface AppContext {
  controller: AppController;
  store: StateStore;
  lock: LockCoordinator;
  decision: LockDecision;
  /** Final save, then release of the writer lock */
  close(): Promise<SaveOutcome>;
}

export interface OpenAppOptions {
  settings: RuntimeSettings;
  engine: PlaybackEngine;
  lockStrategy?: LockStrategy;
}

/**
 * Decide the instance role, load the state and build the controller.
 * The controller is not started.
 */
export async function openApp(options: OpenAppOptions): Promise<AppContext> {
  const { settings, engine } = options;

  const lock = new LockCoordinator(settings.lockFile, { strategy: options.lockStrategy });
  const decision = await lock.acquire();

  const store = new StateStore(settings.stateFile);
  if (decision.role === 'writer') {
    await store.removeStaleTempFiles();
  }
  const { state, error } = await store.loadOrDefault();

  const controller = new AppController({
    state,
    lock: decision,
    writer: store,
    engine,
    reshufflePolicy: settings.reshufflePolicy,
    autosaveIntervalMs: settings.autosaveIntervalMs,
    loadError: error,
  });

  bootLogger.debug('Opened', settings.stateFile, 'as', decision.role);

  let closing: Promise<SaveOutcome> | null = null;
  const close = (): Promise<SaveOutcome> => {
    if (!closing) {
      closing = (async () => {
        try {
          return await controller.shutdown();
        } finally {
          await lock.release();
        }
      })();
    }
    return closing;
  };

  return { controller, store, lock, decision, close };
}
