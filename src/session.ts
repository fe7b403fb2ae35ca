import readline from 'readline';
import type { AppContext } from '../services/appBootstrap';
import type { ConsolePlaybackEngine } from '../services/playbackEngine';
import { formatNotice, formatRecentFolders, formatView } from '../utils/formatView';
import { HELP_LINES, parseSessionLine } from './commands';

export type LineWriter = (line: string) => void;

export interface SessionOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  write?: LineWriter;
  /** Where SIGINT and SIGTERM are heard; the process by default */
  signals?: NodeJS.EventEmitter;
}

const STOP_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Interactive prompt over a running app. Returns after "quit", end of
 * input, Ctrl+C or SIGTERM, once the final save has been attempted and the
 * lock released.
 */
export async function runSession(
  app: AppContext,
  engine: ConsolePlaybackEngine,
  options: SessionOptions = {}
): Promise<void> {
  const write: LineWriter = options.write ?? ((line) => console.log(line));
  const printLines = (lines: string[]) => lines.forEach(line => write(line));
  const { controller } = app;
  const signals: NodeJS.EventEmitter = options.signals ?? process;
  let onSignal: (() => void) | null = null;

  const unsubscribe = controller.subscribe((update) => {
    if (update.type === 'notice') {
      write(formatNotice(update.notice));
    }
  });

  try {
    await controller.start();
    printLines(formatView(controller.getView()));
    write('Type "help" for commands.');

    // Leaving the loop closes the interface
    const rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout,
      prompt: '> ',
    });
    rl.on('SIGINT', () => rl.close());
    // Readline only reports Ctrl+C on a TTY; signals from elsewhere end the loop too
    const stop = () => rl.close();
    onSignal = stop;
    for (const signal of STOP_SIGNALS) {
      signals.once(signal, stop);
    }
    rl.prompt();

    for await (const line of rl) {
      const command = parseSessionLine(line);
      if (command === null) {
        rl.prompt();
        continue;
      }

      if (command.kind === 'quit') {
        break;
      }

      switch (command.kind) {
        case 'event': {
          const result = await controller.dispatch(command.event);
          if (result.changed) {
            printLines(formatView(controller.getView()));
          }
          break;
        }
        case 'status':
          printLines(formatView(controller.getView()));
          break;
        case 'recent':
          printLines(formatRecentFolders(controller.getView().recentFolders));
          break;
        case 'pause':
          engine.pause();
          break;
        case 'resume':
          engine.resume();
          break;
        case 'end-track':
          engine.finishTrack();
          await controller.whenIdle();
          printLines(formatView(controller.getView()));
          break;
        case 'help':
          printLines(HELP_LINES);
          break;
        case 'error':
          write(command.message);
          break;
      }
      rl.prompt();
    }
  } finally {
    if (onSignal) {
      for (const signal of STOP_SIGNALS) {
        signals.off(signal, onSignal);
      }
    }
    const outcome = await app.close();
    unsubscribe();
    if (outcome.status === 'saved') {
      write('State saved.');
    } else if (outcome.status === 'suppressed') {
      write('Read-only instance, state not saved.');
    }
  }
}
