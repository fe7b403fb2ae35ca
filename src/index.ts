#!/usr/bin/env node
import * as command from 'commander';
import { APP } from '../constants/config';
import { openApp } from '../services/appBootstrap';
import { logger } from '../services/logger';
import { ConsolePlaybackEngine } from '../services/playbackEngine';
import { settingsManager, type RuntimeSettings } from '../services/settingsManager';
import type { AppEvent } from '../types';
import { handleError } from '../utils/errorHandler';
import { formatNotice, formatRecentFolders, formatView } from '../utils/formatView';
import {
  parseFind,
  parsePlayPosition,
  parseSeek,
  parseShuffle,
  parseVolume,
  parseZoom,
  type SessionCommand,
} from './commands';
import { runSession } from './session';

type GlobalOptions = {
  stateDir?: string;
  verbose?: boolean;
};

type Output = 'view' | 'recent';

const program = new command.Command();

function configure(): RuntimeSettings {
  const options = program.opts<GlobalOptions>();
  const settings = settingsManager.resolve({ stateDir: options.stateDir, verbose: options.verbose });
  logger.setLevel(settings.logLevel);
  return settings;
}

function expectEvent(parsed: SessionCommand): AppEvent {
  if (parsed.kind === 'event') {
    return parsed.event;
  }
  return program.error(parsed.kind === 'error' ? parsed.message : `Unexpected command: ${parsed.kind}`);
}

/**
 * Open the app, apply at most one event, print the result and shut down
 */
async function runOnce(
  event: AppEvent | null,
  output: Output = 'view',
  restoreLastFolder = true
): Promise<void> {
  const settings = configure();
  const engine = new ConsolePlaybackEngine();
  const app = await openApp({ settings, engine });

  const unsubscribe = app.controller.subscribe((update) => {
    if (update.type === 'notice' && update.notice.code !== 'read-only') {
      console.log(formatNotice(update.notice));
    }
  });

  try {
    await app.controller.start({ restoreLastFolder });
    if (event) {
      await app.controller.dispatch(event);
    }
  } finally {
    await app.close();
    unsubscribe();
  }

  const view = app.controller.getView();
  const lines = output === 'recent' ? formatRecentFolders(view.recentFolders) : formatView(view);
  lines.forEach(line => console.log(line));
}

async function main() {
  program
    .name(APP.NAME)
    .version(APP.VERSION)
    .description('Per-folder media playlists that remember their order and position')
    .option('-d, --state-dir <dir>', 'directory holding the state file')
    .option('-v, --verbose', 'print debug logging');

  program
    .command('open')
    .argument('<folder>', 'folder with media files')
    .description('open a folder and show its playlist')
    .action((folder: string) => runOnce({ type: 'folder.open', path: folder }, 'view', false));

  program
    .command('status')
    .description('show the playlist of the most recent folder')
    .action(() => runOnce(null));

  program
    .command('recent')
    .description('list the recently opened folders')
    .action(() => runOnce(null, 'recent', false));

  program
    .command('next')
    .description('move to the next track')
    .action(() => runOnce({ type: 'track.next' }));

  program
    .command('prev')
    .description('move to the previous track')
    .action(() => runOnce({ type: 'track.previous' }));

  program
    .command('play')
    .argument('<position>', 'list position, starting at 1')
    .description('jump to a position in the playlist')
    .action((position: string) => runOnce(expectEvent(parsePlayPosition(position))));

  program
    .command('shuffle')
    .argument('<mode>', 'on or off')
    .description('turn shuffle mode on or off')
    .action((mode: string) => runOnce(expectEvent(parseShuffle(mode))));

  program
    .command('reshuffle')
    .description('generate a new shuffle order')
    .action(() => runOnce({ type: 'shuffle.reshuffle' }));

  program
    .command('loop')
    .description('toggle looping at the ends of the playlist')
    .action(() => runOnce({ type: 'loop.toggle' }));

  // Unknown options pass through so that "-5" reaches the argument
  program
    .command('volume')
    .argument('<level>', '0 to 100, or +N / -N for a step')
    .description('set or step the volume')
    .allowUnknownOption()
    .action((level: string) => runOnce(expectEvent(parseVolume(level))));

  program
    .command('seek')
    .argument('<seconds>', '+S or -S seconds from the saved position')
    .description('move the saved position of the current track')
    .allowUnknownOption()
    .action((seconds: string) => runOnce(expectEvent(parseSeek(seconds))));

  program
    .command('restart')
    .description('rewind the current track to the start')
    .action(() => runOnce({ type: 'track.restart' }));

  program
    .command('find')
    .argument('<text...>', 'part of a file name')
    .description('show the tracks whose names contain the text')
    .action((text: string[]) => runOnce(expectEvent(parseFind(text.join(' ')))));

  program
    .command('zoom')
    .argument('<action>', 'in, out or reset')
    .description('change the zoom level')
    .action((action: string) => runOnce(expectEvent(parseZoom(action))));

  program
    .command('session')
    .description('interactive player prompt')
    .action(async () => {
      const settings = configure();
      const engine = new ConsolePlaybackEngine();
      const app = await openApp({ settings, engine });
      await runSession(app, engine);
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const appError = handleError(error, 'CLI');
  console.error(appError.message);
  process.exitCode = 1;
});
