/**
 * Menu loop
 *
 * Reads a command, runs its handler inside a per-command log context, and
 * repeats until Exit or the end of input.
 */

import { hasErrorCode } from '../errors/libraryError';
import { createServiceLogger, runCommandScope } from '../observability';
import { ErrorCode } from '../types/errors';
import { MENU_LABELS, MenuCommand, parseMenuCommand, renderMenu } from './commands';
import { CommandOutcome, ConsoleContext } from './context';
import { handleCommandError } from './errorHandler';
import { commandHandlers } from './handlers';
import { InputClosedError } from './prompter';

const log = createServiceLogger('console');

export const EXIT_OK = 0;

/**
 * Run one command; errors are reported and the menu continues
 */
export async function runCommand(command: MenuCommand, ctx: ConsoleContext): Promise<CommandOutcome> {
  return runCommandScope(MENU_LABELS[command], async () => {
    log.debug('Command started');
    try {
      const outcome = await commandHandlers[command](ctx);
      log.debug({ outcome }, 'Command completed');
      return outcome;
    } catch (error) {
      if (error instanceof InputClosedError) {
        throw error;
      }
      handleCommandError(error, ctx.print);
      return 'continue';
    }
  });
}

/**
 * Load the saved library before the first prompt. No file means an empty library.
 */
export async function loadOnStartup(ctx: ConsoleContext): Promise<void> {
  return runCommandScope('Startup load', async () => {
    try {
      ctx.library.replaceState(await ctx.persistence.load());
    } catch (error) {
      if (hasErrorCode(error, ErrorCode.FILE_NOT_FOUND)) {
        log.info('No saved data, starting empty');
        return;
      }
      handleCommandError(error, ctx.print);
      ctx.print('Starting with an empty library.');
    }
  });
}

export async function runMenu(ctx: ConsoleContext): Promise<number> {
  for (;;) {
    renderMenu().forEach((line) => ctx.print(line));

    try {
      const answer = await ctx.prompter.ask('Select option: ');
      const command = parseMenuCommand(answer);
      if (command === undefined) {
        ctx.print('Unknown option.');
        continue;
      }

      if ((await runCommand(command, ctx)) === 'exit') {
        return EXIT_OK;
      }
    } catch (error) {
      if (error instanceof InputClosedError) {
        log.info('Input closed, leaving menu');
        return EXIT_OK;
      }
      throw error;
    }
  }
}
