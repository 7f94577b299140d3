#!/usr/bin/env node
import { config, getEnvironmentInfo } from './config';
import { ConsoleContext, ReadlinePrompter, loadOnStartup, runMenu } from './console';
import { logger } from './observability';
import { LibraryService } from './services/library';
import { PersistenceService } from './services/persistence';

const startConsole = async (): Promise<void> => {
  logger.info(getEnvironmentInfo(), 'Library manager starting');

  const prompter = new ReadlinePrompter();
  const ctx: ConsoleContext = {
    library: new LibraryService(),
    persistence: new PersistenceService(),
    prompter,
    print: (line) => console.log(line),
  };

  try {
    if (config.storage.autoload) {
      await loadOnStartup(ctx);
    }
    process.exitCode = await runMenu(ctx);
  } finally {
    prompter.close();
  }

  logger.info({ exitCode: process.exitCode }, 'Library manager stopped');
};

startConsole().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Library manager failed');
  console.error('Failed to run library manager:', error);
  process.exit(1);
});
