import { LibraryService } from '../services/library';
import { PersistenceService } from '../services/persistence';
import { Prompter } from './prompter';
import { Print } from './prompts';

export interface ConsoleContext {
  library: LibraryService;
  persistence: PersistenceService;
  prompter: Prompter;
  print: Print;
}

export type CommandOutcome = 'continue' | 'exit';

export type CommandHandler = (ctx: ConsoleContext) => Promise<CommandOutcome>;
