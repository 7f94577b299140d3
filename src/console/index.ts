export { MenuCommand, MENU_LABELS, renderMenu, parseMenuCommand } from './commands';
export { ConsoleContext, CommandHandler, CommandOutcome } from './context';
export { commandHandlers } from './handlers';
export { formatError, handleCommandError } from './errorHandler';
export { runCommand, runMenu, loadOnStartup, EXIT_OK } from './menu';
export { Prompter, ReadlinePrompter, InputClosedError } from './prompter';
