import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuid } from 'uuid';

/**
 * The menu command currently running. Everything logged while it runs is
 * tagged with its id, so one command's lines can be pulled out of the log.
 */
export interface CommandContext {
  commandId: string;
  command: string;
  /** Added while the command runs, e.g. the data file a save writes to */
  fields: Record<string, unknown>;
}

const commandStore = new AsyncLocalStorage<CommandContext>();

export const getCommandId = (): string | undefined => commandStore.getStore()?.commandId;

/**
 * Fields for the logger mixin; empty between commands
 */
export const commandLogFields = (): Record<string, unknown> => {
  const current = commandStore.getStore();
  return current ? { commandId: current.commandId, command: current.command, ...current.fields } : {};
};

/**
 * Tag the rest of the running command's log lines. Does nothing between commands.
 */
export const addCommandFields = (fields: Record<string, unknown>): void => {
  const current = commandStore.getStore();
  if (current) {
    Object.assign(current.fields, fields);
  }
};

/**
 * Run one command under a fresh command id
 */
export const runCommandScope = <T>(command: string, fn: () => T): T =>
  commandStore.run({ commandId: uuid(), command, fields: {} }, fn);
