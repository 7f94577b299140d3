import { hasErrorCode } from '../errors/libraryError';
import { ReportKind } from '../services/library';
import { ErrorCode } from '../types/errors';
import { MenuCommand } from './commands';
import { CommandHandler } from './context';
import { formatListing, formatReport } from './format';
import { askCount, askOptional, askRequired } from './prompts';

const plural = (count: number, one: string, many: string) => `${count} ${count === 1 ? one : many}`;

const addBook: CommandHandler = async ({ library, prompter, print }) => {
  const title = await askRequired(prompter, print, 'Title: ');
  const author = await askOptional(prompter, 'Author: ');
  const genre = await askOptional(prompter, 'Genre: ');
  const quantity = await askCount(prompter, print, 'Quantity: ');

  const book = library.addBook({ title, author, genre, quantity });
  print(`Book added: "${book.title}" (${plural(book.quantity, 'copy', 'copies')}).`);
  return 'continue';
};

const removeBook: CommandHandler = async ({ library, prompter, print }) => {
  const title = await askRequired(prompter, print, 'Title to remove: ');
  const book = library.removeBook(title);
  print(`Removed "${book.title}".`);
  return 'continue';
};

const addUser: CommandHandler = async ({ library, prompter, print }) => {
  const name = await askRequired(prompter, print, 'Name: ');
  const contact = await askOptional(prompter, 'Contact info: ');

  const user = library.addUser({ name, contact });
  print(`User added: ${user.name}.`);
  return 'continue';
};

const removeUser: CommandHandler = async ({ library, prompter, print }) => {
  const name = await askRequired(prompter, print, 'Name of user to remove: ');
  const user = library.removeUser(name);
  print(`Removed user ${user.name}.`);
  return 'continue';
};

const issueBook: CommandHandler = async ({ library, prompter, print }) => {
  const name = await askRequired(prompter, print, 'User name: ');
  const title = await askRequired(prompter, print, 'Book title: ');

  const { book, user } = library.issueBook(name, title);
  print(`Issued "${book.title}" to ${user.name}. ${plural(book.quantity, 'copy', 'copies')} left.`);
  return 'continue';
};

const returnBook: CommandHandler = async ({ library, prompter, print }) => {
  const name = await askRequired(prompter, print, 'User name: ');
  const title = await askRequired(prompter, print, 'Book title: ');

  const { book, user } = library.returnBook(name, title);
  print(`${user.name} returned "${book.title}". ${plural(book.quantity, 'copy', 'copies')} available.`);
  return 'continue';
};

const view: CommandHandler = async ({ library, print }) => {
  formatListing(library.listBooks(), library.listUsers()).forEach((line) => print(line));
  return 'continue';
};

const save: CommandHandler = async ({ library, persistence, print }) => {
  const filePath = await persistence.save(library.getState());
  print(`Saved to ${filePath}.`);
  return 'continue';
};

/**
 * A missing file keeps the current library; anything else is an error
 */
const load: CommandHandler = async ({ library, persistence, print }) => {
  try {
    library.replaceState(await persistence.load());
  } catch (error) {
    if (hasErrorCode(error, ErrorCode.FILE_NOT_FOUND)) {
      print(`No saved data at ${persistence.defaultPath}.`);
      return 'continue';
    }
    throw error;
  }
  print(`Loaded from ${persistence.defaultPath}.`);
  return 'continue';
};

const REPORT_ORDER = [
  ReportKind.SUMMARY,
  ReportKind.AVAILABLE_VS_BORROWED,
  ReportKind.MOST_POPULAR,
  ReportKind.OVERDUE_USERS,
] as const;

const reports: CommandHandler = async ({ library, print }) => {
  for (const kind of REPORT_ORDER) {
    formatReport(library.generateReport(kind)).forEach((line) => print(line));
  }
  return 'continue';
};

const exit: CommandHandler = async ({ print }) => {
  print('Goodbye.');
  return 'exit';
};

export const commandHandlers: Record<MenuCommand, CommandHandler> = {
  [MenuCommand.ADD_BOOK]: addBook,
  [MenuCommand.REMOVE_BOOK]: removeBook,
  [MenuCommand.ADD_USER]: addUser,
  [MenuCommand.REMOVE_USER]: removeUser,
  [MenuCommand.ISSUE_BOOK]: issueBook,
  [MenuCommand.RETURN_BOOK]: returnBook,
  [MenuCommand.VIEW]: view,
  [MenuCommand.SAVE]: save,
  [MenuCommand.LOAD]: load,
  [MenuCommand.REPORTS]: reports,
  [MenuCommand.EXIT]: exit,
};
