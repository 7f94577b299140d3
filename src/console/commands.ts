/**
 * Menu commands, keyed by what the user types at the prompt
 */
export enum MenuCommand {
  ADD_BOOK = '1',
  REMOVE_BOOK = '2',
  ADD_USER = '3',
  REMOVE_USER = '4',
  ISSUE_BOOK = '5',
  RETURN_BOOK = '6',
  VIEW = '7',
  SAVE = '8',
  LOAD = '9',
  REPORTS = '10',
  EXIT = '0',
}

export const MENU_LABELS: Record<MenuCommand, string> = {
  [MenuCommand.ADD_BOOK]: 'Add book',
  [MenuCommand.REMOVE_BOOK]: 'Remove book',
  [MenuCommand.ADD_USER]: 'Add user',
  [MenuCommand.REMOVE_USER]: 'Remove user',
  [MenuCommand.ISSUE_BOOK]: 'Issue book',
  [MenuCommand.RETURN_BOOK]: 'Return book',
  [MenuCommand.VIEW]: 'View books and users',
  [MenuCommand.SAVE]: 'Save data',
  [MenuCommand.LOAD]: 'Load data',
  [MenuCommand.REPORTS]: 'Reports',
  [MenuCommand.EXIT]: 'Exit',
};

// Display order: numbered actions first, Exit last
const MENU_ORDER: MenuCommand[] = [
  MenuCommand.ADD_BOOK,
  MenuCommand.REMOVE_BOOK,
  MenuCommand.ADD_USER,
  MenuCommand.REMOVE_USER,
  MenuCommand.ISSUE_BOOK,
  MenuCommand.RETURN_BOOK,
  MenuCommand.VIEW,
  MenuCommand.SAVE,
  MenuCommand.LOAD,
  MenuCommand.REPORTS,
  MenuCommand.EXIT,
];

export function renderMenu(): string[] {
  return ['', 'Library Manager', ...MENU_ORDER.map((command) => `${command}) ${MENU_LABELS[command]}`)];
}

export function parseMenuCommand(input: string): MenuCommand | undefined {
  const key = input.trim();
  return Object.values(MenuCommand).find((command) => command === key);
}
