import { Prompter } from './prompter';

export type Print = (line: string) => void;

const WHOLE_NUMBER = /^\d+$/;

/**
 * Ask until the answer is not blank
 */
export async function askRequired(prompter: Prompter, print: Print, question: string): Promise<string> {
  for (;;) {
    const answer = (await prompter.ask(question)).trim();
    if (answer.length > 0) {
      return answer;
    }
    print('A value is required.');
  }
}

export async function askOptional(prompter: Prompter, question: string): Promise<string> {
  return (await prompter.ask(question)).trim();
}

/**
 * Ask until the answer is a whole number of 0 or more that counts exactly
 */
export async function askCount(prompter: Prompter, print: Print, question: string): Promise<number> {
  for (;;) {
    const answer = (await prompter.ask(question)).trim();
    if (!WHOLE_NUMBER.test(answer)) {
      print('Please enter a whole number of 0 or more.');
      continue;
    }
    const count = parseInt(answer, 10);
    if (Number.isSafeInteger(count)) {
      return count;
    }
    print('That number is too large.');
  }
}
