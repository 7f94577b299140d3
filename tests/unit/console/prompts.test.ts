/**
 * Unit tests for prompt helpers
 */

import { askCount, askOptional, askRequired } from '../../../src/console/prompts';
import { InputClosedError } from '../../../src/console/prompter';
import { ScriptedPrompter, createOutput } from '../../helpers/testPrompter';

describe('Prompt helpers', () => {
  describe('askRequired', () => {
    it('should re-ask until the answer is not blank', async () => {
      const prompter = new ScriptedPrompter(['', '   ', ' Dune ']);
      const output = createOutput();

      await expect(askRequired(prompter, output.print, 'Title: ')).resolves.toBe('Dune');
      expect(prompter.questions).toEqual(['Title: ', 'Title: ', 'Title: ']);
      expect(output.lines).toEqual(['A value is required.', 'A value is required.']);
    });

    it('should give up when input closes', async () => {
      const prompter = new ScriptedPrompter(['']);

      await expect(askRequired(prompter, () => undefined, 'Title: ')).rejects.toBeInstanceOf(InputClosedError);
    });
  });

  describe('askOptional', () => {
    it('should accept a blank answer', async () => {
      await expect(askOptional(new ScriptedPrompter(['  ']), 'Genre: ')).resolves.toBe('');
    });
  });

  describe('askCount', () => {
    it('should re-ask until the answer is a whole number', async () => {
      const prompter = new ScriptedPrompter(['three', '-1', '2.5', '4']);
      const output = createOutput();

      await expect(askCount(prompter, output.print, 'Quantity: ')).resolves.toBe(4);
      expect(output.lines).toEqual([
        'Please enter a whole number of 0 or more.',
        'Please enter a whole number of 0 or more.',
        'Please enter a whole number of 0 or more.',
      ]);
    });

    it('should re-ask when the number is too large to count exactly', async () => {
      const prompter = new ScriptedPrompter(['100000000000000000000', '12']);
      const output = createOutput();

      await expect(askCount(prompter, output.print, 'Quantity: ')).resolves.toBe(12);
      expect(output.lines).toEqual(['That number is too large.']);
    });

    it('should accept zero', async () => {
      await expect(askCount(new ScriptedPrompter(['0']), () => undefined, 'Quantity: ')).resolves.toBe(0);
    });
  });
});
