/**
 * ReadlinePrompter tests
 *
 * Uses in-memory streams in place of stdin/stdout.
 */

import { PassThrough } from 'stream';

import { InputClosedError, ReadlinePrompter } from '../../../src/console/prompter';
import { captureAsyncError } from '../../helpers/errors';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('ReadlinePrompter', () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;
  let prompter: ReadlinePrompter;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    prompter = new ReadlinePrompter(input, output);
  });

  afterEach(() => {
    prompter.close();
  });

  it('should write the question and resolve with the next line', async () => {
    const answer = prompter.ask('Name: ');
    input.write('John Smith\n');

    await expect(answer).resolves.toBe('John Smith');
    await tick();
    expect(written).toBe('Name: ');
  });

  it('should keep lines that arrive before they are asked for', async () => {
    input.write('1\nDune\nFrank Herbert\n');
    await tick();

    expect(await prompter.ask('Select option: ')).toBe('1');
    expect(await prompter.ask('Title: ')).toBe('Dune');
    expect(await prompter.ask('Author: ')).toBe('Frank Herbert');
  });

  it('should reject a pending question when input ends', async () => {
    const answer = prompter.ask('Select option: ');
    input.end();

    const error = await captureAsyncError(() => answer);
    expect(error).toBeInstanceOf(InputClosedError);
  });

  it('should hand out queued lines before reporting the end of input', async () => {
    input.end('0\n');
    await tick();

    expect(await prompter.ask('Select option: ')).toBe('0');
    const error = await captureAsyncError(() => prompter.ask('Select option: '));
    expect(error).toBeInstanceOf(InputClosedError);
  });
});
