import readline from 'readline';

/**
 * Thrown when the input stream ends while the menu is waiting for an answer
 */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

/**
 * Line-oriented prompter over a readable stream.
 *
 * Lines are queued as they arrive so piped input is not lost between questions.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly lines: string[] = [];
  private waiting?: { resolve: (line: string) => void; reject: (error: Error) => void };
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, terminal: false });

    this.rl.on('line', (line: string) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting.resolve(line);
      } else {
        this.lines.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting.reject(new InputClosedError());
      }
    });
  }

  ask(question: string): Promise<string> {
    this.output.write(question);

    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(new InputClosedError());
    }
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  close(): void {
    this.rl.close();
  }
}
