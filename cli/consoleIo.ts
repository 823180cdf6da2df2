import { createInterface } from 'readline';

/**
 * Console input/output used by the menu loop.
 * Kept behind an interface so the app can be driven by scripted answers.
 */
export interface ConsoleIo {
  /** Print one line to stdout */
  write(line: string): void;
  /** Print one line to stderr */
  error(line: string): void;
  /** Ask a question and resolve with the raw answer */
  ask(prompt: string): Promise<string>;
  close(): void;
}

/** Raised by `ask` once stdin has ended */
export class InputClosedError extends Error {
  constructor() {
    super('Input closed');
    this.name = 'InputClosedError';
  }
}

interface PendingAnswer {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Create console IO on top of readline.
 * Lines are queued as they arrive, so piped input that lands in one chunk
 * (or ends in the same tick) still answers one prompt per line.
 * @param input - Readable stream (defaults to stdin)
 * @param output - Writable stream (defaults to stdout)
 */
export function createConsoleIo(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): ConsoleIo {
  const rl = createInterface({ input, output });
  const lines: string[] = [];
  const pending: PendingAnswer[] = [];
  let closed = false;

  rl.on('line', (line) => {
    const waiting = pending.shift();
    if (waiting) {
      waiting.resolve(line);
    } else {
      lines.push(line);
    }
  });
  rl.once('close', () => {
    closed = true;
    pending.splice(0).forEach((waiting) => waiting.reject(new InputClosedError()));
  });

  return {
    write: (line) => {
      output.write(`${line}\n`);
    },
    error: (line) => {
      process.stderr.write(`${line}\n`);
    },
    ask: (prompt) => {
      if (closed && lines.length === 0) {
        return Promise.reject(new InputClosedError());
      }
      if (closed) {
        output.write(prompt);
      } else {
        rl.setPrompt(prompt);
        rl.prompt();
      }
      const queued = lines.shift();
      if (queued !== undefined) {
        return Promise.resolve(queued);
      }
      return new Promise<string>((resolve, reject) => {
        pending.push({ resolve, reject });
      });
    },
    close: () => {
      rl.close();
    },
  };
}
