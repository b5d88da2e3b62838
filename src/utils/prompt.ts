import * as readline from 'node:readline/promises';
import type { Prompter } from '../types';

export class PromptCancelledError extends Error {
  constructor(message = 'Operation cancelled.') {
    super(message);
    this.name = 'PromptCancelledError';
  }
}

interface PendingAnswer {
  resolve: (answer: string) => void;
  reject: (error: Error) => void;
}

export interface PrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Treat the streams as a terminal (keypress handling, Ctrl-C as a key) */
  terminal?: boolean;
  /** Source of process signals; SIGINT here cancels like Ctrl-C */
  signals?: NodeJS.EventEmitter;
}

/**
 * Line-oriented prompter over readline.
 *
 * Lines that arrive before they are asked for (piped input) are queued, so
 * `printf 'a\nb\n' | cli` answers both prompts. Ctrl-C, a SIGINT sent to the
 * process, or end of input while a prompt is pending rejects with
 * PromptCancelledError.
 */
export function createPrompter({
  input = process.stdin,
  output = process.stdout,
  terminal,
  signals = process,
}: PrompterOptions = {}): Prompter {
  const rl = readline.createInterface({ input, output, terminal });
  const queued: string[] = [];
  let pending: PendingAnswer | undefined;
  let cancelled = false;

  const interrupt = () => rl.close();

  const cancel = () => {
    cancelled = true;
    signals.removeListener('SIGINT', interrupt);
    if (pending) {
      const { reject } = pending;
      pending = undefined;
      reject(new PromptCancelledError());
    }
  };

  rl.on('line', (line) => {
    if (pending) {
      const { resolve } = pending;
      pending = undefined;
      resolve(line);
    } else {
      queued.push(line);
    }
  });
  rl.on('SIGINT', interrupt);
  rl.on('close', cancel);
  signals.once('SIGINT', interrupt);

  return {
    ask(question: string): Promise<string> {
      if (!cancelled) {
        rl.setPrompt(question);
        rl.prompt();
      }

      const next = queued.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      if (cancelled) {
        return Promise.reject(new PromptCancelledError());
      }
      return new Promise<string>((resolve, reject) => {
        pending = { resolve, reject };
      });
    },
    close(): void {
      rl.close();
    },
  };
}
