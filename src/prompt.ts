import * as readline from 'readline';
import { CancelledError } from './errors';
import { Prompter } from './decision';

export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  signal?: AbortSignal;
}

/** A yes/no prompt on the terminal. Anything but `y` or `yes` declines. */
export function createPrompter(streams: PromptStreams = {}): Prompter {
  const input = streams.input ?? process.stdin;
  const output = streams.output ?? process.stderr;

  return (summary) =>
    new Promise<boolean>((resolve, reject) => {
      const rl = readline.createInterface({ input, output });
      const onAbort = () => {
        reject(new CancelledError());
        rl.close();
      };
      streams.signal?.addEventListener('abort', onAbort, { once: true });
      // End of input counts as a no
      rl.on('close', () => {
        streams.signal?.removeEventListener('abort', onAbort);
        resolve(false);
      });

      rl.question(`${summary} [y/N] `, (answer) => {
        resolve(/^y(es)?$/i.test(answer.trim()));
        rl.close();
      });
    });
}
