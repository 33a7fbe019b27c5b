import readline from 'node:readline';
import { ShellIO } from './Shell';

export interface ConsoleIO extends ShellIO {
  close(): void;
}

export function createConsoleIO(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsoleIO {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  return {
    ask(question: string): Promise<string | undefined> {
      if (closed) return Promise.resolve(undefined);

      return new Promise(resolve => {
        const onClose = () => resolve(undefined);
        rl.once('close', onClose);
        rl.question(question, answer => {
          rl.off('close', onClose);
          resolve(answer);
        });
      });
    },
    print(text: string): void {
      output.write(`${text}\n`);
    },
    close(): void {
      if (!closed) rl.close();
    }
  };
}
