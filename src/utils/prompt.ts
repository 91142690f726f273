import readline from 'readline';

/**
 * Line-oriented question/answer source for interactive menus
 */
export interface Prompter {
  /** Resolves null once input has ended (EOF or Ctrl+C) */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Prompter backed by stdin/stdout. Ctrl+C closes the interface instead of killing
 * the process, so callers can print their summaries first.
 */
export function createPrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });
  rl.on('SIGINT', () => {
    output.write('\n');
    rl.close();
  });

  return {
    ask(question: string): Promise<string | null> {
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        const onClose = () => resolve(null);
        rl.once('close', onClose);
        rl.question(question, (answer) => {
          rl.removeListener('close', onClose);
          resolve(answer.trim());
        });
      });
    },
    close(): void {
      if (!closed) {
        rl.close();
      }
    },
  };
}

export async function confirm(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(question);
  return answer !== null && answer.toLowerCase() === 'y';
}
