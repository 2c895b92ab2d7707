import readline from 'readline';
import type { CancellationToken } from './cancellation.js';

export interface Prompter {
  ask(question: string): Promise<string>;
}

/**
 * stdin prompt. Ctrl+C while waiting cancels the token instead of being
 * swallowed by readline, and the pending question resolves with ''.
 */
export class TerminalPrompter implements Prompter {
  constructor(private token?: CancellationToken) {}

  ask(question: string): Promise<string> {
    return new Promise(resolve => {
      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
      });
      rl.on('SIGINT', () => {
        this.token?.cancel('SIGINT');
        rl.close();
        resolve('');
      });
      rl.question(question, answer => {
        rl.close();
        resolve(answer.trim());
      });
    });
  }
}

/** Explicit value, then environment, then an interactive question. */
export async function resolveCredential(
  explicit: string | undefined,
  fromEnv: string | undefined,
  question: string,
  prompter: Prompter
): Promise<string> {
  if (explicit && explicit.trim()) return explicit.trim();
  if (fromEnv && fromEnv.trim()) return fromEnv.trim();
  return prompter.ask(question);
}
