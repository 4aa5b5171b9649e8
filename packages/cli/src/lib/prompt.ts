import * as readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';

export type Confirm = (question: string) => Promise<boolean>;

/**
 * Ask a yes/no question; anything but y/yes, or Ctrl-C, is a no.
 */
export const confirm: Confirm = async (question) => {
  const rl = readline.createInterface({ input, output });
  const controller = new AbortController();
  rl.on('SIGINT', () => controller.abort());

  try {
    const answer = await rl.question(question, { signal: controller.signal });
    return ['y', 'yes'].includes(answer.trim().toLowerCase());
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      output.write('\n');
      return false;
    }
    throw error;
  } finally {
    rl.close();
  }
};
