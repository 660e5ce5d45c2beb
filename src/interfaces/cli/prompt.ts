import process from 'node:process';
import { createInterface } from 'node:readline/promises';

export type Prompter = {
  ask: (question: string) => Promise<string>;
  close: () => void;
};

export function createPrompter(): Prompter {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return {
    ask: async (question) => (await rl.question(question)).trim(),
    close: () => rl.close(),
  };
}
