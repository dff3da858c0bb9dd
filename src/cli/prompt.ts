import { createInterface } from 'node:readline';

export interface Prompt {
  // undefined once input is exhausted
  ask(question: string): Promise<string | undefined>;
}

// Lines are pulled through the async iterator so input piped ahead of a question is not lost.
export function createLinePrompt(
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream
): Prompt & { close(): void } {
  const rl = createInterface({ input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  return {
    async ask(question: string): Promise<string | undefined> {
      output.write(question);
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
    close(): void {
      rl.close();
    },
  };
}
