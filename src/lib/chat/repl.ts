import { createInterface } from "node:readline";

const EXIT_WORDS = new Set(["exit", "quit"]);

/**
 * Reads lines until "exit"/"quit" or end of input (Ctrl-D, or a pipe running dry), handling
 * one line at a time. Resolves once the interface is closed.
 */
export async function runChatLoop(opts: {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  prompt: string;
  onLine(line: string): Promise<void>;
}): Promise<void> {
  const rl = createInterface({ input: opts.input, output: opts.output, prompt: opts.prompt });
  try {
    rl.prompt();
    for await (const raw of rl) {
      const line = raw.trim();
      if (EXIT_WORDS.has(line)) break;
      if (line) await opts.onLine(line);
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
