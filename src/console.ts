import readline from "node:readline";
import type { Output, Prompt } from "./types.js";

export class InputClosedError extends Error {
  constructor() {
    super("Input closed");
    this.name = "InputClosedError";
  }
}

export interface ConsolePrompt extends Prompt {
  close(): void;
}

interface PendingAsk {
  resolve: (answer: string) => void;
  reject: (err: Error) => void;
}

export function createConsolePrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsolePrompt {
  const rl = readline.createInterface({ input, output });
  // Lines can arrive before anyone asks (piped stdin); they wait here.
  const buffered: string[] = [];
  const waiting: PendingAsk[] = [];
  let closed = false;

  rl.on("line", (line) => {
    const pending = waiting.shift();
    if (pending) pending.resolve(line);
    else buffered.push(line);
  });
  rl.on("close", () => {
    closed = true;
    for (const pending of waiting.splice(0)) pending.reject(new InputClosedError());
  });

  return {
    ask: (question) => {
      const line = buffered.shift();
      if (line !== undefined) {
        output.write(question);
        return Promise.resolve(line);
      }
      if (closed) return Promise.reject(new InputClosedError());
      output.write(question);
      return new Promise<string>((resolve, reject) => {
        waiting.push({ resolve, reject });
      });
    },
    close: () => rl.close(),
  };
}

export const consoleOutput: Output = (line) => {
  console.log(line);
};
