#!/usr/bin/env node
import { run } from "./cli.js";
import { consoleOutput, createConsolePrompt } from "./console.js";

const prompt = createConsolePrompt();

run(process.argv.slice(2), {
  prompt,
  out: consoleOutput,
  err: (line) => console.error(line),
})
  .then((code) => {
    process.exitCode = code;
  })
  .finally(() => prompt.close())
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
