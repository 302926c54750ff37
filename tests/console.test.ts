import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { InputClosedError, createConsolePrompt } from "../src/console.js";

describe("createConsolePrompt", () => {
  it("answers a question with the next input line", async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const prompt = createConsolePrompt(input, output);

    const answer = prompt.ask("Choose: ");
    input.write("2\n");

    await expect(answer).resolves.toBe("2");
    prompt.close();
  });

  it("keeps lines that arrive in one chunk for the following questions", async () => {
    const input = new PassThrough();
    const prompt = createConsolePrompt(input, new PassThrough());

    input.write("1\n2\n");

    await expect(prompt.ask("First: ")).resolves.toBe("1");
    await expect(prompt.ask("Second: ")).resolves.toBe("2");
    prompt.close();
  });

  it("answers from lines buffered before input ended, then reports the close", async () => {
    const input = new PassThrough();
    const prompt = createConsolePrompt(input, new PassThrough());

    input.end("1\n2\n");
    const [a, b, c] = await Promise.allSettled([prompt.ask("A: "), prompt.ask("B: "), prompt.ask("C: ")]);

    expect(a).toEqual({ status: "fulfilled", value: "1" });
    expect(b).toEqual({ status: "fulfilled", value: "2" });
    expect(c.status).toBe("rejected");
    expect(c.status === "rejected" && c.reason).toBeInstanceOf(InputClosedError);
  });

  it("rejects pending and later questions once input ends", async () => {
    const input = new PassThrough();
    const prompt = createConsolePrompt(input, new PassThrough());

    const pending = prompt.ask("Choose: ");
    input.end();

    await expect(pending).rejects.toBeInstanceOf(InputClosedError);
    await expect(prompt.ask("Again: ")).rejects.toBeInstanceOf(InputClosedError);
  });
});
