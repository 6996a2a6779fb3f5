import { PassThrough } from "node:stream";
import { describe, expect, test } from "vitest";
import { TerminalConfirmer, isAffirmative } from "../src/adapters/terminal-confirmer.js";

function terminal() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on("data", (chunk: Buffer) => written.push(chunk.toString("utf8")));
  return { input, output, written, confirmer: new TerminalConfirmer(input, output) };
}

describe("terminal-confirmer", () => {
  test("should accept a yes answer", async () => {
    const { input, written, confirmer } = terminal();

    const answer = confirmer.confirm("Proceed with restore?");
    input.write("y\n");

    await expect(answer).resolves.toBe(true);
    expect(written.join("")).toContain("Proceed with restore? [y/N] ");
  });

  test("should treat any other answer as no", async () => {
    const { input, confirmer } = terminal();

    const answer = confirmer.confirm("Proceed with restore?");
    input.write("nope\n");

    await expect(answer).resolves.toBe(false);
  });

  test("should answer no when input ends before an answer", async () => {
    const { input, confirmer } = terminal();

    const answer = confirmer.confirm("Proceed with restore?");
    input.end();

    await expect(answer).resolves.toBe(false);
  });
});

describe("isAffirmative", () => {
  test("should accept only yes answers", () => {
    expect(["y", "Y", "yes", " YES "].map(isAffirmative)).toEqual([true, true, true, true]);
    expect(["", "n", "no", "yep"].map(isAffirmative)).toEqual([false, false, false, false]);
  });
});
