import { createInterface } from "node:readline/promises";
import type { Confirmer } from "../ports/confirmer.js";

/**
 * Yes/no prompt on the terminal; prompts go to stderr so stdout stays parseable.
 * Input that ends before an answer counts as "no".
 */
export class TerminalConfirmer implements Confirmer {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr,
  ) {}

  async confirm(question: string): Promise<boolean> {
    const prompt = createInterface({ input: this.input, output: this.output });
    let closed = false;
    const unanswered = new Promise<boolean>((resolve) => {
      prompt.once("close", () => {
        closed = true;
        resolve(false);
      });
    });
    const answered = prompt.question(`${question} [y/N] `).then(isAffirmative, (error: unknown) => {
      if (closed) {
        return false;
      }
      throw error;
    });

    try {
      return await Promise.race([answered, unanswered]);
    } finally {
      if (!closed) {
        prompt.close();
      }
    }
  }
}

export function isAffirmative(answer: string): boolean {
  return /^(y|yes)$/i.test(answer.trim());
}
