/**
 * jarkit CLI — Yes/No Prompts
 *
 * The only interactive UI: a single-line yes/no question on the terminal.
 */

import * as readline from "readline";
import type { Readable, Writable } from "stream";
import type { Confirm } from "@jarkit/engine";

/**
 * Interpret an answer. With a "no" default only an explicit y accepts;
 * with a "yes" default only an explicit n declines.
 */
export function parseAnswer(answer: string, defaultAnswer: boolean): boolean {
  const a = answer.trim();
  return defaultAnswer ? !/^[Nn]$/.test(a) : /^[Yy]$/.test(a);
}

export function formatQuestion(question: string, defaultAnswer: boolean): string {
  return `${question} ${defaultAnswer ? "(Y/n)" : "(y/N)"}: `;
}

export function createConfirm(
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): Confirm {
  return (question: string, defaultAnswer: boolean) => {
    // Input that ended under an earlier prompt never closes a new interface
    if (input.readableEnded) {
      return Promise.resolve(defaultAnswer);
    }
    const rl = readline.createInterface({ input, output });
    return new Promise<boolean>((resolve) => {
      let answered = false;
      rl.question(formatQuestion(question, defaultAnswer), (answer) => {
        answered = true;
        rl.close();
        resolve(parseAnswer(answer, defaultAnswer));
      });
      // stdin closed (Ctrl-D or no terminal): take the default
      rl.on("close", () => {
        if (!answered) resolve(defaultAnswer);
      });
    });
  };
}
