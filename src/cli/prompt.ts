import { createInterface, type Interface } from "node:readline/promises";
import type { SetupPrompter } from "../config/types.ts";
import { bold, dim } from "./format.ts";

export interface TerminalPrompter extends SetupPrompter {
  close(): void;
}

export function isInteractive(): boolean {
  return Boolean(process.stdin.isTTY && process.stdout.isTTY);
}

/** Line-based prompts on stdin/stdout. Call `close()` when done so the process can exit. */
export function createTerminalPrompter(): TerminalPrompter {
  let rl: Interface | null = null;
  const line = () => {
    rl ??= createInterface({ input: process.stdin, output: process.stdout });
    return rl;
  };

  return {
    async ask(question, defaultValue) {
      const answer = (await line().question(`${bold(question)} ${dim(`[${defaultValue}]`)} `)).trim();
      return answer === "" ? defaultValue : answer;
    },

    async choose(question, choices, defaultValue) {
      const prompt = `${bold(question)} ${dim(`(${choices.join("/")}) [${defaultValue}]`)} `;
      for (;;) {
        const answer = (await line().question(prompt)).trim().toLowerCase();
        if (answer === "") return defaultValue;
        const match = choices.find((c) => c.toLowerCase() === answer);
        if (match) return match;
        console.log(dim(`  Choose one of: ${choices.join(", ")}`));
      }
    },

    async confirm(question, defaultValue) {
      const hint = defaultValue ? "[Y/n]" : "[y/N]";
      const answer = (await line().question(`${bold(question)} ${dim(hint)} `)).trim().toLowerCase();
      if (answer === "") return defaultValue;
      return answer === "y" || answer === "yes";
    },

    info(message) {
      console.log(message);
    },

    close() {
      rl?.close();
      rl = null;
    },
  };
}
