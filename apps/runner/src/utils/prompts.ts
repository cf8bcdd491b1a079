/**
 * Interactive palette UI over Node.js readline (no external libraries).
 */

import { createInterface } from "node:readline";
import type { Interface } from "node:readline";
import type { PaletteUI } from "@cmdpal/sdk";

export interface PromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const SELECT_PROMPT = "Select a command (number or name, empty to cancel): ";
const CANCEL_ANSWERS = new Set(["", "q"]);

/**
 * Numbered command list plus a single-line argument prompt.
 *
 * Lines are read in order from the input stream; end of input cancels
 * whatever is being asked.
 */
export class TerminalUI implements PaletteUI {
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly pending: string[] = [];
  private waiting?: (line: string | undefined) => void;
  private closed = false;

  constructor(options: PromptOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = createInterface({ input: options.input ?? process.stdin, terminal: false });

    this.rl.on("line", line => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = undefined;
        waiting(line);
      } else {
        this.pending.push(line);
      }
    });
    this.rl.on("close", () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = undefined;
      waiting?.(undefined);
    });
  }

  async listAndChoose(items: string[][]): Promise<number | undefined> {
    if (items.length === 0) {
      this.output.write("No commands available\n");
      return undefined;
    }

    const width = String(items.length).length;
    items.forEach((rows, index) => {
      const [title = "", ...details] = rows;
      this.output.write(`${String(index + 1).padStart(width)}. ${title}\n`);
      for (const detail of details) {
        this.output.write(`${" ".repeat(width + 2)}${detail}\n`);
      }
    });

    for (;;) {
      const answer = (await this.nextLine(SELECT_PROMPT))?.trim();
      if (answer === undefined || CANCEL_ANSWERS.has(answer)) {
        return undefined;
      }

      const matches = matchItems(items, answer);
      if (matches.length === 1) {
        return matches[0];
      }
      if (matches.length === 0) {
        this.output.write(`No command matches "${answer}"\n`);
      } else {
        const names = matches.map(index => items[index][0]).join(", ");
        this.output.write(`"${answer}" matches several commands: ${names}\n`);
      }
    }
  }

  async promptForText(label: string, initial: string): Promise<string | undefined> {
    const promptText = initial ? `${label} (${initial}) ` : `${label} `;
    const answer = await this.nextLine(promptText);
    if (answer === undefined) {
      return undefined;
    }
    return answer.trim() === "" && initial ? initial : answer;
  }

  showError(message: string): void {
    this.output.write(`Error: ${message}\n`);
  }

  close(): void {
    this.rl.close();
  }

  private nextLine(prompt: string): Promise<string | undefined> {
    this.output.write(prompt);
    const buffered = this.pending.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise(resolve => {
      this.waiting = resolve;
    });
  }
}

/**
 * Resolve an answer to item indexes: a 1-based number, an exact name, or
 * every name containing the answer.
 */
function matchItems(items: string[][], answer: string): number[] {
  if (/^\d+$/.test(answer)) {
    const index = Number(answer) - 1;
    return index >= 0 && index < items.length ? [index] : [];
  }

  const exact = items.findIndex(rows => rows[0] === answer);
  if (exact !== -1) {
    return [exact];
  }

  const matches: number[] = [];
  items.forEach((rows, index) => {
    if ((rows[0] ?? "").includes(answer)) {
      matches.push(index);
    }
  });
  return matches;
}
