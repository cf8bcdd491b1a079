/**
 * In-memory state the terminal host's commands act on.
 */

import type { Literal } from "@cmdpal/sdk";

/** The single document text commands edit. */
export interface TextBuffer {
  text: string;
  /** Offset of the caret within `text`. */
  caret: number;
}

export interface TerminalSession {
  readonly buffer: TextBuffer;
  /** Application-wide preferences set from the palette. */
  readonly preferences: Map<string, Literal>;
  /** Write one line of command output. */
  print(line: string): void;
}

export interface TerminalSessionOptions {
  /** Initial buffer text; the caret starts at its end. */
  text?: string;
  print?: (line: string) => void;
}

export function createTerminalSession(options: TerminalSessionOptions = {}): TerminalSession {
  const text = options.text ?? "";
  return {
    buffer: { text, caret: text.length },
    preferences: new Map(),
    print: options.print ?? (line => console.log(line)),
  };
}

/** The buffer text with the caret shown as `|`. */
export function renderBuffer(buffer: TextBuffer): string {
  return `${buffer.text.slice(0, buffer.caret)}|${buffer.text.slice(buffer.caret)}`;
}
