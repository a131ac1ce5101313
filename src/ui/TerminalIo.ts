/**
 * Terminal collaborators: where input lines come from and where text
 * goes. The game runner depends only on the two interfaces; the
 * readline and stream implementations plug them into a real terminal.
 */

import * as readline from 'node:readline';

// ── Interfaces ──────────────────────────────────────────────

/** Supplies one trimmed, lowercased line per prompt. */
export interface LineReader {
  /** @returns The next line, or `null` at the end of input. */
  readLine(prompt: string): Promise<string | null>;
}

/** Receives text to show the player. */
export interface TextWriter {
  write(text: string): void;
}

// ── Node implementations ────────────────────────────────────

/**
 * LineReader over a readable stream (stdin by default).
 *
 * Lines are buffered from construction, so piped input is never lost
 * between prompts.
 */
export class ReadlineLineReader implements LineReader {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly promptOutput: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async readLine(prompt: string): Promise<string | null> {
    this.promptOutput.write(prompt);
    const next = await this.lines.next();
    return next.done ? null : next.value.trim().toLowerCase();
  }

  /** Stop reading; later calls return `null`. */
  close(): void {
    this.rl.close();
  }
}

/**
 * TextWriter over a writable stream (stdout by default). Each write
 * ends with a newline.
 */
export class StreamTextWriter implements TextWriter {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  write(text: string): void {
    this.stream.write(`${text}\n`);
  }
}
