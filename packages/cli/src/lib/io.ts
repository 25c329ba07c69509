/**
 * I/O helpers for CLI
 */

import { createInterface } from "node:readline/promises";

/**
 * Where commands write output and ask questions
 */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Whether ANSI colors may be used on stderr */
  colors: boolean;
  /** Whether the user can answer prompts */
  isInteractive(): boolean;
  /** Ask a yes/no question; resolves true only for "y" */
  confirm(question: string): Promise<boolean>;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}

/**
 * CLI I/O bound to the current process
 */
export const processIO: CliIO = {
  stdout: writeStdout,
  stderr: writeStderr,
  colors: process.stderr.isTTY ?? false,
  isInteractive: isStdinTTY,
  async confirm(question: string): Promise<boolean> {
    const rl = createInterface({
      input: process.stdin,
      output: process.stderr,
    });
    try {
      const answer = await rl.question(question);
      return answer.trim().toLowerCase() === "y";
    } finally {
      rl.close();
    }
  },
};
