/**
 * In-process CLI runner for tests
 */

import { runCli } from "../src/program.js";
import type { CliIO } from "../src/lib/io.js";

export interface RunOptions {
  interactive?: boolean;
  answer?: boolean;
}

export interface RunResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  prompts: string[];
}

/**
 * Helper to run a CLI command with captured output
 */
export async function run(args: string[], options: RunOptions = {}): Promise<RunResult> {
  let stdout = "";
  let stderr = "";
  const prompts: string[] = [];

  const io: CliIO = {
    stdout: (text) => {
      stdout += text;
    },
    stderr: (text) => {
      stderr += text;
    },
    colors: false,
    isInteractive: () => options.interactive ?? false,
    confirm: async (question) => {
      prompts.push(question);
      return options.answer ?? false;
    },
  };

  const exitCode = await runCli(args, io);
  return { exitCode, stdout, stderr, prompts };
}
