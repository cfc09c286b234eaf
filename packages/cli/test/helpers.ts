/**
 * In-process CLI runner for tests
 */

import type { CliIO } from "../src/lib/io.js";
import { run } from "../src/program.js";
import type { ProgramOptions } from "../src/program.js";

/**
 * Collects everything a command writes
 */
export class MemoryIO implements CliIO {
  out = "";
  err = "";

  stdout(content: string): void {
    this.out += content;
  }

  stderr(content: string): void {
    this.err += content;
  }

  isTTY(): boolean {
    return false;
  }
}

export interface CliResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Run the CLI with `args` against an empty environment unless one is given
 */
export async function runCli(
  args: string[],
  options: Omit<ProgramOptions, "io"> = {}
): Promise<CliResult> {
  const io = new MemoryIO();
  const exitCode = await run(args, { env: {}, ...options, io });
  return { stdout: io.out, stderr: io.err, exitCode };
}
