/**
 * I/O helpers for CLI
 */

/**
 * Output streams a command writes to
 */
export interface CliIO {
  stdout(content: string): void;
  stderr(content: string): void;
  isTTY(stream: "stdout" | "stderr"): boolean;
}

export const processIO: CliIO = {
  stdout: (content) => {
    process.stdout.write(content);
  },
  stderr: (content) => {
    process.stderr.write(content);
  },
  isTTY: (stream) => (stream === "stdout" ? process.stdout.isTTY : process.stderr.isTTY) ?? false,
};

/**
 * Resolve on the first of `signals`, then stop listening
 */
export function waitForSignal(
  signals: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"]
): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      for (const name of signals) {
        process.off(name, onSignal);
      }
      resolve(signal);
    };
    for (const name of signals) {
      process.on(name, onSignal);
    }
  });
}
