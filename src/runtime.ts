/**
 * Process boundary for commands: where output goes and how the process ends.
 * Tests pass their own runtime to capture output and exit codes.
 */

export type RuntimeEnv = {
  log: (message: string) => void;
  error: (message: string) => void;
  exit: (code: number) => void;
};

export const defaultRuntime: RuntimeEnv = {
  log: (message) => {
    process.stdout.write(`${message}\n`);
  },
  error: (message) => {
    process.stderr.write(`${message}\n`);
  },
  exit: (code) => {
    // let pending stderr writes flush instead of process.exit()
    process.exitCode = code;
  },
};
