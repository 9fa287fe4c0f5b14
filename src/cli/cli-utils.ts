import { createLogger, setRootLogger, type LogLevel } from "../logging/index.js";
import { setProgressSilent } from "../progress.js";
import { formatErrorMessage } from "../retry.js";
import type { RuntimeEnv } from "../runtime.js";

const useColor = () => process.stdout.isTTY === true && !process.env.NO_COLOR;
const paint = (code: number) => (s: string) => (useColor() ? `\x1b[${code}m${s}\x1b[0m` : s);

export const theme = {
  error: paint(31),
  success: paint(32),
  warn: paint(33),
  info: paint(34),
  muted: paint(90),
} as const;

export type OutputFlags = {
  quiet?: boolean;
  verbose?: boolean;
};

export function logLevelFor(flags: OutputFlags): LogLevel {
  if (flags.quiet) return "warn";
  if (flags.verbose) return "debug";
  return "info";
}

/** Apply `--quiet` / `--verbose` to the process-wide logger and progress output. */
export function configureOutput(flags: OutputFlags): void {
  setRootLogger(createLogger("provision", { level: logLevelFor(flags) }));
  setProgressSilent(flags.quiet === true);
}

/**
 * Run a command body, turning any thrown error into a one-line message on
 * stderr and exit code 1.
 */
export async function runCommandWithRuntime(runtime: RuntimeEnv, fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (error) {
    runtime.error(theme.error(`Error: ${formatErrorMessage(error)}`));
    runtime.exit(1);
  }
}

/** Parse a comma or whitespace separated list, dropping empty entries. */
export function parseList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
