/**
 * Progress Reporting & Readiness Polling
 *
 * Progress output for long-running waits, and the poll-until-ready loop used
 * after create calls in place of fixed sleeps.
 */

import { ProvisioningError } from "./errors.js";
import { sleep } from "./retry.js";
import type { ReadinessOptions, ResourceKind } from "./types.js";

// =============================================================================
// Types
// =============================================================================

export type ProgressReporter = {
  setLabel: (label: string) => void;
  /** Completion percentage (0–100). */
  setPercent: (percent: number) => void;
  tick: () => void;
  done: () => void;
};

export type ProgressOptions = {
  /** Show on stderr (default: true). */
  stderr?: boolean;
  /** Total units for tick-based progress. */
  total?: number;
  silent?: boolean;
};

// Set once from `--quiet`; individual calls can still override it.
let defaultSilent = false;

export function setProgressSilent(silent: boolean): void {
  defaultSilent = silent;
}

// =============================================================================
// Core Progress Reporter
// =============================================================================

export function createProgress(label: string, options?: ProgressOptions): ProgressReporter {
  const silent = options?.silent ?? defaultSilent;
  const total = options?.total ?? 100;
  const stream = options?.stderr !== false ? process.stderr : process.stdout;
  let currentLabel = label;
  let currentPercent = 0;
  let ticks = 0;
  let isDone = false;

  function render() {
    if (silent || isDone) return;
    const pct = Math.min(100, Math.round(currentPercent));
    stream.write(`\r  ${currentLabel} [${pct}%]`);
  }

  render();

  return {
    setLabel(newLabel: string) {
      currentLabel = newLabel;
      render();
    },
    setPercent(percent: number) {
      currentPercent = percent;
      render();
    },
    tick() {
      ticks++;
      currentPercent = (ticks / total) * 100;
      render();
    },
    done() {
      if (isDone) return;
      isDone = true;
      currentPercent = 100;
      if (!silent) stream.write(`\r  ${currentLabel} [100%]\n`);
    },
  };
}

/**
 * Execute a function with progress reporting and cleanup.
 */
export async function withProgress<T>(
  label: string,
  fn: (progress: ProgressReporter) => Promise<T>,
  options?: ProgressOptions,
): Promise<T> {
  const progress = createProgress(label, options);
  try {
    return await fn(progress);
  } finally {
    progress.done();
  }
}

// =============================================================================
// Readiness Polling
// =============================================================================

export const READINESS_DEFAULTS: Required<ReadinessOptions> = {
  intervalMs: 5_000,
  timeoutMs: 300_000,
};

export type ReadinessTarget = {
  kind: ResourceKind;
  name: string;
  operation: string;
};

/**
 * Poll `checkFn` until it reports ready. Throws a TIMEOUT error naming the
 * resource when the deadline passes first.
 */
export async function waitUntilReady(
  target: ReadinessTarget,
  checkFn: () => Promise<boolean>,
  options?: ReadinessOptions & { silent?: boolean },
): Promise<void> {
  const interval = options?.intervalMs ?? READINESS_DEFAULTS.intervalMs;
  const timeout = options?.timeoutMs ?? READINESS_DEFAULTS.timeoutMs;
  const started = Date.now();
  const deadline = started + timeout;

  await withProgress(
    `Waiting for ${target.kind} ${target.name}`,
    async (progress) => {
      for (;;) {
        if (await checkFn()) return;
        if (Date.now() + interval > deadline) break;
        progress.setPercent(Math.min(95, ((Date.now() - started) / timeout) * 100));
        await sleep(interval);
      }
      throw new ProvisioningError(
        "TIMEOUT",
        `${target.operation} ${target.kind} "${target.name}" was not ready after ${timeout}ms`,
        { resourceKind: target.kind, resourceName: target.name, operation: target.operation },
      );
    },
    { silent: options?.silent },
  );
}
