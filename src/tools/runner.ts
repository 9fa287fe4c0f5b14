/**
 * External Tool Runner
 *
 * Wraps the command-line tools the deploy pipeline shells out to
 * (`dotnet publish`). A failing tool's output is surfaced verbatim.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { ProvisioningError } from "../errors.js";
import { getLogger } from "../logging/index.js";

const execFileAsync = promisify(execFile);
const log = getLogger("tools");

// =============================================================================
// Types
// =============================================================================

export type ToolRunOptions = {
  cwd?: string;
  /** Timeout in ms. */
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

export type ToolResult = {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set on failure: why the process failed, when it printed nothing. */
  message?: string;
};

function stringField(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null) return undefined;
  const field: unknown = Reflect.get(value, key);
  if (typeof field === "string") return field;
  if (Buffer.isBuffer(field)) return field.toString("utf8");
  return undefined;
}

function exitCodeOf(value: unknown): number {
  if (typeof value !== "object" || value === null) return 1;
  const code: unknown = Reflect.get(value, "code");
  return typeof code === "number" ? code : 1;
}

// =============================================================================
// ToolRunner
// =============================================================================

export class ToolRunner {
  private defaultTimeoutMs: number;

  constructor(options?: { timeoutMs?: number }) {
    this.defaultTimeoutMs = options?.timeoutMs ?? 15 * 60_000;
  }

  async run(command: string, args: string[], options: ToolRunOptions = {}): Promise<ToolResult> {
    log.debug(`Running ${command} ${args.join(" ")}`, { cwd: options.cwd });
    try {
      const { stdout, stderr } = await execFileAsync(command, args, {
        cwd: options.cwd,
        timeout: options.timeoutMs ?? this.defaultTimeoutMs,
        env: options.env ?? process.env,
        maxBuffer: 64 * 1024 * 1024,
      });
      return { success: true, stdout: String(stdout), stderr: String(stderr), exitCode: 0 };
    } catch (error) {
      return {
        success: false,
        stdout: stringField(error, "stdout") ?? "",
        stderr: stringField(error, "stderr") ?? "",
        exitCode: exitCodeOf(error),
        message: stringField(error, "message") ?? "Unknown error",
      };
    }
  }

  /**
   * Run a tool and throw a TOOL_FAILED error carrying its output unchanged.
   * `dotnet` reports build errors on stdout, so both streams are kept.
   */
  async runOrThrow(command: string, args: string[], options?: ToolRunOptions): Promise<ToolResult> {
    const result = await this.run(command, args, options);
    if (!result.success) {
      const streams = [result.stderr.trim(), result.stdout.trim()].filter((text) => text.length > 0);
      const output = streams.length > 0 ? streams.join("\n") : (result.message ?? "Unknown error");
      throw new ProvisioningError(
        "TOOL_FAILED",
        `${command} ${args[0] ?? ""} exited with code ${result.exitCode}:\n${output}`,
        { operation: `${command} ${args[0] ?? ""}`.trim() },
      );
    }
    return result;
  }
}

// =============================================================================
// dotnet
// =============================================================================

export type DotnetPublishOptions = {
  configuration?: string;
  runtime?: string;
};

/**
 * `dotnet publish <project> -c Release -o <outputDir>`.
 */
export async function dotnetPublish(
  runner: ToolRunner,
  projectPath: string,
  outputDir: string,
  options: DotnetPublishOptions = {},
): Promise<ToolResult> {
  const args = ["publish", projectPath, "-c", options.configuration ?? "Release", "-o", outputDir];
  if (options.runtime) args.push("-r", options.runtime);
  return runner.runOrThrow("dotnet", args);
}
