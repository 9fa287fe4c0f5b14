import { CommanderError } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { VERSION } from "../version.js";
import { buildProgram } from "./program.js";

function captureRuntime() {
  return { log: vi.fn(), error: vi.fn(), exit: vi.fn() };
}

const argv = (...args: string[]) => ["node", "saas-provision", ...args];

describe("saas-provision program", () => {
  beforeEach(() => {
    vi.stubEnv("NO_COLOR", "1");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("registers the top-level commands", () => {
    const names = buildProgram(captureRuntime()).commands.map((c) => c.name());
    expect(names).toEqual(["deploy", "plan", "migrations"]);
  });

  it("prints the version", async () => {
    const runtime = captureRuntime();
    await expect(buildProgram(runtime).parseAsync(argv("--version"))).rejects.toBeInstanceOf(CommanderError);
    expect(runtime.log).toHaveBeenCalledWith(VERSION);
    expect(runtime.exit).toHaveBeenCalledWith(0);
  });

  it("exits with 1 on an unknown command", async () => {
    const runtime = captureRuntime();
    await expect(buildProgram(runtime).parseAsync(argv("destroy"))).rejects.toBeInstanceOf(CommanderError);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });

  it("parses deployment flags and exits with 1 on invalid configuration", async () => {
    const runtime = captureRuntime();
    await buildProgram(runtime).parseAsync(
      argv(
        "plan",
        "--prefix",
        "Bad_Prefix",
        "--location",
        "eastus",
        "--tenant",
        "tenant-1",
        "--subscription",
        "sub-1",
        "--admin-users",
        "admin@contoso.test",
        "--quiet",
      ),
    );

    expect(runtime.exit).toHaveBeenCalledWith(1);
    const message = String(runtime.error.mock.calls[0][0]);
    expect(message.split("\n")[0]).toBe("Error: Invalid deployment configuration:");
    expect(message).toContain("Name prefix must start with a lowercase letter");
  });

  it("runs a dry-run deploy from flags alone", async () => {
    const runtime = captureRuntime();
    await buildProgram(runtime).parseAsync(
      argv(
        "deploy",
        "--dry-run",
        "--prefix",
        "demo",
        "--location",
        "eastus",
        "--tenant",
        "tenant-1",
        "--subscription",
        "sub-1",
        "--admin-users",
        "a@contoso.test,b@contoso.test",
        "--quiet",
      ),
    );

    expect(runtime.exit).not.toHaveBeenCalled();
    expect(runtime.log).toHaveBeenLastCalledWith("Dry run of 29 steps succeeded; nothing was changed.");
  });
});
