import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, mkdir, rm, writeFile, readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { publishAndDeploy, packagePaths } from "./pipeline.js";
import { ToolRunner, type ToolResult, type ToolRunOptions } from "../tools/index.js";
import type { DeployProject } from "./types.js";

class FakeDotnet extends ToolRunner {
  calls: string[][] = [];
  fail = false;

  override async run(command: string, args: string[], _options?: ToolRunOptions): Promise<ToolResult> {
    this.calls.push([command, ...args]);
    if (this.fail) return { success: false, stdout: "", stderr: "error NU1101: Unable to find package", exitCode: 1 };
    const outputDir = args[args.indexOf("-o") + 1];
    await mkdir(outputDir, { recursive: true });
    await writeFile(path.join(outputDir, "AdminSite.dll"), "compiled");
    return { success: true, stdout: "", stderr: "", exitCode: 0 };
  }
}

describe("publishAndDeploy", () => {
  let root: string;
  let runner: FakeDotnet;
  const kudu = { zipDeploy: vi.fn(), waitForDeployment: vi.fn() };
  const webApps = { attachVNetIntegration: vi.fn() };
  const fetchMock = vi.fn();

  const project: DeployProject = {
    name: "AdminSite",
    projectPath: "src/AdminSite/AdminSite.csproj",
    appName: "demo-admin",
    resourceGroup: "rg-1",
  };

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
    runner = new FakeDotnet();
    vi.clearAllMocks();
    vi.stubGlobal("fetch", fetchMock);
    kudu.zipDeploy.mockResolvedValue("https://demo-admin.scm.azurewebsites.net/api/deployments/abc");
    kudu.waitForDeployment.mockResolvedValue({ id: "abc", status: 4, statusText: "", complete: true });
    webApps.attachVNetIntegration.mockResolvedValue(true);
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(root, { recursive: true, force: true });
  });

  function target() {
    return { sourceRoot: path.join(root, "repo"), artifactRoot: path.join(root, "publish"), runner, kudu, webApps };
  }

  it("publishes, archives and deploys in order", async () => {
    const outcome = await publishAndDeploy(project, target());

    expect(runner.calls[0]).toEqual([
      "dotnet",
      "publish",
      path.join(root, "repo", "src/AdminSite/AdminSite.csproj"),
      "-c",
      "Release",
      "-o",
      path.join(root, "publish", "AdminSite"),
    ]);
    expect(kudu.zipDeploy).toHaveBeenCalledWith("demo-admin", expect.any(Buffer));
    expect(outcome.package.artifactPath).toBe(path.join(root, "publish", "AdminSite.zip"));
    expect(outcome.deploymentId).toBe("abc");
    expect(outcome.vnetIntegrated).toBe(false);
    expect(webApps.attachVNetIntegration).not.toHaveBeenCalled();
  });

  it("copies branding assets into wwwroot", async () => {
    fetchMock.mockImplementation(async () => new Response(new Uint8Array([137, 80, 78, 71]), { status: 200 }));
    const outcome = await publishAndDeploy(
      { ...project, branding: { logoPngUrl: "https://cdn.contoso.test/logo.png" } },
      target(),
    );
    expect(outcome.brandingFiles).toEqual(["wwwroot/contoso-sales.png"]);
    const logo = await readFile(path.join(root, "publish", "AdminSite", "wwwroot", "contoso-sales.png"));
    expect([...logo]).toEqual([137, 80, 78, 71]);
  });

  it("attaches VNet integration when a subnet is given", async () => {
    const outcome = await publishAndDeploy({ ...project, integrationSubnetId: "subnet-id" }, target());
    expect(webApps.attachVNetIntegration).toHaveBeenCalledWith("rg-1", "demo-admin", "subnet-id");
    expect(outcome.vnetIntegrated).toBe(true);
  });

  it("stops at the first failing step with the tool's output", async () => {
    runner.fail = true;
    await expect(publishAndDeploy(project, target())).rejects.toMatchObject({
      code: "TOOL_FAILED",
      message: "dotnet publish exited with code 1:\nerror NU1101: Unable to find package",
    });
    expect(kudu.zipDeploy).not.toHaveBeenCalled();
  });
});

describe("packagePaths", () => {
  it("places the archive beside the publish directory", () => {
    const paths = packagePaths(
      { name: "CustomerSite", projectPath: "src/CustomerSite/CustomerSite.csproj", appName: "demo-portal", resourceGroup: "rg-1" },
      { sourceRoot: "/repo", artifactRoot: "/out" },
    );
    expect(paths).toEqual({
      sourcePath: "/repo/src/CustomerSite/CustomerSite.csproj",
      publishDir: "/out/CustomerSite",
      artifactPath: "/out/CustomerSite.zip",
    });
  });
});
