import { createRequire } from "node:module";

function readVersionFromPackageJson(): string | null {
  try {
    const require = createRequire(import.meta.url);
    // same relative path from src/ and dist/
    const pkg: unknown = require("../package.json");
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
    return null;
  } catch {
    return null;
  }
}

export const VERSION = process.env.SAAS_PROVISION_VERSION || readVersionFromPackageJson() || "0.0.0";
