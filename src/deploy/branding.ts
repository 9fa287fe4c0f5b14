/**
 * Branding assets: operator-supplied logo and favicon copied into the
 * published site's wwwroot before it is archived.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { request } from "../http.js";
import { getLogger } from "../logging/index.js";
import { BRANDING_FILES, type BrandingAssets } from "./types.js";

const log = getLogger("deploy/branding");

async function download(url: string, destination: string): Promise<void> {
  const response = await request(url);
  const bytes = new Uint8Array(await response.arrayBuffer());
  await writeFile(destination, bytes);
  log.debug(`Downloaded ${url} (${bytes.byteLength} bytes)`);
}

/**
 * Download the configured assets into `<publishDir>/wwwroot`. Returns the
 * paths written, relative to the publish directory.
 */
export async function applyBranding(publishDir: string, assets: BrandingAssets): Promise<string[]> {
  const wwwroot = path.join(publishDir, "wwwroot");
  const targets: Array<[string | undefined, string]> = [
    [assets.logoPngUrl, BRANDING_FILES.png],
    [assets.logoIcoUrl, BRANDING_FILES.ico],
  ];

  const written: string[] = [];
  for (const [url, fileName] of targets) {
    if (!url) continue;
    await mkdir(wwwroot, { recursive: true });
    await download(url, path.join(wwwroot, fileName));
    written.push(`wwwroot/${fileName}`);
  }
  return written;
}
