/**
 * Zip archives of publish output (jszip).
 */

import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import JSZip from "jszip";

/** Every file under `dir`, as sorted forward-slash paths relative to it. */
export async function listFiles(dir: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(path.join(dir, prefix), { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
    const relative = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listFiles(dir, relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files;
}

/**
 * Zip the contents of `sourceDir` (not the directory itself) and write the
 * archive to `archivePath`. Returns the archive bytes.
 */
export async function archiveDirectory(sourceDir: string, archivePath: string): Promise<Buffer> {
  const zip = new JSZip();
  for (const file of await listFiles(sourceDir)) {
    zip.file(file, await readFile(path.join(sourceDir, file)));
  }
  const bytes = await zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
  });
  await mkdir(path.dirname(archivePath), { recursive: true });
  await writeFile(archivePath, bytes);
  return bytes;
}
