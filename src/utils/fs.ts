import fs from "node:fs/promises";
import { runCommand } from "./process.js";

export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
}

/**
 * Dot-prefixed names are already hidden on POSIX; Windows needs the attribute.
 */
export async function hideDirectory(
  dir: string,
  platform: NodeJS.Platform = process.platform,
  run: typeof runCommand = runCommand
): Promise<void> {
  if (platform !== "win32") return;
  await run("attrib", ["+h", dir]);
}

/**
 * Size in bytes, or null when the path does not exist.
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile() ? stat.size : null;
  } catch (err) {
    if (isNotFound(err)) return null;
    throw err;
  }
}

export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }
}

export function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}
