import fs from "node:fs/promises";
import path from "node:path";

export async function ensureDir(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** Writes UTF-8 text, creating parent directories and replacing any existing file. */
export async function writeText(filePath: string, text: string) {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, text, "utf8");
}

export async function copyInto(source: string, destFile: string) {
  await ensureDir(path.dirname(destFile));
  await fs.copyFile(source, destFile);
}
