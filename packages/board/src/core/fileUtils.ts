import { existsSync, readdirSync, renameSync, rmSync, writeFileSync } from "node:fs";

/**
 * Write through a temp file and rename over the target.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const tempPath = `${filePath}.tmp`;
  writeFileSync(tempPath, content, "utf-8");
  try {
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}

/**
 * Names of the files in `directory` ending in `extension`, sorted by name.
 * Missing directories list as empty.
 */
export function listFiles(directory: string, extension: string): string[] {
  if (!existsSync(directory)) return [];
  return readdirSync(directory, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
    .map((entry) => entry.name)
    .sort();
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
