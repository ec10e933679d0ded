/**
 * Filesystem helpers shared by the writers and the stub database
 */

import fs from "fs/promises";
import path from "path";

/**
 * Checks if a file or directory exists
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Checks if a path exists and is a directory
 */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Reads a file, returning undefined if it doesn't exist
 */
export async function safeReadFile(target: string): Promise<string | undefined> {
  try {
    return await fs.readFile(target, "utf-8");
  } catch {
    return undefined;
  }
}

const TEMP_SUFFIX = ".tmp";

/** Matches the temporary siblings created by writeFileAtomic */
const TEMP_FILE_PATTERN = /^\..+\.\d+\.tmp$/;

/**
 * Removes temporary files an interrupted run left behind in a directory
 * @returns Names of the removed files
 */
export async function removeStaleTempFiles(dir: string): Promise<string[]> {
  const stale = (await fs.readdir(dir)).filter((name) =>
    TEMP_FILE_PATTERN.test(name)
  );

  for (const name of stale) {
    await fs.rm(path.join(dir, name), { force: true });
  }
  return stale;
}

/**
 * Writes a file through a temporary sibling and a rename, so the target is
 * either the previous file or the complete new one.
 * @returns Number of bytes written
 */
export async function writeFileAtomic(
  target: string,
  content: string
): Promise<number> {
  const tempFile = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}${TEMP_SUFFIX}`
  );

  try {
    await fs.writeFile(tempFile, content, "utf-8");
    await fs.rename(tempFile, target);
  } catch (error) {
    await fs.rm(tempFile, { force: true });
    throw error;
  }

  return Buffer.byteLength(content, "utf-8");
}
