import fs from "fs/promises";
import os from "os";
import path from "path";
import type { Reporter } from "../src/types";

/**
 * Creates a unique scratch directory under the OS temp dir
 */
export async function makeTempDir(prefix = "stubconv-test-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Writes stub files into <root>/<layout> and returns that directory
 */
export async function writeStubs(
  root: string,
  stubs: Record<string, string>,
  layout = path.join("mackup", "applications")
): Promise<string> {
  const dir = path.join(root, layout);
  await fs.mkdir(dir, { recursive: true });

  for (const [fileName, content] of Object.entries(stubs)) {
    await fs.writeFile(path.join(dir, fileName), content, "utf-8");
  }
  return dir;
}

export interface CollectingReporter extends Reporter {
  infos: string[];
  warnings: string[];
}

export function collectingReporter(): CollectingReporter {
  const infos: string[] = [];
  const warnings: string[] = [];
  return {
    infos,
    warnings,
    info: (message) => infos.push(message),
    warn: (message) => warnings.push(message),
  };
}
