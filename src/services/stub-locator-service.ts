import fs from "fs/promises";
import path from "path";
import { SourceLayoutError } from "../utils/errors";
import { isDirectory } from "../utils/fs-utils";
import { STUB_EXTENSION } from "../utils/stub-parser";

/**
 * Relative locations of the applications directory, tried in order.
 * Older checkouts keep it at the top level, newer ones under src/.
 */
export const APPLICATION_DIR_CANDIDATES: readonly string[] = [
  path.join("mackup", "applications"),
  path.join("src", "mackup", "applications"),
];

/**
 * Service responsible for finding stub files inside a source checkout
 */
export class StubLocatorService {
  constructor(
    private readonly candidates: readonly string[] = APPLICATION_DIR_CANDIDATES
  ) {}

  /**
   * Finds the directory holding the stub files
   * @param sourceRoot - Root of the source checkout
   * @returns Absolute path of the first candidate that is a directory
   * @throws {SourceLayoutError} If no candidate exists
   */
  async locate(sourceRoot: string): Promise<string> {
    for (const candidate of this.candidates) {
      const applicationsDir = path.resolve(sourceRoot, candidate);
      if (await isDirectory(applicationsDir)) {
        return applicationsDir;
      }
    }

    throw new SourceLayoutError(sourceRoot, this.candidates);
  }

  /**
   * Lists stub files directly inside a directory
   * @returns Absolute paths, sorted by name
   */
  async listStubFiles(applicationsDir: string): Promise<string[]> {
    const entries = await fs.readdir(applicationsDir, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(STUB_EXTENSION))
      .map((entry) => path.join(applicationsDir, entry.name))
      .sort();
  }
}
