import fs from "fs/promises";
import path from "path";
import type { StubRecord } from "../types";
import { removeStaleTempFiles, writeFileAtomic } from "../utils/fs-utils";

/** File extension of every file in the flat tree */
export const FLAT_TREE_EXTENSION = ".conf";

/**
 * The three sibling directories of the flat tree
 */
export const FLAT_TREE_DIRS = {
  applications: "applications",
  configurationFiles: "configuration_files",
  xdgConfigurationFiles: "xdg_configuration_files",
} as const;

/**
 * Renders a path list, one entry per line. An empty list renders as "".
 */
export function renderPathList(paths: readonly string[]): string {
  return paths.map((entry) => `${entry}\n`).join("");
}

/**
 * Service responsible for writing records as a flat directory tree:
 *
 *   <root>/applications/<id>.conf            name = <display name>
 *   <root>/configuration_files/<id>.conf     standard paths, one per line
 *   <root>/xdg_configuration_files/<id>.conf XDG paths, one per line
 *
 * Both path lists are written independently of each other.
 */
export class FlatTreeService {
  constructor(private readonly outputDirectory: string) {}

  /**
   * Creates the output root and its subdirectories, and clears temporary
   * files left there by an interrupted run
   */
  async prepare(): Promise<void> {
    for (const dir of Object.values(FLAT_TREE_DIRS)) {
      const target = path.join(this.outputDirectory, dir);
      await fs.mkdir(target, { recursive: true });
      await removeStaleTempFiles(target);
    }
  }

  /**
   * Writes the files of one record, replacing any previous content
   * @returns Paths of the files written
   */
  async write(record: StubRecord): Promise<string[]> {
    const written: string[] = [];

    if (record.displayName) {
      written.push(
        await this.writeEntry(
          FLAT_TREE_DIRS.applications,
          record.stubId,
          `name = ${record.displayName}\n`
        )
      );
    }

    // Path listings are always written, empty or not, so every stub has a placeholder
    written.push(
      await this.writeEntry(
        FLAT_TREE_DIRS.configurationFiles,
        record.stubId,
        renderPathList(record.standardPaths)
      )
    );
    written.push(
      await this.writeEntry(
        FLAT_TREE_DIRS.xdgConfigurationFiles,
        record.stubId,
        renderPathList(record.xdgPaths)
      )
    );

    return written;
  }

  private async writeEntry(
    dir: string,
    stubId: string,
    content: string
  ): Promise<string> {
    const target = path.join(
      this.outputDirectory,
      dir,
      `${stubId}${FLAT_TREE_EXTENSION}`
    );
    await writeFileAtomic(target, content);
    return target;
  }
}
