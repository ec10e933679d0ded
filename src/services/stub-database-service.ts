import fs from "fs/promises";
import path from "path";
import { FLAT_TREE_DIRS, FLAT_TREE_EXTENSION } from "./flat-tree-service";
import { TableService } from "./table-service";
import type { ConsolidatedTable, StubEntry } from "../types";
import { pathExists, safeReadFile } from "../utils/fs-utils";
import { defaultDisplayName } from "../utils/stub-parser";

/**
 * Locations of previously generated output. Either may be omitted.
 */
export interface StubDatabaseSources {
  flatTreeDirectory?: string;
  tableFile?: string;
}

const NAME_PREFIX = "name = ";

/**
 * Service responsible for reading stubs back from generated output
 * The flat tree takes precedence over the consolidated table
 */
export class StubDatabaseService {
  private table: ConsolidatedTable | undefined;

  constructor(
    private readonly sources: StubDatabaseSources,
    private readonly tableService: TableService
  ) {}

  /**
   * Resolves a stub by id
   * @returns The entry, or undefined when neither source knows the stub
   */
  async loadStub(stubId: string): Promise<StubEntry | undefined> {
    const fromTree = await this.loadFromFlatTree(stubId);
    if (fromTree) return fromTree;

    const table = await this.loadTable();
    if (!Object.hasOwn(table, stubId)) return undefined;
    const entry = table[stubId];

    return {
      stubId,
      name: entry.name,
      configFiles: entry.config_files,
      source: "table",
    };
  }

  /**
   * Lists every known stub id, sorted
   */
  async listStubs(): Promise<string[]> {
    const ids = new Set<string>(Object.keys(await this.loadTable()));

    for (const dir of Object.values(FLAT_TREE_DIRS)) {
      for (const fileName of await this.readFlatTreeDir(dir)) {
        ids.add(path.basename(fileName, FLAT_TREE_EXTENSION));
      }
    }

    return [...ids].sort();
  }

  private async loadFromFlatTree(stubId: string): Promise<StubEntry | undefined> {
    const root = this.sources.flatTreeDirectory;
    if (!root) return undefined;

    const fileFor = (dir: string) =>
      path.join(root, dir, `${stubId}${FLAT_TREE_EXTENSION}`);

    const standard = await safeReadFile(fileFor(FLAT_TREE_DIRS.configurationFiles));
    const xdg = await safeReadFile(fileFor(FLAT_TREE_DIRS.xdgConfigurationFiles));
    const application = await safeReadFile(fileFor(FLAT_TREE_DIRS.applications));

    if (standard === undefined && xdg === undefined && application === undefined) {
      return undefined;
    }

    const standardPaths = splitPathList(standard);
    const name = application
      ?.split("\n")
      .find((line) => line.startsWith(NAME_PREFIX))
      ?.slice(NAME_PREFIX.length)
      .trim();

    return {
      stubId,
      name: name || defaultDisplayName(stubId),
      configFiles: standardPaths.length > 0 ? standardPaths : splitPathList(xdg),
      source: "flat-tree",
    };
  }

  private async loadTable(): Promise<ConsolidatedTable> {
    if (this.table) return this.table;

    const { tableFile } = this.sources;
    this.table =
      tableFile && (await pathExists(tableFile))
        ? await this.tableService.load(tableFile)
        : {};
    return this.table;
  }

  private async readFlatTreeDir(dir: string): Promise<string[]> {
    const root = this.sources.flatTreeDirectory;
    if (!root) return [];

    try {
      const entries = await fs.readdir(path.join(root, dir));
      return entries.filter((entry) => entry.endsWith(FLAT_TREE_EXTENSION));
    } catch {
      return [];
    }
  }
}

function splitPathList(content: string | undefined): string[] {
  if (!content) return [];
  return content
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
