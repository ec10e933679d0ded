import fs from "fs/promises";
import path from "path";
import type { ConsolidatedTable, StubRecord, TableEntry } from "../types";
import { writeFileAtomic } from "../utils/fs-utils";
import { defaultDisplayName } from "../utils/stub-parser";

/**
 * Service responsible for building and writing the consolidated table
 */
export class TableService {
  /**
   * Converts a record into its table entry. Standard paths win; XDG paths
   * are used only when there are no standard paths. The two are never merged.
   */
  toEntry(record: StubRecord): TableEntry {
    const configFiles =
      record.standardPaths.length > 0 ? record.standardPaths : record.xdgPaths;

    return {
      name: record.displayName || defaultDisplayName(record.stubId),
      config_files: [...configFiles],
    };
  }

  /**
   * Builds the table with keys in lexicographic order
   */
  buildTable(records: readonly StubRecord[]): ConsolidatedTable {
    const sorted = [...records].sort((a, b) =>
      a.stubId < b.stubId ? -1 : a.stubId > b.stubId ? 1 : 0
    );

    // fromEntries defines own keys, so an id such as "__proto__" stays a plain entry
    return Object.fromEntries(
      sorted.map((record): [string, TableEntry] => [
        record.stubId,
        this.toEntry(record),
      ])
    );
  }

  /**
   * Serializes the table. Keys are re-sorted so the output does not depend
   * on how the table was assembled.
   */
  serialize(table: ConsolidatedTable): string {
    const ordered: ConsolidatedTable = Object.fromEntries(
      Object.keys(table)
        .sort()
        .map((key): [string, TableEntry] => {
          const entry = table[key];
          return [key, { name: entry.name, config_files: entry.config_files }];
        })
    );
    return JSON.stringify(ordered, null, 2);
  }

  /**
   * Writes the table to disk, creating the parent directory if needed
   * @returns Size of the written file in bytes
   */
  async write(table: ConsolidatedTable, outputFile: string): Promise<number> {
    await fs.mkdir(path.dirname(outputFile), { recursive: true });
    return writeFileAtomic(outputFile, this.serialize(table));
  }

  /**
   * Loads a previously written table
   * @throws {Error} If the file is not a table document
   */
  async load(tableFile: string): Promise<ConsolidatedTable> {
    const data: unknown = JSON.parse(await fs.readFile(tableFile, "utf-8"));

    if (!isConsolidatedTable(data)) {
      throw new Error(`Not a stub table: ${tableFile}`);
    }
    return data;
  }
}

function isTableEntry(value: unknown): value is TableEntry {
  if (typeof value !== "object" || value === null) return false;
  if (!("name" in value) || !("config_files" in value)) return false;
  return (
    typeof value.name === "string" &&
    Array.isArray(value.config_files) &&
    value.config_files.every((entry: unknown) => typeof entry === "string")
  );
}

function isConsolidatedTable(value: unknown): value is ConsolidatedTable {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every(isTableEntry)
  );
}
