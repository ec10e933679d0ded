/**
 * Utility for parsing application stub files into StubRecords
 */

import fs from "fs/promises";
import path from "path";
import type { StubReadResult, StubRecord } from "../types";

/** File extension of source stub files */
export const STUB_EXTENSION = ".cfg";

/**
 * Section cursor of the line scanner. Any section other than the three
 * known ones is tracked as "other" so its lines are ignored.
 */
type Section =
  | "none"
  | "application"
  | "configuration_files"
  | "xdg_configuration_files"
  | "other";

function toSection(name: string): Section {
  switch (name) {
    case "application":
    case "configuration_files":
    case "xdg_configuration_files":
      return name;
    default:
      return "other";
  }
}

/**
 * Parses the text of one stub file
 *
 * @param stubId - Identifier derived from the file name
 * @param content - Raw file content
 * @returns The parsed record; fields stay empty when nothing is recognized
 *
 * @example
 * ```
 * parseStub("alpha", "[application]\nname = Alpha App\n[configuration_files]\n.alpharc\n");
 * // { stubId: "alpha", displayName: "Alpha App", standardPaths: [".alpharc"], xdgPaths: [] }
 * ```
 */
export function parseStub(stubId: string, content: string): StubRecord {
  const record: StubRecord = { stubId, standardPaths: [], xdgPaths: [] };
  let section: Section = "none";

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const line = rawLine.trim();

    // Skip empty lines and comments
    if (!line || line.startsWith("#") || line.startsWith(";")) {
      continue;
    }

    // Section header
    if (line.startsWith("[") && line.endsWith("]")) {
      section = toSection(line.slice(1, -1));
      continue;
    }

    switch (section) {
      case "application": {
        const separator = line.indexOf("=");
        if (separator === -1) break;

        const key = line.slice(0, separator).trim();
        const value = line.slice(separator + 1).trim();
        if (key === "name") {
          record.displayName = value || undefined;
        }
        break;
      }
      case "configuration_files":
        if (!line.startsWith("[")) record.standardPaths.push(line);
        break;
      case "xdg_configuration_files":
        if (!line.startsWith("[")) record.xdgPaths.push(line);
        break;
      default:
        break;
    }
  }

  return record;
}

/**
 * Whether a record carries nothing worth emitting
 */
export function isEmptyRecord(record: StubRecord): boolean {
  return (
    !record.displayName &&
    record.standardPaths.length === 0 &&
    record.xdgPaths.length === 0
  );
}

/**
 * Derives a readable application name from a stub id
 *
 * @example
 * ```
 * defaultDisplayName("sublime-text-3"); // "Sublime Text 3"
 * defaultDisplayName("1password");      // "1Password"
 * ```
 */
export function defaultDisplayName(stubId: string): string {
  return stubId
    .replace(/-/g, " ")
    .replace(
      /\p{L}+/gu,
      (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase()
    );
}

/**
 * Stub id of a source file path ("/x/alpha.cfg" -> "alpha")
 */
export function stubIdFromPath(filePath: string): string {
  return path.basename(filePath, path.extname(filePath));
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Reads and parses one stub file. Never throws: an unreadable file, or one
 * that is not valid UTF-8, is reported as a failed result so the caller can
 * skip it.
 */
export async function readStub(filePath: string): Promise<StubReadResult> {
  const stubId = stubIdFromPath(filePath);

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (error) {
    return {
      ok: false,
      stubId,
      reason: error instanceof Error ? error.message : String(error),
    };
  }

  let content: string;
  try {
    content = utf8.decode(buffer);
  } catch {
    return { ok: false, stubId, reason: "File is not valid UTF-8" };
  }

  return { ok: true, record: parseStub(stubId, content) };
}
