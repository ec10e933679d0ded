/**
 * Type definitions for the stub converter
 */

// ============================================
// Source Stub Types
// ============================================

/**
 * Normalized view of one application stub file
 */
export interface StubRecord {
  /** Source file base name without the .cfg extension */
  stubId: string;
  /** Value of `name` in the [application] section, if any */
  displayName?: string;
  /** Entries of [configuration_files], in file order */
  standardPaths: string[];
  /** Entries of [xdg_configuration_files], in file order */
  xdgPaths: string[];
}

/**
 * Outcome of reading and parsing a single stub file
 */
export type StubReadResult =
  | { ok: true; record: StubRecord }
  | { ok: false; stubId: string; reason: string };

// ============================================
// Output Types
// ============================================

/**
 * One entry of the consolidated table. Field order is part of the output format.
 */
export interface TableEntry {
  name: string;
  config_files: string[];
}

/**
 * Map of stub id to entry, keys sorted
 */
export type ConsolidatedTable = Record<string, TableEntry>;

/**
 * Counters reported at the end of a batch run
 */
export interface BatchSummary {
  found: number;
  processed: number;
  skipped: number;
  /** Output directory (flatten) or output file (table) */
  outputPath: string;
  /** Size of the written table in bytes, table mode only */
  outputBytes?: number;
}

// ============================================
// Lookup Types
// ============================================

/**
 * A stub resolved from previously generated output
 */
export interface StubEntry {
  stubId: string;
  name: string;
  configFiles: string[];
  source: "flat-tree" | "table";
}

// ============================================
// Reporting
// ============================================

/**
 * Sink for progress and warning messages emitted while a batch runs
 */
export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
}
