import { getOptional, parsePositiveInt } from "../utils/validation";

export const DEFAULT_TABLE_FILE = "./src/default_db.json";

/**
 * Application configuration
 */
export interface AppConfig {
  /** Default output root for the flat tree */
  outputDirectory: string;
  /** Fixed output path of the consolidated table */
  tableFile: string;
  /** True when STUBCONV_TABLE_FILE replaced the built-in table path */
  tableFileOverridden: boolean;
  /** Emit a progress line every N processed stubs */
  progressEvery: number;
}

/**
 * Retrieves and validates application configuration from environment variables
 */
export function getAppConfig(): AppConfig {
  const outputDirectory = getOptional(
    process.env.STUBCONV_OUTPUT_DIR,
    "./config_db"
  );
  const tableFile = getOptional(
    process.env.STUBCONV_TABLE_FILE,
    DEFAULT_TABLE_FILE
  );
  const progressEvery = parsePositiveInt(
    "STUBCONV_PROGRESS_EVERY",
    getOptional(process.env.STUBCONV_PROGRESS_EVERY, "50"),
    50
  );

  return {
    outputDirectory,
    tableFile,
    tableFileOverridden: tableFile !== DEFAULT_TABLE_FILE,
    progressEvery,
  };
}
