import os from "os";
import path from "path";
import { getOptional, isValidRepoUrl } from "../utils/validation";

/**
 * Where the table command fetches stub files from
 */
export interface SourceConfig {
  repoUrl: string;
  /** Scratch directory for the clone; removed after every run */
  tempDirectory: string;
}

/**
 * Retrieves and validates source repository configuration from environment variables
 */
export function getSourceConfig(): SourceConfig {
  const repoUrl = getOptional(
    process.env.STUBCONV_REPO_URL,
    "https://github.com/lra/mackup.git"
  );

  if (!isValidRepoUrl(repoUrl)) {
    throw new Error(
      `Invalid STUBCONV_REPO_URL format: ${repoUrl}\n` +
        `Expected format: https://github.com/owner/repo.git`
    );
  }

  const tempDirectory = getOptional(
    process.env.STUBCONV_TEMP_DIR,
    path.join(os.tmpdir(), "mackup_for_dotfiles")
  );

  return {
    repoUrl,
    tempDirectory,
  };
}
