/**
 * stubconv table -- fetch the stub repository and write the consolidated table.
 */

import path from "path";
import { getConfig, validateConfig } from "../config/config";
import { GitSourceService, type SourceSupplier } from "../services/source-service";
import {
  displayBanner,
  displayBatchSummary,
  displaySuccess,
  displayWarning,
} from "../utils/display-utils";
import {
  createBatchService,
  createInterruptHandler,
  reportFailure,
  withSpinner,
  type Exit,
} from "./shared";

/**
 * @param source - Defaults to a shallow clone of the configured repository
 */
export async function runTable(
  exit: Exit = process.exit,
  source?: SourceSupplier
): Promise<void> {
  try {
    validateConfig();
    const config = getConfig();
    const outputFile = path.resolve(config.app.tableFile);

    displayBanner("Stub files to default_db converter", {
      Repository: config.source.repoUrl,
      Output: outputFile,
    });
    if (config.app.tableFileOverridden) {
      displayWarning(`Table path set by STUBCONV_TABLE_FILE: ${outputFile}`);
    }

    const supplier =
      source ??
      withSpinner(
        new GitSourceService(config.source),
        `Cloning ${config.source.repoUrl}...`
      );
    const onInterrupt = createInterruptHandler(supplier, exit);
    process.once("SIGINT", onInterrupt);
    process.once("SIGTERM", onInterrupt);

    try {
      const summary = await createBatchService(
        config.app.progressEvery
      ).buildTable(supplier, outputFile);

      displayBatchSummary(summary);
      displaySuccess("Done! Default database JSON generated successfully.");
    } finally {
      process.removeListener("SIGINT", onInterrupt);
      process.removeListener("SIGTERM", onInterrupt);
    }
  } catch (error) {
    reportFailure(error, exit);
  }
}
