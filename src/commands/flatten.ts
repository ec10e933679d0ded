/**
 * stubconv flatten -- write one file per stub into a flat directory tree.
 */

import os from "os";
import path from "path";
import chalk from "chalk";
import { getConfig, validateConfig } from "../config/config";
import { LocalSourceSupplier } from "../services/source-service";
import { SourceRootNotFoundError } from "../utils/errors";
import {
  displayBanner,
  displayBatchSummary,
  displayError,
  displaySuccess,
} from "../utils/display-utils";
import { createBatchService, reportFailure, type Exit } from "./shared";

export function expandHome(input: string): string {
  return input.replace(/^~(?=$|[\\/])/, os.homedir());
}

export async function runFlatten(
  sourceRootArg: string,
  outputDirArg: string | undefined,
  exit: Exit = process.exit
): Promise<void> {
  try {
    validateConfig();
    const config = getConfig();

    const sourceRoot = path.resolve(expandHome(sourceRootArg));
    const outputDir = path.resolve(outputDirArg ?? config.app.outputDirectory);

    displayBanner("Stub files to config_db converter", {
      Source: sourceRoot,
      Output: outputDir,
    });

    const summary = await createBatchService(config.app.progressEvery).flatten(
      new LocalSourceSupplier(sourceRoot),
      outputDir
    );

    displayBatchSummary(summary);
    displaySuccess("Done! Config database generated successfully.");
  } catch (error) {
    if (error instanceof SourceRootNotFoundError) {
      displayError(error.message);
      console.log(
        chalk.gray(`\nClone it with:\n  git clone ${getConfig().source.repoUrl} ~/mackup`)
      );
      exit(1);
      return;
    }
    reportFailure(error, exit);
  }
}
