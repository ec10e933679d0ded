import chalk from "chalk";
import ora from "ora";
import { BatchService } from "../services/batch-service";
import { StubLocatorService } from "../services/stub-locator-service";
import { TableService } from "../services/table-service";
import type { SourceSupplier } from "../services/source-service";
import type { Reporter } from "../types";
import { consoleReporter, displayError } from "../utils/display-utils";

/**
 * Terminates the process. Commands take it as a parameter so tests can observe exit codes.
 */
export type Exit = (code: number) => void;

export function createBatchService(
  progressEvery: number,
  reporter: Reporter = consoleReporter
): BatchService {
  return new BatchService(new StubLocatorService(), new TableService(), {
    progressEvery,
    reporter,
  });
}

/**
 * Prints an error and exits with status 1
 */
export function reportFailure(error: unknown, exit: Exit): void {
  displayError(
    error instanceof Error ? error.message : "Unknown error",
    error instanceof Error ? error : undefined
  );
  exit(1);
}

/**
 * Builds the SIGINT/SIGTERM handler of a run: release the source, then exit 1.
 * Repeated signals are ignored while the first one is being handled.
 */
export function createInterruptHandler(
  source: SourceSupplier,
  exit: Exit
): () => Promise<void> {
  let interrupted = false;

  return async () => {
    if (interrupted) return;
    interrupted = true;

    console.log(chalk.yellow("\n\nInterrupted by user"));
    try {
      await source.release();
    } catch (error) {
      displayError(
        "Failed to remove temporary directory",
        error instanceof Error ? error : undefined
      );
    }
    exit(1);
  };
}

/**
 * Shows a spinner while the source is being fetched
 */
export function withSpinner(source: SourceSupplier, text: string): SourceSupplier {
  return {
    acquire: async () => {
      const spinner = ora(text).start();
      try {
        const sourceRoot = await source.acquire();
        spinner.succeed("Cloned successfully");
        return sourceRoot;
      } catch (error) {
        spinner.fail("Failed to fetch stub repository");
        throw error;
      }
    },
    release: () => source.release(),
  };
}
