import path from "path";
import chalk from "chalk";
import type { BatchSummary, Reporter, StubEntry } from "../types";

/**
 * Displays the heading printed before a conversion
 */
export function displayBanner(title: string, details: Record<string, string>): void {
  const rule = "=".repeat(60);
  console.log(chalk.bold(rule));
  console.log(chalk.bold.blue(title));
  console.log(chalk.bold(rule));

  for (const [label, value] of Object.entries(details)) {
    console.log(`${chalk.gray(`${label}:`)} ${value}`);
  }
  console.log("");
}

/**
 * Formats a byte count the way the summary reports it, e.g. "12.3 KB"
 */
export function formatFileSize(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

/**
 * Displays the counters of a finished run
 */
export function displayBatchSummary(summary: BatchSummary): void {
  console.log("");
  console.log(
    chalk.green("✓"),
    `Successfully processed ${summary.processed} applications`
  );
  console.log(chalk.yellow("⚠"), `Skipped ${summary.skipped} applications`);
  console.log("📁", `Output: ${path.resolve(summary.outputPath)}`);

  if (summary.outputBytes !== undefined) {
    console.log("📊", `File size: ${formatFileSize(summary.outputBytes)}`);
  }
}

/**
 * Displays one resolved stub
 */
export function displayStubEntry(entry: StubEntry): void {
  console.log(`${chalk.bold(entry.name)} ${chalk.gray(`(${entry.stubId}, from ${entry.source})`)}`);

  if (entry.configFiles.length === 0) {
    console.log(chalk.gray("  No configuration files"));
    return;
  }

  entry.configFiles.forEach((file) => {
    console.log(`  ${chalk.cyan("•")} ${file}`);
  });
}

/**
 * Displays error messages in a consistent format
 */
export function displayError(message: string, error?: Error): void {
  console.error(chalk.red("\n❌ Error:"), message);
  if (error && process.env.NODE_ENV === "development") {
    console.error(chalk.gray(error.stack));
  }
}

/**
 * Displays success messages in a consistent format
 */
export function displaySuccess(message: string): void {
  console.log(chalk.green("✅"), message);
}

/**
 * Displays warning messages in a consistent format
 */
export function displayWarning(message: string): void {
  console.log(chalk.yellow("⚠️"), message);
}

/**
 * Displays info messages in a consistent format
 */
export function displayInfo(message: string): void {
  console.log(chalk.blue("ℹ️"), message);
}

/**
 * Reporter that prints through the display helpers
 */
export const consoleReporter: Reporter = {
  info: displayInfo,
  warn: displayWarning,
};
