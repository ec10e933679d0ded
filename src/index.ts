#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import dotenv from "dotenv";
import { getConfig, validateConfig } from "./config/config";
import { TableService } from "./services/table-service";
import { StubDatabaseService } from "./services/stub-database-service";
import { runFlatten } from "./commands/flatten";
import { runTable } from "./commands/table";
import { reportFailure } from "./commands/shared";
import { displayError, displayStubEntry } from "./utils/display-utils";

// Load environment variables
dotenv.config();

/**
 * Main CLI program
 */
const program = new Command();

program
  .name("stubconv")
  .description("Convert application stub files into a config database")
  .version("1.0.0")
  .showHelpAfterError();

program
  .command("flatten")
  .description("Write one file per stub into applications/, configuration_files/ and xdg_configuration_files/")
  .argument("<source_root>", "Checkout of the stub repository")
  .argument("[output_dir]", "Output root (default: ./config_db)")
  .action((sourceRoot: string, outputDir: string | undefined) =>
    runFlatten(sourceRoot, outputDir)
  );

program
  .command("table")
  .description("Fetch the stub repository and write the consolidated JSON table")
  .action(() => runTable());

program
  .command("show")
  .description("Print the name and configuration files of one stub")
  .argument("<stub_id>", "Stub identifier, e.g. git")
  .option("-d, --db <dir>", "Flat tree written by flatten")
  .option("-t, --table <file>", "Table written by table")
  .action(async (stubId: string, options: LookupOptions) => {
    try {
      const entry = await createStubDatabase(options).loadStub(stubId);

      if (!entry) {
        displayError(`Unknown stub: ${stubId}`);
        process.exit(1);
      }

      displayStubEntry(entry);
    } catch (error) {
      fail(error);
    }
  });

program
  .command("list")
  .description("List every stub id found in the generated output")
  .option("-d, --db <dir>", "Flat tree written by flatten")
  .option("-t, --table <file>", "Table written by table")
  .action(async (options: LookupOptions) => {
    try {
      const stubIds = await createStubDatabase(options).listStubs();
      stubIds.forEach((stubId) => console.log(stubId));
      console.log(chalk.gray(`\n${stubIds.length} stubs`));
    } catch (error) {
      fail(error);
    }
  });

interface LookupOptions {
  db?: string;
  table?: string;
}

/**
 * Defaults to the configured output locations when neither option is given
 */
function createStubDatabase(options: LookupOptions): StubDatabaseService {
  validateConfig();
  const { app } = getConfig();
  const useDefaults = !options.db && !options.table;

  return new StubDatabaseService(
    {
      flatTreeDirectory: options.db ?? (useDefaults ? app.outputDirectory : undefined),
      tableFile: options.table ?? (useDefaults ? app.tableFile : undefined),
    },
    new TableService()
  );
}

function fail(error: unknown): void {
  reportFailure(error, process.exit);
}

// Parse command line arguments
program.parseAsync(process.argv).catch(fail);
