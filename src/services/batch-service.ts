import { StubLocatorService } from "./stub-locator-service";
import { FlatTreeService } from "./flat-tree-service";
import { TableService } from "./table-service";
import type { SourceSupplier } from "./source-service";
import type { BatchSummary, Reporter, StubRecord } from "../types";
import { isEmptyRecord, readStub } from "../utils/stub-parser";

/**
 * Lifecycle of a single run
 */
export type BatchState = "idle" | "running" | "done" | "failed";

export interface BatchOptions {
  /** Report progress every N processed stubs */
  progressEvery: number;
  reporter: Reporter;
}

/**
 * Service responsible for orchestrating a conversion run
 * Coordinates between the source supplier, the locator and one of the writers
 */
export class BatchService {
  private currentState: BatchState = "idle";

  constructor(
    private readonly locator: StubLocatorService,
    private readonly tableService: TableService,
    private readonly options: BatchOptions
  ) {}

  get state(): BatchState {
    return this.currentState;
  }

  /**
   * Converts every stub into the flat tree under outputDirectory
   */
  async flatten(
    source: SourceSupplier,
    outputDirectory: string
  ): Promise<BatchSummary> {
    const writer = new FlatTreeService(outputDirectory);

    return this.run(source, async (stubFiles) => {
      await writer.prepare();

      let processed = 0;
      let skipped = 0;

      for (const stubFile of stubFiles) {
        const record = await this.readRecord(stubFile);

        if (!record) {
          skipped++;
          continue;
        }
        if (isEmptyRecord(record)) {
          this.reportEmpty(record);
          skipped++;
          continue;
        }

        await writer.write(record);
        processed++;
        this.reportProgress(processed);
      }

      return { found: stubFiles.length, processed, skipped, outputPath: outputDirectory };
    });
  }

  /**
   * Converts every stub into one consolidated table written to outputFile
   */
  async buildTable(
    source: SourceSupplier,
    outputFile: string
  ): Promise<BatchSummary> {
    return this.run(source, async (stubFiles) => {
      const records: StubRecord[] = [];
      let skipped = 0;

      for (const stubFile of stubFiles) {
        const record = await this.readRecord(stubFile);

        if (!record) {
          skipped++;
          continue;
        }
        // A table entry needs a name of its own or at least one path
        if (
          !record.displayName &&
          this.tableService.toEntry(record).config_files.length === 0
        ) {
          this.reportEmpty(record);
          skipped++;
          continue;
        }

        records.push(record);
        this.reportProgress(records.length);
      }

      const outputBytes = await this.tableService.write(
        this.tableService.buildTable(records),
        outputFile
      );

      return {
        found: stubFiles.length,
        processed: records.length,
        skipped,
        outputPath: outputFile,
        outputBytes,
      };
    });
  }

  private async run(
    source: SourceSupplier,
    convert: (stubFiles: string[]) => Promise<BatchSummary>
  ): Promise<BatchSummary> {
    const { reporter } = this.options;
    this.currentState = "running";

    try {
      const sourceRoot = await source.acquire();
      const applicationsDir = await this.locator.locate(sourceRoot);
      reporter.info(`Processing stub files from: ${applicationsDir}`);

      const stubFiles = await this.locator.listStubFiles(applicationsDir);
      reporter.info(`Found ${stubFiles.length} .cfg files`);

      const summary = await convert(stubFiles);
      this.currentState = "done";
      return summary;
    } catch (error) {
      this.currentState = "failed";
      throw error;
    } finally {
      await source.release();
    }
  }

  private async readRecord(stubFile: string): Promise<StubRecord | undefined> {
    const result = await readStub(stubFile);

    if (!result.ok) {
      this.options.reporter.warn(
        `Failed to parse ${result.stubId}: ${result.reason}`
      );
      return undefined;
    }
    return result.record;
  }

  private reportEmpty(record: StubRecord): void {
    this.options.reporter.warn(
      `Skipping ${record.stubId}: no name or configuration files`
    );
  }

  private reportProgress(processed: number): void {
    if (processed % this.options.progressEvery === 0) {
      this.options.reporter.info(`Processed ${processed} applications...`);
    }
  }
}
