import fs from "fs/promises";
import { simpleGit } from "simple-git";
import type { SourceConfig } from "../config/config";
import { SourceFetchError, SourceRootNotFoundError } from "../utils/errors";
import { pathExists } from "../utils/fs-utils";

/**
 * Supplies a local directory tree holding stub files
 */
export interface SourceSupplier {
  /** Makes the tree available and returns its root */
  acquire(): Promise<string>;
  /** Releases whatever acquire() created. Safe to call more than once. */
  release(): Promise<void>;
}

/**
 * Clones a repository into a directory
 */
export type GitClone = (
  repoUrl: string,
  directory: string,
  options: string[]
) => Promise<void>;

const simpleGitClone: GitClone = async (repoUrl, directory, options) => {
  await simpleGit().clone(repoUrl, directory, options);
};

/**
 * Supplier for a tree that already exists on disk. Nothing is removed on release.
 */
export class LocalSourceSupplier implements SourceSupplier {
  constructor(private readonly sourceRoot: string) {}

  async acquire(): Promise<string> {
    if (!(await pathExists(this.sourceRoot))) {
      throw new SourceRootNotFoundError(this.sourceRoot);
    }
    return this.sourceRoot;
  }

  async release(): Promise<void> {}
}

/**
 * Service responsible for fetching the stub repository into a scratch directory
 */
export class GitSourceService implements SourceSupplier {
  constructor(
    private readonly config: SourceConfig,
    private readonly clone: GitClone = simpleGitClone
  ) {}

  /**
   * Shallow-clones the repository, replacing any leftover scratch directory
   * @returns The scratch directory
   * @throws {SourceFetchError} When the clone fails
   */
  async acquire(): Promise<string> {
    const { repoUrl, tempDirectory } = this.config;

    await this.release();

    try {
      await this.clone(repoUrl, tempDirectory, ["--depth=1", "--single-branch"]);
    } catch (error) {
      throw new SourceFetchError(
        `Failed to clone ${repoUrl}`,
        error instanceof Error ? error.message.trim() : String(error)
      );
    }

    return tempDirectory;
  }

  /**
   * Removes the scratch directory if it exists
   */
  async release(): Promise<void> {
    await fs.rm(this.config.tempDirectory, { recursive: true, force: true });
  }
}
