import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { getConfig, validateConfig } from "../src/config/config";
import { isValidRepoUrl } from "../src/utils/validation";

describe("getConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses built-in defaults", () => {
    vi.stubEnv("STUBCONV_OUTPUT_DIR", "");
    vi.stubEnv("STUBCONV_TABLE_FILE", "");
    vi.stubEnv("STUBCONV_PROGRESS_EVERY", "");
    vi.stubEnv("STUBCONV_REPO_URL", "");
    vi.stubEnv("STUBCONV_TEMP_DIR", "");

    expect(getConfig()).toEqual({
      app: {
        outputDirectory: "./config_db",
        tableFile: "./src/default_db.json",
        tableFileOverridden: false,
        progressEvery: 50,
      },
      source: {
        repoUrl: "https://github.com/lra/mackup.git",
        tempDirectory: path.join(os.tmpdir(), "mackup_for_dotfiles"),
      },
    });
  });

  it("reads overrides from the environment", () => {
    vi.stubEnv("STUBCONV_OUTPUT_DIR", "/srv/db");
    vi.stubEnv("STUBCONV_PROGRESS_EVERY", "10");
    vi.stubEnv("STUBCONV_REPO_URL", "git@example.com:team/stubs.git");

    const config = getConfig();

    expect(config.app.outputDirectory).toBe("/srv/db");
    expect(config.app.progressEvery).toBe(10);
    expect(config.source.repoUrl).toBe("git@example.com:team/stubs.git");
  });

  it("flags a table path taken from the environment", () => {
    vi.stubEnv("STUBCONV_TABLE_FILE", "/srv/out/db.json");

    expect(getConfig().app).toMatchObject({
      tableFile: "/srv/out/db.json",
      tableFileOverridden: true,
    });
  });

  it("rejects a non-positive progress interval", () => {
    vi.stubEnv("STUBCONV_PROGRESS_EVERY", "0");

    expect(() => validateConfig()).toThrow(
      "Configuration Error:\nInvalid STUBCONV_PROGRESS_EVERY: 0"
    );
  });

  it("rejects a malformed repository URL", () => {
    vi.stubEnv("STUBCONV_PROGRESS_EVERY", "");
    vi.stubEnv("STUBCONV_REPO_URL", "not a url");

    expect(() => getConfig()).toThrow("Invalid STUBCONV_REPO_URL format: not a url");
  });
});

describe("isValidRepoUrl", () => {
  it.each([
    ["https://github.com/lra/mackup.git", true],
    ["ssh://git@example.com/stubs.git", true],
    ["git@example.com:team/stubs.git", true],
    ["file:///srv/repos/stubs", true],
    ["ftp://example.com/stubs", false],
    ["stubs", false],
  ])("%s -> %s", (url, expected) => {
    expect(isValidRepoUrl(url)).toBe(expected);
  });
});
