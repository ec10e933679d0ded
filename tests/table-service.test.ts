import fs from "fs/promises";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { TableService } from "../src/services/table-service";
import type { StubRecord } from "../src/types";
import { makeTempDir } from "./helpers";

function record(overrides: Partial<StubRecord> & { stubId: string }): StubRecord {
  return { standardPaths: [], xdgPaths: [], ...overrides };
}

describe("TableService", () => {
  const service = new TableService();

  describe("toEntry", () => {
    it("uses standard paths when present, ignoring xdg paths", () => {
      const entry = service.toEntry(
        record({
          stubId: "alpha",
          displayName: "Alpha App",
          standardPaths: [".alpharc"],
          xdgPaths: ["alpha/config"],
        })
      );
      expect(entry).toEqual({ name: "Alpha App", config_files: [".alpharc"] });
    });

    it("falls back to xdg paths and the default name", () => {
      const entry = service.toEntry(
        record({ stubId: "beta", xdgPaths: [".config/beta/settings"] })
      );
      expect(entry).toEqual({
        name: "Beta",
        config_files: [".config/beta/settings"],
      });
    });

    it("returns an empty path list when neither source has paths", () => {
      expect(service.toEntry(record({ stubId: "gamma", displayName: "G" }))).toEqual({
        name: "G",
        config_files: [],
      });
    });
  });

  describe("buildTable", () => {
    it("orders keys lexicographically regardless of input order", () => {
      const table = service.buildTable([
        record({ stubId: "zsh", standardPaths: [".zshrc"] }),
        record({ stubId: "Xcode", standardPaths: ["x"] }),
        record({ stubId: "alpha", standardPaths: [".alpharc"] }),
        record({ stubId: "a-b", standardPaths: ["ab"] }),
      ]);
      expect(Object.keys(table)).toEqual(["Xcode", "a-b", "alpha", "zsh"]);
    });
  });

  describe("stub ids that collide with Object.prototype", () => {
    it("keeps __proto__ as an ordinary key", () => {
      const table = service.buildTable([
        record({ stubId: "alpha", standardPaths: [".alpharc"] }),
        record({ stubId: "__proto__", standardPaths: [".protorc"] }),
      ]);

      expect(Object.keys(table)).toEqual(["__proto__", "alpha"]);
      expect(Object.getPrototypeOf(table)).toBe(Object.prototype);
      expect(service.serialize(table)).toBe(
        [
          "{",
          '  "__proto__": {',
          '    "name": "__Proto__",',
          '    "config_files": [',
          '      ".protorc"',
          "    ]",
          "  },",
          '  "alpha": {',
          '    "name": "Alpha",',
          '    "config_files": [',
          '      ".alpharc"',
          "    ]",
          "  }",
          "}",
        ].join("\n")
      );
    });
  });

  describe("serialize", () => {
    it("writes two-space indented JSON with sorted keys and fixed field order", () => {
      const json = service.serialize({
        beta: { config_files: [".config/beta/settings"], name: "Beta" },
        alpha: { name: "Alpha App", config_files: [".alpharc"] },
      });

      expect(json).toBe(
        [
          "{",
          '  "alpha": {',
          '    "name": "Alpha App",',
          '    "config_files": [',
          '      ".alpharc"',
          "    ]",
          "  },",
          '  "beta": {',
          '    "name": "Beta",',
          '    "config_files": [',
          '      ".config/beta/settings"',
          "    ]",
          "  }",
          "}",
        ].join("\n")
      );
    });

    it("renders an empty path list inline", () => {
      expect(service.serialize({ g: { name: "G", config_files: [] } })).toBe(
        '{\n  "g": {\n    "name": "G",\n    "config_files": []\n  }\n}'
      );
    });
  });

  describe("write and load", () => {
    let dir: string;

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it("creates the parent directory and returns the byte size", async () => {
      dir = await makeTempDir();
      const outputFile = path.join(dir, "nested", "default_db.json");
      const table = { alpha: { name: "Älpha", config_files: [".alpharc"] } };

      const bytes = await service.write(table, outputFile);

      const written = await fs.readFile(outputFile, "utf-8");
      expect(written).toBe(service.serialize(table));
      expect(bytes).toBe(Buffer.byteLength(written, "utf-8"));
      expect(await fs.readdir(path.dirname(outputFile))).toEqual(["default_db.json"]);
    });

    it("round-trips through load", async () => {
      dir = await makeTempDir();
      const outputFile = path.join(dir, "db.json");
      const table = { alpha: { name: "Alpha App", config_files: [".alpharc"] } };

      await service.write(table, outputFile);

      expect(await service.load(outputFile)).toEqual(table);
    });

    it("rejects a document that is not a table", async () => {
      dir = await makeTempDir();
      const file = path.join(dir, "bad.json");
      await fs.writeFile(file, JSON.stringify({ alpha: { name: 1 } }));

      await expect(service.load(file)).rejects.toThrow(`Not a stub table: ${file}`);
    });
  });
});
