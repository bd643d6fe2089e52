/**
 * Unit tests for wiring a reverter
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import { createReverter, ignoreMirrorFiles, Reverter } from "../../src/index.js";

describe("createReverter", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "revertguard-index-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should create a mirror table per entity table", () => {
    const guard = createReverter(tempDir, { config: { databasePath: ":memory:" } });

    const tables = guard.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name"
      )
      .all()
      .map((row) => row.name);

    expect(guard.reverter).toBeInstanceOf(Reverter);
    expect(tables).toEqual([
      "comments",
      "options",
      "postmeta",
      "posts",
      "term_taxonomy",
      "terms",
      "usermeta",
      "users",
    ]);

    guard.close();
    expect(guard.db.open).toBe(false);
  });

  it("should apply overrides on top of the file config", () => {
    fs.mkdirSync(path.join(tempDir, ".revertguard"));
    fs.writeFileSync(
      path.join(tempDir, ".revertguard", "config.json"),
      JSON.stringify({ gmtOffsetMinutes: 60, storageDir: "store" })
    );

    const guard = createReverter(tempDir, {
      config: { databasePath: ":memory:", gmtOffsetMinutes: 120 },
    });

    expect(guard.config).toEqual({
      storageDir: "store",
      databasePath: ":memory:",
      gmtOffsetMinutes: 120,
      verbose: false,
    });

    guard.close();
  });

  it("should create the mirror file under the repository", () => {
    const guard = createReverter(tempDir);
    guard.close();

    expect(fs.existsSync(path.join(tempDir, ".revertguard", "mirror.db"))).toBe(true);
  });

  it("should ignore the mirror files beside the database", () => {
    createReverter(tempDir).close();
    createReverter(tempDir).close();

    expect(fs.readFileSync(path.join(tempDir, ".revertguard", ".gitignore"), "utf8")).toBe(
      "mirror.db*\n.gitignore\n"
    );
  });

  it("should exclude a mirror at the repository root through git", () => {
    fs.mkdirSync(path.join(tempDir, ".git", "info"), { recursive: true });
    fs.writeFileSync(path.join(tempDir, ".git", "info", "exclude"), "# local excludes");

    ignoreMirrorFiles(tempDir, "mirror.sqlite");

    expect(fs.readFileSync(path.join(tempDir, ".git", "info", "exclude"), "utf8")).toBe(
      "# local excludes\n/mirror.sqlite*\n"
    );
    expect(fs.existsSync(path.join(tempDir, ".gitignore"))).toBe(false);
  });

  it("should leave mirrors outside the repository alone", () => {
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), "revertguard-outside-"));
    try {
      ignoreMirrorFiles(tempDir, path.join(outside, "mirror.db"));

      expect(fs.readdirSync(outside)).toEqual([]);
      expect(fs.readdirSync(tempDir)).toEqual([]);
    } finally {
      fs.rmSync(outside, { recursive: true, force: true });
    }
  });
});
