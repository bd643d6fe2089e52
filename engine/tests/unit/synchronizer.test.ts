/**
 * Unit tests for mirror synchronization
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";
import type Database from "better-sqlite3";
import { initDatabase, mirrorTables } from "../../src/db.js";
import { DbSchemaInfo } from "../../src/schema-info.js";
import { StorageFactory } from "../../src/storage/storage-factory.js";
import { SynchronizationProcess } from "../../src/synchronizer.js";

interface PostRow {
  vp_id: string;
  comment_count: number;
  post_modified: string | null;
  data: string;
}

describe("SynchronizationProcess", () => {
  const schema = DbSchemaInfo.fromFile();
  let tempDir: string;
  let db: Database.Database;
  let storages: StorageFactory;
  let synchronizer: SynchronizationProcess;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "revertguard-sync-test-"));
    db = initDatabase({
      path: ":memory:",
      tables: mirrorTables(schema),
    });
    storages = new StorageFactory(tempDir, schema);
    synchronizer = new SynchronizationProcess(db, schema, storages);

    storages.getStorage("post").save("P1", {
      post_title: "Hello",
      post_modified: "2024-01-01 10:00:00",
    });
    storages.getStorage("post").save("P2", { post_title: "Other" });
    storages.getStorage("postmeta").save("M1", { meta_key: "_edit_lock" }, "P1");
    storages.getStorage("comment").save("C1", { vp_comment_post_ID: "P1" });
    storages.getStorage("comment").save("C2", { vp_comment_post_ID: "P1" });
  });

  afterEach(() => {
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function posts(): PostRow[] {
    return db
      .prepare<[], PostRow>("SELECT vp_id, comment_count, post_modified, data FROM posts ORDER BY vp_id")
      .all();
  }

  it("should mirror posts with their comment counts", () => {
    synchronizer.synchronize(["post"]);

    const rows = posts();
    expect(rows.map((row) => [row.vp_id, row.comment_count, row.post_modified])).toEqual([
      ["P1", 2, "2024-01-01 10:00:00"],
      ["P2", 0, null],
    ]);
    expect(JSON.parse(rows[1].data)).toEqual({ post_title: "Other", vp_id: "P2" });
  });

  it("should record the parent of nested entities", () => {
    synchronizer.synchronize(["postmeta"]);

    const row = db.prepare("SELECT vp_id, parent_vp_id FROM postmeta").get();
    expect(row).toEqual({ vp_id: "M1", parent_vp_id: "P1" });
  });

  it("should key nested entities by parent and id", () => {
    storages.getStorage("postmeta").save("M1", { meta_key: "_thumbnail_id" }, "P2");

    synchronizer.synchronize(["postmeta"]);

    const rows = db
      .prepare<[], { vp_id: string; parent_vp_id: string }>(
        "SELECT vp_id, parent_vp_id FROM postmeta ORDER BY parent_vp_id"
      )
      .all();
    expect(rows).toEqual([
      { vp_id: "M1", parent_vp_id: "P1" },
      { vp_id: "M1", parent_vp_id: "P2" },
    ]);
  });

  it("should replace stale rows", () => {
    synchronizer.synchronize(["post"]);
    storages.getStorage("post").delete("P2");

    synchronizer.synchronize(["post"]);

    expect(posts().map((row) => row.vp_id)).toEqual(["P1"]);
  });

  it("should produce the same rows when run twice with duplicates", () => {
    synchronizer.synchronize(["comment", "post", "post"]);
    const first = posts();

    synchronizer.synchronize(["comment", "post"]);

    expect(posts()).toEqual(first);
    const count = db.prepare("SELECT COUNT(*) AS count FROM comments").get();
    expect(count).toEqual({ count: 2 });
  });

  it("should skip entity types the schema does not know", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    synchronizer.synchronize(["widget", "option"]);

    expect(warn).toHaveBeenCalledWith("[sync] Skipping unknown entity type: widget");
    warn.mockRestore();
  });
});
