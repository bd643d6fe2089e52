/**
 * Pushes file-store state into the relational mirror
 */

import type Database from "better-sqlite3";
import { POSTS_TABLE_NAME } from "@revertguard/types/schema";
import type {
  EntityInfo,
  EntityRecord,
  SchemaRegistry,
  StorageProvider,
  Synchronizer,
} from "./types.js";
import { withTransaction } from "./db.js";
import { ID_FIELD } from "./storage/entity-storages.js";

const COMMENT_ENTITY = "comment";
const COMMENT_POST_FIELD = "vp_comment_post_ID";

export interface SynchronizationOptions {
  verbose?: boolean;
}

function scalar(value: EntityRecord[string] | undefined): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * Replaces the mirror table of each requested entity type with the
 * entities currently in the store. Running it twice yields the same rows.
 */
export class SynchronizationProcess implements Synchronizer {
  private readonly verbose: boolean;

  constructor(
    private readonly db: Database.Database,
    private readonly schema: SchemaRegistry,
    private readonly storages: StorageProvider,
    options: SynchronizationOptions = {}
  ) {
    this.verbose = options.verbose ?? Boolean(process.env.REVERTGUARD_DEBUG);
  }

  synchronize(entityNames: string[]): void {
    const known = new Set(this.schema.getAllEntityNames());
    const distinct = Array.from(new Set(entityNames)).filter((entityName) => {
      if (!known.has(entityName)) {
        console.warn(`[sync] Skipping unknown entity type: ${entityName}`);
        return false;
      }
      return true;
    });

    withTransaction(this.db, () => {
      for (const entityName of distinct) {
        this.synchronizeEntity(this.schema.getEntityInfo(entityName));
      }
    });
  }

  private synchronizeEntity(info: EntityInfo): void {
    const entities = this.storages.getStorage(info.entityName).loadAll();
    const parentField =
      info.storage.type === "meta" ? `vp_${info.storage.parentReference}` : null;

    if (this.verbose) {
      console.log(`[sync] ${info.entityName}: ${entities.length} entities -> ${info.table}`);
    }

    this.db.prepare(`DELETE FROM ${info.table}`).run();

    if (info.table === POSTS_TABLE_NAME) {
      this.insertPosts(entities);
      return;
    }

    const insert = this.db.prepare(`
      INSERT INTO ${info.table} (vp_id, parent_vp_id, data)
      VALUES (@vp_id, @parent_vp_id, @data)
    `);
    for (const entity of entities) {
      insert.run({
        vp_id: scalar(entity[ID_FIELD]),
        parent_vp_id: parentField ? (scalar(entity[parentField]) ?? "") : null,
        data: JSON.stringify(entity),
      });
    }
  }

  private insertPosts(posts: EntityRecord[]): void {
    const commentCounts = this.countCommentsPerPost();
    const insert = this.db.prepare(`
      INSERT INTO posts (vp_id, parent_vp_id, data, comment_count, post_modified, post_modified_gmt)
      VALUES (@vp_id, @parent_vp_id, @data, @comment_count, @post_modified, @post_modified_gmt)
    `);

    for (const post of posts) {
      const vpId = scalar(post[ID_FIELD]);
      insert.run({
        vp_id: vpId,
        parent_vp_id: scalar(post["vp_post_parent"]),
        data: JSON.stringify(post),
        comment_count: vpId === null ? 0 : (commentCounts.get(vpId) ?? 0),
        post_modified: scalar(post["post_modified"]),
        post_modified_gmt: scalar(post["post_modified_gmt"]),
      });
    }
  }

  private countCommentsPerPost(): Map<string, number> {
    const counts = new Map<string, number>();
    if (!this.schema.getAllEntityNames().includes(COMMENT_ENTITY)) {
      // counts stay zero for stores without comments
      return counts;
    }

    for (const comment of this.storages.getStorage(COMMENT_ENTITY).loadAll()) {
      const postId = scalar(comment[COMMENT_POST_FIELD]);
      if (postId !== null) {
        counts.set(postId, (counts.get(postId) ?? 0) + 1);
      }
    }
    return counts;
  }
}
