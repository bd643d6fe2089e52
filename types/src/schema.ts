/**
 * SQLite schema of the relational mirror
 * Shared between the engine and anything that reads the mirror
 */

/**
 * Database configuration SQL
 */
export const DB_CONFIG = `
-- Enable WAL mode for better concurrency
PRAGMA journal_mode=WAL;

PRAGMA synchronous=NORMAL;
PRAGMA temp_store=MEMORY;
`;

/**
 * Name of the table that receives post timestamps
 */
export const POSTS_TABLE_NAME = "posts";

/**
 * Posts carry denormalized columns on top of the generic entity shape:
 * the comment count and the two modification timestamps.
 */
export const POSTS_TABLE = `
CREATE TABLE IF NOT EXISTS posts (
    vp_id TEXT PRIMARY KEY,
    parent_vp_id TEXT,
    data TEXT NOT NULL DEFAULT '{}',
    comment_count INTEGER NOT NULL DEFAULT 0 CHECK(comment_count >= 0),
    post_modified TEXT,
    post_modified_gmt TEXT,
    synced_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
);
`;

export const POSTS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_posts_post_modified ON posts(post_modified);
`;

const TABLE_NAME_PATTERN = /^[a-z_][a-z0-9_]*$/;

/**
 * Check that a table name can be interpolated into DDL
 */
export function isValidTableName(table: string): boolean {
  return TABLE_NAME_PATTERN.test(table);
}

function assertTableName(table: string): void {
  if (!isValidTableName(table)) {
    throw new Error(`Invalid mirror table name: ${table}`);
  }
}

/**
 * A mirror table and whether its rows are keyed within a parent entity
 */
export interface MirrorTable {
  name: string;
  /** Child entities: ids are unique per parent only */
  scoped?: boolean;
}

/**
 * Generic mirror table: one row per stored entity, fields kept as JSON.
 * Scoped tables are keyed by (parent_vp_id, vp_id).
 */
export function entityTable(table: MirrorTable): string {
  assertTableName(table.name);
  if (table.name === POSTS_TABLE_NAME) {
    return POSTS_TABLE;
  }
  if (table.scoped) {
    return `
CREATE TABLE IF NOT EXISTS ${table.name} (
    vp_id TEXT NOT NULL,
    parent_vp_id TEXT NOT NULL,
    data TEXT NOT NULL DEFAULT '{}',
    synced_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP,
    PRIMARY KEY (parent_vp_id, vp_id)
);
`;
  }
  return `
CREATE TABLE IF NOT EXISTS ${table.name} (
    vp_id TEXT PRIMARY KEY,
    parent_vp_id TEXT,
    data TEXT NOT NULL DEFAULT '{}',
    synced_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
);
`;
}

export function entityTableIndexes(table: string): string {
  assertTableName(table);
  const indexes = `
CREATE INDEX IF NOT EXISTS idx_${table}_parent_vp_id ON ${table}(parent_vp_id);
`;
  return table === POSTS_TABLE_NAME ? indexes + POSTS_INDEXES : indexes;
}
