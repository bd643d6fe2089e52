/**
 * Relational mirror initialization and connection management
 */

import * as fs from "fs";
import * as path from "path";
import Database from "better-sqlite3";
import * as schema from "@revertguard/types/schema";
import type { SchemaRegistry } from "./types.js";

export interface DatabaseOptions {
  path: string;
  /** Mirror tables to create besides the posts table */
  tables?: schema.MirrorTable[];
  verbose?: boolean;
}

/**
 * Initialize and configure the SQLite mirror
 */
export function initDatabase(options: DatabaseOptions): Database.Database {
  if (options.path !== ":memory:") {
    fs.mkdirSync(path.dirname(options.path), { recursive: true });
  }

  const db = new Database(options.path, {
    verbose: options.verbose ? console.log : undefined,
  });

  db.exec(schema.DB_CONFIG);

  const tables = new Map<string, schema.MirrorTable>([
    [schema.POSTS_TABLE_NAME, { name: schema.POSTS_TABLE_NAME }],
  ]);
  for (const table of options.tables ?? []) {
    tables.set(table.name, table);
  }
  for (const table of tables.values()) {
    db.exec(schema.entityTable(table));
    db.exec(schema.entityTableIndexes(table.name));
  }

  return db;
}

/**
 * Mirror tables of every entity type the registry declares
 */
export function mirrorTables(registry: SchemaRegistry): schema.MirrorTable[] {
  return registry.getAllEntityNames().map((entityName) => {
    const info = registry.getEntityInfo(entityName);
    return { name: info.table, scoped: info.storage.type === "meta" };
  });
}

/**
 * Keep a mirror database that lives inside the repository out of git.
 * A mirror in a subdirectory gets a `.gitignore` beside it that also ignores
 * itself; a mirror at the repository root is listed in `.git/info/exclude`.
 */
export function ignoreMirrorFiles(repoRoot: string, databasePath: string): void {
  if (databasePath === ":memory:") {
    return;
  }

  const root = path.resolve(repoRoot);
  const mirrorDir = path.dirname(path.resolve(root, databasePath));
  const relativeDir = path.relative(root, mirrorDir);
  if (relativeDir.startsWith("..") || path.isAbsolute(relativeDir)) {
    return;
  }

  const pattern = `${path.basename(databasePath)}*`;

  if (relativeDir === "") {
    const infoDir = path.join(root, ".git", "info");
    if (!fs.existsSync(path.join(root, ".git"))) {
      return;
    }
    fs.mkdirSync(infoDir, { recursive: true });
    appendIgnoreLines(path.join(infoDir, "exclude"), [`/${pattern}`]);
    return;
  }

  fs.mkdirSync(mirrorDir, { recursive: true });
  appendIgnoreLines(path.join(mirrorDir, ".gitignore"), [pattern, ".gitignore"]);
}

function appendIgnoreLines(ignoreFile: string, lines: string[]): void {
  const existing = fs.existsSync(ignoreFile) ? fs.readFileSync(ignoreFile, "utf8") : "";
  const present = new Set(existing.split(/\r?\n/).map((line) => line.trim()));
  const missing = lines.filter((line) => !present.has(line));
  if (missing.length === 0) {
    return;
  }

  const separator = existing === "" || existing.endsWith("\n") ? "" : "\n";
  fs.writeFileSync(ignoreFile, `${existing}${separator}${missing.join("\n")}\n`, "utf8");
}

/**
 * Run a callback inside a savepoint, rolling back if it throws
 */
export function withTransaction<T>(
  db: Database.Database,
  callback: (db: Database.Database) => T
): T {
  const savepoint = `sp_${Date.now()}`;

  try {
    db.exec(`SAVEPOINT ${savepoint}`);
    const result = callback(db);
    db.exec(`RELEASE ${savepoint}`);
    return result;
  } catch (error) {
    db.exec(`ROLLBACK TO ${savepoint}`);
    db.exec(`RELEASE ${savepoint}`);
    throw error;
  }
}
