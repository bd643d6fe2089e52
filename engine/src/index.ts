/**
 * revertguard engine
 * Referentially safe reverts of a git-versioned entity store
 */

import type Database from "better-sqlite3";
import type { Clock, Config } from "./types.js";
import { loadConfig, resolveConfigPaths } from "./config.js";
import { Committer } from "./committer.js";
import { ignoreMirrorFiles, initDatabase, mirrorTables } from "./db.js";
import { GitRepository } from "./git-repository.js";
import { PostTimestampUpdater } from "./post-timestamps.js";
import { ReferenceIntegrityChecker } from "./reference-checker.js";
import { Reverter } from "./reverter.js";
import { DbSchemaInfo } from "./schema-info.js";
import { StorageFactory } from "./storage/storage-factory.js";
import { SynchronizationProcess } from "./synchronizer.js";

export * from "./types.js";
export * from "./errors.js";
export { buildChangeInfo, formatChangeInfo, getEntityChanges } from "./change-info.js";
export { detectEntitiesToSynchronize, getAffectedPosts, wasModified } from "./change-set.js";
export { systemClock, formatSqlDate } from "./clock.js";
export { Committer, type CommitTarget } from "./committer.js";
export { loadConfig, resolveConfigPaths, DEFAULT_CONFIG } from "./config.js";
export { ignoreMirrorFiles, initDatabase, mirrorTables, withTransaction } from "./db.js";
export { GitRepository } from "./git-repository.js";
export { PostTimestampUpdater } from "./post-timestamps.js";
export {
  ReferenceIntegrityChecker,
  ScanningIncomingReferenceLookup,
  type IncomingReferenceLookup,
  type ReferenceChecker,
} from "./reference-checker.js";
export { Reverter, type ReverterDependencies } from "./reverter.js";
export { DbSchemaInfo, DEFAULT_SCHEMA_PATH } from "./schema-info.js";
export { DirectoryStorage, MetaStorage, SingleFileStorage } from "./storage/entity-storages.js";
export { StorageFactory } from "./storage/storage-factory.js";
export { SynchronizationProcess } from "./synchronizer.js";

export interface CreateReverterOptions {
  /** Overrides for values read from `.revertguard/config.json` */
  config?: Partial<Config>;
  clock?: Clock;
}

export interface RevertGuard {
  reverter: Reverter;
  db: Database.Database;
  config: Config;
  close(): void;
}

/**
 * Wire a reverter for the repository at `repoRoot`
 */
export function createReverter(repoRoot: string, options: CreateReverterOptions = {}): RevertGuard {
  const config: Config = { ...loadConfig(repoRoot), ...options.config };
  const paths = resolveConfigPaths(repoRoot, config);

  const schema = DbSchemaInfo.fromFile(paths.schemaPath);
  const storages = new StorageFactory(paths.storageDir, schema);
  const repository = new GitRepository(repoRoot);

  ignoreMirrorFiles(repoRoot, paths.databasePath);
  const db = initDatabase({
    path: paths.databasePath,
    tables: mirrorTables(schema),
  });

  const reverter = new Reverter({
    repository,
    committer: new Committer(repository),
    referenceChecker: new ReferenceIntegrityChecker(schema, storages),
    synchronizer: new SynchronizationProcess(db, schema, storages, {
      verbose: config.verbose || undefined,
    }),
    postUpdater: new PostTimestampUpdater(db, {
      clock: options.clock,
      gmtOffsetMinutes: config.gmtOffsetMinutes,
    }),
    verbose: config.verbose || undefined,
  });

  return {
    reverter,
    db,
    config,
    close: () => db.close(),
  };
}
