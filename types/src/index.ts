/**
 * Core types for revertguard
 */

/**
 * A field value as stored in an entity file: a scalar or a list of ids
 */
export type EntityFieldValue = string | string[];

/**
 * An entity as materialized from the file store. Every stored entity
 * carries its own id under `vp_id`.
 */
export type EntityRecord = Record<string, EntityFieldValue>;

export interface EntityIdentity {
  entityType: string;
  entityId: string;
  parentId: string | null;
}

/**
 * How a type's entities are laid out on disk
 */
export type EntityStorageLayout =
  | { type: "directory"; path: string }
  | { type: "file"; path: string }
  | { type: "meta"; parent: string; parentReference: string };

/**
 * Reference declarations of one entity type.
 * Both maps go from reference name to the referenced entity type.
 */
export interface EntityInfo {
  entityName: string;
  table: string;
  storage: EntityStorageLayout;
  /** One-to-many ("belongs-to") references, stored as `vp_<reference>` */
  references: Record<string, string>;
  /** Many-to-many references, stored as `vp_<referenced entity type>` */
  mnReferences: Record<string, string>;
}

export type EntityAction = string;

export interface EntityChangeInfo {
  kind: "entity";
  entityType: string;
  action: EntityAction;
  entityId: string;
  parentId: string | null;
}

export type RevertAction = "undo" | "rollback";

export interface RevertChangeInfo {
  kind: "revert";
  action: RevertAction;
  commitHash: string;
}

export type SubChangeInfo = EntityChangeInfo | RevertChangeInfo;

/**
 * A commit whose message carries no structured description
 */
export interface UntrackedChangeInfo {
  kind: "untracked";
  message: string;
}

export interface TrackedChangeInfo {
  kind: "tracked";
  changes: SubChangeInfo[];
}

export type ChangeInfo = UntrackedChangeInfo | TrackedChangeInfo;

export interface CommitInfo {
  hash: string;
  message: string;
}

export const RevertStatus = {
  OK: "OK",
  NOT_CLEAN_WORKING_DIRECTORY: "NOT_CLEAN_WORKING_DIRECTORY",
  MERGE_CONFLICT: "MERGE_CONFLICT",
  VIOLATED_REFERENTIAL_INTEGRITY: "VIOLATED_REFERENTIAL_INTEGRITY",
  NOTHING_TO_COMMIT: "NOTHING_TO_COMMIT",
} as const;

export type RevertStatus = (typeof RevertStatus)[keyof typeof RevertStatus];

/**
 * Project configuration (`.revertguard/config.json`)
 */
export interface Config {
  /** Entity store root, relative to the repository root */
  storageDir: string;
  /** SQLite mirror path, relative to the repository root */
  databasePath: string;
  /** Schema registry file; the bundled schema.yml when unset */
  schemaPath?: string;
  /** Offset of local time from UTC, used for post timestamps */
  gmtOffsetMinutes: number;
  verbose: boolean;
}
