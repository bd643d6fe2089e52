/**
 * Collaborator contracts of the revert engine, re-exporting shared types
 */

import type {
  ChangeInfo,
  CommitInfo,
  EntityInfo,
  EntityRecord,
  RevertChangeInfo,
} from "@revertguard/types";

export type {
  ChangeInfo,
  CommitInfo,
  Config,
  EntityChangeInfo,
  EntityFieldValue,
  EntityIdentity,
  EntityInfo,
  EntityRecord,
  EntityStorageLayout,
  RevertAction,
  RevertChangeInfo,
  SubChangeInfo,
  TrackedChangeInfo,
  UntrackedChangeInfo,
} from "@revertguard/types";
export { RevertStatus } from "@revertguard/types";

/**
 * Version-control backend holding the entity files
 */
export interface VersionControl {
  isCleanWorkingDirectory(): boolean;
  /** Files touched by a revision range, in the order git reports them */
  getModifiedFiles(range: string): string[];
  getCommit(hash: string): CommitInfo;
  /**
   * Apply the inverse of one commit without committing it.
   * Returns false on conflict, with the working tree restored.
   */
  revert(hash: string): boolean;
  /** Discard a speculatively applied revert */
  abortRevert(): void;
  /** Make the working tree match the tree of `hash` */
  revertAll(hash: string): void;
  /** True iff the working tree differs from the last commit */
  willCommit(): boolean;
}

/**
 * Attaches a change description to the next commit and finalizes it
 */
export interface ChangeCommitter {
  forceChangeInfo(changeInfo: RevertChangeInfo): void;
  commit(): void;
}

export type ChangeInfoParser = (commitMessage: string) => ChangeInfo;

/**
 * Read/write access to the stored entities of one type
 */
export interface EntityStorage {
  exists(entityId: string, parentId?: string | null): boolean;
  /** The stored entity, or null when it does not exist */
  loadEntity(entityId: string, parentId?: string | null): EntityRecord | null;
  loadAll(): EntityRecord[];
  save(entityId: string, data: EntityRecord, parentId?: string | null): void;
  delete(entityId: string, parentId?: string | null): void;
}

export interface StorageProvider {
  getStorage(entityName: string): EntityStorage;
}

export interface SchemaRegistry {
  getEntityInfo(entityName: string): EntityInfo;
  getAllEntityNames(): string[];
}

/**
 * Pushes file-store state for the given entity types into the mirror.
 * Safe to call with duplicates or a superset of the needed types.
 */
export interface Synchronizer {
  synchronize(entityNames: string[]): void;
}

export interface PostChangeDateUpdater {
  updateChangeDateForPosts(vpIds: string[]): void;
}

export interface Clock {
  now(): Date;
}
