/**
 * In-process stand-ins for the file store and the git backend
 */

import type {
  ChangeCommitter,
  CommitInfo,
  EntityRecord,
  EntityStorage,
  PostChangeDateUpdater,
  RevertChangeInfo,
  SchemaRegistry,
  StorageProvider,
  Synchronizer,
  VersionControl,
} from "../../src/types.js";
import { SchemaError } from "../../src/errors.js";

interface StoredEntity {
  parentId: string | null;
  record: EntityRecord;
}

export class InMemoryStorage implements EntityStorage {
  readonly entities = new Map<string, StoredEntity>();

  constructor(private readonly scoped: boolean) {}

  exists(entityId: string, parentId?: string | null): boolean {
    return this.loadEntity(entityId, parentId) !== null;
  }

  loadEntity(entityId: string, parentId?: string | null): EntityRecord | null {
    const stored = this.entities.get(entityId);
    if (!stored) {
      return null;
    }
    if (this.scoped && parentId !== undefined && parentId !== null && stored.parentId !== parentId) {
      return null;
    }
    return { ...stored.record };
  }

  loadAll(): EntityRecord[] {
    return Array.from(this.entities.values()).map((stored) => ({ ...stored.record }));
  }

  save(entityId: string, data: EntityRecord, parentId?: string | null): void {
    this.entities.set(entityId, {
      parentId: parentId ?? null,
      record: { ...data, vp_id: entityId },
    });
  }

  delete(entityId: string): void {
    this.entities.delete(entityId);
  }
}

export class InMemoryStore implements StorageProvider {
  private readonly storages = new Map<string, InMemoryStorage>();

  constructor(schema: SchemaRegistry) {
    for (const entityName of schema.getAllEntityNames()) {
      const scoped = schema.getEntityInfo(entityName).storage.type === "meta";
      this.storages.set(entityName, new InMemoryStorage(scoped));
    }
  }

  getStorage(entityName: string): InMemoryStorage {
    const storage = this.storages.get(entityName);
    if (!storage) {
      throw new SchemaError(`Unknown entity type: ${entityName}`, entityName);
    }
    return storage;
  }

  snapshot(): string {
    const state: Record<string, Array<[string, StoredEntity]>> = {};
    for (const [entityName, storage] of this.storages) {
      state[entityName] = Array.from(storage.entities.entries());
    }
    return JSON.stringify(state);
  }

  restore(snapshot: string): void {
    const state: Record<string, Array<[string, StoredEntity]>> = JSON.parse(snapshot);
    for (const [entityName, entries] of Object.entries(state)) {
      const storage = this.getStorage(entityName);
      storage.entities.clear();
      for (const [entityId, stored] of entries) {
        storage.entities.set(entityId, stored);
      }
    }
  }
}

export interface FakeCommit {
  hash: string;
  message: string;
  files: string[];
  /** Effect of reverting the commit on the store */
  revert: (store: InMemoryStore) => void;
}

export interface FakeRollback {
  files: string[];
  /** Effect of returning the store to the commit's state */
  apply: (store: InMemoryStore) => void;
}

/**
 * Git backend over an in-memory store. A speculative revert snapshots the
 * store first so that aborting restores it exactly.
 */
export class FakeRepository implements VersionControl {
  clean = true;
  readonly calls: string[] = [];
  readonly conflicting = new Set<string>();
  private readonly commits = new Map<string, FakeCommit>();
  private readonly rollbacks = new Map<string, FakeRollback>();
  private committedState: string;

  constructor(private readonly store: InMemoryStore) {
    this.committedState = store.snapshot();
  }

  addCommit(commit: FakeCommit): void {
    this.commits.set(commit.hash, commit);
  }

  addRollback(hash: string, rollback: FakeRollback): void {
    this.rollbacks.set(hash, rollback);
  }

  /** Treat the current store state as committed */
  markCommitted(): void {
    this.committedState = this.store.snapshot();
  }

  isCleanWorkingDirectory(): boolean {
    this.calls.push("isCleanWorkingDirectory");
    return this.clean;
  }

  getModifiedFiles(range: string): string[] {
    this.calls.push(`getModifiedFiles ${range}`);
    const single = /^(.+)~1\.\.\1$/.exec(range);
    if (single) {
      return this.getFakeCommit(single[1]).files;
    }
    const rollbackHash = range.replace(/\.\.HEAD$/, "");
    return this.rollbacks.get(rollbackHash)?.files ?? [];
  }

  getCommit(hash: string): CommitInfo {
    this.calls.push(`getCommit ${hash}`);
    const commit = this.getFakeCommit(hash);
    return { hash: commit.hash, message: commit.message };
  }

  revert(hash: string): boolean {
    this.calls.push(`revert ${hash}`);
    if (this.conflicting.has(hash)) {
      return false;
    }
    this.getFakeCommit(hash).revert(this.store);
    return true;
  }

  abortRevert(): void {
    this.calls.push("abortRevert");
    this.store.restore(this.committedState);
  }

  revertAll(hash: string): void {
    this.calls.push(`revertAll ${hash}`);
    this.rollbacks.get(hash)?.apply(this.store);
  }

  willCommit(): boolean {
    this.calls.push("willCommit");
    return this.store.snapshot() !== this.committedState;
  }

  private getFakeCommit(hash: string): FakeCommit {
    const commit = this.commits.get(hash);
    if (!commit) {
      throw new Error(`Unknown commit: ${hash}`);
    }
    return commit;
  }
}

export class FakeCommitter implements ChangeCommitter {
  readonly forced: RevertChangeInfo[] = [];
  commits = 0;

  constructor(private readonly repository: FakeRepository) {}

  forceChangeInfo(changeInfo: RevertChangeInfo): void {
    this.forced.push(changeInfo);
  }

  commit(): void {
    this.commits++;
    this.repository.markCommitted();
  }
}

export class RecordingSynchronizer implements Synchronizer {
  readonly calls: string[][] = [];

  synchronize(entityNames: string[]): void {
    this.calls.push(entityNames);
  }
}

export class RecordingPostUpdater implements PostChangeDateUpdater {
  readonly calls: string[][] = [];

  updateChangeDateForPosts(vpIds: string[]): void {
    this.calls.push(vpIds);
  }
}
