/**
 * Creates and caches one storage per entity type
 */

import * as path from "path";
import type { EntityStorage, SchemaRegistry, StorageProvider } from "../types.js";
import { SchemaError } from "../errors.js";
import {
  DirectoryStorage,
  MetaStorage,
  SingleFileStorage,
  type EntityFileLocator,
} from "./entity-storages.js";

type TopLevelStorage = EntityStorage & EntityFileLocator;

export class StorageFactory implements StorageProvider {
  private readonly storages = new Map<string, EntityStorage>();

  constructor(
    private readonly storageDir: string,
    private readonly schema: SchemaRegistry
  ) {}

  getStorage(entityName: string): EntityStorage {
    const cached = this.storages.get(entityName);
    if (cached) {
      return cached;
    }

    const storage = this.createStorage(entityName);
    this.storages.set(entityName, storage);
    return storage;
  }

  private createStorage(entityName: string): EntityStorage {
    const { storage } = this.schema.getEntityInfo(entityName);
    if (storage.type !== "meta") {
      return this.getTopLevelStorage(entityName);
    }

    return new MetaStorage(
      entityName,
      this.getTopLevelStorage(storage.parent),
      storage.parentReference
    );
  }

  private getTopLevelStorage(entityName: string): TopLevelStorage {
    const { storage } = this.schema.getEntityInfo(entityName);
    const cached = this.storages.get(entityName);

    switch (storage.type) {
      case "directory": {
        if (cached instanceof DirectoryStorage) {
          return cached;
        }
        const created = new DirectoryStorage(path.join(this.storageDir, storage.path));
        this.storages.set(entityName, created);
        return created;
      }
      case "file": {
        if (cached instanceof SingleFileStorage) {
          return cached;
        }
        const created = new SingleFileStorage(path.join(this.storageDir, storage.path));
        this.storages.set(entityName, created);
        return created;
      }
      case "meta":
        throw new SchemaError(
          `Entity '${entityName}' is nested and cannot hold other entities`,
          entityName
        );
    }
  }
}
