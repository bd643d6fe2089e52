/**
 * Referential integrity checks for reverted entities
 *
 * Runs against the working tree after a revert has been applied but before
 * it is committed, and only reads the store.
 */

import type {
  EntityFieldValue,
  EntityRecord,
  SchemaRegistry,
  StorageProvider,
} from "./types.js";

/**
 * Answers whether anything still points at an entity
 */
export interface IncomingReferenceLookup {
  existsSomeEntityWithReferenceTo(entityName: string, entityId: string): boolean;
}

export interface ReferenceChecker {
  checkEntityReferences(entityName: string, entityId: string, parentId: string | null): boolean;
}

/** Field holding a one-to-many reference */
export function referenceField(reference: string): string {
  return `vp_${reference}`;
}

/** Field holding the ids of a many-to-many reference */
export function mnReferenceField(referencedEntityName: string): string {
  return `vp_${referencedEntityName}`;
}

function referencedIds(value: EntityFieldValue | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

/**
 * Finds incoming references by loading every entity of every type that
 * declares a reference to the checked type. There is no reverse index.
 */
export class ScanningIncomingReferenceLookup implements IncomingReferenceLookup {
  constructor(
    private readonly schema: SchemaRegistry,
    private readonly storages: StorageProvider
  ) {}

  existsSomeEntityWithReferenceTo(entityName: string, entityId: string): boolean {
    for (const otherEntityName of this.schema.getAllEntityNames()) {
      const { references, mnReferences } = this.schema.getEntityInfo(otherEntityName);

      const oneToManyFields = Object.entries(references)
        .filter(([, target]) => target === entityName)
        .map(([reference]) => referenceField(reference));
      const hasMnReference = Object.values(mnReferences).includes(entityName);

      if (oneToManyFields.length === 0 && !hasMnReference) {
        continue;
      }

      const possiblyReferencingEntities = this.storages.getStorage(otherEntityName).loadAll();
      if (
        possiblyReferencingEntities.some(
          (entity) =>
            oneToManyFields.some((field) => entity[field] === entityId) ||
            (hasMnReference && this.listsId(entity, mnReferenceField(entityName), entityId))
        )
      ) {
        return true;
      }
    }

    return false;
  }

  private listsId(entity: EntityRecord, field: string, entityId: string): boolean {
    return referencedIds(entity[field]).includes(entityId);
  }
}

export class ReferenceIntegrityChecker implements ReferenceChecker {
  private readonly incomingReferences: IncomingReferenceLookup;

  constructor(
    private readonly schema: SchemaRegistry,
    private readonly storages: StorageProvider,
    incomingReferences?: IncomingReferenceLookup
  ) {
    this.incomingReferences =
      incomingReferences ?? new ScanningIncomingReferenceLookup(schema, storages);
  }

  /**
   * Returns true if the current state of the entity violates no reference
   * constraint: a missing entity must not be referenced by anything, and an
   * existing one must only reference entities that exist.
   */
  checkEntityReferences(entityName: string, entityId: string, parentId: string | null): boolean {
    const entityInfo = this.schema.getEntityInfo(entityName);
    const storage = this.storages.getStorage(entityName);

    const entity = storage.loadEntity(entityId, parentId);
    if (entity === null) {
      return !this.incomingReferences.existsSomeEntityWithReferenceTo(entityName, entityId);
    }

    for (const [reference, referencedEntityName] of Object.entries(entityInfo.references)) {
      const value = entity[referenceField(reference)];
      if (value === undefined) {
        continue;
      }

      const referencedStorage = this.storages.getStorage(referencedEntityName);
      if (!referencedIds(value).every((id) => referencedStorage.exists(id, parentId))) {
        return false;
      }
    }

    for (const referencedEntityName of Object.values(entityInfo.mnReferences)) {
      const ids = referencedIds(entity[mnReferenceField(referencedEntityName)]);
      const referencedStorage = this.storages.getStorage(referencedEntityName);

      if (!ids.every((id) => referencedStorage.exists(id, parentId))) {
        return false;
      }
    }

    return true;
  }
}
