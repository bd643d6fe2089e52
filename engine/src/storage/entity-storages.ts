/**
 * File-backed entity storages
 *
 * - DirectoryStorage: one file per entity, `<dir>/<shard>/<id>.ini`
 * - SingleFileStorage: every entity of the type in one file
 * - MetaStorage: child entities kept in their parent's file as
 *   `[<type>:<id>]` sections
 */

import * as fs from "fs";
import * as path from "path";
import type { EntityRecord, EntityStorage } from "../types.js";
import { StorageError } from "../errors.js";
import { readIniSections, writeIniSections } from "./ini-file.js";

export const ID_FIELD = "vp_id";

const ENTITY_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Storages that other storages can nest child entities into
 */
export interface EntityFileLocator {
  getFilePath(entityId: string): string;
  listFiles(): string[];
}

function assertEntityId(entityId: string): void {
  if (!ENTITY_ID_PATTERN.test(entityId)) {
    throw new StorageError(`Invalid entity id: '${entityId}'`);
  }
}

function withId(entityId: string, data: EntityRecord): EntityRecord {
  return { ...data, [ID_FIELD]: entityId };
}

function isNestedSection(sectionName: string): boolean {
  return sectionName.includes(":");
}

export class DirectoryStorage implements EntityStorage, EntityFileLocator {
  constructor(private readonly directory: string) {}

  getFilePath(entityId: string): string {
    assertEntityId(entityId);
    return path.join(this.directory, entityId.slice(0, 2), `${entityId}.ini`);
  }

  listFiles(): string[] {
    if (!fs.existsSync(this.directory)) {
      return [];
    }

    const files: string[] = [];
    const shards = fs
      .readdirSync(this.directory, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();

    for (const shard of shards) {
      const shardDir = path.join(this.directory, shard);
      for (const name of fs.readdirSync(shardDir).sort()) {
        if (name.endsWith(".ini")) {
          files.push(path.join(shardDir, name));
        }
      }
    }
    return files;
  }

  exists(entityId: string): boolean {
    return this.loadEntity(entityId) !== null;
  }

  loadEntity(entityId: string): EntityRecord | null {
    const section = readIniSections(this.getFilePath(entityId))[entityId];
    return section ? withId(entityId, section) : null;
  }

  loadAll(): EntityRecord[] {
    const entities: EntityRecord[] = [];
    for (const file of this.listFiles()) {
      const entityId = path.basename(file, ".ini");
      const section = readIniSections(file)[entityId];
      if (section) {
        entities.push(withId(entityId, section));
      }
    }
    return entities;
  }

  save(entityId: string, data: EntityRecord): void {
    const filePath = this.getFilePath(entityId);
    const sections = readIniSections(filePath);
    sections[entityId] = withId(entityId, data);
    writeIniSections(filePath, sections);
  }

  /**
   * Removes the entity together with everything nested in its file
   */
  delete(entityId: string): void {
    writeIniSections(this.getFilePath(entityId), {});
  }
}

export class SingleFileStorage implements EntityStorage, EntityFileLocator {
  constructor(private readonly filePath: string) {}

  getFilePath(): string {
    return this.filePath;
  }

  listFiles(): string[] {
    return fs.existsSync(this.filePath) ? [this.filePath] : [];
  }

  exists(entityId: string): boolean {
    return this.loadEntity(entityId) !== null;
  }

  loadEntity(entityId: string): EntityRecord | null {
    assertEntityId(entityId);
    const section = readIniSections(this.filePath)[entityId];
    return section ? withId(entityId, section) : null;
  }

  loadAll(): EntityRecord[] {
    return Object.entries(readIniSections(this.filePath))
      .filter(([name]) => !isNestedSection(name))
      .map(([entityId, section]) => withId(entityId, section));
  }

  save(entityId: string, data: EntityRecord): void {
    assertEntityId(entityId);
    const sections = readIniSections(this.filePath);
    sections[entityId] = withId(entityId, data);
    writeIniSections(this.filePath, sections);
  }

  delete(entityId: string): void {
    assertEntityId(entityId);
    const sections = readIniSections(this.filePath);
    delete sections[entityId];
    writeIniSections(this.filePath, sections);
  }
}

/**
 * Child entities scoped under a parent entity. The parent's id is kept in
 * the `vp_<parentReference>` field of every child.
 */
export class MetaStorage implements EntityStorage {
  private readonly parentField: string;

  constructor(
    private readonly entityName: string,
    private readonly parent: EntityFileLocator,
    parentReference: string
  ) {
    this.parentField = `vp_${parentReference}`;
  }

  private sectionName(entityId: string): string {
    assertEntityId(entityId);
    return `${this.entityName}:${entityId}`;
  }

  private candidateFiles(parentId?: string | null): string[] {
    if (parentId === undefined || parentId === null) {
      return this.parent.listFiles();
    }
    return [this.parent.getFilePath(parentId)];
  }

  exists(entityId: string, parentId?: string | null): boolean {
    return this.loadEntity(entityId, parentId) !== null;
  }

  loadEntity(entityId: string, parentId?: string | null): EntityRecord | null {
    const sectionName = this.sectionName(entityId);

    for (const file of this.candidateFiles(parentId)) {
      const section = readIniSections(file)[sectionName];
      if (!section) {
        continue;
      }
      if (parentId !== undefined && parentId !== null && section[this.parentField] !== parentId) {
        continue;
      }
      return withId(entityId, section);
    }
    return null;
  }

  loadAll(): EntityRecord[] {
    const prefix = `${this.entityName}:`;
    const entities: EntityRecord[] = [];

    for (const file of this.parent.listFiles()) {
      for (const [name, section] of Object.entries(readIniSections(file))) {
        if (name.startsWith(prefix)) {
          entities.push(withId(name.slice(prefix.length), section));
        }
      }
    }
    return entities;
  }

  save(entityId: string, data: EntityRecord, parentId?: string | null): void {
    if (parentId === undefined || parentId === null) {
      throw new StorageError(`Cannot save ${this.entityName} '${entityId}' without a parent id`);
    }

    const filePath = this.parent.getFilePath(parentId);
    const sections = readIniSections(filePath);
    sections[this.sectionName(entityId)] = {
      ...withId(entityId, data),
      [this.parentField]: parentId,
    };
    writeIniSections(filePath, sections);
  }

  delete(entityId: string, parentId?: string | null): void {
    const sectionName = this.sectionName(entityId);

    for (const file of this.candidateFiles(parentId)) {
      const sections = readIniSections(file);
      if (sections[sectionName]) {
        delete sections[sectionName];
        writeIniSections(file, sections);
      }
    }
  }
}
