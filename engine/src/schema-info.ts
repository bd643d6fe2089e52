/**
 * Entity schema registry
 *
 * Loads entity declarations (mirror table, storage layout and references)
 * from a YAML file. The bundled schema.yml describes the default store.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { z } from "zod";
import type { EntityInfo, EntityStorageLayout, SchemaRegistry } from "./types.js";
import { SchemaError } from "./errors.js";

export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL("../schema.yml", import.meta.url));

const storageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("directory"), path: z.string().min(1) }),
  z.object({ type: z.literal("file"), path: z.string().min(1) }),
  z.object({
    type: z.literal("meta"),
    parent: z.string().min(1),
    "parent-reference": z.string().min(1),
  }),
]);

const entitySchema = z.object({
  table: z
    .string()
    .regex(/^[a-z_][a-z0-9_]*$/, "table must be a lowercase SQL identifier")
    .optional(),
  storage: storageSchema,
  references: z.record(z.string()).default({}),
  "mn-references": z.record(z.string()).default({}),
});

const schemaFileSchema = z.record(entitySchema);

type EntityDeclaration = z.infer<typeof entitySchema>;

function toStorageLayout(storage: EntityDeclaration["storage"]): EntityStorageLayout {
  if (storage.type === "meta") {
    return {
      type: "meta",
      parent: storage.parent,
      parentReference: storage["parent-reference"],
    };
  }
  return storage;
}

export class DbSchemaInfo implements SchemaRegistry {
  private readonly entityInfos: Map<string, EntityInfo>;

  constructor(entityInfos: EntityInfo[]) {
    this.entityInfos = new Map(entityInfos.map((info) => [info.entityName, info]));
    this.validateReferences();
  }

  /**
   * Parse a registry from YAML text
   *
   * @throws SchemaError if the document does not describe a valid schema
   */
  static fromYaml(content: string): DbSchemaInfo {
    let document: unknown;
    try {
      document = yaml.load(content, { schema: yaml.JSON_SCHEMA });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaError(`Invalid schema YAML: ${message}`);
    }

    const parsed = schemaFileSchema.safeParse(document ?? {});
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new SchemaError(`Invalid schema: ${issues}`);
    }

    return new DbSchemaInfo(
      Object.entries(parsed.data).map(([entityName, declaration]) => ({
        entityName,
        table: declaration.table ?? entityName,
        storage: toStorageLayout(declaration.storage),
        references: declaration.references,
        mnReferences: declaration["mn-references"],
      }))
    );
  }

  static fromFile(schemaPath: string = DEFAULT_SCHEMA_PATH): DbSchemaInfo {
    if (!fs.existsSync(schemaPath)) {
      throw new SchemaError(`Schema file not found: ${schemaPath}`);
    }
    return DbSchemaInfo.fromYaml(fs.readFileSync(schemaPath, "utf8"));
  }

  hasEntity(entityName: string): boolean {
    return this.entityInfos.has(entityName);
  }

  getEntityInfo(entityName: string): EntityInfo {
    const info = this.entityInfos.get(entityName);
    if (!info) {
      throw new SchemaError(`Unknown entity type: ${entityName}`, entityName);
    }
    return info;
  }

  getAllEntityNames(): string[] {
    return Array.from(this.entityInfos.keys());
  }

  private validateReferences(): void {
    for (const info of this.entityInfos.values()) {
      const targets = [
        ...Object.values(info.references),
        ...Object.values(info.mnReferences),
      ];
      for (const target of targets) {
        if (!this.entityInfos.has(target)) {
          throw new SchemaError(
            `Entity '${info.entityName}' references unknown entity type '${target}'`,
            info.entityName
          );
        }
      }

      if (info.storage.type === "meta") {
        const parent = this.entityInfos.get(info.storage.parent);
        if (!parent) {
          throw new SchemaError(
            `Entity '${info.entityName}' is nested in unknown entity type '${info.storage.parent}'`,
            info.entityName
          );
        }
        if (parent.storage.type === "meta") {
          throw new SchemaError(
            `Entity '${info.entityName}' cannot be nested in '${parent.entityName}', which is nested itself`,
            info.entityName
          );
        }
      }
    }
  }
}
