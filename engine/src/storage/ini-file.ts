/**
 * INI reader and writer for entity files
 *
 * Each section of a file holds one entity. Lists are written as
 * `key[] = value` lines.
 */

import * as fs from "fs";
import * as path from "path";
import ini from "ini";
import type { EntityFieldValue, EntityRecord } from "../types.js";
import { StorageError } from "../errors.js";

export type IniSections = Record<string, EntityRecord>;

function toFieldValue(value: unknown): EntityFieldValue | null {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean" || typeof value === "number") {
    // the parser turns bare true/false into booleans
    return String(value);
  }
  if (Array.isArray(value)) {
    const items: string[] = [];
    for (const item of value) {
      const itemValue = toFieldValue(item);
      if (typeof itemValue === "string") {
        items.push(itemValue);
      }
    }
    return items;
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Normalize a parsed section into an entity record.
 * Null values are dropped: a reference set to null is not set.
 */
export function toEntityRecord(section: Record<string, unknown>): EntityRecord {
  const record: EntityRecord = {};
  for (const [key, value] of Object.entries(section)) {
    const fieldValue = toFieldValue(value);
    if (fieldValue !== null) {
      record[key] = fieldValue;
    }
  }
  return record;
}

export function parseIniSections(content: string): IniSections {
  const parsed: Record<string, unknown> = ini.parse(content);
  const sections: IniSections = {};
  for (const [name, value] of Object.entries(parsed)) {
    if (isPlainObject(value)) {
      sections[name] = toEntityRecord(value);
    }
  }
  return sections;
}

/**
 * Read all sections of an INI file; a missing file has none
 */
export function readIniSections(filePath: string): IniSections {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  try {
    return parseIniSections(fs.readFileSync(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Failed to read ${filePath}: ${message}`, filePath);
  }
}

/**
 * Write sections back, removing the file once it has none left
 */
export function writeIniSections(filePath: string, sections: IniSections): void {
  try {
    if (Object.keys(sections).length === 0) {
      fs.rmSync(filePath, { force: true });
      return;
    }

    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, ini.stringify(sections, { whitespace: true }), "utf8");
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StorageError(`Failed to write ${filePath}: ${message}`, filePath);
  }
}
