import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { Config } from "./types.js";
import { ConfigurationError } from "./errors.js";

export const CONFIG_DIR = ".revertguard";
export const CONFIG_FILE = "config.json";

export const DEFAULT_CONFIG: Config = {
  storageDir: "db",
  databasePath: path.join(CONFIG_DIR, "mirror.db"),
  gmtOffsetMinutes: 0,
  verbose: false,
};

const configSchema = z
  .object({
    storageDir: z.string().min(1),
    databasePath: z.string().min(1),
    schemaPath: z.string().min(1),
    gmtOffsetMinutes: z.number().int().min(-14 * 60).max(14 * 60),
    verbose: z.boolean(),
  })
  .partial();

export function getConfigPath(repoRoot: string): string {
  return path.join(repoRoot, CONFIG_DIR, CONFIG_FILE);
}

/**
 * Read `.revertguard/config.json`, filling in defaults.
 * A missing file yields the defaults.
 *
 * @throws ConfigurationError if the file is not valid JSON or a field has
 * the wrong type
 */
export function loadConfig(repoRoot: string): Config {
  const configPath = getConfigPath(repoRoot);
  if (!fs.existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to parse ${configPath}: ${message}`);
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue.path.join(".");
    throw new ConfigurationError(`Invalid config value for '${field}': ${issue.message}`, field);
  }

  return { ...DEFAULT_CONFIG, ...parsed.data };
}

/**
 * Resolve the config's relative paths against the repository root
 */
export function resolveConfigPaths(
  repoRoot: string,
  config: Config
): { storageDir: string; databasePath: string; schemaPath?: string } {
  return {
    storageDir: path.resolve(repoRoot, config.storageDir),
    databasePath:
      config.databasePath === ":memory:"
        ? config.databasePath
        : path.resolve(repoRoot, config.databasePath),
    schemaPath: config.schemaPath ? path.resolve(repoRoot, config.schemaPath) : undefined,
  };
}
