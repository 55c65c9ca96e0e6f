/**
 * Config manager: loads deckhand.yaml and gates edits through the schema.
 *
 * Provides: resolveRoot, loadConfig, get, set (with dry-run).
 * Writes are atomic (write-file-atomic) and only happen when the edited
 * document still validates.
 */

import { readFile } from "node:fs/promises";
import { isAbsolute, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import writeFileAtomic from "write-file-atomic";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import { DeckhandConfig } from "../schemas/config.js";
import { ValidationError } from "../errors.js";

export const CONFIG_FILE_NAME = "deckhand.yaml";
export const ROOT_ENV_VAR = "DECKHAND_ROOT";

/** Config with every path made absolute. */
export interface ResolvedConfig extends DeckhandConfig {
  root: string;
  configPath: string;
}

export interface ConfigChange {
  key: string;
  oldValue: unknown;
  newValue: unknown;
}

/**
 * Root directory: explicit flag, then DECKHAND_ROOT, then the install
 * directory (two levels above this module in both src/ and dist/ layouts).
 */
export function resolveRoot(explicit?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicit) return resolve(explicit);
  const fromEnv = env[ROOT_ENV_VAR];
  if (fromEnv) return resolve(fromEnv);
  return installDir();
}

export function installDir(): string {
  return fileURLToPath(new URL("../..", import.meta.url));
}

/**
 * Load and validate `<root>/deckhand.yaml`. A missing file yields defaults.
 */
export async function loadConfig(root: string): Promise<ResolvedConfig> {
  const configPath = join(root, CONFIG_FILE_NAME);
  const raw = await readConfigDocument(configPath);
  const result = DeckhandConfig.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid ${CONFIG_FILE_NAME}: ${details}`);
  }

  const config = result.data;
  const abs = (p: string): string => (isAbsolute(p) ? p : resolve(root, p));
  return {
    ...config,
    projectsDir: abs(config.projectsDir),
    globalCredentialFile: abs(config.globalCredentialFile),
    eventsDir: abs(config.eventsDir),
    systemdDir: abs(config.systemdDir),
    root,
    configPath,
  };
}

/**
 * Get a value from the config using dot-notation, e.g. "statusCheck.retries".
 * Unset keys report their default.
 */
export async function getConfigValue(configPath: string, key: string): Promise<unknown> {
  const raw = await readConfigDocument(configPath);
  const explicit = resolveKeyPath(raw, key);
  if (explicit !== undefined) return explicit;

  const defaults = DeckhandConfig.safeParse(raw);
  return defaults.success ? resolveKeyPath(defaults.data, key) : undefined;
}

/**
 * Set a value using dot-notation. The whole document is validated after the
 * change; nothing is written on dry-run or when validation fails.
 */
export async function setConfigValue(
  configPath: string,
  key: string,
  value: string,
  dryRun: boolean = false,
): Promise<{ change: ConfigChange; issues: string[] }> {
  const raw = await readConfigDocument(configPath);
  const oldValue = resolveKeyPath(raw, key);
  const newValue = parseValue(value);

  setKeyPath(raw, key, newValue);

  const change = { key, oldValue, newValue };
  const parseResult = DeckhandConfig.strict().safeParse(raw);
  if (!parseResult.success) {
    return {
      change,
      issues: parseResult.error.issues.map(i => `Schema error at ${i.path.join(".") || key}: ${i.message}`),
    };
  }

  if (!dryRun) {
    await writeFileAtomic(configPath, stringifyYaml(raw, { lineWidth: 120 }), "utf-8");
  }

  return { change, issues: [] };
}

// --- Helpers ---

async function readConfigDocument(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return {};
    throw err;
  }

  const parsed: unknown = parseYaml(content);
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ValidationError(`${configPath} must contain a YAML mapping`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveKeyPath(obj: Record<string, unknown>, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (Array.isArray(current)) {
      const idx = parseInt(part, 10);
      current = isNaN(idx) ? undefined : current[idx];
    } else if (isRecord(current)) {
      current = current[part];
    } else {
      return undefined;
    }
  }

  return current;
}

function setKeyPath(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  const lastKey = parts.pop();
  if (lastKey === undefined || lastKey === "") {
    throw new ValidationError("Config key cannot be empty");
  }

  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[lastKey] = value;
}

/** Parse a string value into the appropriate type. */
function parseValue(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value);
  if (value.startsWith("[") || value.startsWith("{")) {
    try {
      return JSON.parse(value) as unknown;
    } catch {
      return value;
    }
  }
  // Remove surrounding quotes
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  return value;
}
