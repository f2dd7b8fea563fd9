import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import type { BuiltinTables } from "../types/config.js";
import { isPlainObject } from "../core/json.js";

const CONFIG_DIR = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../config");

export type RawConfig = Record<string, unknown>;

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const current = result[key];
    if (isPlainObject(val)) {
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  const parsed: unknown = YAML.parse(raw);
  return isPlainObject(parsed) ? parsed : {};
}

/** Apply TPACK_ prefixed environment variable overrides. */
function applyEnvOverrides(config: RawConfig): RawConfig {
  const prefix = "TPACK_";
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(prefix) || value === undefined) continue;
    // TPACK_MANIFEST_FILE → manifest_file
    const configKey = key.slice(prefix.length).toLowerCase();
    config[configKey] = value;
  }
  return config;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig`.
 *
 * @param envName - Optional overlay name (e.g., "strict"), read from `{configDir}/{envName}.yaml`.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string): RawConfig {
  const dir = configDir ?? CONFIG_DIR;

  const base = loadYaml(path.join(dir, "base.yaml"));

  let merged = base;
  if (envName) {
    merged = deepMerge(base, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged);
}

function stringList(raw: RawConfig, key: string): string[] {
  const val = raw[key];
  if (!Array.isArray(val)) return [];
  return val.filter((v): v is string => typeof v === "string");
}

/** Load the built-in entity tables shipped next to base.yaml. */
export function loadBuiltins(configDir?: string): BuiltinTables {
  const raw = loadYaml(path.join(configDir ?? CONFIG_DIR, "builtins.yaml"));
  return {
    action_namespaces: stringList(raw, "action_namespaces"),
    tags: stringList(raw, "tags"),
    modes: stringList(raw, "modes"),
    settings: stringList(raw, "settings"),
    captures: stringList(raw, "captures"),
    lists: stringList(raw, "lists"),
  };
}
