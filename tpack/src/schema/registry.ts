import fs from "node:fs";
import path from "node:path";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

export type SchemaValidation = { valid: boolean; errors: string | null };

/**
 * Schema registry — discovers and loads all JSON Schemas from a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "manifest.schema.json" → "manifest"
      const name = file.replace(/\.schema\.json$/, "");
      const version = extractVersion(schema) ?? "1.0.0";

      this.entries.set(name, { name, version, filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  /** List all registered schema names. */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Compile and cache a validator for the given schema name. */
  async getValidator(name: string): Promise<AjvValidateFn> {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const ajv = await this.instance();
    const validate = ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  /** Validate data against a named schema. */
  async validate(name: string, data: unknown): Promise<SchemaValidation> {
    const validate = await this.getValidator(name);
    const valid = validate(data);
    const ajv = await this.instance();

    return {
      valid,
      errors: valid ? null : ajv.errorsText(validate.errors),
    };
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) {
      this.ajv = await loadAjv();
    }
    return this.ajv;
  }
}

/** Extract a semver-like version from schema metadata. */
function extractVersion(schema: unknown): string | null {
  if (schema === null || typeof schema !== "object") return null;

  if ("version" in schema && typeof schema.version === "string") return schema.version;

  // "urn:tpack:schema:manifest@1.0.0"
  if ("$id" in schema && typeof schema.$id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(schema.$id);
    if (m) return m[1];
  }

  return null;
}

/** Create and load a registry from the default schemas directory. */
export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const dir = schemaDir ?? path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../schemas");
  const registry = new SchemaRegistry(dir);
  await registry.load();
  return registry;
}
