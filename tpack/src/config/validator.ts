import { loadAjv } from "../schema/ajv.js";
import type { TpackConfig } from "../types/config.js";

const stringArray = { type: "array", items: { type: "string" } };

/** Config schema — every key is required once the layers are merged. */
const CONFIG_SCHEMA = {
  type: "object",
  required: [
    "schema_version",
    "manifest_file",
    "generator_name",
    "skip_dirs",
    "ignore",
    "namespace_prefixes",
    "repository_root_marker",
    "generators",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    manifest_file: { type: "string", pattern: "^[^/\\\\]+\\.json$" },
    generator_name: { type: "string", minLength: 1 },
    skip_dirs: stringArray,
    ignore: stringArray,
    namespace_prefixes: { type: "array", items: { type: "string", pattern: "^[a-z_][a-z0-9_]*$" }, minItems: 1 },
    repository_root_marker: { type: "string", minLength: 1 },
    generators: {
      type: "object",
      required: ["manifest", "install_block"],
      properties: {
        manifest: { type: "boolean" },
        install_block: { type: "boolean" },
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: TpackConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a loaded config against the config schema. */
export async function validateConfig(config: unknown): Promise<ConfigValidationResult> {
  const ajv = await loadAjv();
  const validate = ajv.compile<TpackConfig>(CONFIG_SCHEMA);
  if (validate(config)) {
    return { valid: true, config, errors: null };
  }
  return { valid: false, errors: ajv.errorsText(validate.errors) };
}
