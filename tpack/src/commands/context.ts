import type { SchemaRegistry } from "../schema/registry.js";
import { createRegistry } from "../schema/registry.js";
import { loadBuiltins, loadConfig, type RawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import type { BuiltinTables, TpackConfig } from "../types/config.js";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import { errorMessage } from "../core/errors.js";

export type RuntimeSetup = {
  config: TpackConfig;
  builtins: BuiltinTables;
  registry: SchemaRegistry;
};

export type SetupResult = { ok: true; setup: RuntimeSetup } | { ok: false; error: Diagnostic };

/** Load and validate layered config, built-in tables and schemas. */
export async function loadSetup(opts: { env?: string; configDir?: string; schemaDir?: string }): Promise<SetupResult> {
  let raw: RawConfig;
  let builtins: BuiltinTables;
  try {
    raw = loadConfig(opts.env, opts.configDir);
    builtins = loadBuiltins(opts.configDir);
  } catch (err) {
    return { ok: false, error: diag("error", "CONFIG_INVALID", `cannot load config: ${errorMessage(err)}`) };
  }

  const checked = await validateConfig(raw);
  if (!checked.valid) {
    return { ok: false, error: diag("error", "CONFIG_INVALID", `config invalid: ${checked.errors}`) };
  }

  let registry: SchemaRegistry;
  try {
    registry = await createRegistry(opts.schemaDir);
  } catch (err) {
    return { ok: false, error: diag("error", "CONFIG_INVALID", errorMessage(err)) };
  }

  return {
    ok: true,
    setup: { config: checked.config, builtins, registry },
  };
}
