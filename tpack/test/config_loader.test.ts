import { describe, expect, it, afterEach } from "vitest";
import path from "node:path";
import { deepMerge, loadBuiltins, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  const origEnv = { ...process.env };

  afterEach(() => {
    for (const key of Object.keys(process.env)) {
      if (key.startsWith("TPACK_")) delete process.env[key];
    }
    Object.assign(process.env, origEnv);
  });

  it("loads base config with all required fields", () => {
    const config = loadConfig(undefined, CONFIG_DIR);
    expect(config.schema_version).toBe("1.0.0");
    expect(config.manifest_file).toBe("manifest.json");
    expect(config.generator_name).toBe("talon-manifest-generator");
    expect(config.skip_dirs).toContain("node_modules");
    expect(config.ignore).toEqual([]);
    expect(config.generators).toEqual({ manifest: true, install_block: false });
  });

  it("merges env-specific config over base", () => {
    const config = loadConfig("strict", CONFIG_DIR);
    expect(config.skip_dirs).toEqual([".git"]);
    expect(config.ignore).toEqual(["**/*.draft.py"]);
    // base fields still present
    expect(config.repository_root_marker).toBe("user");
  });

  it("applies environment variable overrides", () => {
    process.env.TPACK_MANIFEST_FILE = "package.manifest.json";
    const config = loadConfig(undefined, CONFIG_DIR);
    expect(config.manifest_file).toBe("package.manifest.json");
  });

  it("returns base config when env yaml does not exist", () => {
    const config = loadConfig("nonexistent-env", CONFIG_DIR);
    expect(config.skip_dirs).toContain("node_modules");
  });

  it("replaces arrays and merges nested objects", () => {
    const merged = deepMerge(
      { skip_dirs: ["a", "b"], generators: { manifest: true, install_block: false } },
      { skip_dirs: ["c"], generators: { install_block: true } },
    );
    expect(merged).toEqual({ skip_dirs: ["c"], generators: { manifest: true, install_block: true } });
  });

  it("loads built-in entity tables", () => {
    const builtins = loadBuiltins(CONFIG_DIR);
    expect(builtins.action_namespaces).toContain("edit");
    expect(builtins.captures).toContain("number");
    expect(builtins.lists).toContain("letter");
  });

  it("returns empty built-in tables when the file is absent", () => {
    expect(loadBuiltins(path.join(CONFIG_DIR, "missing"))).toEqual({
      action_namespaces: [],
      tags: [],
      modes: [],
      settings: [],
      captures: [],
      lists: [],
    });
  });
});

describe("config validator", () => {
  it("validates a correct base config", async () => {
    const config = loadConfig(undefined, CONFIG_DIR);
    const { valid, errors } = await validateConfig(config);
    expect(valid).toBe(true);
    expect(errors).toBeNull();
  });

  it("rejects config missing required fields", async () => {
    const { valid, errors } = await validateConfig({ manifest_file: "manifest.json" });
    expect(valid).toBe(false);
    expect(errors).toContain("required");
  });

  it("rejects a manifest file name with a directory part", async () => {
    const config = { ...loadConfig(undefined, CONFIG_DIR), manifest_file: "meta/manifest.json" };
    const { valid } = await validateConfig(config);
    expect(valid).toBe(false);
  });

  it("rejects an empty namespace prefix list", async () => {
    const config = { ...loadConfig(undefined, CONFIG_DIR), namespace_prefixes: [] };
    const { valid } = await validateConfig(config);
    expect(valid).toBe(false);
  });
});
