import { describe, expect, it, beforeAll, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { createRegistry, type SchemaRegistry } from "../src/schema/registry.js";
import { RepositoryIndex, buildIndex, findSearchRoot, indexManifest } from "../src/index/repository-index.js";
import type { TpackConfig } from "../src/types/config.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");
const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");
const GENERATOR = "talon-manifest-generator";

describe("indexManifest", () => {
  it("indexes contributions of generator-authored manifests only", () => {
    const index = new RepositoryIndex();
    expect(indexManifest(index, { name: "Hand", contributes: { actions: ["user.hand_go"] } }, "/repo/hand", GENERATOR)).toBe(false);
    expect(
      indexManifest(
        index,
        { name: "Q", namespace: "user.q", version: "2.1.0", _generator: GENERATOR, contributes: { actions: ["user.q_show"] } },
        "/repo/q",
        GENERATOR,
      ),
    ).toBe(true);

    expect(index.lookup("action", "user.hand_go")).toEqual([]);
    expect(index.lookup("action", "user.q_show")).toEqual([
      { package: "Q", namespace: "user.q", version: "2.1.0", github: "", manifestDir: "/repo/q", lenient: false },
    ]);
    expect(index.packageCount).toBe(1);
  });

  it("marks entries without a namespace promise as lenient", () => {
    const index = new RepositoryIndex();
    indexManifest(index, { name: "Bare", _generator: GENERATOR, contributes: { tags: ["user.bare_on"] } }, "/repo/bare", GENERATOR);
    indexManifest(
      index,
      {
        name: "Loose",
        namespace: "user.loose",
        _generator: GENERATOR,
        _generatorStrictNamespace: false,
        contributes: { apps: ["slack"], actions: ["user.loose_go", "user.elsewhere"] },
      },
      "/repo/loose",
      GENERATOR,
    );

    expect(index.lookup("tag", "user.bare_on")[0].lenient).toBe(true);
    expect(index.lookup("action", "user.loose_go")[0].lenient).toBe(false);
    expect(index.lookup("action", "user.elsewhere")[0].lenient).toBe(true);
    expect(index.lookup("app", "slack")[0].lenient).toBe(false);
    expect(index.lookup("tag", "user.bare_on")[0].version).toBe("0.0.0");
  });
});

describe("buildIndex", () => {
  let config: TpackConfig;
  let registry: SchemaRegistry;
  let root: string;

  beforeAll(async () => {
    const checked = await validateConfig(loadConfig(undefined, CONFIG_DIR));
    if (!checked.valid) throw new Error(checked.errors);
    config = checked.config;
    registry = await createRegistry(SCHEMA_DIR);
  });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "tpack-index-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function manifest(rel: string, content: string): void {
    const dir = path.join(root, rel);
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, "manifest.json"), content);
  }

  it("walks nested manifests and skips configured directories", async () => {
    manifest("q", JSON.stringify({ name: "Q", namespace: "user.q", _generator: GENERATOR, contributes: { actions: ["user.q_show"] } }));
    manifest("group/r", JSON.stringify({ name: "R", namespace: "user.r", _generator: GENERATOR, contributes: { lists: ["user.r_items"] } }));
    manifest("node_modules/s", JSON.stringify({ name: "S", namespace: "user.s", _generator: GENERATOR, contributes: { actions: ["user.s_go"] } }));

    const { index, diagnostics } = await buildIndex(root, config, registry);
    expect(diagnostics).toEqual([]);
    expect(index.packageCount).toBe(2);
    expect(index.lookup("action", "user.q_show").map((e) => e.manifestDir)).toEqual([path.join(root, "q")]);
    expect(index.lookup("list", "user.r_items").map((e) => e.package)).toEqual(["R"]);
    expect(index.lookup("action", "user.s_go")).toEqual([]);
  });

  it("skips unreadable manifests with a warning and keeps going", async () => {
    manifest("bad", "{not json");
    manifest("wrong", JSON.stringify({ name: 5 }));
    manifest("q", JSON.stringify({ name: "Q", namespace: "user.q", _generator: GENERATOR, contributes: { actions: ["user.q_show"] } }));

    const { index, diagnostics } = await buildIndex(root, config, registry);
    expect(diagnostics.map((d) => [d.code, d.path, d.details])).toEqual([
      ["INDEX_MANIFEST_SKIPPED", path.join(root, "bad", "manifest.json"), { cause: "CORRUPT_MANIFEST" }],
      ["INDEX_MANIFEST_SKIPPED", path.join(root, "wrong", "manifest.json"), { cause: "CORRUPT_MANIFEST" }],
    ]);
    expect(index.packageCount).toBe(1);
  });
});

describe("findSearchRoot", () => {
  it("prefers an explicit root, then the nearest marker ancestor, then cwd", () => {
    const base = path.join(os.tmpdir(), "talon", "user", "pkg", "sub");
    expect(findSearchRoot(base, "user", "/explicit/root")).toBe(path.resolve("/explicit/root"));
    expect(findSearchRoot(base, "user")).toBe(path.join(os.tmpdir(), "talon", "user"));
    expect(findSearchRoot(base, "no-such-marker")).toBe(base);
  });
});
