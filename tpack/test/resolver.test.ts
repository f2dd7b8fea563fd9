import { describe, expect, it } from "vitest";
import { EntitySet } from "../src/extract/entity-set.js";
import { RepositoryIndex, type IndexEntry } from "../src/index/repository-index.js";
import { BuiltinCatalog } from "../src/resolve/builtins.js";
import { resolvePackage, type ResolveContext, type ResolveInput } from "../src/resolve/resolver.js";
import { emptySections, type Entity } from "../src/types/entity.js";

const builtins = new BuiltinCatalog({
  action_namespaces: ["edit", "app", "core"],
  tags: ["terminal"],
  modes: ["command"],
  settings: ["speech.timeout"],
  captures: [],
  lists: [],
});

function entry(pkg: string, overrides: Partial<IndexEntry> = {}): IndexEntry {
  return {
    package: pkg,
    namespace: `user.${pkg.toLowerCase()}`,
    version: "1.0.0",
    github: "",
    manifestDir: `/repo/${pkg.toLowerCase()}`,
    lenient: false,
    ...overrides,
  };
}

function context(index: RepositoryIndex): ResolveContext {
  return { index, builtins, namespacePrefixes: ["user", "edit", "core", "app", "code"] };
}

function input(declared: Entity[], referenced: Entity[], overrides: Partial<ResolveInput> = {}): ResolveInput {
  return {
    packageName: "P",
    packageDir: "/repo/p",
    namespace: "",
    strictNamespace: true,
    recordedRequireVersionAction: false,
    hasVersionFile: false,
    declared: new EntitySet(declared),
    referenced: new EntitySet(referenced),
    ...overrides,
  };
}

const action = (name: string): Entity => ({ kind: "action", name });

describe("resolvePackage", () => {
  it("turns a reference into a dependency on the declaring package", () => {
    const index = new RepositoryIndex();
    index.add(action("user.q_show"), entry("Q", { namespace: "user.q", version: "2.1.0" }));

    const result = resolvePackage(input([action("user.p_go")], [action("user.q_show")]), context(index));

    expect(result.namespace).toBe("user.p");
    expect(result.contributes).toEqual({ ...emptySections(), actions: ["user.p_go"] });
    expect(result.depends).toEqual({ ...emptySections(), actions: ["user.q_show"] });
    expect(result.dependencies).toEqual({ Q: { namespace: "user.q", min_version: "2.1.0" } });
    expect(result.unresolved).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("keeps an unknown reference in depends and warns", () => {
    const result = resolvePackage(input([action("user.p_go")], [action("user.unknown_thing")]), context(new RepositoryIndex()));

    expect(result.depends.actions).toEqual(["user.unknown_thing"]);
    expect(result.dependencies).toEqual({});
    expect(result.unresolved).toEqual([action("user.unknown_thing")]);
    expect(result.warnings.map((w) => [w.code, w.message])).toEqual([
      ["UNRESOLVED_REFERENCE", "no package declares action user.unknown_thing"],
    ]);
  });

  it("never depends on what the package declares itself", () => {
    const index = new RepositoryIndex();
    index.add(action("user.p_go"), entry("Other"));

    const result = resolvePackage(
      input([action("user.p_go"), { kind: "list", name: "user.p_items" }], [action("user.p_go"), { kind: "capture", name: "user.p_items" }]),
      context(index),
    );
    expect(result.depends).toEqual(emptySections());
    expect(result.dependencies).toEqual({});
  });

  it("skips entities supplied by the host", () => {
    const result = resolvePackage(
      input(
        [],
        [
          action("edit.save"),
          { kind: "tag", name: "terminal" },
          { kind: "mode", name: "command" },
          { kind: "setting", name: "speech.timeout" },
        ],
      ),
      context(new RepositoryIndex()),
    );
    expect(result.depends).toEqual(emptySections());
    expect(result.warnings).toEqual([]);
  });

  it("picks the lowest package name when several declare an entity", () => {
    const shared = action("user.shared_thing_action");
    for (const order of [["zeta", "alpha"], ["alpha", "zeta"]]) {
      const index = new RepositoryIndex();
      for (const pkg of order) index.add(shared, entry(pkg));

      const result = resolvePackage(input([], [shared]), context(index));
      expect(Object.keys(result.dependencies)).toEqual(["alpha"]);
      expect(result.ambiguous).toEqual([{ entity: shared, candidates: ["alpha", "zeta"], chosen: "alpha" }]);
      expect(result.warnings.map((w) => [w.level, w.code, w.message])).toEqual([
        ["warn", "AMBIGUOUS_REFERENCE", "action user.shared_thing_action is declared by alpha, zeta; using alpha"],
      ]);
    }
  });

  it("prefers strict declarations over lenient ones", () => {
    const index = new RepositoryIndex();
    index.add(action("user.x_go"), entry("aaa_loose", { lenient: true }));
    index.add(action("user.x_go"), entry("strictpkg"));

    const result = resolvePackage(input([], [action("user.x_go")]), context(index));
    expect(Object.keys(result.dependencies)).toEqual(["strictpkg"]);
    expect(result.ambiguous).toEqual([]);
  });

  it("reports ambiguity between lenient declarations at info level", () => {
    const index = new RepositoryIndex();
    index.add(action("user.x_go"), entry("one", { lenient: true }));
    index.add(action("user.x_go"), entry("two", { lenient: true }));

    const result = resolvePackage(input([], [action("user.x_go")]), context(index));
    expect(Object.keys(result.dependencies)).toEqual(["one"]);
    expect(result.warnings.map((w) => w.level)).toEqual(["info"]);
  });

  it("uses the highest version among copies of one package", () => {
    const index = new RepositoryIndex();
    index.add(action("user.q_show"), entry("Q", { version: "1.0.0", manifestDir: "/repo/q-old" }));
    index.add(action("user.q_show"), entry("Q", { version: "1.2.0", manifestDir: "/repo/q-new" }));

    const result = resolvePackage(input([], [action("user.q_show")]), context(index));
    expect(result.dependencies.Q.min_version).toBe("1.2.0");
    expect(result.ambiguous).toEqual([]);
  });

  it("excludes the package itself by name or by directory", () => {
    const index = new RepositoryIndex();
    index.add(action("user.z_stale"), entry("P", { manifestDir: "/elsewhere/p" }));
    index.add(action("user.z_moved"), entry("renamed", { manifestDir: "/repo/p" }));

    const result = resolvePackage(input([], [action("user.z_stale"), action("user.z_moved")]), context(index));
    expect(result.dependencies).toEqual({});
    expect(result.unresolved.map((e) => e.name)).toEqual(["user.z_moved", "user.z_stale"]);
  });

  it("carries the github url of the chosen package", () => {
    const index = new RepositoryIndex();
    index.add(action("user.q_show"), entry("Q", { github: "https://github.com/example/q" }));

    const result = resolvePackage(input([], [action("user.q_show")]), context(index));
    expect(result.dependencies).toEqual({
      Q: { namespace: "user.q", github: "https://github.com/example/q", min_version: "1.0.0" },
    });
  });

  it("warns about undeclared references under the package's own namespace", () => {
    const result = resolvePackage(
      input([action("user.p_go")], [action("user.p_missing")], { namespace: "user.p" }),
      context(new RepositoryIndex()),
    );
    expect(result.depends).toEqual(emptySections());
    expect(result.warnings.map((w) => [w.code, w.message])).toEqual([
      ["NAMESPACE_INCONSISTENCY", "referenced under own namespace user.p but not declared: user.p_missing"],
    ]);
  });

  it("flags declarations outside a strict namespace", () => {
    const result = resolvePackage(
      input([action("user.p_go"), action("user.other")], [], { namespace: "user.p" }),
      context(new RepositoryIndex()),
    );
    expect(result.warnings.map((w) => w.message)).toEqual([
      "declared outside namespace user.p (expected 'user.p' or 'user.p_*'): actions: user.other",
    ]);
  });

  it("does not infer or police a namespace when strict namespacing is off", () => {
    const result = resolvePackage(
      input([action("user.p_go"), action("user.other")], [], { strictNamespace: false }),
      context(new RepositoryIndex()),
    );
    expect(result.namespace).toBe("");
    expect(result.warnings).toEqual([]);
  });

  it("requires a version action for namespaced packages unless told otherwise", () => {
    const required = resolvePackage(
      input([action("user.p_go")], [], { recordedRequireVersionAction: undefined }),
      context(new RepositoryIndex()),
    );
    expect(required.requireVersionAction).toBe(true);
    expect(required.warnings.map((w) => [w.code, w.message])).toEqual([
      ["VERSION_ACTION_MISSING", "missing required version action 'user.p_version'"],
    ]);

    const satisfied = resolvePackage(
      input([action("user.p_go"), action("user.p_version")], [], { recordedRequireVersionAction: undefined }),
      context(new RepositoryIndex()),
    );
    expect(satisfied.requireVersionAction).toBe(true);
    expect(satisfied.warnings).toEqual([]);
  });

  it("qualifies a recorded bare namespace", () => {
    const result = resolvePackage(input([action("user.p_go")], [], { namespace: "p" }), context(new RepositoryIndex()));
    expect(result.namespace).toBe("user.p");
  });
});
