import { describe, expect, it } from "vitest";
import { EntitySet } from "../src/extract/entity-set.js";
import {
  belongsTo,
  hasContributions,
  inferNamespace,
  namespaceOffenders,
  qualifyNamespace,
  versionActionName,
} from "../src/policy/namespace.js";
import { maxVersion, ratchet } from "../src/policy/version.js";

describe("inferNamespace", () => {
  it("picks the longest prefix shared by a majority", () => {
    const declared = new EntitySet([
      { kind: "action", name: "user.p_go" },
      { kind: "action", name: "user.p_stop" },
      { kind: "tag", name: "user.p_active" },
    ]);
    expect(inferNamespace(declared)).toBe("user.p");
  });

  it("prefers a longer prefix when it still holds a majority", () => {
    const declared = new EntitySet([
      { kind: "action", name: "user.mouse_grid_show" },
      { kind: "action", name: "user.mouse_grid_hide" },
      { kind: "action", name: "user.other_thing" },
    ]);
    expect(inferNamespace(declared)).toBe("user.mouse_grid");
  });

  it("cuts a single entity at its last underscore", () => {
    expect(inferNamespace(new EntitySet([{ kind: "action", name: "user.foo_bar_version" }]))).toBe("user.foo_bar");
  });

  it("returns null without a majority prefix or without namespaced entities", () => {
    expect(
      inferNamespace(
        new EntitySet([
          { kind: "action", name: "user.a" },
          { kind: "action", name: "user.b" },
        ]),
      ),
    ).toBeNull();
    expect(inferNamespace(new EntitySet([{ kind: "app", name: "slack" }]))).toBeNull();
  });
});

describe("namespace helpers", () => {
  it("qualifies bare namespaces with user.", () => {
    const prefixes = ["user", "edit"];
    expect(qualifyNamespace("p", prefixes)).toBe("user.p");
    expect(qualifyNamespace("user.p", prefixes)).toBe("user.p");
    expect(qualifyNamespace("edit.x", prefixes)).toBe("edit.x");
    expect(qualifyNamespace("", prefixes)).toBe("");
  });

  it("matches names under a namespace only at a boundary", () => {
    expect(belongsTo("user.q_show", "user.q")).toBe(true);
    expect(belongsTo("user.q", "user.q")).toBe(true);
    expect(belongsTo("user.qq_show", "user.q")).toBe(false);
    expect(belongsTo("user.q_show", "")).toBe(false);
  });

  it("lists user entities declared outside the namespace", () => {
    const declared = new EntitySet([
      { kind: "action", name: "user.p_go" },
      { kind: "action", name: "user.other" },
      { kind: "setting", name: "edit.x" },
      { kind: "app", name: "foo" },
    ]);
    expect(namespaceOffenders("user.p", declared)).toEqual([{ kind: "action", name: "user.other" }]);
  });

  it("names the version action after the namespace base", () => {
    expect(versionActionName("user.q")).toBe("user.q_version");
    expect(versionActionName("q")).toBe("user.q_version");
  });

  it("does not count apps as contributions", () => {
    expect(hasContributions(new EntitySet([{ kind: "app", name: "slack" }]))).toBe(false);
    expect(hasContributions(new EntitySet([{ kind: "list", name: "user.p_items" }]))).toBe(true);
  });
});

describe("version ratchet", () => {
  it("compares versions semantically", () => {
    expect(maxVersion("1.2.0", "1.10.0")).toBe("1.10.0");
    expect(maxVersion("2.0.0", "1.9.9")).toBe("2.0.0");
  });

  it("lets a valid version win over an invalid one", () => {
    expect(maxVersion("bogus", "1.0.0")).toBe("1.0.0");
    expect(maxVersion("1.0.0", "bogus")).toBe("1.0.0");
    expect(maxVersion("bogus", "worse")).toBe("bogus");
  });

  it("never lowers a recorded minimum", () => {
    expect(ratchet("1.2.0", "1.1.0")).toBe("1.2.0");
    expect(ratchet("1.2.0", "1.3.0")).toBe("1.3.0");
    expect(ratchet(undefined, "1.1.0")).toBe("1.1.0");
  });
});
