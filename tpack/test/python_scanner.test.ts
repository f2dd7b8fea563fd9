import { describe, expect, it } from "vitest";
import { tokenize } from "../src/extract/python/tokenizer.js";
import { scanPython as scanWith } from "../src/extract/python/scanner.js";

const PREFIXES = ["user", "edit", "core", "app", "code"];
const scanPython = (source: string) => scanWith(source, PREFIXES);

describe("tokenize", () => {
  it("strips string prefixes and f-string replacement fields", () => {
    const result = tokenize("x = f\"a{b}c\" + rb'q'\n");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0].tokens.map((t) => [t.type, t.value])).toEqual([
      ["name", "x"],
      ["op", "="],
      ["string", "ac"],
      ["op", "+"],
      ["string", "q"],
    ]);
  });

  it("joins backslash continuations into one logical line", () => {
    const result = tokenize("total = 1 + \\\n    2\n");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.lines).toHaveLength(1);
    expect(result.lines[0].line).toBe(1);
    expect(result.lines[0].tokens.map((t) => t.value)).toEqual(["total", "=", "1", "+", "2"]);
  });

  it("reports an unmatched closing bracket", () => {
    expect(tokenize("foo(]\n")).toEqual({ ok: false, line: 1, reason: "unmatched ']'" });
  });

  it("reports an inconsistent dedent", () => {
    expect(tokenize("def f():\n        x = 1\n    y = 2\n")).toEqual({
      ok: false,
      line: 3,
      reason: "unindent does not match any outer indentation level",
    });
  });
});

describe("scanPython", () => {
  it("finds module declarations, action classes and captures", () => {
    const source = [
      "from talon import Module, Context, actions, settings",
      "",
      "mod = Module()",
      'mod.tag("p_active", desc="x")',
      'mod.list("p_items", desc="items")',
      'mod.setting("p_speed", type=int, default=1)',
      'mod.mode(name="p_mode")',
      'mod.apps.p_app = "app.name: P"',
      "",
      "@mod.action_class",
      "class Actions:",
      "    def p_go():",
      '        """Go."""',
      "        actions.user.q_show()",
      '        speed = settings.get("user.q_speed")',
      "",
      "    def p_stop():",
      "        pass",
      "",
      '@mod.capture(rule="<user.q_word> {user.q_letters}")',
      "def p_phrase(m) -> str:",
      "    return m",
      "",
    ].join("\n");

    const facts = scanPython(source);
    expect(facts.degraded).toBeNull();
    expect(facts.declared.toSections()).toEqual({
      apps: ["p_app"],
      tags: ["user.p_active"],
      modes: ["user.p_mode"],
      scopes: [],
      settings: ["user.p_speed"],
      captures: ["user.p_phrase"],
      lists: ["user.p_items"],
      actions: ["user.p_go", "user.p_stop"],
    });
    expect(facts.referenced.toSections()).toEqual({
      apps: [],
      tags: [],
      modes: [],
      scopes: [],
      settings: ["user.q_speed"],
      captures: ["user.q_word"],
      lists: ["user.q_letters"],
      actions: ["user.q_show"],
    });
  });

  it("treats context overrides and context data as references", () => {
    const source = [
      "from talon import Context, actions",
      "",
      "ctx = Context()",
      'ctx.matches = r"""',
      "app: vscode",
      "mode: command",
      "tag: user.q_editor",
      '"""',
      'ctx.tags = ["user.q_tabs", "terminal"]',
      'ctx.lists["user.q_letters"] = {"a": "a"}',
      'ctx.settings["user.q_speed"] = 2',
      "",
      '@ctx.action_class("edit")',
      "class EditActions:",
      "    def save():",
      '        actions.key("ctrl-s")',
      "",
    ].join("\n");

    const facts = scanPython(source);
    expect(facts.declared.size).toBe(0);
    expect(facts.referenced.toSections()).toEqual({
      apps: [],
      tags: ["terminal", "user.q_editor", "user.q_tabs"],
      modes: ["command"],
      scopes: [],
      settings: ["user.q_speed"],
      captures: [],
      lists: ["user.q_letters"],
      actions: ["edit.save"],
    });
    expect([...facts.requires]).toEqual([]);
  });

  it("ignores a bare action_class decorator", () => {
    const source = ["@action_class", "class Actions:", "    def p_go():", "        pass", ""].join("\n");
    expect(scanPython(source).declared.size).toBe(0);
  });

  it("declares explicitly named actions", () => {
    const source = ['@mod.action("user.p_named")', "def anything():", "    pass", ""].join("\n");
    expect(scanPython(source).declared.names("action")).toEqual(["user.p_named"]);
  });

  it("honours custom module variable names", () => {
    const source = ["import talon", "helpers = talon.Module()", 'helpers.tag("p_on")', 'mod.tag("p_off")', ""].join("\n");
    expect(scanPython(source).declared.names("tag")).toEqual(["user.p_on"]);
  });

  it("detects hardware and beta requirements", () => {
    const source = [
      '@ctx.dynamic_list("user.q_dynamic")',
      "def dynamic(phrase):",
      "    actions.tracking.control_toggle()",
      "",
    ].join("\n");
    const facts = scanPython(source);
    expect([...facts.requires].sort()).toEqual(["eyeTracker", "talonBeta"]);
    expect(facts.referenced.names("action")).toEqual([]);
  });

  it("records only actions under the configured namespaces as references", () => {
    const source = [
      "@mod.action_class",
      "class Actions:",
      "    def p_go():",
      "        actions.self.p_helper()",
      '        actions.key("enter")',
      "        actions.edit.save()",
      "        actions.user.q_show()",
      "",
    ].join("\n");
    const facts = scanPython(source);
    expect(facts.referenced.names("action").sort()).toEqual(["edit.save", "user.q_show"]);
    expect(scanWith(source, ["user"]).referenced.names("action")).toEqual(["user.q_show"]);
  });

  it("falls back to a textual scan when the file does not tokenize", () => {
    const source = [
      'mod.tag("p_x")',
      "actions.user.q_show(",
      'settings.get("user.q_speed")',
      "actions.self.p_helper()",
      'x = "oops',
      "",
    ].join("\n");

    const facts = scanPython(source);
    expect(facts.degraded).toEqual({ line: 5, reason: "unterminated string literal" });
    expect(facts.declared.size).toBe(0);
    expect(facts.referenced.names("action")).toEqual(["user.q_show"]);
    expect(facts.referenced.names("setting")).toEqual(["user.q_speed"]);
  });
});
