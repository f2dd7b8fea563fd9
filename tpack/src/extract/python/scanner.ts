import type { EntityKind } from "../../types/entity.js";
import { ScanFacts } from "../facts.js";
import { scanMatches, scanPythonText, scanRule } from "../patterns.js";
import { tokenize, type Token } from "./tokenizer.js";

const DECLARING_CALLS: Record<string, EntityKind> = {
  setting: "setting",
  tag: "tag",
  mode: "mode",
  list: "list",
};

type Decorator = {
  path: string[];
  /** Call arguments, or null for a bare decorator. */
  args: Token[] | null;
};

type ClassFrame = {
  indent: number;
  bodyIndent: number | null;
  role: "declare" | "override" | "plain";
  context: string;
};

function isOp(token: Token | undefined, value: string): boolean {
  return token?.type === "op" && token.value === value;
}

function isName(token: Token | undefined, value?: string): boolean {
  return token?.type === "name" && (value === undefined || token.value === value);
}

/** Index of the bracket closing the one opened at `open`, or the end of the line. */
function closingIndex(tokens: Token[], open: number): number {
  let depth = 0;
  for (let i = open; i < tokens.length; i++) {
    const t = tokens[i];
    if (t.type !== "op") continue;
    if (t.value === "(" || t.value === "[" || t.value === "{") depth++;
    else if (t.value === ")" || t.value === "]" || t.value === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return tokens.length;
}

/** Split call arguments on top-level commas. */
function splitArgs(args: Token[]): Token[][] {
  const parts: Token[][] = [[]];
  let depth = 0;
  for (const t of args) {
    if (t.type === "op" && (t.value === "(" || t.value === "[" || t.value === "{")) depth++;
    if (t.type === "op" && (t.value === ")" || t.value === "]" || t.value === "}")) depth--;
    if (depth === 0 && isOp(t, ",")) {
      parts.push([]);
      continue;
    }
    parts[parts.length - 1].push(t);
  }
  return parts.filter((p) => p.length > 0);
}

/** A string literal argument (adjacent literals concatenate), or null. */
function literal(tokens: Token[]): string | null {
  if (tokens.length === 0 || !tokens.every((t) => t.type === "string")) return null;
  return tokens.map((t) => t.value).join("");
}

/** The string passed positionally at `position`, or as `keyword=`. */
function stringArg(args: Token[], position: number, keyword?: string): string | null {
  const parts = splitArgs(args);
  const positional = parts.filter((p) => !(isName(p[0]) && isOp(p[1], "=")));
  const byPosition = positional[position];
  if (byPosition) {
    const value = literal(byPosition);
    if (value !== null) return value;
  }
  if (keyword) {
    const kw = parts.find((p) => isName(p[0], keyword) && isOp(p[1], "="));
    if (kw) return literal(kw.slice(2));
  }
  return null;
}

function readDecorator(tokens: Token[]): Decorator | null {
  const path: string[] = [];
  let i = 1;
  while (isName(tokens[i])) {
    path.push(tokens[i].value);
    if (!isOp(tokens[i + 1], ".")) {
      i++;
      break;
    }
    i += 2;
  }
  if (path.length === 0) return null;
  if (isOp(tokens[i], "(")) {
    return { path, args: tokens.slice(i + 1, closingIndex(tokens, i)) };
  }
  return { path, args: null };
}

/** Attribute decorators only: `@mod.action_class`, never a bare `@action_class`. */
function decoratorAttr(d: Decorator): string | null {
  return d.path.length >= 2 ? d.path[d.path.length - 1] : null;
}

/** `x = Module()` / `x = talon.Module()` bindings; `mod` when the file has none. */
function findModuleVars(lines: Token[][]): Set<string> {
  const vars = new Set<string>();
  for (const tokens of lines) {
    if (!isName(tokens[0]) || !isOp(tokens[1], "=")) continue;
    let i = 2;
    while (isName(tokens[i]) && isOp(tokens[i + 1], ".")) i += 2;
    if (isName(tokens[i], "Module") && isOp(tokens[i + 1], "(")) vars.add(tokens[0].value);
  }
  if (vars.size === 0) vars.add("mod");
  return vars;
}

function userName(name: string): string {
  return name.includes(".") ? name : `user.${name}`;
}

class LineScanner {
  constructor(
    private readonly facts: ScanFacts,
    private readonly moduleVars: Set<string>,
  ) {}

  /** Expression-level references and declaring calls anywhere in a line. */
  scanExpressions(tokens: Token[]): void {
    for (let i = 0; i < tokens.length; i++) {
      const t = tokens[i];
      if (t.type !== "name" || isOp(tokens[i - 1], ".")) continue;

      if (t.value === "actions" && isOp(tokens[i + 1], ".") && isName(tokens[i + 2]) && isOp(tokens[i + 3], ".") && isName(tokens[i + 4])) {
        this.facts.useAction(`${tokens[i + 2].value}.${tokens[i + 4].value}`);
        continue;
      }

      if (t.value === "settings" && isOp(tokens[i + 1], ".") && isName(tokens[i + 2], "get") && isOp(tokens[i + 3], "(")) {
        const args = tokens.slice(i + 4, closingIndex(tokens, i + 3));
        const name = stringArg(args, 0);
        if (name) this.facts.reference("setting", name);
        continue;
      }

      if (!isOp(tokens[i + 1], ".") || !isName(tokens[i + 2])) continue;
      const attr = tokens[i + 2].value;

      const kind = DECLARING_CALLS[attr];
      if (kind && this.moduleVars.has(t.value) && isOp(tokens[i + 3], "(")) {
        const args = tokens.slice(i + 4, closingIndex(tokens, i + 3));
        const name = stringArg(args, 0, "name");
        if (name) this.facts.declare(kind, userName(name));
        continue;
      }

      if (/ctx/i.test(t.value)) {
        if ((attr === "dynamic_list" && isOp(tokens[i + 3], "(")) || (attr === "selections" && isOp(tokens[i + 3], "["))) {
          this.facts.requires.add("talonBeta");
        }
      }
    }
  }

  /** Statement forms `target = value` that declare apps or reference context data. */
  scanAssignment(tokens: Token[]): void {
    let depth = 0;
    let eq = -1;
    for (let i = 0; i < tokens.length; i++) {
      const t = tokens[i];
      if (t.type !== "op") continue;
      if (t.value === "(" || t.value === "[" || t.value === "{") depth++;
      else if (t.value === ")" || t.value === "]" || t.value === "}") depth--;
      else if (depth === 0 && t.value === "=") {
        eq = i;
        break;
      }
    }
    if (eq < 3) return;

    const target = tokens.slice(0, eq);
    const value = tokens.slice(eq + 1);
    if (!isName(target[0]) || !isOp(target[1], ".") || !isName(target[2])) return;
    const attr = target[2].value;

    if (attr === "apps" && target.length === 5 && isOp(target[3], ".") && isName(target[4]) && this.moduleVars.has(target[0].value)) {
      this.facts.declare("app", target[4].value);
      return;
    }

    if ((attr === "lists" || attr === "settings") && target.length === 6 && isOp(target[3], "[") && target[4].type === "string" && isOp(target[5], "]")) {
      this.facts.reference(attr === "lists" ? "list" : "setting", target[4].value);
      return;
    }

    if (target.length !== 3) return;
    if (attr === "tags" && isOp(value[0], "[")) {
      for (const t of value) {
        if (t.type === "string") this.facts.reference("tag", t.value);
      }
    } else if (attr === "matches") {
      scanMatches(value.filter((t) => t.type === "string").map((t) => t.value).join("\n"), this.facts);
    }
  }
}

/**
 * Scan a Python source file for declared and referenced entities.
 *
 * Declarations depend on structure (decorators, class bodies), so they are only
 * recognised when the file tokenizes. Otherwise a textual pass recovers the
 * references and the result is marked degraded.
 */
export function scanPython(source: string, namespacePrefixes: readonly string[]): ScanFacts {
  const facts = new ScanFacts(namespacePrefixes);
  const tokenized = tokenize(source);
  if (!tokenized.ok) {
    scanPythonText(source, facts);
    facts.degraded = { line: tokenized.line, reason: tokenized.reason };
    return facts;
  }

  const lines = tokenized.lines;
  const scanner = new LineScanner(facts, findModuleVars(lines.map((l) => l.tokens)));
  const classes: ClassFrame[] = [];
  let pending: Decorator[] = [];

  for (const { indent, tokens } of lines) {
    while (classes.length > 0 && indent <= classes[classes.length - 1].indent) classes.pop();
    const cls = classes.length > 0 ? classes[classes.length - 1] : null;
    if (cls && cls.bodyIndent === null) cls.bodyIndent = indent;

    if (isOp(tokens[0], "@")) {
      const decorator = readDecorator(tokens);
      if (decorator) pending.push(decorator);
      scanner.scanExpressions(tokens);
      continue;
    }

    if (isName(tokens[0], "class") && isName(tokens[1])) {
      let role: ClassFrame["role"] = "plain";
      let context = "";
      for (const d of pending) {
        if (decoratorAttr(d) !== "action_class") continue;
        if (d.args === null) {
          role = "declare";
        } else {
          const ctx = stringArg(d.args, 0);
          if (ctx) {
            role = "override";
            context = ctx;
          }
        }
      }
      classes.push({ indent, bodyIndent: null, role, context });
      pending = [];
      scanner.scanExpressions(tokens);
      continue;
    }

    const defAt = isName(tokens[0], "async") ? 1 : 0;
    if (isName(tokens[defAt], "def") && isName(tokens[defAt + 1])) {
      const fname = tokens[defAt + 1].value;
      if (cls && indent === cls.bodyIndent) {
        if (cls.role === "declare") facts.declare("action", `user.${fname}`);
        else if (cls.role === "override") facts.useAction(`${cls.context}.${fname}`);
      }
      for (const d of pending) {
        const attr = decoratorAttr(d);
        if (attr === "action" && d.args) {
          const name = stringArg(d.args, 0);
          if (name) facts.declare("action", name);
        } else if (attr === "capture") {
          facts.declare("capture", `user.${fname}`);
          const rule = d.args ? stringArg(d.args, 0, "rule") : null;
          if (rule) scanRule(rule, facts);
        }
      }
      pending = [];
      scanner.scanExpressions(tokens);
      continue;
    }

    pending = [];
    scanner.scanAssignment(tokens);
    scanner.scanExpressions(tokens);
  }

  return facts;
}
