import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { Dialect, Requirement } from "../types/entity.js";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import { errorMessage } from "../core/errors.js";
import { EntitySet } from "./entity-set.js";
import type { ScanFacts } from "./facts.js";
import { scanPython } from "./python/scanner.js";
import { scanTalon, scanTalonList } from "./talon/scanner.js";

export type FileScan = {
  /** Path relative to the package root, `/`-separated. */
  file: string;
  dialect: Dialect;
  facts: ScanFacts;
};

export type PackageScan = {
  root: string;
  files: FileScan[];
  declared: EntitySet;
  referenced: EntitySet;
  requires: Requirement[];
  diagnostics: Diagnostic[];
};

export type ExtractResult = { ok: true; scan: PackageScan } | { ok: false; error: Diagnostic };

export type ExtractOptions = {
  skipDirs: string[];
  ignore: string[];
  /** Action namespaces whose uses are recorded as dependencies. */
  namespacePrefixes: readonly string[];
};

const SCANNERS: Record<Dialect, (source: string, namespacePrefixes: readonly string[]) => ScanFacts> = {
  python: scanPython,
  talon: scanTalon,
  "talon-list": scanTalonList,
};

export function dialectOf(filename: string): Dialect | null {
  if (filename.endsWith(".py")) return "python";
  if (filename.endsWith(".talon")) return "talon";
  if (filename.endsWith(".talon-list")) return "talon-list";
  return null;
}

function byName(a: fs.Dirent, b: fs.Dirent): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Source files under `root` in a stable depth-first, name-sorted order.
 * Throws when `root` itself cannot be listed; unreadable subdirectories are
 * reported and skipped.
 */
function collectSources(
  root: string,
  dir: string,
  opts: ExtractOptions,
  out: Array<{ rel: string; dialect: Dialect }>,
  diagnostics: Diagnostic[],
): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    if (dir === root) throw err;
    diagnostics.push(diag("warn", "PARSE_DEGRADED", `cannot list directory: ${errorMessage(err)}`, { path: dir }));
    return;
  }

  for (const entry of entries.sort(byName)) {
    const fullPath = path.join(dir, entry.name);
    const rel = path.relative(root, fullPath).split(path.sep).join("/");
    if (opts.ignore.some((pattern) => minimatch(rel, pattern, { dot: true }))) continue;

    if (entry.isDirectory()) {
      if (!opts.skipDirs.includes(entry.name)) collectSources(root, fullPath, opts, out, diagnostics);
    } else if (entry.isFile()) {
      const dialect = dialectOf(entry.name);
      if (dialect) out.push({ rel, dialect });
    }
  }
}

/** Scan one package tree for the entities it declares and references. */
export function extractPackage(root: string, opts: ExtractOptions): ExtractResult {
  const diagnostics: Diagnostic[] = [];
  const sources: Array<{ rel: string; dialect: Dialect }> = [];
  try {
    collectSources(root, root, opts, sources, diagnostics);
  } catch (err) {
    return {
      ok: false,
      error: diag("error", "IO_FAILURE", `cannot read package directory: ${errorMessage(err)}`, { path: root }),
    };
  }

  const files: FileScan[] = [];
  const declared = new EntitySet();
  const referenced = new EntitySet();
  const requires = new Set<Requirement>();

  for (const { rel, dialect } of sources) {
    const fullPath = path.join(root, rel);
    let source: string;
    try {
      source = fs.readFileSync(fullPath, "utf8");
    } catch (err) {
      diagnostics.push(diag("warn", "PARSE_DEGRADED", `cannot read file: ${errorMessage(err)}`, { path: fullPath }));
      continue;
    }

    const facts = SCANNERS[dialect](source, opts.namespacePrefixes);
    if (facts.degraded) {
      const message =
        dialect === "python"
          ? `${facts.degraded.reason} (line ${facts.degraded.line}); only references were recovered`
          : facts.degraded.reason;
      diagnostics.push(
        diag("warn", "PARSE_DEGRADED", message, {
          path: fullPath,
          details: { dialect, line: facts.degraded.line },
        }),
      );
    }
    files.push({ file: rel, dialect, facts });
    declared.addAll(facts.declared);
    referenced.addAll(facts.referenced);
    for (const r of facts.requires) requires.add(r);
  }

  return {
    ok: true,
    scan: { root, files, declared, referenced, requires: [...requires].sort(), diagnostics },
  };
}
