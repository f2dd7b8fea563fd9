import path from "node:path";
import { EntitySet } from "../extract/entity-set.js";
import type { IndexEntry, RepositoryIndex } from "../index/repository-index.js";
import { SECTION_KEYS, type Entity, type EntitySections } from "../types/entity.js";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import type { DependencyMap } from "../types/manifest.js";
import {
  belongsTo,
  hasContributions,
  inferNamespace,
  namespaceOffenders,
  qualifyNamespace,
  versionActionName,
} from "../policy/namespace.js";
import { maxVersion } from "../policy/version.js";
import type { BuiltinCatalog } from "./builtins.js";

export type ResolveInput = {
  packageName: string;
  packageDir: string;
  /** Namespace recorded in the existing manifest; empty when none. */
  namespace: string;
  strictNamespace: boolean;
  /** `_generatorRequiresVersionAction` from the existing manifest, if recorded. */
  recordedRequireVersionAction?: boolean;
  /** A generated `_version.py` exists in the package root. */
  hasVersionFile: boolean;
  declared: EntitySet;
  referenced: EntitySet;
};

export type ResolveContext = {
  index: RepositoryIndex;
  builtins: BuiltinCatalog;
  namespacePrefixes: string[];
};

export type AmbiguousReference = {
  entity: Entity;
  candidates: string[];
  chosen: string;
};

export type Resolution = {
  namespace: string;
  requireVersionAction: boolean;
  contributes: EntitySections;
  depends: EntitySections;
  dependencies: DependencyMap;
  unresolved: Entity[];
  ambiguous: AmbiguousReference[];
  warnings: Diagnostic[];
};

type Candidate = { entry: IndexEntry; version: string };

function groupByPackage(entries: readonly IndexEntry[]): Map<string, Candidate> {
  const groups = new Map<string, Candidate>();
  for (const entry of entries) {
    const current = groups.get(entry.package);
    if (!current) {
      groups.set(entry.package, { entry, version: entry.version });
      continue;
    }
    const version = maxVersion(current.version, entry.version);
    if (version !== current.version) groups.set(entry.package, { entry, version });
  }
  return groups;
}

function describe(e: Entity): string {
  return `${e.kind} ${e.name}`;
}

/**
 * Work out what one package contributes, which entities it depends on and
 * which packages supply them. Never fails: every problem becomes a warning.
 */
export function resolvePackage(input: ResolveInput, ctx: ResolveContext): Resolution {
  const warnings: Diagnostic[] = [];
  const where = { path: input.packageDir };
  const ownDir = path.resolve(input.packageDir);

  let namespace = input.namespace;
  if (!namespace && input.strictNamespace) {
    namespace = inferNamespace(input.declared) ?? "";
    if (!namespace && hasContributions(input.declared)) {
      warnings.push(
        diag("warn", "NAMESPACE_INCONSISTENCY", "could not infer a namespace: no prefix is shared by more than half of the contributions", where),
      );
    }
  }
  namespace = qualifyNamespace(namespace, ctx.namespacePrefixes);

  const depends = new EntitySet();
  const dependencies: DependencyMap = {};
  const unresolved: Entity[] = [];
  const ambiguous: AmbiguousReference[] = [];
  const undeclaredOwn: Entity[] = [];

  for (const entity of input.referenced.sorted()) {
    if (input.declared.hasName(entity.name) || ctx.builtins.has(entity)) continue;
    if (belongsTo(entity.name, namespace)) {
      undeclaredOwn.push(entity);
      continue;
    }

    depends.add(entity.kind, entity.name);

    const others = ctx.index
      .lookup(entity.kind, entity.name)
      .filter((e) => e.package !== input.packageName && path.resolve(e.manifestDir) !== ownDir);
    const strict = others.filter((e) => !e.lenient);
    const pool = strict.length > 0 ? strict : others;
    const groups = groupByPackage(pool);

    if (groups.size === 0) {
      unresolved.push(entity);
      warnings.push(
        diag("warn", "UNRESOLVED_REFERENCE", `no package declares ${describe(entity)}`, {
          ...where,
          details: { kind: entity.kind, name: entity.name },
        }),
      );
      continue;
    }

    const names = [...groups.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
    const chosen = names[0];
    if (names.length > 1) {
      ambiguous.push({ entity, candidates: names, chosen });
      warnings.push(
        diag(
          strict.length > 0 ? "warn" : "info",
          "AMBIGUOUS_REFERENCE",
          `${describe(entity)} is declared by ${names.join(", ")}; using ${chosen}`,
          { ...where, details: { kind: entity.kind, name: entity.name, candidates: names, chosen } },
        ),
      );
    }

    const pick = groups.get(chosen);
    if (!pick) continue;
    const existing = dependencies[chosen];
    const github = existing?.github || pick.entry.github;
    dependencies[chosen] = {
      namespace: pick.entry.namespace,
      ...(github ? { github } : {}),
      min_version: existing ? maxVersion(existing.min_version, pick.version) : pick.version,
    };
  }

  if (undeclaredOwn.length > 0) {
    warnings.push(
      diag(
        "warn",
        "NAMESPACE_INCONSISTENCY",
        `referenced under own namespace ${namespace} but not declared: ${undeclaredOwn.map((e) => e.name).join(", ")}`,
        { ...where, details: { entities: undeclaredOwn } },
      ),
    );
  }

  if (namespace && input.strictNamespace) {
    const offenders = namespaceOffenders(namespace, input.declared);
    if (offenders.length > 0) {
      warnings.push(
        diag(
          "warn",
          "NAMESPACE_INCONSISTENCY",
          `declared outside namespace ${namespace} (expected '${namespace}' or '${namespace}_*'): ${offenders
            .map((e) => `${SECTION_KEYS[e.kind]}: ${e.name}`)
            .join(", ")}`,
          { ...where, details: { namespace, entities: offenders } },
        ),
      );
    }
  }

  const requireVersionAction =
    hasContributions(input.declared) && (input.recordedRequireVersionAction ?? namespace !== "");
  if (namespace && requireVersionAction) {
    const action = versionActionName(namespace);
    if (!input.declared.has("action", action)) {
      const message = input.hasVersionFile
        ? `_version.py exists but action '${action}' was not detected`
        : `missing required version action '${action}'`;
      warnings.push(diag("warn", "VERSION_ACTION_MISSING", message, { ...where, details: { action } }));
    }
  }

  const sortedDependencies: DependencyMap = {};
  for (const name of Object.keys(dependencies).sort()) sortedDependencies[name] = dependencies[name];

  return {
    namespace,
    requireVersionAction,
    contributes: input.declared.toSections(),
    depends: depends.toSections(),
    dependencies: sortedDependencies,
    unresolved,
    ambiguous,
    warnings,
  };
}
