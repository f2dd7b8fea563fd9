import type { EntitySet } from "../extract/entity-set.js";
import type { Entity } from "../types/entity.js";

/**
 * Longest underscore-delimited prefix shared by more than half of the declared
 * namespaced entities (apps excluded). A lone entity yields everything before its
 * last underscore. Returns null when nothing qualifies.
 */
export function inferNamespace(declared: EntitySet): string | null {
  const names: string[] = [];
  for (const e of declared.sorted()) {
    if (e.kind !== "app" && e.name.includes(".")) names.push(e.name);
  }
  if (names.length === 0) return null;
  if (names.length === 1) {
    const only = names[0];
    const cut = only.lastIndexOf("_");
    return cut === -1 ? only : only.slice(0, cut);
  }

  const counts = new Map<string, number>();
  for (const name of names) {
    const parts = name.split("_");
    for (let i = 1; i <= parts.length; i++) {
      const prefix = parts.slice(0, i).join("_");
      counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
    }
  }

  const threshold = names.length * 0.5;
  const candidates = [...counts].filter(([, count]) => count > threshold);
  if (candidates.length === 0) return null;
  candidates.sort((a, b) => b[0].length - a[0].length || b[1] - a[1]);
  return candidates[0][0];
}

/** Prefix `user.` unless the namespace already starts with a known prefix. */
export function qualifyNamespace(namespace: string, knownPrefixes: string[]): string {
  if (!namespace) return "";
  return knownPrefixes.some((p) => namespace.startsWith(`${p}.`)) ? namespace : `user.${namespace}`;
}

/** The namespace without its `user.` prefix. */
export function namespaceBase(namespace: string): string {
  return namespace.startsWith("user.") ? namespace.slice("user.".length) : namespace;
}

/** True when `name` lies under `namespace`: equal to it, or continuing it with `_` or `.`. */
export function belongsTo(name: string, namespace: string): boolean {
  if (!namespace) return false;
  return name === namespace || name.startsWith(`${namespace}_`) || name.startsWith(`${namespace}.`);
}

/**
 * Declared `user.*` entities (apps excluded) that are neither `<base>` nor
 * `<base>_*` for the namespace's base name.
 */
export function namespaceOffenders(namespace: string, declared: EntitySet): Entity[] {
  const base = namespaceBase(namespace);
  const offenders: Entity[] = [];
  for (const e of declared.sorted()) {
    if (e.kind === "app" || !e.name.startsWith("user.")) continue;
    const suffix = e.name.slice("user.".length);
    if (suffix && suffix !== base && !suffix.startsWith(`${base}_`)) offenders.push(e);
  }
  return offenders;
}

/** Name of the action a package must expose to report its version. */
export function versionActionName(namespace: string): string {
  return `user.${namespaceBase(namespace)}_version`;
}

/** True when the package declares anything besides apps. */
export function hasContributions(declared: EntitySet): boolean {
  for (const e of declared.entities()) {
    if (e.kind !== "app") return true;
  }
  return false;
}
