import path from "node:path";
import type { Resolution } from "../resolve/resolver.js";
import type { Requirement } from "../types/entity.js";
import { KNOWN_FIELDS, type DependencyEntry, type DependencyMap, type PackageManifest, type StoredManifest } from "../types/manifest.js";
import { isPlainObject, stringField, stringList, type JsonRecord } from "../core/json.js";
import { applyFrozenFields } from "../policy/frozen.js";
import { ratchet } from "../policy/version.js";

export const DESCRIPTION_PLACEHOLDER = "Add a description of your package here.";

/** Lookups against the package directory that only run when a field needs a default. */
export type PackageFileProbe = {
  license: () => string | null;
  preview: (github: string) => string;
};

export type MergeInput = {
  packageDir: string;
  existing: StoredManifest | null;
  resolution: Resolution;
  requires: Requirement[];
  generatorName: string;
  generatorVersion: string;
  files: PackageFileProbe;
};

export type MergeResult = {
  manifest: StoredManifest;
  /** Resolved packages left out of `dependencies` because `devDependencies` covers them. */
  coveredByDev: string[];
};

const KNOWN = new Set<string>(KNOWN_FIELDS);

/** `talon-foo_bar` -> `Foo Bar`. */
export function defaultTitle(name: string): string {
  return name
    .replace(/talon[-_]/g, "")
    .replace(/[-_]/g, " ")
    .replace(/[A-Za-z]+/g, (word) => word[0].toUpperCase() + word.slice(1).toLowerCase());
}

/**
 * Read one dependency entry in any shape older generators wrote: a bare version
 * string, or an object with `version` in place of `min_version`.
 */
export function normalizeDependency(value: unknown): DependencyEntry | null {
  if (typeof value === "string") return { namespace: "", min_version: value };
  if (!isPlainObject(value)) return null;
  const github = stringField(value, "github");
  return {
    namespace: stringField(value, "namespace") ?? "",
    ...(github !== undefined ? { github } : {}),
    min_version: stringField(value, "min_version") ?? stringField(value, "version") ?? "0.0.0",
  };
}

export function normalizeDependencies(value: unknown): DependencyMap {
  const out: DependencyMap = {};
  if (!isPlainObject(value)) return out;
  for (const [name, raw] of Object.entries(value)) {
    const entry = normalizeDependency(raw);
    if (entry) out[name] = entry;
  }
  return out;
}

function mergeDependencies(
  resolved: DependencyMap,
  recorded: DependencyMap,
  dev: DependencyMap,
): { dependencies: DependencyMap; coveredByDev: string[] } {
  const dependencies: DependencyMap = {};
  const coveredByDev: string[] = [];
  for (const [name, fresh] of Object.entries(resolved)) {
    if (Object.hasOwn(dev, name)) {
      coveredByDev.push(name);
      continue;
    }
    const prev = Object.hasOwn(recorded, name) ? recorded[name] : undefined;
    const github = fresh.github || prev?.github;
    dependencies[name] = {
      namespace: fresh.namespace,
      ...(github ? { github } : {}),
      min_version: ratchet(prev?.min_version, fresh.min_version),
    };
  }
  return { dependencies, coveredByDev };
}

/**
 * Combine freshly resolved facts with the manifest on disk. Identity fields the
 * owner set are kept, generated sections are replaced, frozen paths keep their
 * recorded value (or absence) and unknown fields pass through in place.
 */
export function mergeManifest(input: MergeInput): MergeResult {
  const existing: StoredManifest = input.existing ?? {};
  const { resolution } = input;

  const name = stringField(existing, "name") ?? path.basename(path.resolve(input.packageDir));
  const github = stringField(existing, "github") ?? "";
  const platforms = stringList(existing.platforms);
  const license = Object.hasOwn(existing, "license") ? stringField(existing, "license") : input.files.license() ?? undefined;

  const { dependencies, coveredByDev } = mergeDependencies(
    resolution.dependencies,
    normalizeDependencies(existing.dependencies),
    normalizeDependencies(existing.devDependencies),
  );
  const validateDependencies =
    typeof existing.validateDependencies === "boolean"
      ? existing.validateDependencies
      : Object.keys(dependencies).length > 0
        ? true
        : undefined;

  const next: PackageManifest = {
    name,
    title: stringField(existing, "title") ?? defaultTitle(name),
    description: stringField(existing, "description") ?? DESCRIPTION_PLACEHOLDER,
    version: stringField(existing, "version") ?? "0.0.0",
    status: stringField(existing, "status") ?? "experimental",
    namespace: resolution.namespace,
    github,
    preview: stringField(existing, "preview") || input.files.preview(github),
    author: typeof existing.author === "string" ? existing.author : Array.isArray(existing.author) ? stringList(existing.author) : "",
    tags: stringList(existing.tags),
    ...(license ? { license } : {}),
    ...(platforms.length > 0 ? { platforms } : {}),
    ...(input.requires.length > 0 ? { requires: [...input.requires] } : {}),
    dependencies,
    devDependencies: normalizeDependencies(existing.devDependencies),
    contributes: resolution.contributes,
    depends: resolution.depends,
    ...(validateDependencies !== undefined ? { validateDependencies } : {}),
    _generator: input.generatorName,
    _generatorVersion: input.generatorVersion,
    _generatorRequiresVersionAction: resolution.requireVersionAction,
    _generatorStrictNamespace: existing._generatorStrictNamespace !== false,
    _generatorFrozenFields: stringList(existing._generatorFrozenFields),
  };

  const frozen: JsonRecord = structuredClone(next);
  applyFrozenFields(frozen, existing, next._generatorFrozenFields);

  const manifest: StoredManifest = {};
  for (const key of KNOWN_FIELDS) {
    if (Object.hasOwn(frozen, key)) manifest[key] = frozen[key];
  }
  for (const [key, value] of Object.entries(existing)) {
    if (!KNOWN.has(key)) manifest[key] = value;
  }
  return { manifest, coveredByDev };
}
