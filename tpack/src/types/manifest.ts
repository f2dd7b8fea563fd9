import type { EntitySections, Requirement } from "./entity.js";

/** One entry of `dependencies` / `devDependencies`. */
export type DependencyEntry = {
  namespace: string;
  github?: string;
  min_version: string;
};

export type DependencyMap = Record<string, DependencyEntry>;

/**
 * Persisted package manifest. Field names are read by other tooling and must
 * not change. Fields this tool does not model are carried through the index
 * signature.
 */
export type PackageManifest = {
  name: string;
  title: string;
  description: string;
  version: string;
  status: string;
  namespace: string;
  github: string;
  preview: string;
  author: string | string[];
  tags: string[];
  license?: string;
  platforms?: string[];
  requires?: Requirement[];
  dependencies: DependencyMap;
  devDependencies: DependencyMap;
  contributes: EntitySections;
  depends: EntitySections;
  validateDependencies?: boolean;
  _generator: string;
  _generatorVersion: string;
  _generatorRequiresVersionAction: boolean;
  _generatorStrictNamespace: boolean;
  _generatorFrozenFields: string[];
  [field: string]: unknown;
};

/** A manifest as read from disk, after schema validation. */
export type StoredManifest = Record<string, unknown>;

/** Top-level fields this tool writes; anything else passes through untouched. */
export const KNOWN_FIELDS = [
  "name",
  "title",
  "description",
  "version",
  "status",
  "namespace",
  "github",
  "preview",
  "author",
  "tags",
  "license",
  "platforms",
  "requires",
  "dependencies",
  "devDependencies",
  "contributes",
  "depends",
  "validateDependencies",
  "_generator",
  "_generatorVersion",
  "_generatorRequiresVersionAction",
  "_generatorStrictNamespace",
  "_generatorFrozenFields",
] as const;
