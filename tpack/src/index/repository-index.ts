import fs from "node:fs";
import path from "node:path";
import type { SchemaRegistry } from "../schema/registry.js";
import type { TpackConfig } from "../types/config.js";
import { ENTITY_KINDS, SECTION_KEYS, entityKey, type Entity, type EntityKind } from "../types/entity.js";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import type { StoredManifest } from "../types/manifest.js";
import { readManifest } from "../core/manifest-io.js";
import { errorMessage } from "../core/errors.js";
import { isPlainObject, stringField, stringList } from "../core/json.js";
import { belongsTo } from "../policy/namespace.js";

/** One package that declares an indexed entity. */
export type IndexEntry = {
  package: string;
  namespace: string;
  version: string;
  github: string;
  manifestDir: string;
  /**
   * The package makes no namespace promise for this entity (no namespace, or
   * strict namespacing turned off and the entity outside it).
   */
  lenient: boolean;
};

/**
 * Entity -> declaring packages, built from the generator-authored manifests
 * under a search root. Read-only once built.
 */
export class RepositoryIndex {
  private readonly byEntity = new Map<string, IndexEntry[]>();
  private readonly packages = new Set<string>();

  add(entity: Entity, entry: IndexEntry): void {
    const key = entityKey(entity);
    const list = this.byEntity.get(key);
    if (list) list.push(entry);
    else this.byEntity.set(key, [entry]);
    this.packages.add(entry.manifestDir);
  }

  /** Count a manifest as indexed even when it contributes nothing. */
  markIndexed(manifestDir: string): void {
    this.packages.add(manifestDir);
  }

  lookup(kind: EntityKind, name: string): readonly IndexEntry[] {
    return this.byEntity.get(entityKey({ kind, name })) ?? [];
  }

  /** Number of indexed manifests. */
  get packageCount(): number {
    return this.packages.size;
  }
}

export type IndexBuild = {
  index: RepositoryIndex;
  diagnostics: Diagnostic[];
};

/** Register every contributed entity of one manifest. Returns false when it is not ours to index. */
export function indexManifest(index: RepositoryIndex, manifest: StoredManifest, manifestDir: string, generatorName: string): boolean {
  if (manifest._generator !== generatorName) return false;
  const name = stringField(manifest, "name");
  if (!name) return false;

  const namespace = stringField(manifest, "namespace") ?? "";
  const strict = manifest._generatorStrictNamespace !== false;
  const contributes = isPlainObject(manifest.contributes) ? manifest.contributes : {};
  const base = {
    package: name,
    namespace,
    version: stringField(manifest, "version") ?? "0.0.0",
    github: stringField(manifest, "github") ?? "",
    manifestDir,
  };

  for (const kind of ENTITY_KINDS) {
    for (const entityName of stringList(contributes[SECTION_KEYS[kind]])) {
      const lenient = !namespace || (!strict && kind !== "app" && !belongsTo(entityName, namespace));
      index.add({ kind, name: entityName }, { ...base, lenient });
    }
  }
  index.markIndexed(manifestDir);
  return true;
}

function manifestDirs(dir: string, config: TpackConfig, out: string[], diagnostics: Diagnostic[]): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    diagnostics.push(diag("warn", "INDEX_MANIFEST_SKIPPED", `cannot list directory: ${errorMessage(err)}`, { path: dir }));
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  if (entries.some((e) => e.isFile() && e.name === config.manifest_file)) out.push(dir);
  for (const entry of entries) {
    if (entry.isDirectory() && !config.skip_dirs.includes(entry.name)) {
      manifestDirs(path.join(dir, entry.name), config, out, diagnostics);
    }
  }
}

/**
 * Walk `root` and index every manifest this generator wrote. Manifests that
 * cannot be read or fail the schema are skipped with a warning.
 */
export async function buildIndex(root: string, config: TpackConfig, registry: SchemaRegistry): Promise<IndexBuild> {
  const index = new RepositoryIndex();
  const diagnostics: Diagnostic[] = [];
  const dirs: string[] = [];
  manifestDirs(path.resolve(root), config, dirs, diagnostics);

  for (const dir of dirs) {
    const manifestPath = path.join(dir, config.manifest_file);
    const read = await readManifest(manifestPath, registry);
    if (!read.ok) {
      diagnostics.push(
        diag("warn", "INDEX_MANIFEST_SKIPPED", `skipped while indexing: ${read.error.message}`, {
          path: manifestPath,
          details: { cause: read.error.code },
        }),
      );
      continue;
    }
    if (read.manifest) indexManifest(index, read.manifest, dir, config.generator_name);
  }

  return { index, diagnostics };
}

/**
 * Directory whose manifests are indexed: the explicit root when given, else the
 * nearest ancestor of `cwd` named `marker`, else `cwd`.
 */
export function findSearchRoot(cwd: string, marker: string, explicit?: string): string {
  if (explicit) return path.resolve(explicit);
  let dir = path.resolve(cwd);
  for (;;) {
    if (path.basename(dir) === marker) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(cwd);
    dir = parent;
  }
}
