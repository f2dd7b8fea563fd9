import fs from "node:fs";
import path from "node:path";
import type { SchemaRegistry } from "../schema/registry.js";
import type { BuiltinTables, TpackConfig } from "../types/config.js";
import type { Dialect } from "../types/entity.js";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import type { StoredManifest } from "../types/manifest.js";
import { extractPackage, type PackageScan } from "../extract/extractor.js";
import { detectLicense, detectPreview } from "../extract/package-files.js";
import { buildIndex, type RepositoryIndex } from "../index/repository-index.js";
import { BuiltinCatalog } from "../resolve/builtins.js";
import { resolvePackage, type Resolution } from "../resolve/resolver.js";
import { mergeManifest } from "../merge/merger.js";
import { atomicWriteFile } from "./atomic-write.js";
import { errorMessage } from "./errors.js";
import { generatorVersion } from "./generator-info.js";
import { stringField, stringifyJson } from "./json.js";
import { readManifest } from "./manifest-io.js";

export type AnalyzeContext = {
  config: TpackConfig;
  registry: SchemaRegistry;
  index: RepositoryIndex;
  builtins: BuiltinCatalog;
  generatorVersion: string;
};

/** Everything computed for one package before anything is written. */
export type PackageAnalysis = {
  dir: string;
  manifestPath: string;
  existing: StoredManifest | null;
  existingRaw: string | null;
  manifest: StoredManifest;
  serialized: string;
  resolution: Resolution;
  fileCounts: Record<Dialect, number>;
  coveredByDev: string[];
  diagnostics: Diagnostic[];
};

export type AnalyzeResult = { ok: true; analysis: PackageAnalysis } | { ok: false; error: Diagnostic; diagnostics: Diagnostic[] };

export type PackageStatus = "created" | "updated" | "unchanged";

export type PackageOutcome =
  | { ok: true; dir: string; status: PackageStatus; written: boolean; analysis: PackageAnalysis }
  | { ok: false; dir: string; error: Diagnostic; diagnostics: Diagnostic[] };

export type PipelineOptions = {
  packageDirs: string[];
  /** Directory whose manifests make up the repository index. */
  searchRoot: string;
  dryRun: boolean;
  config: TpackConfig;
  builtins: BuiltinTables;
  registry: SchemaRegistry;
  /** Overrides the version stamped into `_generatorVersion`. */
  generatorVersion?: string;
};

export type PipelineResult = {
  outcomes: PackageOutcome[];
  indexDiagnostics: Diagnostic[];
  indexedPackages: number;
  failed: number;
};

function countFiles(scan: PackageScan): Record<Dialect, number> {
  const counts: Record<Dialect, number> = { python: 0, talon: 0, "talon-list": 0 };
  for (const f of scan.files) counts[f.dialect]++;
  return counts;
}

/** Extract, resolve and merge one package in memory. */
export async function analyzePackage(dir: string, ctx: AnalyzeContext): Promise<AnalyzeResult> {
  const packageDir = path.resolve(dir);
  if (!fs.existsSync(packageDir) || !fs.statSync(packageDir).isDirectory()) {
    return { ok: false, error: diag("error", "IO_FAILURE", "package directory not found", { path: packageDir }), diagnostics: [] };
  }

  const manifestPath = path.join(packageDir, ctx.config.manifest_file);
  const read = await readManifest(manifestPath, ctx.registry);
  if (!read.ok) return { ok: false, error: read.error, diagnostics: [] };

  const extracted = extractPackage(packageDir, {
    skipDirs: ctx.config.skip_dirs,
    ignore: ctx.config.ignore,
    namespacePrefixes: ctx.config.namespace_prefixes,
  });
  if (!extracted.ok) return { ok: false, error: extracted.error, diagnostics: [] };
  const { scan } = extracted;

  const existing = read.manifest;
  const recorded = existing?._generatorRequiresVersionAction;
  const resolution = resolvePackage(
    {
      packageName: (existing && stringField(existing, "name")) || path.basename(packageDir),
      packageDir,
      namespace: (existing && stringField(existing, "namespace")) || "",
      strictNamespace: existing?._generatorStrictNamespace !== false,
      recordedRequireVersionAction: typeof recorded === "boolean" ? recorded : undefined,
      hasVersionFile: fs.existsSync(path.join(packageDir, "_version.py")),
      declared: scan.declared,
      referenced: scan.referenced,
    },
    { index: ctx.index, builtins: ctx.builtins, namespacePrefixes: ctx.config.namespace_prefixes },
  );

  const { manifest, coveredByDev } = mergeManifest({
    packageDir,
    existing,
    resolution,
    requires: scan.requires,
    generatorName: ctx.config.generator_name,
    generatorVersion: ctx.generatorVersion,
    files: {
      license: () => detectLicense(packageDir),
      preview: (github) => detectPreview(packageDir, github),
    },
  });

  return {
    ok: true,
    analysis: {
      dir: packageDir,
      manifestPath,
      existing,
      existingRaw: read.raw,
      manifest,
      serialized: stringifyJson(manifest),
      resolution,
      fileCounts: countFiles(scan),
      coveredByDev,
      diagnostics: [...scan.diagnostics, ...resolution.warnings],
    },
  };
}

/** Build the index and analysis context shared by every package in a run. */
export async function prepareContext(
  opts: Pick<PipelineOptions, "searchRoot" | "config" | "builtins" | "registry" | "generatorVersion">,
): Promise<{ ctx: AnalyzeContext; indexDiagnostics: Diagnostic[] }> {
  const { index, diagnostics } = await buildIndex(opts.searchRoot, opts.config, opts.registry);
  return {
    ctx: {
      config: opts.config,
      registry: opts.registry,
      index,
      builtins: new BuiltinCatalog(opts.builtins),
      generatorVersion: opts.generatorVersion ?? generatorVersion(),
    },
    indexDiagnostics: diagnostics,
  };
}

/**
 * Regenerate the manifest of every package directory. The index is built once
 * up front; a failing package is reported and the batch moves on.
 */
export async function generateManifests(opts: PipelineOptions): Promise<PipelineResult> {
  const { ctx, indexDiagnostics } = await prepareContext(opts);
  const outcomes: PackageOutcome[] = [];

  for (const dir of opts.packageDirs) {
    const analyzed = await analyzePackage(dir, ctx);
    if (!analyzed.ok) {
      outcomes.push({ ok: false, dir: path.resolve(dir), error: analyzed.error, diagnostics: analyzed.diagnostics });
      continue;
    }

    const { analysis } = analyzed;
    const status: PackageStatus =
      analysis.existingRaw === null ? "created" : analysis.existingRaw === analysis.serialized ? "unchanged" : "updated";
    const shouldWrite = !opts.dryRun && status !== "unchanged";

    if (shouldWrite) {
      try {
        await atomicWriteFile(analysis.manifestPath, analysis.serialized);
      } catch (err) {
        outcomes.push({
          ok: false,
          dir: analysis.dir,
          error: diag("error", "IO_FAILURE", `cannot write manifest: ${errorMessage(err)}`, { path: analysis.manifestPath }),
          diagnostics: analysis.diagnostics,
        });
        continue;
      }
    }

    outcomes.push({ ok: true, dir: analysis.dir, status, written: shouldWrite, analysis });
  }

  return {
    outcomes,
    indexDiagnostics,
    indexedPackages: ctx.index.packageCount,
    failed: outcomes.filter((o) => !o.ok).length,
  };
}
