import path from "node:path";
import type { GeneratorToggles } from "../types/config.js";
import { diag } from "../types/diagnostics.js";
import type { StoredManifest } from "../types/manifest.js";
import { generateManifests, type PackageOutcome } from "../core/pipeline.js";
import { readManifest } from "../core/manifest-io.js";
import { findSearchRoot } from "../index/repository-index.js";
import { renderInstallBlock } from "../generators/install-block.js";
import { loadSetup } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { Reporter, type OutputFormat, type Writer } from "./output.js";

export type GeneratorFlags = {
  manifestOnly?: boolean;
  installBlockOnly?: boolean;
  /** commander's `--no-manifest` sets this to false. */
  manifest?: boolean;
};

export type GenerateOptions = {
  dirs: string[];
  dryRun?: boolean;
  verbose?: boolean;
  format?: OutputFormat;
  root?: string;
  env?: string;
  configDir?: string;
  schemaDir?: string;
  flags?: GeneratorFlags;
  cwd?: string;
  writer?: Writer;
  /** Overrides the version stamped into `_generatorVersion`. */
  generatorVersion?: string;
};

/** Configured generators, narrowed by the command-line selection flags. */
export function selectGenerators(configured: GeneratorToggles, flags: GeneratorFlags = {}): GeneratorToggles {
  if (flags.manifestOnly) return { manifest: true, install_block: false };
  if (flags.installBlockOnly) return { manifest: false, install_block: true };
  return {
    manifest: flags.manifest === false ? false : configured.manifest,
    install_block: configured.install_block,
  };
}

function describeOutcome(outcome: Extract<PackageOutcome, { ok: true }>, dryRun: boolean, cwd: string): string {
  const where = path.relative(cwd, outcome.analysis.manifestPath) || outcome.analysis.manifestPath;
  if (outcome.status === "unchanged") return `unchanged: ${where}`;
  return dryRun ? `would ${outcome.status === "created" ? "create" : "update"}: ${where}` : `${outcome.status}: ${where}`;
}

/**
 * Run the selected generators over `dirs`. Returns the process exit code:
 * 2 for unusable configuration, 1 when any package failed, else 0.
 */
export async function generate(opts: GenerateOptions): Promise<ExitCode> {
  const cwd = opts.cwd ?? process.cwd();
  const dryRun = opts.dryRun ?? false;
  const reporter = new Reporter(opts.format ?? "human", opts.verbose ?? false, opts.writer);
  const dirs = (opts.dirs.length > 0 ? opts.dirs : ["."]).map((d) => path.resolve(cwd, d));

  const loaded = await loadSetup({ env: opts.env, configDir: opts.configDir, schemaDir: opts.schemaDir });
  if (!loaded.ok) {
    reporter.diagnostic(loaded.error);
    return EXIT.INVALID_ARGS;
  }
  const { config, builtins, registry } = loaded.setup;
  const generators = selectGenerators(config.generators, opts.flags);

  const generated = new Map<string, StoredManifest>();
  let failed = 0;

  if (generators.manifest) {
    const searchRoot = findSearchRoot(cwd, config.repository_root_marker, opts.root && path.resolve(cwd, opts.root));
    const result = await generateManifests({
      packageDirs: dirs,
      searchRoot,
      dryRun,
      config,
      builtins,
      registry,
      generatorVersion: opts.generatorVersion,
    });

    reporter.event(
      { event: "index", root: searchRoot, packages: result.indexedPackages },
      opts.verbose ? `indexed ${result.indexedPackages} package(s) under ${searchRoot}` : undefined,
    );
    reporter.diagnostics(result.indexDiagnostics);

    const counts = { created: 0, updated: 0, unchanged: 0 };
    for (const outcome of result.outcomes) {
      if (!outcome.ok) {
        reporter.diagnostics(outcome.diagnostics);
        reporter.diagnostic(outcome.error);
        continue;
      }
      const { analysis } = outcome;
      counts[outcome.status]++;
      generated.set(outcome.dir, analysis.manifest);
      reporter.diagnostics(analysis.diagnostics);
      reporter.event(
        {
          event: "package",
          dir: outcome.dir,
          manifest: analysis.manifestPath,
          status: outcome.status,
          written: outcome.written,
          dependencies: Object.keys(analysis.resolution.dependencies),
          coveredByDev: analysis.coveredByDev,
          unresolved: analysis.resolution.unresolved.length,
          files: analysis.fileCounts,
        },
        describeOutcome(outcome, dryRun, cwd),
      );
      if (opts.verbose) {
        const files = analysis.fileCounts;
        reporter.text(`  scanned ${files.python} .py, ${files.talon} .talon, ${files["talon-list"]} .talon-list file(s)`);
      }
      if (analysis.coveredByDev.length > 0) {
        reporter.text(`  covered by devDependencies: ${analysis.coveredByDev.join(", ")}`);
      }
      if (dryRun && opts.verbose && outcome.status !== "unchanged") reporter.text(analysis.serialized.trimEnd());
    }
    failed += result.failed;

    reporter.event(
      { event: "summary", packages: result.outcomes.length, ...counts, failed: result.failed, dryRun },
      `${result.outcomes.length} package(s): ${counts.created} created, ${counts.updated} updated, ${counts.unchanged} unchanged, ${result.failed} failed${dryRun ? " (dry run)" : ""}`,
    );
  }

  if (generators.install_block) {
    for (const dir of dirs) {
      const manifestPath = path.join(dir, config.manifest_file);
      let manifest = generated.get(dir) ?? null;
      if (!manifest) {
        const read = await readManifest(manifestPath, registry);
        if (!read.ok) {
          reporter.diagnostic(read.error);
          failed++;
          continue;
        }
        manifest = read.manifest;
      }
      if (!manifest) {
        reporter.diagnostic(diag("error", "IO_FAILURE", "no manifest found; run the manifest generator first", { path: manifestPath }));
        failed++;
        continue;
      }
      const block = renderInstallBlock(manifest, dir);
      reporter.event({ event: "install-block", dir, markdown: block }, block.trimEnd());
    }
  }

  return failed > 0 ? EXIT.PACKAGE_FAILED : EXIT.SUCCESS;
}
