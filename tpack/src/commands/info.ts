import fs from "node:fs";
import path from "node:path";
import type { StoredManifest } from "../types/manifest.js";
import { isPlainObject, stringField, stringList } from "../core/json.js";
import { readManifest } from "../core/manifest-io.js";
import { analyzePackage, prepareContext } from "../core/pipeline.js";
import { findSearchRoot } from "../index/repository-index.js";
import { normalizeDependencies } from "../merge/merger.js";
import { loadSetup } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { Reporter, type OutputFormat, type Writer } from "./output.js";

const REQUIREMENT_LABELS: Record<string, string> = {
  talonBeta: "Talon Beta",
  eyeTracker: "Eye Tracker",
  parrot: "Parrot",
  gamepad: "Gamepad",
  streamDeck: "Stream Deck",
  webcam: "Webcam",
};

export type InfoOptions = {
  dir?: string;
  format?: OutputFormat;
  root?: string;
  env?: string;
  configDir?: string;
  schemaDir?: string;
  cwd?: string;
  writer?: Writer;
};

/** First paragraph of README.md, skipping the title, badges and blockquotes. */
export function readmeIntro(packageDir: string, maxLines = 5): string | null {
  const readme = path.join(packageDir, "README.md");
  if (!fs.existsSync(readme)) return null;

  const intro: string[] = [];
  for (const line of fs.readFileSync(readme, "utf8").split(/\r?\n/)) {
    const stripped = line.trim();
    if (!stripped) {
      if (intro.length > 0) break;
      continue;
    }
    if (stripped.startsWith("# ") || stripped.startsWith("![") || stripped.startsWith("[![") || stripped.startsWith(">")) continue;
    intro.push(stripped);
    if (intro.length >= maxLines) break;
  }
  return intro.length > 0 ? intro.join(" ") : null;
}

function sectionLines(title: string, value: unknown): string[] {
  if (!isPlainObject(value)) return [];
  const lines: string[] = [];
  for (const key of Object.keys(value).sort()) {
    const items = stringList(value[key]).sort();
    if (items.length === 0) continue;
    lines.push(`  ${key}:`, ...items.map((item) => `    ${item}`));
  }
  return lines.length > 0 ? ["", `${title}:`, ...lines] : [];
}

/** Human-readable summary of a package manifest. */
export function renderInfo(manifest: StoredManifest, opts: { packageDir: string; analyzed: boolean; intro?: string | null }): string[] {
  const name = stringField(manifest, "name") ?? path.basename(opts.packageDir);
  const version = stringField(manifest, "version") ?? "0.0.0";
  const status = stringField(manifest, "status") ?? "";
  const description = stringField(manifest, "description") ?? "";
  const namespace = stringField(manifest, "namespace") ?? "";
  const github = stringField(manifest, "github") ?? "";

  const lines: string[] = [];
  if (opts.analyzed) {
    lines.push(`${name} (analyzed)`);
  } else {
    lines.push(`${name} v${version}${status ? ` (${status})` : ""}`);
    if (description) lines.push(description);
  }
  if (opts.intro) lines.push("", opts.intro);
  if (github || namespace) lines.push("");
  if (github) lines.push(github);
  if (namespace) lines.push(`namespace: ${namespace}`);

  const requires = stringList(manifest.requires);
  if (requires.length > 0) {
    lines.push("", "Requires:", ...requires.map((r) => `  ${REQUIREMENT_LABELS[r] ?? r}`));
  }

  const contributes = sectionLines("Contributes", manifest.contributes);
  const depends = sectionLines("Depends", manifest.depends);
  lines.push(...contributes, ...depends);

  const dependencies = normalizeDependencies(manifest.dependencies);
  const depNames = Object.keys(dependencies).sort();
  if (depNames.length > 0) {
    lines.push("", "Dependencies:");
    for (const dep of depNames) {
      lines.push(`  ${dep} >=${dependencies[dep].min_version}`);
      const depGithub = dependencies[dep].github;
      if (depGithub) lines.push(`    ${depGithub}`);
    }
  }

  if (requires.length === 0 && contributes.length === 0 && depends.length === 0 && depNames.length === 0) {
    lines.push("", "No contributions or dependencies detected.");
  }
  return lines;
}

/**
 * Print what a package contributes and depends on. Reads the stored manifest,
 * or analyzes the directory in memory when there is none.
 */
export async function info(opts: InfoOptions): Promise<ExitCode> {
  const cwd = opts.cwd ?? process.cwd();
  const packageDir = path.resolve(cwd, opts.dir ?? ".");
  const reporter = new Reporter(opts.format ?? "human", false, opts.writer);

  const loaded = await loadSetup({ env: opts.env, configDir: opts.configDir, schemaDir: opts.schemaDir });
  if (!loaded.ok) {
    reporter.diagnostic(loaded.error);
    return EXIT.INVALID_ARGS;
  }
  const { config, builtins, registry } = loaded.setup;

  const read = await readManifest(path.join(packageDir, config.manifest_file), registry);
  if (!read.ok) {
    reporter.diagnostic(read.error);
    return EXIT.PACKAGE_FAILED;
  }

  let manifest = read.manifest;
  const analyzed = manifest === null;
  if (!manifest) {
    const searchRoot = findSearchRoot(cwd, config.repository_root_marker, opts.root && path.resolve(cwd, opts.root));
    const { ctx } = await prepareContext({ searchRoot, config, builtins, registry });
    const result = await analyzePackage(packageDir, ctx);
    if (!result.ok) {
      reporter.diagnostic(result.error);
      return EXIT.PACKAGE_FAILED;
    }
    manifest = result.analysis.manifest;
  }

  reporter.event(
    { event: "info", dir: packageDir, analyzed, manifest },
    renderInfo(manifest, { packageDir, analyzed, intro: readmeIntro(packageDir) }).join("\n"),
  );
  return EXIT.SUCCESS;
}
