import path from "node:path";
import type { DependencyMap, StoredManifest } from "../types/manifest.js";
import { stringField } from "../core/json.js";
import { normalizeDependencies } from "../merge/merger.js";

function dependencyLines(deps: DependencyMap): string[] {
  const lines: string[] = [];
  for (const [name, dep] of Object.entries(deps)) {
    lines.push(`- **${name}** (v${dep.min_version}+)`);
    if (dep.github) {
      lines.push("  ```sh", `  git clone ${dep.github}`, "  ```");
    }
  }
  return lines;
}

/**
 * Markdown installation instructions for a package README, built from its
 * manifest: clone commands for the package and each of its dependencies.
 */
export function renderInstallBlock(manifest: StoredManifest, packageDir: string): string {
  const github = stringField(manifest, "github") ?? "";
  const dependencies = normalizeDependencies(manifest.dependencies);
  const devDependencies = normalizeDependencies(manifest.devDependencies);
  const hasDeps = Object.keys(dependencies).length > 0;
  const hasDevDeps = Object.keys(devDependencies).length > 0;

  const lines = [
    "## Installation",
    "",
    "Clone this repository into your Talon user directory:",
    "",
    "```sh",
    "# mac and linux",
    "cd ~/.talon/user",
    "",
    "# windows",
    "cd ~/AppData/Roaming/talon/user",
    "",
    github ? `git clone ${github}` : `git clone <github_url>  # add github to ${path.basename(packageDir)}/manifest.json`,
    "```",
  ];

  if (hasDeps) {
    lines.push("", "### Dependencies", "", "This package requires the following dependencies:", "", ...dependencyLines(dependencies));
  }
  if (hasDevDeps) {
    lines.push(
      "",
      "### Development Dependencies",
      "",
      "Optional dependencies for development and testing:",
      "",
      ...dependencyLines(devDependencies),
    );
  }
  if (hasDeps || hasDevDeps) {
    lines.push("", "> **Note**: Review code from unfamiliar sources before installing.", "> Restart Talon after installing dependencies.");
  }

  return `${lines.join("\n")}\n`;
}
