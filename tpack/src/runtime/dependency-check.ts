import fs from "node:fs";
import semver from "semver";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import type { StoredManifest } from "../types/manifest.js";
import { errorMessage } from "../core/errors.js";
import { isPlainObject, stringField } from "../core/json.js";
import { normalizeDependencies } from "../merge/merger.js";
import { versionActionName } from "../policy/namespace.js";
import { ActionNotDeclaredError, type Capability, type CapabilityRegistry } from "./capabilities.js";
import { VersionState } from "./version-state.js";

export type DependencyProblem = {
  package: string;
  action: string;
  required: string;
  found: string | null;
  reason: "not-installed" | "outdated" | "bad-version";
};

export type DependencyCheckResult =
  | { ok: true; checked: string[]; skipped: boolean }
  | { ok: false; problems: DependencyProblem[] };

/**
 * Verify each runtime dependency is installed at its minimum version by
 * calling its `<namespace>_version` action. `devDependencies` are never
 * checked; nothing is checked when `validateDependencies` is false.
 */
export function checkDependencies(manifest: StoredManifest, registry: CapabilityRegistry): DependencyCheckResult {
  if (manifest.validateDependencies === false) return { ok: true, checked: [], skipped: true };

  const dependencies = normalizeDependencies(manifest.dependencies);
  const problems: DependencyProblem[] = [];
  const checked: string[] = [];

  for (const [name, dep] of Object.entries(dependencies)) {
    const action = versionActionName(dep.namespace);
    checked.push(name);

    let reported: unknown;
    try {
      reported = registry.lookup(action)();
    } catch (err) {
      if (!(err instanceof ActionNotDeclaredError)) throw err;
      problems.push({ package: name, action, required: dep.min_version, found: null, reason: "not-installed" });
      continue;
    }

    const found = typeof reported === "string" ? reported : isPlainObject(reported) ? stringField(reported, "version") ?? null : null;
    if (found === null || !semver.valid(found)) {
      problems.push({ package: name, action, required: dep.min_version, found, reason: "bad-version" });
    } else if (semver.valid(dep.min_version) && semver.lt(found, dep.min_version)) {
      problems.push({ package: name, action, required: dep.min_version, found, reason: "outdated" });
    }
  }

  return problems.length > 0 ? { ok: false, problems } : { ok: true, checked, skipped: false };
}

function describeProblem(p: DependencyProblem): string {
  switch (p.reason) {
    case "not-installed":
      return `${p.package} is not installed (requires ${p.required}+)`;
    case "outdated":
      return `${p.package} ${p.found ?? "?"} is older than the required ${p.required}`;
    case "bad-version":
      return `${p.package} reported an unusable version ${JSON.stringify(p.found)}`;
  }
}

/**
 * Startup form of `checkDependencies`: problems and unexpected failures go to
 * `report` and the call returns whether the dependencies are satisfied.
 */
export function runStartupCheck(manifest: StoredManifest, registry: CapabilityRegistry, report: (d: Diagnostic) => void): boolean {
  const name = stringField(manifest, "name") ?? "package";
  try {
    const result = checkDependencies(manifest, registry);
    if (result.ok) return true;
    for (const problem of result.problems) {
      report(diag("warn", "DEPENDENCY_UNSATISFIED", `${name}: ${describeProblem(problem)}`, { details: { ...problem } }));
    }
    return false;
  } catch (err) {
    report(diag("error", "DEPENDENCY_UNSATISFIED", `${name}: dependency check failed: ${errorMessage(err)}`));
    return false;
  }
}

/**
 * The version action a package registers for others to check against. The
 * manifest is read once, on first call, until the state is reset.
 */
export function manifestVersionAction(manifestPath: string): { action: Capability; state: VersionState<string> } {
  const state = new VersionState(() => {
    const parsed: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
    return (isPlainObject(parsed) ? stringField(parsed, "version") : undefined) ?? "0.0.0";
  });
  return { action: () => state.get(), state };
}
