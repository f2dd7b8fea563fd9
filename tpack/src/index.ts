export type { Entity, EntityKind, EntitySections, Requirement, Dialect } from "./types/entity.js";
export type { Diagnostic, DiagnosticCode } from "./types/diagnostics.js";
export type { PackageManifest, StoredManifest, DependencyEntry, DependencyMap } from "./types/manifest.js";
export type { TpackConfig, BuiltinTables } from "./types/config.js";

export { EntitySet } from "./extract/entity-set.js";
export { extractPackage, type PackageScan, type FileScan } from "./extract/extractor.js";
export { scanPython } from "./extract/python/scanner.js";
export { scanTalon, scanTalonList } from "./extract/talon/scanner.js";
export { RepositoryIndex, buildIndex, findSearchRoot, type IndexEntry } from "./index/repository-index.js";
export { BuiltinCatalog } from "./resolve/builtins.js";
export { resolvePackage, type Resolution, type ResolveInput } from "./resolve/resolver.js";
export { mergeManifest, normalizeDependencies } from "./merge/merger.js";
export { analyzePackage, generateManifests, type PipelineResult, type PackageOutcome } from "./core/pipeline.js";
export { renderInstallBlock } from "./generators/install-block.js";
export { loadConfig, loadBuiltins } from "./config/loader.js";
export { validateConfig } from "./config/validator.js";
export { createRegistry, SchemaRegistry } from "./schema/registry.js";
export { CapabilityRegistry, ActionNotDeclaredError, type Capability } from "./runtime/capabilities.js";
export { VersionState } from "./runtime/version-state.js";
export { checkDependencies, runStartupCheck, manifestVersionAction } from "./runtime/dependency-check.js";
