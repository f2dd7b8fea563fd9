/** Finding codes reported by extraction, indexing, resolution and the pipeline. */
export type DiagnosticCode =
  | "PARSE_DEGRADED"
  | "UNRESOLVED_REFERENCE"
  | "AMBIGUOUS_REFERENCE"
  | "NAMESPACE_INCONSISTENCY"
  | "VERSION_ACTION_MISSING"
  | "INDEX_MANIFEST_SKIPPED"
  | "CORRUPT_MANIFEST"
  | "IO_FAILURE"
  | "CONFIG_INVALID"
  | "DEPENDENCY_UNSATISFIED";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: DiagnosticCode;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: Diagnostic["level"],
  code: DiagnosticCode,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}
