import type { Diagnostic } from "../types/diagnostics.js";

export type OutputFormat = "human" | "jsonl";

/** Line sinks for normal output and for problems. */
export type Writer = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const processWriter: Writer = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

export function isOutputFormat(value: string): value is OutputFormat {
  return value === "human" || value === "jsonl";
}

export function formatDiagnostic(d: Diagnostic): string {
  const where = d.path ? ` (${d.path})` : "";
  return `${d.level.toUpperCase()} ${d.code}: ${d.message}${where}`;
}

/**
 * Renders diagnostics and events in the selected format. Info-level
 * diagnostics are only shown when verbose.
 */
export class Reporter {
  constructor(
    readonly format: OutputFormat,
    private readonly verbose: boolean,
    private readonly writer: Writer = processWriter,
  ) {}

  diagnostic(d: Diagnostic): void {
    if (d.level === "info" && !this.verbose) return;
    if (this.format === "jsonl") {
      this.writer.out(JSON.stringify(d));
    } else if (d.level === "info") {
      this.writer.out(formatDiagnostic(d));
    } else {
      this.writer.err(formatDiagnostic(d));
    }
  }

  diagnostics(list: readonly Diagnostic[]): void {
    for (const d of list) this.diagnostic(d);
  }

  /** A structured event: one JSON line, or `human` text when given. */
  event(record: Record<string, unknown>, human?: string): void {
    if (this.format === "jsonl") this.writer.out(JSON.stringify(record));
    else if (human !== undefined) this.writer.out(human);
  }

  /** Free text, only in human format. */
  text(line: string): void {
    if (this.format === "human") this.writer.out(line);
  }
}
