import type { EntityKind, Requirement } from "../types/entity.js";
import { EntitySet } from "./entity-set.js";

/** What a single source file contributes to a package scan. */
export class ScanFacts {
  readonly declared = new EntitySet();
  readonly referenced = new EntitySet();
  readonly requires = new Set<Requirement>();
  /** Set when structured parsing failed and only a textual scan ran. */
  degraded: { line: number; reason: string } | null = null;

  /** @param actionNamespaces heads under which an action use counts as a dependency */
  constructor(private readonly actionNamespaces: readonly string[] = []) {}

  declare(kind: EntityKind, name: string): void {
    if (name) this.declared.add(kind, name);
  }

  reference(kind: EntityKind, name: string): void {
    if (name) this.referenced.add(kind, name);
  }

  /**
   * Record an `actions.<ns>.<name>` use. Only configured namespaces become
   * references; eye-tracker actions imply the hardware either way.
   */
  useAction(name: string): void {
    if (this.actionNamespaces.includes(name.split(".")[0])) this.reference("action", name);
    if (name.startsWith("tracking.")) this.requires.add("eyeTracker");
  }
}
