import type { BuiltinTables } from "../types/config.js";
import type { Entity, EntityKind } from "../types/entity.js";

/** Matches entities supplied by the host application rather than any package. */
export class BuiltinCatalog {
  private readonly actionNamespaces: Set<string>;
  private readonly exact: Partial<Record<EntityKind, Set<string>>>;

  constructor(tables: BuiltinTables) {
    this.actionNamespaces = new Set(tables.action_namespaces);
    this.exact = {
      tag: new Set(tables.tags),
      mode: new Set(tables.modes),
      setting: new Set(tables.settings),
      capture: new Set(tables.captures),
      list: new Set(tables.lists),
    };
  }

  has(entity: Entity): boolean {
    if (entity.kind === "action") {
      return this.actionNamespaces.has(entity.name.split(".")[0]);
    }
    return this.exact[entity.kind]?.has(entity.name) ?? false;
  }
}
