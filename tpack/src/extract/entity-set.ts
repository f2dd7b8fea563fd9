import { ENTITY_KINDS, SECTION_KEYS, emptySections, type Entity, type EntityKind, type EntitySections } from "../types/entity.js";

/** Names grouped by kind. Each kind keeps insertion order and drops duplicates. */
export class EntitySet {
  private readonly byKind = new Map<EntityKind, Set<string>>();

  constructor(entities: Iterable<Entity> = []) {
    for (const e of entities) this.add(e.kind, e.name);
  }

  add(kind: EntityKind, name: string): void {
    let names = this.byKind.get(kind);
    if (!names) {
      names = new Set();
      this.byKind.set(kind, names);
    }
    names.add(name);
  }

  addAll(other: EntitySet): void {
    for (const e of other.entities()) this.add(e.kind, e.name);
  }

  has(kind: EntityKind, name: string): boolean {
    return this.byKind.get(kind)?.has(name) ?? false;
  }

  /** True when `name` is present under any kind. */
  hasName(name: string): boolean {
    for (const names of this.byKind.values()) {
      if (names.has(name)) return true;
    }
    return false;
  }

  names(kind: EntityKind): string[] {
    return [...(this.byKind.get(kind) ?? [])];
  }

  get size(): number {
    let total = 0;
    for (const names of this.byKind.values()) total += names.size;
    return total;
  }

  *entities(): IterableIterator<Entity> {
    for (const kind of ENTITY_KINDS) {
      for (const name of this.byKind.get(kind) ?? []) yield { kind, name };
    }
  }

  /** Entities by kind, names sorted within each kind. */
  sorted(): Entity[] {
    const out: Entity[] = [];
    for (const kind of ENTITY_KINDS) {
      for (const name of this.names(kind).sort()) out.push({ kind, name });
    }
    return out;
  }

  /** Manifest sections with every key present and names sorted. */
  toSections(): EntitySections {
    const sections = emptySections();
    for (const kind of ENTITY_KINDS) {
      sections[SECTION_KEYS[kind]] = this.names(kind).sort();
    }
    return sections;
  }
}
