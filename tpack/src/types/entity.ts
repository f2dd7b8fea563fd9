/** Entity kinds a package can declare or reference. */
export type EntityKind = "app" | "tag" | "mode" | "scope" | "setting" | "capture" | "list" | "action";

/** Manifest section key for each kind, in the order sections are written. */
export const SECTION_KEYS = {
  app: "apps",
  tag: "tags",
  mode: "modes",
  scope: "scopes",
  setting: "settings",
  capture: "captures",
  list: "lists",
  action: "actions",
} as const satisfies Record<EntityKind, string>;

export type SectionKey = (typeof SECTION_KEYS)[EntityKind];

export const ENTITY_KINDS: EntityKind[] = ["app", "tag", "mode", "scope", "setting", "capture", "list", "action"];

/** `contributes` / `depends` shape: every section key present. */
export type EntitySections = Record<SectionKey, string[]>;

export type Entity = {
  kind: EntityKind;
  name: string;
};

export type Dialect = "python" | "talon" | "talon-list";

export type Requirement = "talonBeta" | "eyeTracker" | "parrot" | "gamepad" | "streamDeck" | "webcam";

export function emptySections(): EntitySections {
  return {
    apps: [],
    tags: [],
    modes: [],
    scopes: [],
    settings: [],
    captures: [],
    lists: [],
    actions: [],
  };
}

export function entityKey(entity: Entity): string {
  return `${entity.kind}:${entity.name}`;
}
