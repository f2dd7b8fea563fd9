import { ScanFacts } from "../facts.js";
import { scanRule, scanSettingsGet } from "../patterns.js";

const USER_NAME = "user\\.[a-z_][a-z0-9_]*";

const HEADER_PATTERNS = [
  { kind: "tag", re: new RegExp(`^\\s*(?:and\\s+|not\\s+)?tag:\\s+(${USER_NAME})`, "gm") },
  { kind: "app", re: /^\s*(?:and\s+|not\s+)?app:\s+([a-z_][a-z0-9_]*)/gm },
  { kind: "mode", re: /^\s*(?:and\s+|not\s+)?mode:\s+([a-z_][a-z0-9_.]*)/gm },
  { kind: "scope", re: new RegExp(`^\\s*(?:and\\s+|not\\s+)?scope:\\s+(${USER_NAME})`, "gm") },
  { kind: "setting", re: new RegExp(`^[ \\t]+(${USER_NAME})\\s*=`, "gm") },
] as const;

const HARDWARE = [
  { requirement: "gamepad", re: /\bgamepad\s*\(/ },
  { requirement: "streamDeck", re: /\bdeck\s*\(/ },
  { requirement: "parrot", re: /\bparrot\s*\(/ },
  { requirement: "webcam", re: /\bface\s*\(/ },
] as const;

const BETA_MARKERS = ["parrot(", "face(", "deck("];

export type TalonSections = {
  header: string;
  body: string;
};

/** Split on the first line that is only `-`. Without one the whole file is body. */
export function splitTalon(source: string): TalonSections {
  const lines = source.split(/\r?\n/);
  const separator = lines.findIndex((l) => l.trim() === "-");
  if (separator === -1) return { header: "", body: lines.join("\n") };
  return {
    header: lines.slice(0, separator).join("\n"),
    body: lines.slice(separator + 1).join("\n"),
  };
}

/** `user.x = value` lines indented under a `settings():` statement. */
function scanSettingsBlocks(body: string, facts: ScanFacts): void {
  let inBlock = false;
  for (const line of body.split("\n")) {
    if (/^settings\(\)\s*:/.test(line)) {
      inBlock = true;
      continue;
    }
    if (!inBlock || line.trim() === "") continue;
    if (!/^\s/.test(line)) {
      inBlock = false;
      continue;
    }
    const m = new RegExp(`^\\s+(${USER_NAME})\\s*=`).exec(line);
    if (m) facts.reference("setting", m[1]);
  }
}

/** Scan a `.talon` file. Everything it names is a reference; talon files declare nothing. */
export function scanTalon(source: string): ScanFacts {
  const facts = new ScanFacts();
  const { header, body } = splitTalon(source);

  for (const { kind, re } of HEADER_PATTERNS) {
    for (const m of header.matchAll(re)) facts.reference(kind, m[1]);
  }

  for (const m of body.matchAll(/\b(?:actions\.)?user\.([a-z_][a-z0-9_]*)\s*\(/g)) {
    facts.reference("action", `user.${m[1]}`);
  }
  scanRule(body, facts);
  scanSettingsGet(body, facts);
  for (const m of body.matchAll(new RegExp(`^tag\\(\\)\\s*:\\s*(${USER_NAME})`, "gm"))) {
    facts.reference("tag", m[1]);
  }
  scanSettingsBlocks(body, facts);

  for (const { requirement, re } of HARDWARE) {
    if (re.test(body)) facts.requires.add(requirement);
  }
  const lower = source.toLowerCase();
  if (BETA_MARKERS.some((marker) => lower.includes(marker))) facts.requires.add("talonBeta");

  return facts;
}

/**
 * Scan a `.talon-list` file: a `list: user.x` header line declares the list.
 * A file without one is reported as degraded.
 */
export function scanTalonList(source: string): ScanFacts {
  const facts = new ScanFacts();
  const { header, body } = splitTalon(source);
  const declaration = new RegExp(`^\\s*list:\\s*(${USER_NAME})\\s*$`, "m").exec(header || body);
  if (declaration) {
    facts.declare("list", declaration[1]);
  } else {
    facts.degraded = { line: 1, reason: "no 'list:' declaration" };
  }
  return facts;
}
