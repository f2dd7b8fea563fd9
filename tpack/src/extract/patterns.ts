import type { ScanFacts } from "./facts.js";

/** `<user.x>` captures and `{user.x}` lists inside a voice-command rule. */
export function scanRule(text: string, facts: ScanFacts): void {
  for (const m of text.matchAll(/<(user\.[a-z_][a-z0-9_]*)>/g)) facts.reference("capture", m[1]);
  for (const m of text.matchAll(/\{(user\.[a-z_][a-z0-9_]*)\}/g)) facts.reference("list", m[1]);
}

/**
 * `mode:` and `tag:` requirements in a context-match string. `app:` lines
 * name host applications, which no package declares.
 */
export function scanMatches(text: string, facts: ScanFacts): void {
  for (const m of text.matchAll(/\b(mode|tag):\s*([\w.]+)/g)) facts.reference(m[1] === "mode" ? "mode" : "tag", m[2]);
}

/** `settings.get("name")` reads. */
export function scanSettingsGet(text: string, facts: ScanFacts): void {
  for (const m of text.matchAll(/\bsettings\.get\s*\(\s*["']([^"']+)["']/g)) facts.reference("setting", m[1]);
}

/**
 * Reference-only scan of Python text that failed to tokenize. Declarations
 * need structure and are not attempted here.
 */
export function scanPythonText(text: string, facts: ScanFacts): void {
  for (const m of text.matchAll(/\bactions\.([A-Za-z_]\w*)\.([A-Za-z_]\w*)/g)) facts.useAction(`${m[1]}.${m[2]}`);
  scanSettingsGet(text, facts);
  for (const m of text.matchAll(/\.lists\[\s*["']([\w.]+)["']\s*\]/g)) facts.reference("list", m[1]);
  for (const m of text.matchAll(/\.tags\s*=\s*\[([^\]]*)\]/g)) {
    for (const tag of m[1].matchAll(/["']([\w.]+)["']/g)) facts.reference("tag", tag[1]);
  }
}
