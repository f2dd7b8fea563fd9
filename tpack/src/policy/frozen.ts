import { isPlainObject, type JsonRecord } from "../core/json.js";

export type PathLookup = { found: true; value: unknown } | { found: false };

function segments(fieldPath: string): string[] {
  return fieldPath.split(".").filter((s) => s.length > 0);
}

export function getPath(obj: JsonRecord, fieldPath: string): PathLookup {
  let node: unknown = obj;
  for (const key of segments(fieldPath)) {
    if (!isPlainObject(node) || !Object.hasOwn(node, key)) return { found: false };
    node = node[key];
  }
  return { found: true, value: node };
}

/** Set a value, creating (or replacing non-object) intermediate nodes. */
export function setPath(obj: JsonRecord, fieldPath: string, value: unknown): void {
  const keys = segments(fieldPath);
  const last = keys.pop();
  if (last === undefined) return;
  let node = obj;
  for (const key of keys) {
    const next = node[key];
    if (isPlainObject(next)) {
      node = next;
    } else {
      const created: JsonRecord = {};
      node[key] = created;
      node = created;
    }
  }
  node[last] = value;
}

export function deletePath(obj: JsonRecord, fieldPath: string): void {
  const keys = segments(fieldPath);
  const last = keys.pop();
  if (last === undefined) return;
  let node: unknown = obj;
  for (const key of keys) {
    if (!isPlainObject(node)) return;
    node = node[key];
  }
  if (isPlainObject(node)) delete node[last];
}

/**
 * Restore every frozen path of `next` to what `previous` held: the previous
 * value when it had one, otherwise no value at all.
 */
export function applyFrozenFields(next: JsonRecord, previous: JsonRecord, frozen: readonly string[]): void {
  for (const fieldPath of frozen) {
    const prior = getPath(previous, fieldPath);
    if (prior.found) setPath(next, fieldPath, structuredClone(prior.value));
    else deletePath(next, fieldPath);
  }
}
