export type JsonRecord = Record<string, unknown>;

export function isPlainObject(val: unknown): val is JsonRecord {
  return val !== null && typeof val === "object" && !Array.isArray(val);
}

/** JSON text as written to disk: two-space indent, trailing newline. */
export function stringifyJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function stringField(obj: JsonRecord, key: string): string | undefined {
  const val = obj[key];
  return typeof val === "string" ? val : undefined;
}

export function stringList(val: unknown): string[] {
  return Array.isArray(val) ? val.filter((v): v is string => typeof v === "string") : [];
}
