import fs from "node:fs";
import path from "node:path";
import { isPlainObject, stringField } from "./json.js";

const PACKAGE_JSON = path.resolve(path.dirname(new URL(import.meta.url).pathname), "../../package.json");

/** Version stamped into `_generatorVersion`: this tool's own package version. */
export function generatorVersion(): string {
  const parsed: unknown = JSON.parse(fs.readFileSync(PACKAGE_JSON, "utf8"));
  return (isPlainObject(parsed) ? stringField(parsed, "version") : undefined) ?? "0.0.0";
}
