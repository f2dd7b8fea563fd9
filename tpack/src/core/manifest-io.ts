import fs from "node:fs";
import type { SchemaRegistry } from "../schema/registry.js";
import type { StoredManifest } from "../types/manifest.js";
import { diag, type Diagnostic } from "../types/diagnostics.js";
import { errorMessage } from "./errors.js";
import { isPlainObject } from "./json.js";

export type ReadManifestResult =
  | { ok: true; manifest: StoredManifest | null; raw: string | null }
  | { ok: false; error: Diagnostic };

/**
 * Read and schema-check the manifest at `manifestPath`. A missing file is not
 * an error (`manifest: null`); unreadable JSON or a schema failure is
 * CORRUPT_MANIFEST, any other read failure IO_FAILURE.
 */
export async function readManifest(manifestPath: string, registry: SchemaRegistry): Promise<ReadManifestResult> {
  let raw: string;
  try {
    raw = fs.readFileSync(manifestPath, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return { ok: true, manifest: null, raw: null };
    }
    return { ok: false, error: diag("error", "IO_FAILURE", `cannot read manifest: ${errorMessage(err)}`, { path: manifestPath }) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: diag("error", "CORRUPT_MANIFEST", `manifest is not valid JSON: ${errorMessage(err)}`, { path: manifestPath }) };
  }

  const check = await registry.validate("manifest", parsed);
  if (!check.valid || !isPlainObject(parsed)) {
    return {
      ok: false,
      error: diag("error", "CORRUPT_MANIFEST", `manifest fails schema: ${check.errors ?? "not an object"}`, { path: manifestPath }),
    };
  }

  return { ok: true, manifest: parsed, raw };
}
