import semver from "semver";

export function isVersion(value: unknown): value is string {
  return typeof value === "string" && semver.valid(value) !== null;
}

/**
 * The higher of two versions. An invalid version loses to a valid one; when
 * neither parses, `current` is kept unchanged.
 */
export function maxVersion(current: string, candidate: string): string {
  const currentOk = isVersion(current);
  const candidateOk = isVersion(candidate);
  if (currentOk && candidateOk) return semver.gt(candidate, current) ? candidate : current;
  if (candidateOk) return candidate;
  return current;
}

/** A recorded minimum version only ever moves up. */
export function ratchet(recorded: string | undefined, resolved: string): string {
  return recorded === undefined ? resolved : maxVersion(recorded, resolved);
}
