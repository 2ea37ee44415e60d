/**
 * Drift detection
 *
 * Compares what a caller asked for with what a refresh read back and
 * names every field that no longer matches. Only fields the caller set
 * are compared; values the service fills in on its own are not drift.
 */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isScalar(value: unknown): boolean {
  return value === null || (typeof value !== "object" && typeof value !== "function");
}

function join(path: string, key: string | number): string {
  return path === "" ? String(key) : `${path}.${key}`;
}

/** Lists of scalars (ids, CIDRs) carry no order the service keeps. */
function sameMembers(desired: readonly unknown[], observed: readonly unknown[]): boolean {
  const remaining = [...observed];
  for (const value of desired) {
    const at = remaining.indexOf(value);
    if (at === -1) return false;
    remaining.splice(at, 1);
  }
  return remaining.length === 0;
}

/**
 * Returns the dotted paths (`clusterRegionInfo.0.numNodes`) at which
 * `observed` differs from `desired`. A `null` or `undefined` desired value
 * means "not set" and is skipped.
 */
export function detectDrift(desired: unknown, observed: unknown, path = ""): string[] {
  if (desired === undefined || desired === null) return [];

  if (Array.isArray(desired)) {
    if (!Array.isArray(observed) || observed.length !== desired.length) return [path];
    const wanted: unknown[] = desired;
    const actual: unknown[] = observed;
    if (wanted.every(isScalar)) return sameMembers(wanted, actual) ? [] : [path];
    return wanted.flatMap((item, index) => detectDrift(item, actual[index], join(path, index)));
  }

  if (isRecord(desired)) {
    if (!isRecord(observed)) return [path];
    const wanted = desired;
    const actual = observed;
    return Object.keys(wanted).flatMap((key) => detectDrift(wanted[key], actual[key], join(path, key)));
  }

  return desired === observed ? [] : [path];
}
