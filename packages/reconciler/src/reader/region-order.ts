/**
 * Region ordering
 *
 * The service returns list sub-resources in its own order. Callers list
 * regions in theirs, and a reorder would read as drift. The translator
 * records each region's position; readers put fetched elements back by
 * region name.
 */

export type RegionIndex = ReadonlyMap<string, number>;

export function buildRegionIndex(regions: readonly string[]): RegionIndex {
  const index = new Map<string, number>();
  regions.forEach((region, position) => {
    if (!index.has(region)) index.set(region, position);
  });
  return index;
}

/**
 * Sorts `items` into the caller's order. Elements whose region is not in
 * `index` (added out-of-band) follow, in response order.
 */
export function restoreRegionOrder<T>(
  items: readonly T[],
  regionOf: (item: T) => string,
  index: RegionIndex,
): T[] {
  const known: Array<{ item: T; position: number }> = [];
  const unknown: T[] = [];
  for (const item of items) {
    const position = index.get(regionOf(item));
    if (position === undefined) {
      unknown.push(item);
    } else {
      known.push({ item, position });
    }
  }
  known.sort((a, b) => a.position - b.position);
  return [...known.map((entry) => entry.item), ...unknown];
}
