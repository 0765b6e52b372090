import type { FindRecord, ObjectView, Visibility, WorldObject } from '../types.js';

/**
 * Collected/uncollected status of one object for one viewer.
 *
 * `finds` are the object's ledger rows in insertion order.
 *
 * - Single-find objects are collected for every viewer as soon as any row
 *   exists; the earliest row names the finder.
 * - Multifindable objects are collected only for a viewer who has a row of
 *   their own. Without a viewer (global view) they stay uncollected.
 */
export function resolveVisibility(
  object: Pick<WorldObject, 'multifindable'>,
  finds: readonly FindRecord[],
  viewer?: string,
): Visibility {
  const findCount = finds.length;

  if (!object.multifindable) {
    const first = finds[0];
    return first
      ? { collected: true, foundBy: first.foundBy, foundAt: first.foundAt, findCount }
      : { collected: false, foundBy: null, foundAt: null, findCount };
  }

  const own = viewer ? finds.find((f) => f.foundBy === viewer) : undefined;
  return own
    ? { collected: true, foundBy: own.foundBy, foundAt: own.foundAt, findCount }
    : { collected: false, foundBy: null, foundAt: null, findCount };
}

export function groupFindsByObject(rows: readonly FindRecord[]): Map<string, FindRecord[]> {
  const grouped = new Map<string, FindRecord[]>();
  for (const row of rows) {
    const list = grouped.get(row.objectId);
    if (list) {
      list.push(row);
    } else {
      grouped.set(row.objectId, [row]);
    }
  }
  return grouped;
}

/** Attach visibility to each object and drop the collected ones unless asked to keep them. */
export function applyVisibility(
  objects: readonly WorldObject[],
  findsByObject: ReadonlyMap<string, readonly FindRecord[]>,
  options: { viewer?: string; includeFound?: boolean } = {},
): ObjectView[] {
  const views: ObjectView[] = [];
  for (const object of objects) {
    const visibility = resolveVisibility(object, findsByObject.get(object.id) ?? [], options.viewer);
    if (visibility.collected && !options.includeFound) continue;
    views.push({ ...object, ...visibility });
  }
  return views;
}
