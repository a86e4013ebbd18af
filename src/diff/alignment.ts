/**
 * Alignment Engine
 *
 * Partitions the identifiers of an old and a new container into modified
 * (present in both), added (new only) and removed (old only), and maps each
 * identifier back to its position in the container it came from.
 *
 * Identifiers are compared with SameValueZero, as Map keys are. Within one
 * side they must be unique.
 */

import { ArgumentError } from '../errors.js';

export interface Alignment<I> {
  /** oldIds ∩ newIds, in old order */
  readonly modified: readonly I[];
  /** newIds − oldIds, in new order */
  readonly added: readonly I[];
  /** oldIds − newIds, in old order */
  readonly removed: readonly I[];
  /** identifier → 0-based position in the old container */
  readonly oldPositions: ReadonlyMap<I, number>;
  /** identifier → 0-based position in the new container */
  readonly newPositions: ReadonlyMap<I, number>;
}

/**
 * Default identifiers for a container of `length` elements: 1, 2, …, length.
 */
export function positionalIds(length: number): number[] {
  return Array.from({ length }, (_, index) => index + 1);
}

/**
 * Require one identifier per element.
 */
export function checkIdentifiers(ids: readonly unknown[], length: number, label: string): void {
  if (ids.length !== length) {
    throw new ArgumentError(
      `${label} has ${ids.length} identifiers for ${length} elements`,
    );
  }
}

/**
 * Map each identifier to its position. Duplicates are rejected since a
 * position map cannot represent them.
 */
export function indexPositions<I>(ids: readonly I[], label: string): Map<I, number> {
  const positions = new Map<I, number>();
  ids.forEach((id, position) => {
    if (positions.has(id)) {
      throw new ArgumentError(`${label} contains duplicate identifier ${String(id)}`);
    }
    positions.set(id, position);
  });
  return positions;
}

export function alignIdentifiers<I>(
  oldIds: readonly I[],
  newIds: readonly I[],
  labels: { old: string; new: string } = { old: 'oldIds', new: 'newIds' },
): Alignment<I> {
  const oldPositions = indexPositions(oldIds, labels.old);
  const newPositions = indexPositions(newIds, labels.new);

  const modified: I[] = [];
  const removed: I[] = [];
  for (const id of oldIds) {
    (newPositions.has(id) ? modified : removed).push(id);
  }
  const added = newIds.filter((id) => !oldPositions.has(id));

  return { modified, added, removed, oldPositions, newPositions };
}

/**
 * Positions of `ids` according to `positions`. Every id must be mapped.
 */
export function positionsOf<I>(ids: readonly I[], positions: ReadonlyMap<I, number>): number[] {
  return ids.map((id) => {
    const position = positions.get(id);
    if (position === undefined) {
      throw new ArgumentError(`Identifier ${String(id)} has no position`);
    }
    return position;
  });
}
