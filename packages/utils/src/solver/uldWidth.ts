/**
 * ULD Load Planner - ULD Width Resolver
 *
 * Maps a ULD identifier to the number of consecutive slots it occupies by
 * prefix match against the ULD-type catalog.
 */

import { UldTypeEntry } from '../types';

export const DEFAULT_ULD_WIDTH = 1;

/**
 * First catalog entry (in stored order) whose prefix starts the ULD ID.
 */
export function findUldTypeEntry(
  uldId: string,
  catalog: readonly UldTypeEntry[]
): UldTypeEntry | null {
  for (const entry of catalog) {
    if (uldId.startsWith(entry.prefix)) return entry;
  }
  return null;
}

export function resolveUldWidth(uldId: string, catalog: readonly UldTypeEntry[]): number {
  const entry = findUldTypeEntry(uldId, catalog);
  if (!entry) return DEFAULT_ULD_WIDTH;

  const width = Math.floor(entry.width_slots);
  return Number.isFinite(width) && width >= 1 ? width : DEFAULT_ULD_WIDTH;
}
