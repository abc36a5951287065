/**
 * ULD Load Planner - Placement Engine
 *
 * Greedy slot assignment over a pooled sequence of main and lower deck slots.
 * ULDs are processed strictly in input order; once a slot is occupied it stays
 * occupied for the rest of the run and earlier decisions are never revisited.
 *
 * Two selection policies exist and exactly one is used per run:
 * - FIRST_FIT: the earliest contiguous run in pool order
 * - CG_BALANCE: the run whose resulting CG arm lands closest to the mean
 *   arm of all slots in the pool
 *
 * Main and lower decks keep separate index spaces, so a run never spans the
 * deck boundary even though both decks share one pool.
 */

import {
  LoadTotals,
  PlacementStrategy,
  Slot,
  UldAssignment,
  UldInput,
  UldTypeEntry
} from '../types';
import { resolveUldWidth } from './uldWidth';
import {
  EMPTY_TOTALS,
  accumulatePlacement,
  calculateRunMoment,
  meanSlotArm
} from './loadBalance';

export interface PlacementOptions {
  strategy?: PlacementStrategy;
}

export interface PlacementResult {
  assignments: UldAssignment[];
  totals: LoadTotals;
  target_arm: number | null;
}

// ============================================================================
// CANDIDATES AND RUNS
// ============================================================================

export function isSlotEligible(slot: Slot, uld: UldInput): boolean {
  if (slot.occupancy.status !== 'EMPTY') return false;
  if (!uld.allow_special_slots && (slot.zone === 'NOSE' || slot.zone === 'TAIL')) return false;
  if (uld.deck === 'MAIN' && slot.deck !== 'main') return false;
  if (uld.deck === 'LOWER' && slot.deck !== 'lower') return false;
  return true;
}

/**
 * Eligible slots in pool order. The result references the pool's own slot
 * objects.
 */
export function findCandidateSlots(pool: readonly Slot[], uld: UldInput): Slot[] {
  return pool.filter(slot => isSlotEligible(slot, uld));
}

function isRunAt(candidates: readonly Slot[], start: number, width: number): boolean {
  const first = candidates[start];
  for (let k = 1; k < width; k++) {
    const prev = candidates[start + k - 1];
    const next = candidates[start + k];
    if (next.deck !== first.deck || next.index !== prev.index + 1) return false;
  }
  return true;
}

export function findFirstContiguousRun(candidates: readonly Slot[], width: number): Slot[] | null {
  if (width < 1) return null;
  for (let i = 0; i <= candidates.length - width; i++) {
    if (isRunAt(candidates, i, width)) {
      return candidates.slice(i, i + width);
    }
  }
  return null;
}

export function findContiguousRuns(candidates: readonly Slot[], width: number): Slot[][] {
  const runs: Slot[][] = [];
  if (width < 1) return runs;
  for (let i = 0; i <= candidates.length - width; i++) {
    if (isRunAt(candidates, i, width)) {
      runs.push(candidates.slice(i, i + width));
    }
  }
  return runs;
}

// ============================================================================
// CG-DRIVEN SELECTION
// ============================================================================

export function scoreRunBalance(
  run: readonly Slot[],
  weight: number,
  totals: LoadTotals,
  targetArm: number
): number {
  const newWeight = totals.total_weight + weight;
  const newCg = newWeight > 0
    ? (totals.total_moment + calculateRunMoment(run, weight)) / newWeight
    : run.reduce((sum, slot) => sum + slot.arm, 0) / run.length;
  return Math.abs(newCg - targetArm);
}

/**
 * Lowest deviation wins; ties keep the earliest run.
 */
export function selectBalancedRun(
  runs: readonly Slot[][],
  weight: number,
  totals: LoadTotals,
  targetArm: number
): Slot[] | null {
  let best: Slot[] | null = null;
  let bestScore = Number.POSITIVE_INFINITY;

  for (const run of runs) {
    const score = scoreRunBalance(run, weight, totals, targetArm);
    if (score < bestScore) {
      bestScore = score;
      best = run;
    }
  }
  return best;
}

// ============================================================================
// OCCUPANCY
// ============================================================================

export function occupyRun(run: readonly Slot[], uld: UldInput): void {
  const share = uld.weight_kg / run.length;
  for (const slot of run) {
    if (slot.occupancy.status !== 'EMPTY') {
      throw new Error(`Slot ${slot.deck}[${slot.index + 1}] is already occupied by ${slot.occupancy.uld_id}`);
    }
    slot.occupancy = { status: 'OCCUPIED', uld_id: uld.uld_id, allocated_weight: share };
  }
}

// ============================================================================
// MAIN PLACEMENT LOOP
// ============================================================================

export function placeUlds(
  pool: Slot[],
  ulds: readonly UldInput[],
  uldCatalog: readonly UldTypeEntry[],
  options: PlacementOptions = {}
): PlacementResult {
  const strategy = options.strategy ?? 'FIRST_FIT';
  const targetArm = meanSlotArm(pool);
  const assignments: UldAssignment[] = [];
  let totals: LoadTotals = { ...EMPTY_TOTALS };

  for (const uld of ulds) {
    const width = resolveUldWidth(uld.uld_id, uldCatalog);
    const candidates = findCandidateSlots(pool, uld);

    let run: Slot[] | null;
    if (strategy === 'CG_BALANCE' && targetArm !== null) {
      run = selectBalancedRun(findContiguousRuns(candidates, width), uld.weight_kg, totals, targetArm);
    } else {
      run = findFirstContiguousRun(candidates, width);
    }

    if (!run) {
      assignments.push({ uld, width_slots: width, outcome: { status: 'UNASSIGNED' } });
      continue;
    }

    occupyRun(run, uld);
    totals = accumulatePlacement(totals, run, uld.weight_kg);
    assignments.push({
      uld,
      width_slots: width,
      outcome: {
        status: 'PLACED',
        deck: run[0].deck,
        start_index: run[0].index,
        width_slots: width,
        slot_indices: run.map(slot => slot.index)
      }
    });
  }

  return { assignments, totals, target_arm: targetArm };
}
