/**
 * ULD Load Planner - Weight and Moment Accumulation
 *
 * Moment is distributed per slot: a ULD of weight W spread over w slots adds
 * (W / w) * arm for each slot it occupies.
 */

import { LoadSummary, LoadTotals, Slot } from '../types';

export const EMPTY_TOTALS: LoadTotals = { total_weight: 0, total_moment: 0 };

export function calculateRunMoment(run: readonly Slot[], weight: number): number {
  if (run.length === 0) return 0;
  const share = weight / run.length;
  return run.reduce((sum, slot) => sum + share * slot.arm, 0);
}

export function accumulatePlacement(
  totals: LoadTotals,
  run: readonly Slot[],
  weight: number
): LoadTotals {
  return {
    total_weight: totals.total_weight + weight,
    total_moment: totals.total_moment + calculateRunMoment(run, weight)
  };
}

export function calculateCgArm(totals: LoadTotals): number | null {
  return totals.total_weight > 0 ? totals.total_moment / totals.total_weight : null;
}

/**
 * Simple mean arm of every slot in the pool, occupied or not.
 */
export function meanSlotArm(slots: readonly Slot[]): number | null {
  if (slots.length === 0) return null;
  return slots.reduce((sum, slot) => sum + slot.arm, 0) / slots.length;
}

export function calculateLoadSummary(
  totals: LoadTotals,
  mtw: number,
  placedCount: number,
  unassignedCount: number
): LoadSummary {
  return {
    total_weight: totals.total_weight,
    total_moment: totals.total_moment,
    cg_arm: calculateCgArm(totals),
    mtw,
    mtw_used_percent: mtw > 0 ? (totals.total_weight / mtw) * 100 : null,
    exceeds_mtw: mtw > 0 && totals.total_weight > mtw,
    placed_count: placedCount,
    unassigned_count: unassignedCount
  };
}

export function getLoadStatusMessage(summary: LoadSummary): string {
  const cg = summary.cg_arm === null ? 'n/a' : summary.cg_arm.toFixed(2);
  const base = `Load ${summary.total_weight.toFixed(1)} kg, moment ${summary.total_moment.toFixed(1)}, CG arm ${cg}`;

  if (summary.mtw_used_percent === null) return base;
  if (summary.exceeds_mtw) {
    return `${base} - WARNING: exceeds MTW ${summary.mtw} kg (${summary.mtw_used_percent.toFixed(1)}%)`;
  }
  return `${base} - ${summary.mtw_used_percent.toFixed(1)}% of MTW ${summary.mtw} kg`;
}
