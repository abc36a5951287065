/**
 * ULD Load Planner - Load Plan Orchestration
 *
 * Finalizes deck geometry, builds the slot pool and runs the placement engine
 * for one aircraft and one ULD list.
 */

import {
  AircraftConfig,
  ArmRange,
  DeckName,
  LoadPlanResult,
  PlacementStrategy,
  UldInput,
  UldTypeEntry
} from '../types';
import {
  buildDeckSlots,
  buildSlotPool,
  finalizeDeckGeometry,
  resolveArmRanges
} from './slotModel';
import { placeUlds } from './placementEngine';
import { calculateLoadSummary } from './loadBalance';

export interface LoadPlanOptions {
  strategy?: PlacementStrategy;
  armRanges?: Partial<Record<DeckName, ArmRange>>;
}

export function finalizeAircraft(
  aircraft: AircraftConfig,
  armRanges: Partial<Record<DeckName, ArmRange>> = {}
): AircraftConfig {
  const ranges = resolveArmRanges(armRanges);
  return {
    ...aircraft,
    main_deck: finalizeDeckGeometry(aircraft.main_deck, ranges.main),
    lower_deck: finalizeDeckGeometry(aircraft.lower_deck, ranges.lower)
  };
}

export function planLoad(
  aircraft: AircraftConfig,
  ulds: readonly UldInput[],
  uldCatalog: readonly UldTypeEntry[],
  options: LoadPlanOptions = {}
): LoadPlanResult {
  const strategy = options.strategy ?? 'FIRST_FIT';
  const warnings: string[] = [];
  const finalized = finalizeAircraft(aircraft, options.armRanges);

  const mainSlots = buildDeckSlots('main', finalized.main_deck);
  const lowerSlots = buildDeckSlots('lower', finalized.lower_deck);
  const pool = buildSlotPool(mainSlots, lowerSlots);

  if (pool.length === 0 && ulds.length > 0) {
    warnings.push(`Aircraft ${finalized.model} has no cargo slots; all ULDs remain unassigned`);
  }

  const placement = placeUlds(pool, ulds, uldCatalog, { strategy });

  const unassigned = placement.assignments.filter(a => a.outcome.status === 'UNASSIGNED');
  const placedCount = placement.assignments.length - unassigned.length;
  const summary = calculateLoadSummary(
    placement.totals,
    finalized.mtw,
    placedCount,
    unassigned.length
  );

  if (unassigned.length > 0) {
    warnings.push(
      `${unassigned.length} ULD(s) could not be placed: ${unassigned.map(a => a.uld.uld_id).join(', ')}`
    );
  }
  if (summary.exceeds_mtw) {
    warnings.push(`Placed weight ${summary.total_weight} kg exceeds MTW ${summary.mtw} kg`);
  }

  return {
    aircraft: finalized,
    strategy,
    slots: { main: mainSlots, lower: lowerSlots },
    assignments: placement.assignments,
    target_arm: placement.target_arm,
    summary,
    warnings
  };
}
