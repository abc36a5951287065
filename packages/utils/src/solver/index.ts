/**
 * @uld-planner/utils - Solver Module
 * 
 * Slot model construction, ULD width lookup, placement and load balance.
 */

export {
  generateDefaultArms,
  finalizeDeckGeometry,
  classifySlotZone,
  buildDeckSlots,
  buildSlotPool,
  emptyDeckGeometry,
  resolveArmRanges
} from './slotModel';

export {
  DEFAULT_ULD_WIDTH,
  findUldTypeEntry,
  resolveUldWidth
} from './uldWidth';

export {
  isSlotEligible,
  findCandidateSlots,
  findFirstContiguousRun,
  findContiguousRuns,
  scoreRunBalance,
  selectBalancedRun,
  occupyRun,
  placeUlds,
  type PlacementOptions,
  type PlacementResult
} from './placementEngine';

export * from './loadBalance';

export {
  finalizeAircraft,
  planLoad,
  type LoadPlanOptions
} from './loadPlanner';
