/**
 * ULD Load Planner - Data Types and Models
 *
 * Deck geometry, slots, ULD inputs and placement outcomes shared by the
 * catalog loaders, the placement engine and the report renderers.
 */

// ============================================================================
// DECKS AND SLOTS
// ============================================================================

export type DeckName = 'main' | 'lower';

export type SlotZone = 'NORMAL' | 'NOSE' | 'TAIL';

export interface DeckGeometry {
  slot_count: number;
  row_length: number;   // Cells per diagram row when centring
  nose_slots: number;
  tail_slots: number;
  slot_arms: number[];  // Front-to-back, one per slot once finalized
}

export interface ArmRange {
  fore_arm: number;
  aft_arm: number;
}

/**
 * Fore/aft arms used when a deck has no explicit arm per slot.
 */
export const DEFAULT_ARM_RANGES: Readonly<Record<DeckName, ArmRange>> = {
  main: { fore_arm: 18.0, aft_arm: 36.0 },
  lower: { fore_arm: 12.0, aft_arm: 28.0 }
};

export const DEFAULT_ROW_LENGTH = 8;

export type SlotOccupancy =
  | { status: 'EMPTY' }
  | { status: 'OCCUPIED'; uld_id: string; allocated_weight: number };

export interface Slot {
  deck: DeckName;
  index: number;        // Zero-based within its deck
  arm: number;
  zone: SlotZone;
  occupancy: SlotOccupancy;
}

// ============================================================================
// AIRCRAFT
// ============================================================================

export interface AircraftConfig {
  model: string;
  mtw: number;          // Carried through to the summary, never enforced
  main_deck: DeckGeometry;
  lower_deck: DeckGeometry;
}

export const CUSTOM_AIRCRAFT_MODEL = 'CUSTOM';

// ============================================================================
// ULD TYPES AND INPUT
// ============================================================================

export interface UldTypeEntry {
  prefix: string;
  uld_type: string;
  width_slots: number;
  deck: string;         // Free-text hint, informational
  notes: string;
}

export type DeckRestriction = 'MAIN' | 'LOWER' | 'ANY';

export interface UldInput {
  uld_id: string;
  weight_kg: number;
  deck: DeckRestriction;
  allow_special_slots: boolean;
}

// ============================================================================
// PLACEMENT
// ============================================================================

export type PlacementStrategy = 'FIRST_FIT' | 'CG_BALANCE';

export type AssignmentOutcome =
  | {
      status: 'PLACED';
      deck: DeckName;
      start_index: number;
      width_slots: number;
      slot_indices: number[];
    }
  | { status: 'UNASSIGNED' };

export interface UldAssignment {
  uld: UldInput;
  width_slots: number;
  outcome: AssignmentOutcome;
}

export interface LoadTotals {
  total_weight: number;
  total_moment: number;
}

export interface LoadSummary extends LoadTotals {
  cg_arm: number | null;
  mtw: number;
  mtw_used_percent: number | null;
  exceeds_mtw: boolean;
  placed_count: number;
  unassigned_count: number;
}

export interface DeckSlots {
  main: Slot[];
  lower: Slot[];
}

export interface LoadPlanResult {
  aircraft: AircraftConfig;
  strategy: PlacementStrategy;
  slots: DeckSlots;
  assignments: UldAssignment[];
  target_arm: number | null;
  summary: LoadSummary;
  warnings: string[];
}

// ============================================================================
// VALIDATION
// ============================================================================

export type FieldResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };
