/**
 * ULD Load Planner - Slot Model Builder
 *
 * Expands deck geometry into concrete, front-to-back slot sequences with a
 * moment arm and a zone classification per slot.
 */

import {
  ArmRange,
  DeckGeometry,
  DeckName,
  Slot,
  SlotZone,
  DEFAULT_ARM_RANGES
} from '../types';

// ============================================================================
// ARM SYNTHESIS
// ============================================================================

/**
 * Linear interpolation between fore and aft arm. A single slot sits at the
 * midpoint.
 */
export function generateDefaultArms(
  n: number,
  foreArm: number = 10.0,
  aftArm: number = 40.0
): number[] {
  const arms: number[] = [];
  if (n <= 0) return arms;
  if (n === 1) return [(foreArm + aftArm) / 2];

  for (let i = 0; i < n; i++) {
    const t = i / (n - 1);
    arms.push(foreArm * (1 - t) + aftArm * t);
  }
  return arms;
}

export function finalizeDeckGeometry(deck: DeckGeometry, armRange: ArmRange): DeckGeometry {
  if (deck.slot_arms.length === deck.slot_count) {
    return { ...deck, slot_arms: [...deck.slot_arms] };
  }
  return {
    ...deck,
    slot_arms: generateDefaultArms(deck.slot_count, armRange.fore_arm, armRange.aft_arm)
  };
}

// ============================================================================
// ZONES AND SLOTS
// ============================================================================

// Nose wins when the nose and tail ranges overlap on very short decks
export function classifySlotZone(index: number, deck: DeckGeometry): SlotZone {
  if (index < deck.nose_slots) return 'NOSE';
  if (index >= deck.slot_count - deck.tail_slots) return 'TAIL';
  return 'NORMAL';
}

export function buildDeckSlots(deckName: DeckName, deck: DeckGeometry): Slot[] {
  if (deck.slot_arms.length !== deck.slot_count) {
    throw new Error(
      `${deckName} deck has ${deck.slot_arms.length} arms for ${deck.slot_count} slots; finalize the geometry first`
    );
  }

  const slots: Slot[] = [];
  for (let i = 0; i < deck.slot_count; i++) {
    slots.push({
      deck: deckName,
      index: i,
      arm: deck.slot_arms[i],
      zone: classifySlotZone(i, deck),
      occupancy: { status: 'EMPTY' }
    });
  }
  return slots;
}

/**
 * Main deck slots followed by lower deck slots, each front-to-back. The
 * returned array holds the same slot objects, not copies.
 */
export function buildSlotPool(mainSlots: Slot[], lowerSlots: Slot[]): Slot[] {
  return [...mainSlots, ...lowerSlots];
}

export function emptyDeckGeometry(rowLength: number = 8): DeckGeometry {
  return {
    slot_count: 0,
    row_length: rowLength,
    nose_slots: 0,
    tail_slots: 0,
    slot_arms: []
  };
}

export function resolveArmRanges(
  overrides: Partial<Record<DeckName, ArmRange>> = {}
): Record<DeckName, ArmRange> {
  return {
    main: overrides.main ?? DEFAULT_ARM_RANGES.main,
    lower: overrides.lower ?? DEFAULT_ARM_RANGES.lower
  };
}
