/**
 * Slot Model Tests
 * Arm synthesis, zone classification and slot pool construction
 */

import {
  generateDefaultArms,
  finalizeDeckGeometry,
  classifySlotZone,
  buildDeckSlots,
  buildSlotPool,
  resolveArmRanges
} from '../packages/utils/src/solver/slotModel';
import { DEFAULT_ARM_RANGES, DeckGeometry } from '../packages/utils/src/types';
import { fourSlotDeck, twoDeckAircraft } from './fixtures/loadFixtures';

describe('Default Arm Generation', () => {
  test('should return an empty sequence for zero or negative slot counts', () => {
    expect(generateDefaultArms(0, 18, 36)).toEqual([]);
    expect(generateDefaultArms(-2, 18, 36)).toEqual([]);
  });

  test('should place a single slot at the midpoint', () => {
    expect(generateDefaultArms(1, 18, 36)).toEqual([27]);
  });

  test('should interpolate linearly from fore to aft arm', () => {
    expect(generateDefaultArms(3, 10, 40)).toEqual([10, 25, 40]);
    expect(generateDefaultArms(5, 18, 36)).toEqual([18, 22.5, 27, 31.5, 36]);
  });

  test('should produce identical sequences for identical inputs', () => {
    expect(generateDefaultArms(7, 12, 28)).toEqual(generateDefaultArms(7, 12, 28));
  });
});

describe('Deck Geometry Finalization', () => {
  test('should synthesize arms when the count does not match the slots', () => {
    const deck: DeckGeometry = { slot_count: 3, row_length: 8, nose_slots: 0, tail_slots: 0, slot_arms: [1, 2] };
    const finalized = finalizeDeckGeometry(deck, { fore_arm: 12, aft_arm: 28 });

    expect(finalized.slot_arms).toEqual([12, 20, 28]);
    expect(deck.slot_arms).toEqual([1, 2]);
  });

  test('should keep explicit arms when they match the slot count', () => {
    const finalized = finalizeDeckGeometry(fourSlotDeck, DEFAULT_ARM_RANGES.main);

    expect(finalized.slot_arms).toEqual([10, 20, 30, 40]);
    expect(finalized.slot_arms).not.toBe(fourSlotDeck.slot_arms);
  });

  test('should fall back to default arm ranges unless overridden', () => {
    const ranges = resolveArmRanges({ main: { fore_arm: 0, aft_arm: 100 } });

    expect(ranges.main).toEqual({ fore_arm: 0, aft_arm: 100 });
    expect(ranges.lower).toEqual({ fore_arm: 12, aft_arm: 28 });
  });
});

describe('Slot Zone Classification', () => {
  test('should mark leading nose and trailing tail slots', () => {
    const zones = [0, 1, 2, 3].map(i => classifySlotZone(i, fourSlotDeck));
    expect(zones).toEqual(['NOSE', 'NORMAL', 'NORMAL', 'TAIL']);
  });

  test('should let nose win when nose and tail ranges overlap', () => {
    const tiny: DeckGeometry = { slot_count: 2, row_length: 8, nose_slots: 2, tail_slots: 2, slot_arms: [1, 2] };
    expect([0, 1].map(i => classifySlotZone(i, tiny))).toEqual(['NOSE', 'NOSE']);

    const short: DeckGeometry = { slot_count: 3, row_length: 8, nose_slots: 1, tail_slots: 3, slot_arms: [1, 2, 3] };
    expect([0, 1, 2].map(i => classifySlotZone(i, short))).toEqual(['NOSE', 'TAIL', 'TAIL']);
  });
});

describe('Slot Construction', () => {
  test('should build one empty slot per position with its arm and zone', () => {
    const slots = buildDeckSlots('main', fourSlotDeck);

    expect(slots).toHaveLength(4);
    expect(slots.map(s => s.index)).toEqual([0, 1, 2, 3]);
    expect(slots.map(s => s.arm)).toEqual([10, 20, 30, 40]);
    expect(slots[0]).toEqual({ deck: 'main', index: 0, arm: 10, zone: 'NOSE', occupancy: { status: 'EMPTY' } });
  });

  test('should refuse geometry whose arms were never finalized', () => {
    const deck: DeckGeometry = { slot_count: 2, row_length: 8, nose_slots: 0, tail_slots: 0, slot_arms: [] };
    expect(() => buildDeckSlots('lower', deck)).toThrow('lower deck has 0 arms for 2 slots');
  });

  test('should pool main slots ahead of lower slots without copying them', () => {
    const main = buildDeckSlots('main', twoDeckAircraft.main_deck);
    const lower = buildDeckSlots('lower', twoDeckAircraft.lower_deck);
    const pool = buildSlotPool(main, lower);

    expect(pool).toHaveLength(10);
    expect(pool[0]).toBe(main[0]);
    expect(pool[6]).toBe(lower[0]);
    expect(pool.map(s => s.deck)).toEqual([
      'main', 'main', 'main', 'main', 'main', 'main',
      'lower', 'lower', 'lower', 'lower'
    ]);
  });
});
