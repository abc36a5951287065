/**
 * ULD Input Parser Tests
 * Field validation and CSV batch input
 */

import {
  validateUldId,
  validateWeight,
  validateSlotCount,
  parseDeckRestriction,
  parseSpecialSlotPermission,
  parseUldCsv
} from '../packages/utils/src/parser/uldInputParser';

describe('Field Validation', () => {
  test('should trim ULD IDs and reject empty ones', () => {
    expect(validateUldId('  AKE123 ')).toEqual({ valid: true, value: 'AKE123' });
    expect(validateUldId('   ')).toEqual({ valid: false, error: 'ULD ID must not be empty' });
  });

  test('should accept non-negative decimal weights', () => {
    expect(validateWeight('1250.5')).toEqual({ valid: true, value: 1250.5 });
    expect(validateWeight(' 0 ')).toEqual({ valid: true, value: 0 });
  });

  test('should reject weights that are not numbers or are negative', () => {
    expect(validateWeight('heavy')).toEqual({ valid: false, error: 'Enter a number.' });
    expect(validateWeight('12kg')).toEqual({ valid: false, error: 'Enter a number.' });
    expect(validateWeight('')).toEqual({ valid: false, error: 'Enter a number.' });
    expect(validateWeight('-5')).toEqual({ valid: false, error: 'Weight must not be negative.' });
  });

  test('should accept only whole non-negative slot counts', () => {
    expect(validateSlotCount('12')).toEqual({ valid: true, value: 12 });
    expect(validateSlotCount('2.5')).toEqual({ valid: false, error: 'Enter a whole number.' });
    expect(validateSlotCount('-1')).toEqual({ valid: false, error: 'Count must not be negative.' });
  });

  test('should fall back to ANY for unknown deck tokens', () => {
    expect(parseDeckRestriction('main')).toBe('MAIN');
    expect(parseDeckRestriction(' Lower ')).toBe('LOWER');
    expect(parseDeckRestriction('upper')).toBe('ANY');
    expect(parseDeckRestriction('')).toBe('ANY');
  });

  test('should only allow special slots on an explicit yes', () => {
    expect(parseSpecialSlotPermission('y')).toBe(true);
    expect(parseSpecialSlotPermission('YES')).toBe(true);
    expect(parseSpecialSlotPermission('n')).toBe(false);
    expect(parseSpecialSlotPermission('maybe')).toBe(false);
  });
});

describe('CSV ULD Lists', () => {
  test('should parse rows with optional columns', () => {
    const csv = 'uld_id,weight_kg,deck,allow_special\nAKE1,100,lower,y\nPMC2,200.5,,n';
    const result = parseUldCsv(csv);

    expect(result.errors).toEqual([]);
    expect(result.ulds).toEqual([
      { uld_id: 'AKE1', weight_kg: 100, deck: 'LOWER', allow_special_slots: true },
      { uld_id: 'PMC2', weight_kg: 200.5, deck: 'ANY', allow_special_slots: false }
    ]);
  });

  test('should normalize header names', () => {
    const result = parseUldCsv('ULD ID,Weight KG\nAKE1,10');
    expect(result.ulds).toEqual([{ uld_id: 'AKE1', weight_kg: 10, deck: 'ANY', allow_special_slots: false }]);
  });

  test('should report a missing required column', () => {
    const result = parseUldCsv('uld_id,deck\nAKE1,MAIN');

    expect(result.ulds).toEqual([]);
    expect(result.errors).toEqual([
      { line: 1, field: 'weight_kg', message: 'Missing required column "weight_kg"' }
    ]);
  });

  test('should report bad rows and keep the valid ones', () => {
    const result = parseUldCsv('uld_id,weight_kg\nA,heavy\nB,-5\n ,10\nC,10');

    expect(result.errors).toEqual([
      { line: 2, field: 'weight_kg', message: 'Enter a number.' },
      { line: 3, field: 'weight_kg', message: 'Weight must not be negative.' },
      { line: 4, field: 'uld_id', message: 'ULD ID must not be empty' }
    ]);
    expect(result.ulds.map(u => u.uld_id)).toEqual(['C']);
  });

  test('should skip blank lines and honour quoted fields', () => {
    const result = parseUldCsv('uld_id,weight_kg\n"AKE,1",5\n\nB,2\n');
    expect(result.ulds.map(u => u.uld_id)).toEqual(['AKE,1', 'B']);
  });

  test('should require a header row', () => {
    expect(parseUldCsv('  ').errors).toEqual([{ line: 1, message: 'CSV must contain a header row' }]);
  });
});
