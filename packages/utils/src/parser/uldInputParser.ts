/**
 * ULD Load Planner - ULD Input Parser
 *
 * Field validators for interactive entry and a CSV reader for batch ULD lists.
 * Validators return a FieldResult so callers can re-prompt instead of failing.
 */

import { uldInputSchema } from '@shared/schema';
import { DeckRestriction, FieldResult, UldInput } from '../types';

// ============================================================================
// FIELD VALIDATORS
// ============================================================================

const YES_TOKENS = new Set(['Y', 'YES']);

export function validateUldId(raw: string): FieldResult<string> {
  const id = raw.trim();
  if (id === '') {
    return { valid: false, error: 'ULD ID must not be empty' };
  }
  return { valid: true, value: id };
}

function parseNumber(raw: string): number | null {
  const text = raw.trim();
  if (text === '') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function validateWeight(raw: string): FieldResult<number> {
  const value = parseNumber(raw);
  if (value === null) {
    return { valid: false, error: 'Enter a number.' };
  }
  if (value < 0) {
    return { valid: false, error: 'Weight must not be negative.' };
  }
  return { valid: true, value };
}

export function validateSlotCount(raw: string): FieldResult<number> {
  const value = parseNumber(raw);
  if (value === null || !Number.isInteger(value)) {
    return { valid: false, error: 'Enter a whole number.' };
  }
  if (value < 0) {
    return { valid: false, error: 'Count must not be negative.' };
  }
  return { valid: true, value };
}

export function parseDeckRestriction(raw: string): DeckRestriction {
  const token = raw.trim().toUpperCase();
  if (token === 'MAIN') return 'MAIN';
  if (token === 'LOWER') return 'LOWER';
  return 'ANY';
}

export function parseSpecialSlotPermission(raw: string): boolean {
  return YES_TOKENS.has(raw.trim().toUpperCase());
}

// ============================================================================
// CSV BATCH INPUT
// ============================================================================

export interface UldParseError {
  line: number;
  field?: string;
  message: string;
}

export interface UldParseResult {
  ulds: UldInput[];
  errors: UldParseError[];
}

function parseCSVLine(line: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === ',' && !inQuotes) {
      result.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  result.push(current);
  return result;
}

/**
 * Reads `uld_id,weight_kg,deck,allow_special` rows. Header names are matched
 * case-insensitively; `deck` and `allow_special` are optional columns.
 */
export function parseUldCsv(csvContent: string): UldParseResult {
  const lines = csvContent.trim().split(/\r?\n/);
  const ulds: UldInput[] = [];
  const errors: UldParseError[] = [];

  if (lines.length < 1 || lines[0].trim() === '') {
    errors.push({ line: 1, message: 'CSV must contain a header row' });
    return { ulds, errors };
  }

  const headers = parseCSVLine(lines[0]).map(h => h.trim().toLowerCase().replace(/\s+/g, '_'));
  for (const required of ['uld_id', 'weight_kg']) {
    if (!headers.includes(required)) {
      errors.push({ line: 1, field: required, message: `Missing required column "${required}"` });
    }
  }
  if (errors.length > 0) return { ulds, errors };

  for (let i = 1; i < lines.length; i++) {
    const values = parseCSVLine(lines[i]);
    if (values.every(v => v.trim() === '')) continue;

    const row: Record<string, string> = {};
    headers.forEach((header, idx) => {
      row[header] = values[idx]?.trim() ?? '';
    });

    const weight = validateWeight(row.weight_kg ?? '');
    if (!weight.valid) {
      errors.push({ line: i + 1, field: 'weight_kg', message: weight.error });
      continue;
    }

    const parsed = uldInputSchema.safeParse({
      uld_id: row.uld_id ?? '',
      weight_kg: weight.value,
      deck: row.deck ?? '',
      allow_special_slots: parseSpecialSlotPermission(row.allow_special ?? '')
    });
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      errors.push({ line: i + 1, field: issue.path.join('.'), message: issue.message });
      continue;
    }

    ulds.push(parsed.data);
  }

  return { ulds, errors };
}
