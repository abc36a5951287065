/**
 * ULD Load Planner - Reference Catalog Loader
 *
 * Reads the aircraft and ULD-type catalogs. A missing, unreadable or
 * structurally invalid file yields an empty catalog plus a warning; it never
 * stops a run.
 */

import { readFile } from 'fs/promises';
import {
  aircraftRecordSchema,
  uldTypeRecordSchema,
  type AircraftRecord,
  type DeckRecord,
  type UldTypeRecord
} from '@shared/schema';
import {
  AircraftConfig,
  DeckGeometry,
  UldTypeEntry,
  CUSTOM_AIRCRAFT_MODEL,
  DEFAULT_ROW_LENGTH
} from '../types';
import { emptyDeckGeometry } from '../solver/slotModel';

export interface CatalogLoadResult<T> {
  catalog: T;
  warnings: string[];
}

export type AircraftCatalog = Map<string, AircraftConfig>;

function toDeckGeometry(record: DeckRecord | undefined): DeckGeometry {
  if (!record) return emptyDeckGeometry(DEFAULT_ROW_LENGTH);
  return {
    slot_count: record.slots,
    row_length: record.rowLength,
    nose_slots: record.noseSlots,
    tail_slots: record.tailSlots,
    slot_arms: record.slotArms ? [...record.slotArms] : []
  };
}

export function aircraftFromRecord(record: AircraftRecord): AircraftConfig {
  return {
    model: record.model,
    mtw: record.mtw,
    main_deck: toDeckGeometry(record.mainDeck),
    lower_deck: toDeckGeometry(record.lowerDeck)
  };
}

export function uldTypeFromRecord(record: UldTypeRecord): UldTypeEntry {
  return {
    prefix: record['Prefix'],
    uld_type: record['ULD Type'],
    width_slots: record['Width (slots)'],
    deck: record['Deck'],
    notes: record['Notes']
  };
}

/**
 * Aircraft entered by hand: slot counts only, no special zones, arms
 * synthesized from the configured ranges at planning time.
 */
export function createCustomAircraft(
  model: string,
  mainSlots: number,
  lowerSlots: number,
  mtw: number = 0
): AircraftConfig {
  return {
    model: model.trim() === '' ? CUSTOM_AIRCRAFT_MODEL : model.trim(),
    mtw,
    main_deck: { ...emptyDeckGeometry(DEFAULT_ROW_LENGTH), slot_count: mainSlots },
    lower_deck: { ...emptyDeckGeometry(DEFAULT_ROW_LENGTH), slot_count: lowerSlots }
  };
}

// ============================================================================
// PARSING (already-decoded JSON)
// ============================================================================

export function parseAircraftCatalog(raw: unknown): CatalogLoadResult<AircraftCatalog> {
  const catalog: AircraftCatalog = new Map();
  const warnings: string[] = [];

  if (!Array.isArray(raw)) {
    warnings.push('Aircraft catalog is not an array; using an empty catalog');
    return { catalog, warnings };
  }

  raw.forEach((entry, i) => {
    const parsed = aircraftRecordSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      warnings.push(`Aircraft record ${i + 1} skipped: ${issue.path.join('.') || 'record'} ${issue.message}`);
      return;
    }

    const record = parsed.data;
    if (record.model === '') {
      warnings.push(`Aircraft record ${i + 1} skipped: empty model`);
      return;
    }

    catalog.set(record.model, aircraftFromRecord(record));
  });

  return { catalog, warnings };
}

export function parseUldCatalog(raw: unknown): CatalogLoadResult<UldTypeEntry[]> {
  const catalog: UldTypeEntry[] = [];
  const warnings: string[] = [];

  if (!Array.isArray(raw)) {
    warnings.push('ULD catalog is not an array; every ULD defaults to 1 slot');
    return { catalog, warnings };
  }

  raw.forEach((entry, i) => {
    const parsed = uldTypeRecordSchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      warnings.push(`ULD type record ${i + 1} skipped: ${issue.path.join('.') || 'record'} ${issue.message}`);
      return;
    }

    const record = parsed.data;
    // An empty prefix would match every ULD ID
    if (record['Prefix'] === '') {
      warnings.push(`ULD type record ${i + 1} skipped: empty prefix`);
      return;
    }

    catalog.push(uldTypeFromRecord(record));
  });

  return { catalog, warnings };
}

// ============================================================================
// FILE LOADING
// ============================================================================

async function readJsonFile(path: string): Promise<{ data: unknown } | { error: string }> {
  try {
    const content = await readFile(path, 'utf-8');
    return { data: JSON.parse(content) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { error: message };
  }
}

export async function loadAircraftCatalog(path: string): Promise<CatalogLoadResult<AircraftCatalog>> {
  const result = await readJsonFile(path);
  if ('error' in result) {
    return {
      catalog: new Map(),
      warnings: [`Could not read aircraft catalog ${path}: ${result.error}`]
    };
  }
  return parseAircraftCatalog(result.data);
}

export async function loadUldCatalog(path: string): Promise<CatalogLoadResult<UldTypeEntry[]>> {
  const result = await readJsonFile(path);
  if ('error' in result) {
    return {
      catalog: [],
      warnings: [`Could not read ULD catalog ${path}: ${result.error}`]
    };
  }
  return parseUldCatalog(result.data);
}

export function listAircraftModels(catalog: AircraftCatalog): string[] {
  return [...catalog.keys()].sort();
}
