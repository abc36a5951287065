/**
 * ULD Load Planner - Bay Diagram Renderer
 *
 * Text diagram of each deck: the first and last slot sit alone on their row,
 * interior slots are grouped up to three per row. Each cell shows the
 * occupant and its ULD type (or a nose/tail marker), the 1-based slot number
 * and the allocated weight. Neighbouring cells on a row that hold the same
 * ULD are drawn as one wide cell.
 */

import {
  DeckGeometry,
  DeckName,
  LoadPlanResult,
  Slot,
  UldTypeEntry
} from '../types';
import { findUldTypeEntry } from '../solver/uldWidth';

export const DIAGRAM_BOX_WIDTH = 11;
const MAX_ROW_SLOTS = 3;

export const ANSI_RESET = '\x1b[0m';
const ANSI = {
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m'
} as const;

/**
 * Terminal colour per ULD type code.
 */
export const DEFAULT_ULD_TYPE_COLORS: Readonly<Record<string, string>> = {
  'LD1': ANSI.blue,
  'LD2': ANSI.cyan,
  'LD3': ANSI.green,
  'LD3-45': ANSI.green,
  'LD4': ANSI.magenta,
  'LD6': ANSI.yellow,
  'LD7': ANSI.red,
  'LD8': ANSI.bold + ANSI.cyan,
  'LD9': ANSI.bold + ANSI.green,
  'LD11': ANSI.bold + ANSI.red,
  'LD26': ANSI.bold + ANSI.magenta,
  'LD39': ANSI.bold + ANSI.yellow,
  'M1': ANSI.cyan,
  'M1H': ANSI.blue,
  'M6': ANSI.magenta
};

export interface DiagramOptions {
  colors?: Readonly<Record<string, string>>;
}

const DECK_LABELS: Record<DeckName, string> = {
  main: 'Main',
  lower: 'Lower'
};

// ============================================================================
// ROW AND CELL LAYOUT
// ============================================================================

export function groupDiagramRows<T>(slots: readonly T[]): T[][] {
  const rows: T[][] = [];
  if (slots.length === 0) return rows;

  rows.push([slots[0]]);
  let idx = 1;
  while (idx < slots.length - 1) {
    const rowSize = Math.min(MAX_ROW_SLOTS, slots.length - 1 - idx);
    rows.push(slots.slice(idx, idx + rowSize));
    idx += rowSize;
  }
  if (idx < slots.length) rows.push([slots[slots.length - 1]]);
  return rows;
}

function occupantOf(slot: Slot): string | null {
  return slot.occupancy.status === 'OCCUPIED' ? slot.occupancy.uld_id : null;
}

export function mergeRowCells(row: readonly Slot[]): Slot[][] {
  const cells: Slot[][] = [];
  for (const slot of row) {
    const last = cells[cells.length - 1];
    const occupant = occupantOf(slot);
    if (last && occupant !== null && occupantOf(last[last.length - 1]) === occupant) {
      last.push(slot);
    } else {
      cells.push([slot]);
    }
  }
  return cells;
}

interface CellText {
  text: string;
  visible: number;
}

function plain(text: string): CellText {
  return { text, visible: text.length };
}

function innerWidth(cell: readonly Slot[]): number {
  return DIAGRAM_BOX_WIDTH * cell.length - 1;
}

function labelText(cell: readonly Slot[], catalog: readonly UldTypeEntry[], options: DiagramOptions): CellText {
  const slot = cell[0];
  if (slot.occupancy.status === 'OCCUPIED') {
    const entry = findUldTypeEntry(slot.occupancy.uld_id, catalog);
    const full = slot.occupancy.uld_id + (entry ? `[${entry.uld_type}]` : '');
    const shown = full.slice(0, innerWidth(cell) - 1);
    const color = entry ? options.colors?.[entry.uld_type] : undefined;
    return color ? { text: color + shown + ANSI_RESET, visible: shown.length } : plain(shown);
  }
  if (slot.zone === 'NOSE') return plain('  N  ');
  if (slot.zone === 'TAIL') return plain('  T  ');
  return plain(' ');
}

function numberText(cell: readonly Slot[]): CellText {
  const first = cell[0].index + 1;
  const last = cell[cell.length - 1].index + 1;
  return plain(first === last ? `#${first}` : `#${first}-${last}`);
}

function weightText(cell: readonly Slot[]): CellText {
  let total = 0;
  for (const slot of cell) {
    if (slot.occupancy.status !== 'OCCUPIED') return plain('');
    total += slot.occupancy.allocated_weight;
  }
  // Shares of an evenly split ULD can sum to just under the whole
  return plain(String(Math.trunc(Math.round(total * 1e6) / 1e6)));
}

function renderLine(
  leftPad: string,
  cells: readonly Slot[][],
  content: (cell: readonly Slot[]) => CellText
): string {
  let line = leftPad;
  for (const cell of cells) {
    const { text, visible } = content(cell);
    line += '|' + text + ' '.repeat(Math.max(0, innerWidth(cell) - visible));
  }
  return line + '|';
}

function renderBorder(leftPad: string, cells: readonly Slot[][]): string {
  let line = leftPad;
  for (const cell of cells) {
    line += '+' + '-'.repeat(innerWidth(cell));
  }
  return line + '+';
}

// ============================================================================
// DECK AND PLAN DIAGRAMS
// ============================================================================

export function renderDeckDiagram(
  deckName: DeckName,
  deck: DeckGeometry,
  slots: readonly Slot[],
  catalog: readonly UldTypeEntry[],
  options: DiagramOptions = {}
): string[] {
  const lines: string[] = ['', `=== ${DECK_LABELS[deckName]} Deck Load Plan (slots=${deck.slot_count}) ===`];
  if (deck.slot_count === 0) return lines;

  for (const row of groupDiagramRows(slots)) {
    const cells = mergeRowCells(row);
    const padWidth = Math.floor((deck.row_length * DIAGRAM_BOX_WIDTH - DIAGRAM_BOX_WIDTH * row.length) / 2);
    const leftPad = ' '.repeat(Math.max(0, padWidth));

    lines.push(renderBorder(leftPad, cells));
    lines.push(renderLine(leftPad, cells, cell => labelText(cell, catalog, options)));
    lines.push(renderLine(leftPad, cells, numberText));
    lines.push(renderLine(leftPad, cells, weightText));
    lines.push(renderBorder(leftPad, cells));
  }
  return lines;
}

export function renderLoadPlanDiagram(
  result: LoadPlanResult,
  catalog: readonly UldTypeEntry[],
  options: DiagramOptions = {}
): string[] {
  return [
    ...renderDeckDiagram('main', result.aircraft.main_deck, result.slots.main, catalog, options),
    ...renderDeckDiagram('lower', result.aircraft.lower_deck, result.slots.lower, catalog, options)
  ];
}
