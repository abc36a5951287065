/**
 * ULD Load Planner - Plan File Writer
 */

import { writeFile } from 'fs/promises';

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

export type SaveResult = { saved: true; path: string } | { saved: false; path: string; error: string };

export function stripAnsi(line: string): string {
  return line.replace(ANSI_PATTERN, '');
}

/**
 * Writes one line per entry. Colour codes are stripped so the file stays
 * plain text. Failure is reported, not thrown.
 */
export async function saveLoadPlanToFile(path: string, lines: readonly string[]): Promise<SaveResult> {
  try {
    await writeFile(path, lines.map(line => stripAnsi(line) + '\n').join(''), 'utf-8');
    return { saved: true, path };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { saved: false, path, error: message };
  }
}
