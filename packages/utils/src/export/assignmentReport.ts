/**
 * ULD Load Planner - Assignment Report
 */

import { AssignmentOutcome, LoadPlanResult } from '../types';
import { getLoadStatusMessage } from '../solver/loadBalance';

const ID_COLUMN = 12;
const SLOT_COLUMN = 22;
const RULE_WIDTH = 46;

export const UNASSIGNED_LABEL = 'UNASSIGNED';

export function formatSlotLabel(outcome: AssignmentOutcome): string {
  if (outcome.status === 'UNASSIGNED') return UNASSIGNED_LABEL;

  const first = outcome.start_index + 1;
  const last = outcome.start_index + outcome.width_slots;
  return first === last ? `${outcome.deck}[${first}]` : `${outcome.deck}[${first}-${last}]`;
}

export function renderAssignmentReport(result: LoadPlanResult): string[] {
  const lines: string[] = [
    '=== Assignment Results ===',
    'ULD ID'.padEnd(ID_COLUMN) + 'Assigned Slot'.padEnd(SLOT_COLUMN) + 'Weight(kg)',
    '-'.repeat(RULE_WIDTH)
  ];

  for (const assignment of result.assignments) {
    lines.push(
      assignment.uld.uld_id.padEnd(ID_COLUMN) +
      formatSlotLabel(assignment.outcome).padEnd(SLOT_COLUMN) +
      String(assignment.uld.weight_kg)
    );
  }

  const { summary } = result;
  lines.push('');
  lines.push(`Aircraft: ${result.aircraft.model} (${result.strategy})`);
  lines.push(`Placed ${summary.placed_count} of ${result.assignments.length} ULDs`);
  lines.push(getLoadStatusMessage(summary));
  return lines;
}
