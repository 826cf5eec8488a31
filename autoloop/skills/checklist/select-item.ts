/**
 * Select Item Skill
 *
 * Picks the checklist item the next iteration works on. Blocked items are
 * never picked, whatever their status or priority.
 */

import type { ChecklistCounts, ChecklistItem } from '../../types/index.js';

function isActionable(item: ChecklistItem): boolean {
  return !item.blocked && item.status !== 'done';
}

/**
 * Selection order:
 *   1. first pending PRIORITY:HIGH item
 *   2. first in-progress item (finish what was started)
 *   3. first pending item
 * Returns null when nothing is actionable.
 */
export function selectNextItem(items: ChecklistItem[]): ChecklistItem | null {
  const actionable = items.filter(isActionable);

  return (
    actionable.find(item => item.status === 'pending' && item.highPriority) ??
    actionable.find(item => item.status === 'in_progress') ??
    actionable.find(item => item.status === 'pending') ??
    null
  );
}

/**
 * Count items by status. `blocked` counts unfinished items carrying a
 * BLOCKED: marker; those items are also counted under their status.
 */
export function summarizeChecklist(items: ChecklistItem[]): ChecklistCounts {
  const counts: ChecklistCounts = { pending: 0, inProgress: 0, completed: 0, blocked: 0 };

  for (const item of items) {
    if (item.status === 'pending') counts.pending++;
    else if (item.status === 'in_progress') counts.inProgress++;
    else counts.completed++;

    if (item.blocked && item.status !== 'done') counts.blocked++;
  }

  return counts;
}

export function remainingItems(counts: ChecklistCounts): number {
  return counts.pending + counts.inProgress;
}
