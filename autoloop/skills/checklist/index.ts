/**
 * Checklist Module
 *
 * Reading and prioritising Markdown TODO checklists for the todo loop.
 */

export { parseChecklist, parseChecklistFile, type ParsedChecklist } from './parse-checklist.js';
export { selectNextItem, summarizeChecklist, remainingItems } from './select-item.js';
