/**
 * Parse Checklist Skill
 *
 * Parses a Markdown TODO file into typed checklist items.
 * Uses remark for the document structure, so list items inside code
 * blocks are never picked up, and reads each item's marker from its
 * source line: `[~]` is not a GFM checkbox, and remark-gfm would read
 * a lone tilde in the text as strikethrough.
 */

import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import type { ListItem, Nodes } from 'mdast';
import type { ChecklistItem, ChecklistStatus } from '../../types/index.js';

export interface ParsedChecklist {
  path: string;
  items: ChecklistItem[];
}

/** Bullet or ordinal, then a one-character status box, then the text */
const ITEM_PATTERN = /^(?:[-*+]|\d+[.)])\s+\[([ xX~])\](?:\s+|$)(.*)$/;

const PRIORITY_HIGH = 'PRIORITY:HIGH';
const BLOCKED_PATTERN = /BLOCKED:\s*(.*)$/;

function markerStatus(marker: string): ChecklistStatus {
  if (marker === '~') return 'in_progress';
  if (marker === ' ') return 'pending';
  return 'done';
}

function firstLine(content: string, offset: number): string {
  const end = content.indexOf('\n', offset);
  return content.slice(offset, end === -1 ? undefined : end).replace(/\r$/, '');
}

/**
 * Build a checklist item from a list item node, or null if the item has
 * no status box.
 */
function toChecklistItem(node: ListItem, content: string, depth: number): ChecklistItem | null {
  const start = node.position?.start;
  if (!start || start.offset === undefined) return null;

  const raw = firstLine(content, start.offset).trim();
  const match = ITEM_PATTERN.exec(raw);
  if (!match) return null;

  const text = match[2].trim();
  if (!text) return null;

  const blocked = BLOCKED_PATTERN.exec(text);
  const item: ChecklistItem = {
    text,
    raw,
    status: markerStatus(match[1]),
    highPriority: text.includes(PRIORITY_HIGH),
    blocked: blocked !== null,
    line: start.line,
    depth,
  };
  const reason = blocked?.[1].trim();
  if (reason) item.blockedReason = reason;
  return item;
}

/**
 * Parse checklist content. Items are returned in document order, nested
 * items directly after their parent.
 */
export function parseChecklist(content: string, path: string): ParsedChecklist {
  const ast = unified().use(remarkParse).use(remarkGfm).parse(content);
  const items: ChecklistItem[] = [];

  // `lists` counts enclosing list nodes; a top-level item has depth 0
  function walk(node: Nodes, lists: number): void {
    if (node.type === 'listItem') {
      const item = toChecklistItem(node, content, lists - 1);
      if (item) items.push(item);
    }

    if ('children' in node) {
      const next = node.type === 'list' ? lists + 1 : lists;
      for (const child of node.children) {
        walk(child, next);
      }
    }
  }

  walk(ast, 0);

  return { path, items };
}

export async function parseChecklistFile(
  filePath: string,
  readFile: (path: string) => Promise<string>,
): Promise<ParsedChecklist> {
  const content = await readFile(filePath);
  return parseChecklist(content, filePath);
}
