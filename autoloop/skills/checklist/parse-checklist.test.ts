import { describe, it, expect } from 'vitest';
import { parseChecklist, parseChecklistFile } from './parse-checklist.js';

const SAMPLE = [
  '# Tasks',
  '',
  '- [ ] First task',
  '- [x] Done task',
  '- [X] Also done',
  '- [~] Started task',
  '  - [ ] Nested child',
  '* [ ] Star bullet PRIORITY:HIGH',
  '1. [ ] Numbered BLOCKED: needs API key',
  '- plain bullet',
  '- [ ]',
  '',
].join('\n');

describe('parseChecklist', () => {
  it('reads every checklist item in document order', () => {
    const { items } = parseChecklist(SAMPLE, 'TODO.md');

    expect(items.map(item => item.text)).toEqual([
      'First task',
      'Done task',
      'Also done',
      'Started task',
      'Nested child',
      'Star bullet PRIORITY:HIGH',
      'Numbered BLOCKED: needs API key',
    ]);
  });

  it('maps the status box to a status', () => {
    const { items } = parseChecklist(SAMPLE, 'TODO.md');

    expect(items.map(item => item.status)).toEqual([
      'pending',
      'done',
      'done',
      'in_progress',
      'pending',
      'pending',
      'pending',
    ]);
  });

  it('keeps the source line, its number and nesting depth', () => {
    const { items } = parseChecklist(SAMPLE, 'TODO.md');

    expect(items[3]).toMatchObject({ raw: '- [~] Started task', line: 6, depth: 0 });
    expect(items[4]).toMatchObject({ raw: '- [ ] Nested child', line: 7, depth: 1 });
    expect(items[6]).toMatchObject({ raw: '1. [ ] Numbered BLOCKED: needs API key', line: 9, depth: 0 });
  });

  it('flags priority and blocked markers', () => {
    const { items } = parseChecklist(SAMPLE, 'TODO.md');

    expect(items[5].highPriority).toBe(true);
    expect(items[5].blocked).toBe(false);
    expect(items[6].blocked).toBe(true);
    expect(items[6].blockedReason).toBe('needs API key');
    expect(items[0].highPriority).toBe(false);
  });

  it('leaves out the reason when none is given', () => {
    const { items } = parseChecklist('- [ ] Deploy BLOCKED:\n', 'TODO.md');

    expect(items[0].blocked).toBe(true);
    expect(items[0]).not.toHaveProperty('blockedReason');
  });

  it('ignores list items inside code blocks', () => {
    const content = '- [ ] Real task\n\n```md\n- [ ] Example in a code block\n```\n';

    expect(parseChecklist(content, 'TODO.md').items.map(item => item.text)).toEqual(['Real task']);
  });

  it('keeps tildes in item text', () => {
    const { items } = parseChecklist('- [ ] Bump to ~2.0 and drop ~1.x\n', 'TODO.md');

    expect(items[0].text).toBe('Bump to ~2.0 and drop ~1.x');
  });

  it('handles Windows line endings', () => {
    const { items } = parseChecklist('- [ ] One\r\n- [x] Two\r\n', 'TODO.md');

    expect(items.map(item => item.raw)).toEqual(['- [ ] One', '- [x] Two']);
    expect(items.map(item => item.text)).toEqual(['One', 'Two']);
  });

  it('returns no items for a file without checklists', () => {
    expect(parseChecklist('# Notes\n\nJust prose.\n', 'notes.md')).toEqual({ path: 'notes.md', items: [] });
  });
});

describe('parseChecklistFile', () => {
  it('parses the content the reader returns', async () => {
    const reads: string[] = [];
    const parsed = await parseChecklistFile('/work/TODO.md', async path => {
      reads.push(path);
      return '- [ ] Only task\n';
    });

    expect(reads).toEqual(['/work/TODO.md']);
    expect(parsed.path).toBe('/work/TODO.md');
    expect(parsed.items).toHaveLength(1);
  });
});
