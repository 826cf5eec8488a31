/**
 * Prompt builders for both loop modes.
 */

import type { ChecklistItem } from '../types/index.js';

export interface SignalPromptInput {
  prompt: string;
  completionSignal: string;
  completionThreshold: number;
  iteration: number;
}

/**
 * The first iteration gets the task plus the completion instructions;
 * later iterations get a continuation prompt that restates the goal.
 */
export function buildSignalPrompt(input: SignalPromptInput): string {
  const { prompt, completionSignal, completionThreshold, iteration } = input;

  if (iteration <= 1) {
    return [
      prompt,
      '',
      `IMPORTANT: When you have fully completed this task, output the exact phrase "${completionSignal}" in your response.`,
      `The signal must appear ${completionThreshold} consecutive times (across iterations) for the loop to end.`,
    ].join('\n');
  }

  return [
    `[ITERATION ${iteration} - Continuing previous task]`,
    '',
    `Original goal: ${prompt}`,
    '',
    'Review your previous work and continue. If blocked, try a different approach.',
    `When completely finished, output "${completionSignal}".`,
  ].join('\n');
}

export function buildTodoPrompt(todoFile: string, item: ChecklistItem, completionSignal: string): string {
  return [
    `Process the next TODO item from ${todoFile}.`,
    '',
    `Current task: ${item.raw}`,
    '',
    'Follow the /todo-all protocol:',
    '1. Mark this task as in-progress by changing [ ] to [~]',
    '2. Complete the task (implement, test, verify)',
    '3. Mark as complete by changing [~] to [x]',
    '4. Commit changes with message: "Complete: <task summary>"',
    '5. If blocked, add "BLOCKED: <reason>" and move to next task',
    '',
    `When ALL tasks are complete, output: ${completionSignal}`,
  ].join('\n');
}
