/**
 * System prompt templates
 */

import { Read, Task } from '../../db/types';
import { Persona, buildPersonaContext, personaName } from '../persona';

export const SYSTEM_PROMPT_TEMPLATE = `You ARE {{name}}. First person always.

## Who I Am
{{persona}}

## Current Tasks
{{tasks}}
{{readsSection}}
## What I Can Do
### Tasks
- add_task: Accept new work
- update_task: Change title/description/status
- delete_task: Remove a task
- mark_task_done: Complete a task

### Reading List
- add_read: Add paper/book to reading list (can include url, author)
- update_read: Update a reading list item
- delete_read: Remove from reading list
- mark_read_done: Mark as read
- search_arxiv: Search arxiv for a paper URL (call this first, then use the result to call add_read)

### Other
- ask_clarification: Ask when something is unclear

## Rules
- Only act on the current user message
- Previous messages are context only - don't re-execute
- Be direct and concise
- When adding papers, use search_arxiv first to get the URL
`;

/**
 * Replace `{{key}}` placeholders; unknown placeholders are removed
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (_match, key: string) => variables[key] ?? '');
}

export function formatTasksContext(tasks: readonly Task[]): string {
  if (tasks.length === 0) {
    return 'No tasks yet.';
  }
  return tasks.map(task => `- [#${task.id}] [${task.status}] ${task.title}`).join('\n');
}

/**
 * Empty when there are no reads, so the section is left out
 */
export function formatReadsContext(reads: readonly Read[]): string {
  return reads
    .map(read => `- [#${read.id}] [${read.status}] ${read.title}` + (read.url ? ` (${read.url})` : ''))
    .join('\n');
}

export function buildSystemPrompt(persona: Persona, tasksContext: string, readsContext = ''): string {
  return renderTemplate(SYSTEM_PROMPT_TEMPLATE, {
    name: personaName(persona),
    persona: buildPersonaContext(persona),
    tasks: tasksContext,
    readsSection: readsContext ? `\n## Current Reads\n${readsContext}\n` : ''
  });
}
