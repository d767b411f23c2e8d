import { ToolDefinition } from '../ai-engine/interface';
import { READ_STATUSES, TASK_STATUSES } from '../../db/types';

export const TOOL_NAMES = [
  'add_task',
  'update_task',
  'delete_task',
  'mark_task_done',
  'ask_clarification',
  'add_read',
  'update_read',
  'delete_read',
  'mark_read_done',
  'search_arxiv'
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(value: string): value is ToolName {
  return TOOL_NAMES.some(name => name === value);
}

function idOnly(subject: string): ToolDefinition['parameters'] {
  return {
    type: 'object',
    properties: {
      id: { type: 'integer', description: `${subject} ID` }
    },
    required: ['id']
  };
}

/**
 * Functions the assistant may call
 */
export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  {
    name: 'add_task',
    description: 'Add a new task to my list',
    parameters: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Task title' },
        description: { type: 'string', description: 'Optional details' }
      },
      required: ['title']
    }
  },
  {
    name: 'update_task',
    description: "Update a task's title, description, or status",
    parameters: {
      type: 'object',
      properties: {
        id: { type: 'integer', description: 'Task ID' },
        title: { type: 'string' },
        description: { type: 'string' },
        status: { type: 'string', enum: TASK_STATUSES }
      },
      required: ['id']
    }
  },
  {
    name: 'delete_task',
    description: 'Delete a task permanently',
    parameters: idOnly('Task')
  },
  {
    name: 'mark_task_done',
    description: 'Mark a task as completed',
    parameters: idOnly('Task')
  },
  {
    name: 'ask_clarification',
    description:
      "Ask the user a clarifying question before proceeding. Use when request is ambiguous or you need more context. Don't overuse.",
    parameters: {
      type: 'object',
      properties: {
        question: { type: 'string', description: 'The clarifying question to ask' },
        context: { type: 'string', description: "Brief context for why you're asking" }
      },
      required: ['question']
    }
  },
  {
    name: 'add_read',
    description: 'Add a paper or book to the reading list',
    parameters: {
      type: 'object',
      properties: {
        title: { type: 'string', description: 'Paper/book title' },
        url: { type: 'string', description: 'URL to the paper/book' },
        author: { type: 'string', description: 'Author(s)' },
        notes: { type: 'string', description: 'Optional notes' }
      },
      required: ['title']
    }
  },
  {
    name: 'update_read',
    description: 'Update a reading list item',
    parameters: {
      type: 'object',
      properties: {
        id: { type: 'integer', description: 'Read ID' },
        title: { type: 'string' },
        url: { type: 'string' },
        author: { type: 'string' },
        notes: { type: 'string' },
        status: { type: 'string', enum: READ_STATUSES }
      },
      required: ['id']
    }
  },
  {
    name: 'delete_read',
    description: 'Remove a paper/book from the reading list',
    parameters: idOnly('Read')
  },
  {
    name: 'mark_read_done',
    description: 'Mark a paper/book as read',
    parameters: idOnly('Read')
  },
  {
    name: 'search_arxiv',
    description:
      'Search arxiv for a paper and get its URL. Use this to find paper URLs before adding to reading list.',
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search query (paper title or keywords)' }
      },
      required: ['query']
    }
  }
];
