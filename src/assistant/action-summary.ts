import { ActionResult } from './tools/function-executor';
import { isPaperMatch } from '../integrations/arxiv-client';

/**
 * History line for an action; null for actions that leave no trace
 */
export function describeAction(action: ActionResult): string | null {
  switch (action.type) {
    case 'added':
      return `Added task: ${action.task.title}`;
    case 'updated':
      return `Updated task #${action.task.id}`;
    case 'deleted':
      return `Deleted task: ${action.task.title}`;
    case 'done':
      return `Completed task: ${action.task.title}`;
    case 'read_added':
      return `Added to reading list: ${action.read.title}`;
    case 'read_updated':
      return `Updated read #${action.read.id}`;
    case 'read_deleted':
      return `Removed from reading list: ${action.read.title}`;
    case 'read_done':
      return `Marked as read: ${action.read.title}`;
    case 'arxiv_result':
      return isPaperMatch(action.result) ? `Found on arxiv: ${action.result.title}` : null;
    case 'clarification':
    case 'error':
      return null;
  }
}

/**
 * Stored assistant message: the reply, then the action list in brackets
 */
export function buildHistoryEntry(reply: string, actions: readonly ActionResult[]): string {
  const descriptions = actions.map(describeAction).filter((line): line is string => line !== null);
  const text = reply.trim();

  if (descriptions.length === 0) {
    return text;
  }

  const summary = `[${descriptions.join(', ')}]`;
  return text ? `${text}\n${summary}` : summary;
}
