import type { TaskQuery } from './types.js';

/**
 * Quote a value for use in a JQL clause
 */
export function quoteJqlValue(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/**
 * Build the JQL search for a task listing. Filters are ANDed in a fixed
 * order and results come newest first.
 */
export function buildTaskJql(query: TaskQuery): string {
  const clauses = [`project = ${quoteJqlValue(query.projectKey.toUpperCase())}`];

  if (query.assignee) {
    clauses.push(
      query.assignee.toLowerCase() === 'unassigned'
        ? 'assignee is EMPTY'
        : `assignee = ${quoteJqlValue(query.assignee)}`
    );
  }

  if (query.status) {
    clauses.push(`status = ${quoteJqlValue(query.status)}`);
  }

  const labels = (query.labels ?? []).filter((label) => label.length > 0);
  if (labels.length > 0) {
    clauses.push(`labels in (${labels.map(quoteJqlValue).join(', ')})`);
  }

  if (query.sprint) {
    // Numeric sprints are ids, anything else is a sprint name
    clauses.push(`sprint = ${/^\d+$/.test(query.sprint) ? query.sprint : quoteJqlValue(query.sprint)}`);
  }

  return `${clauses.join(' AND ')} ORDER BY created DESC`;
}
