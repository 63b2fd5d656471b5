import { describe, it } from 'node:test';
import assert from 'node:assert';
import { buildTaskJql, quoteJqlValue } from './jql.js';

describe('quoteJqlValue', () => {
  it('should wrap a value in double quotes', () => {
    assert.strictEqual(quoteJqlValue('In Progress'), '"In Progress"');
  });

  it('should escape embedded quotes and backslashes', () => {
    assert.strictEqual(quoteJqlValue('say "hi"'), '"say \\"hi\\""');
    assert.strictEqual(quoteJqlValue('a\\b'), '"a\\\\b"');
  });
});

describe('buildTaskJql', () => {
  it('should filter by project only when no other filter is given', () => {
    assert.strictEqual(buildTaskJql({ projectKey: 'proj' }), 'project = "PROJ" ORDER BY created DESC');
  });

  it('should add an assignee clause', () => {
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', assignee: 'alice@example.com' }),
      'project = "PROJ" AND assignee = "alice@example.com" ORDER BY created DESC'
    );
  });

  it('should search for empty assignees when asked for unassigned tasks', () => {
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', assignee: 'Unassigned' }),
      'project = "PROJ" AND assignee is EMPTY ORDER BY created DESC'
    );
  });

  it('should add a status clause', () => {
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', status: 'To Do' }),
      'project = "PROJ" AND status = "To Do" ORDER BY created DESC'
    );
  });

  it('should match any of several labels', () => {
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', labels: ['frontend', 'bug'] }),
      'project = "PROJ" AND labels in ("frontend", "bug") ORDER BY created DESC'
    );
  });

  it('should ignore an empty label list', () => {
    assert.strictEqual(buildTaskJql({ projectKey: 'PROJ', labels: [] }), 'project = "PROJ" ORDER BY created DESC');
  });

  it('should send numeric sprints as ids and named sprints quoted', () => {
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', sprint: '42' }),
      'project = "PROJ" AND sprint = 42 ORDER BY created DESC'
    );
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', sprint: 'Sprint 3' }),
      'project = "PROJ" AND sprint = "Sprint 3" ORDER BY created DESC'
    );
  });

  it('should combine every filter in a fixed order', () => {
    assert.strictEqual(
      buildTaskJql({ projectKey: 'PROJ', sprint: '5', labels: ['a'], status: 'Done', assignee: 'bob' }),
      'project = "PROJ" AND assignee = "bob" AND status = "Done" AND labels in ("a") AND sprint = 5 ORDER BY created DESC'
    );
  });
});
