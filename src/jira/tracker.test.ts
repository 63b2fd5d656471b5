import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createTrackerClient, mapIssue, PROJECT_PAGE_SIZE, TASK_PAGE_SIZE } from './tracker.js';
import type { RawIssue } from './client.js';
import { ErrorCode, InvalidStatusFilterError, TrackerError } from '../utils/errors.js';
import {
  createFakeJiraApi,
  createHttpError,
  createNetworkError,
  createSeedState,
} from '../test-utils/mocks.js';

function createIssues(projectKey: string, count: number): RawIssue[] {
  return Array.from({ length: count }, (_, i) => ({
    key: `${projectKey}-${i + 1}`,
    fields: { summary: `Issue ${i + 1}`, status: { name: 'To Do' }, project: { key: projectKey } },
  }));
}

describe('TrackerClient', () => {
  describe('listProjects', () => {
    it('should return every project as a plain entity', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listProjects();

      assert.deepStrictEqual(result, {
        ok: true,
        value: [
          { key: 'PROJ', name: 'Main Project', id: '10000' },
          { key: 'OPS', name: 'Operations', id: '10001' },
        ],
      });
    });

    it('should return an empty list when the tracker has no projects', async () => {
      const { api } = createFakeJiraApi(createSeedState({ projects: [] }));
      const tracker = createTrackerClient(api);

      const result = await tracker.listProjects();

      assert.deepStrictEqual(result, { ok: true, value: [] });
    });

    it('should page through the project search until the last page', async () => {
      const projects = Array.from({ length: 120 }, (_, i) => ({ id: String(i), key: `P${i}`, name: `Project ${i}` }));
      const { api } = createFakeJiraApi(createSeedState({ projects }));
      const tracker = createTrackerClient(api);

      const result = await tracker.listProjects();

      assert.ok(result.ok);
      assert.strictEqual(result.value.length, 120);
      assert.strictEqual(api.searchProjects.mock.callCount(), 3);
      assert.deepStrictEqual(
        api.searchProjects.mock.calls.map((call) => call.arguments[0]),
        [
          { startAt: 0, maxResults: PROJECT_PAGE_SIZE },
          { startAt: 50, maxResults: PROJECT_PAGE_SIZE },
          { startAt: 100, maxResults: PROJECT_PAGE_SIZE },
        ]
      );
    });

    it('should report a network failure as a retryable remote failure', async () => {
      const { api } = createFakeJiraApi();
      api.searchProjects.mock.mockImplementation(async () => {
        throw createNetworkError('ECONNREFUSED');
      });
      const tracker = createTrackerClient(api);

      const result = await tracker.listProjects();

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof TrackerError);
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_NETWORK_ERROR);
        assert.strictEqual(result.error.isRetryable, true);
        assert.strictEqual(result.error.message, 'connect ECONNREFUSED 127.0.0.1:443');
      }
    });

    it('should report an authentication failure', async () => {
      const { api } = createFakeJiraApi();
      api.searchProjects.mock.mockImplementation(async () => {
        throw createHttpError(401);
      });
      const tracker = createTrackerClient(api);

      const result = await tracker.listProjects();

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_AUTH_FAILED);
        assert.strictEqual(result.error.statusCode, 401);
        assert.strictEqual(result.error.message, 'Request failed with status code 401');
      }
    });
  });

  describe('createProject', () => {
    it('should upper-case the key and make the current user the lead', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.createProject({ name: 'Demo', key: 'demo', projectType: 'software' });

      assert.deepStrictEqual(result, { ok: true, value: { key: 'DEMO', name: 'Demo', id: '10002' } });
      assert.deepStrictEqual(api.createProject.mock.calls[0].arguments[0], {
        key: 'DEMO',
        name: 'Demo',
        projectTypeKey: 'software',
        leadAccountId: 'test-account-id',
      });
    });

    it('should send service projects as service_desk', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      await tracker.createProject({ name: 'Help Desk', key: 'HELP', projectType: 'service' });

      assert.strictEqual(api.createProject.mock.calls[0].arguments[0].projectTypeKey, 'service_desk');
    });

    it('should default the project type to software', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      await tracker.createProject({ name: 'Demo', key: 'DEMO' });

      assert.strictEqual(api.createProject.mock.calls[0].arguments[0].projectTypeKey, 'software');
    });

    it('should fail with RemoteOperationFailed when the key already exists', async () => {
      const state = createSeedState();
      state.projects.push({ id: '10005', key: 'DEMO', name: 'Existing Demo' });
      const { api } = createFakeJiraApi(state);
      const tracker = createTrackerClient(api);

      const result = await tracker.createProject({ name: 'Demo', key: 'demo', projectType: 'software' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_REQUEST_REJECTED);
        assert.strictEqual(result.error.message, "projectKey: Project 'Demo' uses this project key.");
      }
      assert.strictEqual(state.projects.length, 3);
    });

    it('should not create the project when the current user cannot be resolved', async () => {
      const { api } = createFakeJiraApi();
      api.getCurrentUserAccountId.mock.mockImplementation(async () => {
        throw new TrackerError(ErrorCode.TRACKER_API_ERROR, 'Jira did not return an account id for the current user');
      });
      const tracker = createTrackerClient(api);

      const result = await tracker.createProject({ name: 'Demo', key: 'DEMO' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.message, 'Jira did not return an account id for the current user');
      }
      assert.strictEqual(api.createProject.mock.callCount(), 0);
    });

    it('should return a project that listProjects later finds with the same key and name', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const created = await tracker.createProject({ name: 'Round Trip', key: 'trip' });
      const listed = await tracker.listProjects();

      assert.ok(created.ok);
      assert.ok(listed.ok);
      const found = listed.value.find((project) => project.key === created.value.key);
      assert.deepStrictEqual(found, { key: 'TRIP', name: 'Round Trip', id: created.value.id });
    });
  });

  describe('listTasks', () => {
    it('should map issues to tasks', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ' });

      assert.deepStrictEqual(result, {
        ok: true,
        value: [
          {
            key: 'PROJ-1',
            summary: 'Set up build',
            description: 'Configure the pipeline',
            status: 'Done',
            assignee: 'Alice Example',
            projectKey: 'PROJ',
            labels: ['infra'],
          },
          {
            key: 'PROJ-2',
            summary: 'Fix login bug',
            status: 'In Progress',
            assignee: 'Unassigned',
            projectKey: 'PROJ',
            labels: [],
          },
        ],
      });
    });

    it('should send the filters as JQL', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      await tracker.listTasks({
        projectKey: 'proj',
        assignee: 'alice',
        status: 'In Progress',
        labels: ['backend', 'urgent'],
        sprint: '7',
      });

      assert.strictEqual(
        api.searchIssues.mock.calls[0].arguments[0].jql,
        'project = "PROJ" AND assignee = "alice" AND status = "In Progress" AND labels in ("backend", "urgent") AND sprint = 7 ORDER BY created DESC'
      );
    });

    it('should filter by a valid status', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ', status: 'In Progress' });

      assert.ok(result.ok);
      assert.deepStrictEqual(result.value.map((task) => task.key), ['PROJ-2']);
    });

    it('should return only unassigned tasks for the unassigned filter', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ', assignee: 'unassigned' });

      assert.ok(result.ok);
      assert.deepStrictEqual(result.value.map((task) => task.key), ['PROJ-2']);
    });

    it('should return an empty list when nothing matches', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'OPS', status: 'Done' });

      assert.deepStrictEqual(result, { ok: true, value: [] });
    });

    it('should yield InvalidStatusFilter for a status the instance does not know', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ', status: 'Bogus' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof InvalidStatusFilterError);
        assert.strictEqual(result.error.kind, 'InvalidStatusFilter');
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_INVALID_STATUS_FILTER);
        assert.strictEqual(result.error.message, "Status 'Bogus' is not valid for project PROJ");
      }
      assert.strictEqual(api.searchIssues.mock.callCount(), 0);
    });

    it('should yield InvalidStatusFilter for a status that only other workflows use', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'ops', status: 'In Progress' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.ok(result.error instanceof InvalidStatusFilterError);
        assert.strictEqual(result.error.message, "Status 'In Progress' is not valid for project OPS");
      }
      assert.strictEqual(api.getProjectStatuses.mock.calls[0].arguments[0], 'OPS');
      assert.strictEqual(api.searchIssues.mock.callCount(), 0);
    });

    it('should match workflow statuses without regard to case', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ', status: 'in progress' });

      assert.ok(result.ok);
      assert.deepStrictEqual(result.value.map((task) => task.key), ['PROJ-2']);
    });

    it('should report an unknown project behind a status filter as not found', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'NOPE', status: 'Done' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_NOT_FOUND);
        assert.strictEqual(result.error.message, "No project could be found with key 'NOPE'.");
      }
    });

    it('should keep search rejections as RemoteOperationFailed', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'NOPE' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.message, "The value 'NOPE' does not exist for the field 'project'.");
      }
    });

    it('should not treat a status complaint as a filter problem when no status was given', async () => {
      const { api } = createFakeJiraApi();
      api.searchIssues.mock.mockImplementation(async () => {
        throw createHttpError(400, { errorMessages: ["Field 'status' is not searchable."] });
      });
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_REQUEST_REJECTED);
      }
    });

    it('should follow the page token until the last page', async () => {
      const state = createSeedState({ issues: createIssues('PROJ', 250) });
      const { api } = createFakeJiraApi(state);
      const tracker = createTrackerClient(api);

      const result = await tracker.listTasks({ projectKey: 'PROJ' });

      assert.ok(result.ok);
      assert.strictEqual(result.value.length, 250);
      assert.deepStrictEqual(
        api.searchIssues.mock.calls.map((call) => call.arguments[0].nextPageToken),
        [undefined, String(TASK_PAGE_SIZE), String(2 * TASK_PAGE_SIZE)]
      );
    });
  });

  describe('getStatuses', () => {
    it('should return the global statuses without an issue type', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.getStatuses();

      assert.deepStrictEqual(result, {
        ok: true,
        value: [
          { id: '1', name: 'To Do', category: 'To Do' },
          { id: '3', name: 'In Progress', description: 'Work has started', category: 'In Progress' },
          { id: '10001', name: 'Done', category: 'Done' },
        ],
      });
      assert.strictEqual(api.getProjectStatuses.mock.callCount(), 0);
    });

    it('should tag project statuses with their issue type', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.getStatuses('proj');

      assert.ok(result.ok);
      assert.deepStrictEqual(
        result.value.map((status) => `${status.issueType}/${status.name}`),
        ['Task/To Do', 'Task/In Progress', 'Task/Done', 'Epic/To Do', 'Epic/Done']
      );
      assert.strictEqual(api.getProjectStatuses.mock.calls[0].arguments[0], 'PROJ');
    });

    it('should report an unknown project as not found', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.getStatuses('NOPE');

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.code, ErrorCode.TRACKER_NOT_FOUND);
        assert.strictEqual(result.error.message, "No project could be found with key 'NOPE'.");
      }
    });
  });

  describe('createTask', () => {
    it('should default the task type to Task and upper-case the project key', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.createTask({ projectKey: 'proj', summary: 'Fix bug' });

      assert.deepStrictEqual(result, {
        ok: true,
        value: {
          key: 'PROJ-3',
          summary: 'Fix bug',
          status: 'Unknown',
          assignee: 'Unassigned',
          projectKey: 'PROJ',
          labels: [],
        },
      });
      assert.deepStrictEqual(api.createIssue.mock.calls[0].arguments[0], {
        projectKey: 'PROJ',
        summary: 'Fix bug',
        description: undefined,
        issueType: 'Task',
      });
    });

    it('should pass the description and task type through', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.createTask({
        projectKey: 'OPS',
        summary: 'Plan migration',
        description: 'Move everything',
        taskType: 'Epic',
      });

      assert.ok(result.ok);
      assert.strictEqual(result.value.description, 'Move everything');
      assert.strictEqual(api.createIssue.mock.calls[0].arguments[0].issueType, 'Epic');
    });

    it('should fail with RemoteOperationFailed for an unknown project', async () => {
      const { api } = createFakeJiraApi();
      const tracker = createTrackerClient(api);

      const result = await tracker.createTask({ projectKey: 'NOPE', summary: 'Orphan' });

      assert.strictEqual(result.ok, false);
      if (!result.ok) {
        assert.strictEqual(result.error.kind, 'RemoteOperationFailed');
        assert.strictEqual(result.error.message, 'project: valid project is required');
      }
    });
  });
});

describe('mapIssue', () => {
  it('should fill in defaults for missing fields', () => {
    const task = mapIssue({ key: 'X-1', fields: {} }, 'X');

    assert.deepStrictEqual(task, {
      key: 'X-1',
      summary: '',
      status: 'Unknown',
      assignee: 'Unassigned',
      projectKey: 'X',
      labels: [],
    });
  });

  it('should drop descriptions that are not plain text', () => {
    const task = mapIssue(
      { key: 'X-2', fields: { summary: 'Rich', description: { type: 'doc', content: [] } } },
      'X'
    );

    assert.strictEqual('description' in task, false);
  });
});
