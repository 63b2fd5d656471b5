/**
 * Test doubles shared by the CLI and tracker tests.
 *
 * The fake Jira API keeps projects, issues and statuses in memory and fails
 * the same way the REST API does (axios-style errors carrying
 * `response.status` and a Jira error body), so the real tracker adapter can
 * be exercised without a network.
 */

import { mock } from 'node:test';
import type {
  JiraApi,
  RawCreateIssue,
  RawCreateProject,
  RawIssue,
  RawIssueSearch,
  RawIssueTypeStatuses,
  RawProject,
  RawStatus,
} from '../jira/client.js';
import type { TrackerClient } from '../jira/tracker.js';
import type { CreateProjectInput, CreateTaskInput, TaskQuery } from '../jira/types.js';
import type { CliOutput } from '../cli/output.js';

// ============================================================================
// OUTPUT
// ============================================================================

export function createMockOutput() {
  const logs: string[] = [];
  const errors: string[] = [];
  const output: CliOutput = {
    log(line) {
      logs.push(line);
    },
    error(line) {
      errors.push(line);
    },
  };
  return { output, logs, errors };
}

// ============================================================================
// ERRORS
// ============================================================================

export interface JiraErrorBody {
  errorMessages?: string[];
  errors?: Record<string, string>;
}

/**
 * An error shaped like the one jira.js rethrows from axios for an HTTP failure
 */
export function createHttpError(status: number, body: JiraErrorBody = {}) {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    response: {
      status,
      data: {
        errorMessages: body.errorMessages ?? [],
        errors: body.errors ?? {},
      },
    },
  });
}

export function createNetworkError(code: string = 'ECONNREFUSED') {
  return Object.assign(new Error(`connect ${code} 127.0.0.1:443`), { code });
}

// ============================================================================
// FAKE JIRA API
// ============================================================================

export interface FakeJiraState {
  projects: RawProject[];
  issues: RawIssue[];
  statuses: RawStatus[];
  projectStatuses: Record<string, RawIssueTypeStatuses[]>;
  accountId: string;
}

export function createSeedState(overrides: Partial<FakeJiraState> = {}): FakeJiraState {
  const todo: RawStatus = { id: '1', name: 'To Do', categoryName: 'To Do' };
  const inProgress: RawStatus = { id: '3', name: 'In Progress', description: 'Work has started', categoryName: 'In Progress' };
  const done: RawStatus = { id: '10001', name: 'Done', categoryName: 'Done' };

  return {
    projects: [
      { id: '10000', key: 'PROJ', name: 'Main Project' },
      { id: '10001', key: 'OPS', name: 'Operations' },
    ],
    issues: [
      {
        key: 'PROJ-1',
        fields: {
          summary: 'Set up build',
          description: 'Configure the pipeline',
          status: { name: 'Done' },
          assignee: { displayName: 'Alice Example' },
          labels: ['infra'],
          project: { key: 'PROJ' },
        },
      },
      {
        key: 'PROJ-2',
        fields: {
          summary: 'Fix login bug',
          status: { name: 'In Progress' },
          assignee: null,
          labels: [],
          project: { key: 'PROJ' },
        },
      },
      {
        key: 'OPS-1',
        fields: {
          summary: 'Rotate credentials',
          status: { name: 'To Do' },
          assignee: { displayName: 'Bob Example' },
          project: { key: 'OPS' },
        },
      },
    ],
    statuses: [todo, inProgress, done],
    projectStatuses: {
      PROJ: [
        { issueType: 'Task', statuses: [todo, inProgress, done] },
        { issueType: 'Epic', statuses: [todo, done] },
      ],
      OPS: [{ issueType: 'Task', statuses: [todo, done] }],
    },
    accountId: 'test-account-id',
    ...overrides,
  };
}

function matchClause(jql: string, field: string): string | undefined {
  const match = new RegExp(`${field} = "((?:[^"\\\\]|\\\\.)*)"`).exec(jql);
  return match ? match[1].replace(/\\(.)/g, '$1') : undefined;
}

/**
 * In-memory Jira. Understands the project, status and `assignee is EMPTY`
 * clauses of the JQL the tracker builds and ignores the rest.
 */
export function createFakeJiraApi(state: FakeJiraState = createSeedState()) {
  const projectExists = (key: string) => state.projects.some((project) => project.key === key);

  const api = {
    searchProjects: mock.fn(async (page: { startAt: number; maxResults: number }) => {
      const values = state.projects.slice(page.startAt, page.startAt + page.maxResults);
      return { values, isLast: page.startAt + page.maxResults >= state.projects.length };
    }),

    createProject: mock.fn(async (input: RawCreateProject) => {
      if (projectExists(input.key)) {
        throw createHttpError(400, {
          errors: { projectKey: `Project '${input.name}' uses this project key.` },
        });
      }
      const id = String(10000 + state.projects.length);
      state.projects.push({ id, key: input.key, name: input.name });
      return { id, key: input.key };
    }),

    getCurrentUserAccountId: mock.fn(async (): Promise<string> => state.accountId),

    searchIssues: mock.fn(async (search: RawIssueSearch) => {
      const projectKey = matchClause(search.jql, 'project');
      const status = matchClause(search.jql, 'status');

      if (projectKey && !projectExists(projectKey)) {
        throw createHttpError(400, {
          errorMessages: [`The value '${projectKey}' does not exist for the field 'project'.`],
        });
      }

      // Jira checks status names against every workflow on the instance
      if (status && !state.statuses.some((known) => known.name.toLowerCase() === status.toLowerCase())) {
        throw createHttpError(400, {
          errorMessages: [`The value '${status}' does not exist for the field 'status'.`],
        });
      }

      const matching = state.issues.filter(
        (issue) =>
          (!projectKey || issue.fields.project?.key === projectKey) &&
          (!status || issue.fields.status?.name?.toLowerCase() === status.toLowerCase()) &&
          (!search.jql.includes('assignee is EMPTY') || !issue.fields.assignee)
      );

      const start = search.nextPageToken ? Number(search.nextPageToken) : 0;
      const end = start + search.maxResults;
      const isLast = end >= matching.length;
      return {
        issues: matching.slice(start, end),
        nextPageToken: isLast ? undefined : String(end),
        isLast,
      };
    }),

    getStatuses: mock.fn(async () => state.statuses),

    getProjectStatuses: mock.fn(async (projectKey: string) => {
      const statuses = state.projectStatuses[projectKey];
      if (!statuses) {
        throw createHttpError(404, { errorMessages: [`No project could be found with key '${projectKey}'.`] });
      }
      return statuses;
    }),

    createIssue: mock.fn(async (input: RawCreateIssue) => {
      if (!projectExists(input.projectKey)) {
        throw createHttpError(400, { errors: { project: 'valid project is required' } });
      }
      const number = state.issues.filter((issue) => issue.fields.project?.key === input.projectKey).length + 1;
      const key = `${input.projectKey}-${number}`;
      state.issues.push({
        key,
        fields: {
          summary: input.summary,
          description: input.description,
          status: { name: 'To Do' },
          assignee: null,
          labels: [],
          project: { key: input.projectKey },
        },
      });
      return { id: String(20000 + state.issues.length), key };
    }),
  } satisfies JiraApi;

  return { api, state };
}

// ============================================================================
// MOCK TRACKER
// ============================================================================

/**
 * TrackerClient whose methods all succeed with empty or echo results
 */
export function createMockTracker() {
  const tracker = {
    listProjects: mock.fn(async () => ({ ok: true as const, value: [] })),
    createProject: mock.fn(async (input: CreateProjectInput) => ({
      ok: true as const,
      value: { key: input.key.toUpperCase(), name: input.name, id: '10000' },
    })),
    listTasks: mock.fn(async (_query: TaskQuery) => ({ ok: true as const, value: [] })),
    getStatuses: mock.fn(async (_projectKey?: string) => ({ ok: true as const, value: [] })),
    createTask: mock.fn(async (input: CreateTaskInput) => ({
      ok: true as const,
      value: {
        key: `${input.projectKey.toUpperCase()}-1`,
        summary: input.summary,
        status: 'Unknown',
        assignee: 'Unassigned',
        projectKey: input.projectKey.toUpperCase(),
        labels: [],
      },
    })),
  } satisfies TrackerClient;

  return tracker;
}

export function totalCalls(tracker: ReturnType<typeof createMockTracker>): number {
  return (
    tracker.listProjects.mock.callCount() +
    tracker.createProject.mock.callCount() +
    tracker.listTasks.mock.callCount() +
    tracker.getStatuses.mock.callCount() +
    tracker.createTask.mock.callCount()
  );
}
