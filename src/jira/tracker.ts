import type { JiraApi, RawIssue, RawStatus } from './client.js';
import { buildTaskJql } from './jql.js';
import {
  DEFAULT_PROJECT_TYPE,
  DEFAULT_TASK_TYPE,
  UNASSIGNED,
  UNKNOWN_STATUS,
  type CreateProjectInput,
  type CreateTaskInput,
  type Project,
  type Status,
  type Task,
  type TaskQuery,
  type TrackerResult,
} from './types.js';
import { logger } from '../utils/logger.js';
import {
  ErrorCode,
  InvalidStatusFilterError,
  TrackerError,
  createTrackerErrorFromResponse,
  type ErrorContext,
} from '../utils/errors.js';

export const PROJECT_PAGE_SIZE = 50;
export const TASK_PAGE_SIZE = 100;

const TASK_FIELDS = ['summary', 'description', 'status', 'assignee', 'labels', 'project'];

export interface TrackerClient {
  listProjects(): Promise<TrackerResult<Project[]>>;
  createProject(input: CreateProjectInput): Promise<TrackerResult<Project>>;
  listTasks(query: TaskQuery): Promise<TrackerResult<Task[]>>;
  getStatuses(projectKey?: string): Promise<TrackerResult<Status[]>>;
  createTask(input: CreateTaskInput): Promise<TrackerResult<Task>>;
}

/**
 * Map a raw issue to a Task. `fallbackProjectKey` is used when the issue
 * comes back without its project field.
 */
export function mapIssue(issue: RawIssue, fallbackProjectKey: string): Task {
  const { fields } = issue;
  const task: Task = {
    key: issue.key,
    summary: fields.summary ?? '',
    status: fields.status?.name || UNKNOWN_STATUS,
    assignee: fields.assignee?.displayName || UNASSIGNED,
    projectKey: fields.project?.key || fallbackProjectKey,
    labels: fields.labels ?? [],
  };
  if (typeof fields.description === 'string' && fields.description.length > 0) {
    task.description = fields.description;
  }
  return task;
}

function mapStatus(status: RawStatus, issueType?: string): Status {
  const mapped: Status = { id: status.id, name: status.name };
  if (status.description) mapped.description = status.description;
  if (status.categoryName) mapped.category = status.categoryName;
  if (issueType !== undefined) mapped.issueType = issueType;
  return mapped;
}

/**
 * JQL validates status names against the whole instance, so a status from
 * another project's workflow is only caught by checking the project itself.
 */
async function assertStatusInWorkflow(api: JiraApi, projectKey: string, status: string): Promise<void> {
  const issueTypes = await api.getProjectStatuses(projectKey);
  const wanted = status.toLowerCase();
  const known = issueTypes.some((issueType) =>
    issueType.statuses.some((candidate) => candidate.name.toLowerCase() === wanted)
  );
  if (!known) {
    throw new InvalidStatusFilterError(status, projectKey);
  }
}

export function createTrackerClient(api: JiraApi): TrackerClient {
  const log = logger.child('Tracker');

  /**
   * Run one remote operation and convert whatever it throws into a failed result
   */
  const execute = async <T>(
    operation: string,
    call: () => Promise<T>,
    context: ErrorContext = {}
  ): Promise<TrackerResult<T>> => {
    const startTime = Date.now();
    try {
      const value = await call();
      log.debug(`${operation} completed`, { ...context, duration: Date.now() - startTime });
      return { ok: true, value };
    } catch (error) {
      const trackerError = createTrackerErrorFromResponse(error, operation, context);
      // The handler prints the user-facing line; this goes to the diagnostic file
      log.info(`Failed to ${operation}`, {
        ...context,
        code: trackerError.code,
        statusCode: trackerError.statusCode,
        error: trackerError.message,
        duration: Date.now() - startTime,
      });
      return { ok: false, error: trackerError };
    }
  };

  return {
    async listProjects() {
      return execute('list projects', async () => {
        const projects: Project[] = [];
        let startAt = 0;

        for (;;) {
          const page = await api.searchProjects({ startAt, maxResults: PROJECT_PAGE_SIZE });
          for (const project of page.values) {
            projects.push(project.id ? { key: project.key, name: project.name, id: project.id } : { key: project.key, name: project.name });
          }
          if (page.isLast || page.values.length === 0) break;
          startAt += page.values.length;
        }

        return projects;
      });
    },

    async createProject(input) {
      const key = input.key.toUpperCase();
      const projectType = input.projectType ?? DEFAULT_PROJECT_TYPE;

      return execute(
        'create project',
        async () => {
          const leadAccountId = await api.getCurrentUserAccountId();
          const created = await api.createProject({
            key,
            name: input.name,
            projectTypeKey: projectType === 'service' ? 'service_desk' : 'software',
            leadAccountId,
          });
          log.info(`Created project ${created.key}`, { name: input.name, projectType });
          return { key: created.key, name: input.name, id: created.id };
        },
        { projectKey: key, projectType }
      );
    },

    async listTasks(query) {
      const projectKey = query.projectKey.toUpperCase();
      const jql = buildTaskJql({ ...query, projectKey });

      return execute(
        'list tasks',
        async () => {
          if (query.status) {
            await assertStatusInWorkflow(api, projectKey, query.status);
          }

          const tasks: Task[] = [];
          let nextPageToken: string | undefined;

          for (;;) {
            const page = await api.searchIssues({ jql, nextPageToken, maxResults: TASK_PAGE_SIZE, fields: TASK_FIELDS });
            tasks.push(...page.issues.map((issue) => mapIssue(issue, projectKey)));
            if (page.isLast || !page.nextPageToken) break;
            nextPageToken = page.nextPageToken;
          }

          return tasks;
        },
        { projectKey, jql }
      );
    },

    async getStatuses(projectKey) {
      if (!projectKey) {
        return execute('get statuses', async () => {
          const statuses = await api.getStatuses();
          return statuses.map((status) => mapStatus(status));
        });
      }

      const key = projectKey.toUpperCase();
      return execute(
        'get statuses',
        async () => {
          const issueTypes = await api.getProjectStatuses(key);
          return issueTypes.flatMap((issueType) =>
            issueType.statuses.map((status) => mapStatus(status, issueType.issueType))
          );
        },
        { projectKey: key }
      );
    },

    async createTask(input) {
      const projectKey = input.projectKey.toUpperCase();
      const taskType = input.taskType ?? DEFAULT_TASK_TYPE;

      return execute(
        'create task',
        async () => {
          const created = await api.createIssue({
            projectKey,
            summary: input.summary,
            description: input.description,
            issueType: taskType,
          });
          if (!created.key) {
            throw new TrackerError(ErrorCode.TRACKER_API_ERROR, 'Jira did not return a key for the new issue', {
              operation: 'create task',
            });
          }
          log.info(`Created task ${created.key}`, { projectKey, taskType });

          const task: Task = {
            key: created.key,
            summary: input.summary,
            status: UNKNOWN_STATUS,
            assignee: UNASSIGNED,
            projectKey,
            labels: [],
          };
          if (input.description) task.description = input.description;
          return task;
        },
        { projectKey, taskType }
      );
    },
  };
}
