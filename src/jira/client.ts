import { Version2Client } from 'jira.js';
import { logger } from '../utils/logger.js';
import { ErrorCode, TrackerError } from '../utils/errors.js';

export interface JiraClientOptions {
  baseUrl: string;
  username: string;
  apiToken: string;
  /** Timeout for individual API calls in milliseconds (default: 30000) */
  timeoutMs?: number;
}

/**
 * Project as returned by the project search endpoint
 */
export interface RawProject {
  id?: string;
  key: string;
  name: string;
}

export interface RawProjectPage {
  values: RawProject[];
  isLast: boolean;
}

export interface RawCreateProject {
  key: string;
  name: string;
  projectTypeKey: 'software' | 'service_desk';
  leadAccountId: string;
}

export interface RawCreatedProject {
  id: string;
  key: string;
}

export interface RawIssue {
  key: string;
  fields: {
    summary?: string;
    description?: unknown;
    status?: { name?: string };
    assignee?: { displayName?: string } | null;
    labels?: string[];
    project?: { key?: string };
  };
}

/**
 * One page of the token-paged JQL search. `nextPageToken` is absent on the last page.
 */
export interface RawIssuePage {
  issues: RawIssue[];
  nextPageToken?: string;
  isLast: boolean;
}

export interface RawIssueSearch {
  jql: string;
  nextPageToken?: string;
  maxResults: number;
  fields: string[];
}

export interface RawStatus {
  id: string;
  name: string;
  description?: string;
  categoryName?: string;
}

export interface RawIssueTypeStatuses {
  issueType: string;
  statuses: RawStatus[];
}

export interface RawCreateIssue {
  projectKey: string;
  summary: string;
  description?: string;
  issueType: string;
}

export interface RawCreatedIssue {
  id: string;
  key: string;
}

/**
 * The slice of the Jira REST API the tracker needs. Production code goes
 * through jira.js; tests provide an in-memory implementation.
 */
export interface JiraApi {
  searchProjects(page: { startAt: number; maxResults: number }): Promise<RawProjectPage>;
  createProject(input: RawCreateProject): Promise<RawCreatedProject>;
  getCurrentUserAccountId(): Promise<string>;
  searchIssues(search: RawIssueSearch): Promise<RawIssuePage>;
  getStatuses(): Promise<RawStatus[]>;
  getProjectStatuses(projectKey: string): Promise<RawIssueTypeStatuses[]>;
  createIssue(input: RawCreateIssue): Promise<RawCreatedIssue>;
}

interface StatusLike {
  id?: string;
  name?: string;
  description?: string;
  statusCategory?: { name?: string };
}

function mapStatus(status: StatusLike): RawStatus {
  return {
    id: status.id ?? '',
    name: status.name ?? '',
    description: status.description || undefined,
    categoryName: status.statusCategory?.name,
  };
}

/**
 * Create a JiraApi backed by the jira.js REST v2 client
 */
export function createJiraApi(options: JiraClientOptions): JiraApi {
  const client = new Version2Client({
    host: options.baseUrl,
    authentication: {
      basic: {
        email: options.username,
        apiToken: options.apiToken,
      },
    },
    baseRequestConfig: {
      timeout: options.timeoutMs ?? 30000,
    },
  });

  logger.debug('Jira client created', { host: options.baseUrl, timeoutMs: options.timeoutMs ?? 30000 });

  return {
    async searchProjects({ startAt, maxResults }) {
      const page = await client.projects.searchProjects({ startAt, maxResults });
      return {
        values: (page.values ?? []).map((project) => ({
          id: project.id,
          key: project.key ?? '',
          name: project.name ?? '',
        })),
        isLast: page.isLast ?? true,
      };
    },

    async createProject(input) {
      const created = await client.projects.createProject({
        key: input.key,
        name: input.name,
        projectTypeKey: input.projectTypeKey,
        leadAccountId: input.leadAccountId,
      });
      return { id: String(created.id), key: created.key ?? input.key };
    },

    async getCurrentUserAccountId() {
      const user = await client.myself.getCurrentUser();
      if (!user.accountId) {
        throw new TrackerError(ErrorCode.TRACKER_API_ERROR, 'Jira did not return an account id for the current user', {
          operation: 'get current user',
        });
      }
      return user.accountId;
    },

    async searchIssues(search) {
      const result = await client.issueSearch.searchForIssuesUsingJqlEnhancedSearch({
        jql: search.jql,
        nextPageToken: search.nextPageToken,
        maxResults: search.maxResults,
        fields: search.fields,
      });
      return {
        issues: (result.issues ?? []).map((issue) => ({
          key: issue.key ?? '',
          fields: {
            summary: issue.fields?.summary,
            description: issue.fields?.description,
            status: { name: issue.fields?.status?.name },
            assignee: issue.fields?.assignee ? { displayName: issue.fields.assignee.displayName } : null,
            labels: issue.fields?.labels,
            project: { key: issue.fields?.project?.key },
          },
        })),
        nextPageToken: result.nextPageToken,
        isLast: !result.nextPageToken,
      };
    },

    async getStatuses() {
      const statuses = await client.workflowStatuses.getStatuses();
      return statuses.map(mapStatus);
    },

    async getProjectStatuses(projectKey) {
      const issueTypes = await client.projects.getAllStatuses({ projectIdOrKey: projectKey });
      return issueTypes.map((issueType) => ({
        issueType: issueType.name ?? 'Unknown',
        statuses: (issueType.statuses ?? []).map(mapStatus),
      }));
    },

    async createIssue(input) {
      const created = await client.issues.createIssue({
        fields: {
          project: { key: input.projectKey },
          summary: input.summary,
          issuetype: { name: input.issueType },
          ...(input.description ? { description: input.description } : {}),
        },
      });
      return { id: created.id, key: created.key };
    },
  };
}
