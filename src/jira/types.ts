import type { TrackerError } from '../utils/errors.js';

export const PROJECT_TYPES = ['software', 'service'] as const;
export type ProjectType = (typeof PROJECT_TYPES)[number];

export const TASK_TYPES = ['Task', 'Sub-task', 'Epic'] as const;
export type TaskType = (typeof TASK_TYPES)[number];

export const DEFAULT_PROJECT_TYPE: ProjectType = 'software';
export const DEFAULT_TASK_TYPE: TaskType = 'Task';

export function isProjectType(value: unknown): value is ProjectType {
  return typeof value === 'string' && (PROJECT_TYPES as readonly string[]).includes(value);
}

export function isTaskType(value: unknown): value is TaskType {
  return typeof value === 'string' && (TASK_TYPES as readonly string[]).includes(value);
}

export interface Project {
  key: string;
  name: string;
  id?: string;
}

export interface Task {
  key: string;
  summary: string;
  description?: string;
  status: string;
  /** Display name of the assignee, or "Unassigned" */
  assignee: string;
  projectKey: string;
  labels: string[];
}

export interface Status {
  id: string;
  name: string;
  description?: string;
  category?: string;
  /** Only set when statuses were looked up for a single project */
  issueType?: string;
}

export interface CreateProjectInput {
  name: string;
  key: string;
  projectType?: ProjectType;
}

export interface TaskQuery {
  projectKey: string;
  assignee?: string;
  labels?: string[];
  sprint?: string;
  status?: string;
}

export interface CreateTaskInput {
  projectKey: string;
  summary: string;
  description?: string;
  taskType?: TaskType;
}

export type TrackerResult<T> = { ok: true; value: T } | { ok: false; error: TrackerError };

export const UNASSIGNED = 'Unassigned';
export const UNKNOWN_STATUS = 'Unknown';
