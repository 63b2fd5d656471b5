import {
  DEFAULT_PROJECT_TYPE,
  DEFAULT_TASK_TYPE,
  PROJECT_TYPES,
  TASK_TYPES,
} from '../jira/types.js';
import { createProject, createTask, listProjects, listStatuses, listTasks } from './handlers.js';
import type { CommandDescriptor, CommandGroup } from './types.js';

/** Installed binary name */
export const PROGRAM_NAME = 'tracker';

/** First command token; every command lives under it */
export const TOOL_NAME = 'jira';

export const HELP_TRIGGERS: readonly string[] = ['help', '-h', '--help'];

export const COMMAND_GROUPS: readonly CommandGroup[] = [
  { name: 'project', description: 'Manage Jira projects' },
  { name: 'task', description: 'Manage Jira tasks' },
];

export const COMMAND_REGISTRY: readonly CommandDescriptor[] = [
  {
    category: 'project',
    name: 'list',
    description: 'List all Jira projects',
    summary: 'Lists all available Jira projects',
    usage: 'tracker jira project list',
    options: [],
    handler: listProjects,
  },
  {
    category: 'project',
    name: 'create',
    description: 'Create a new Jira project',
    summary: 'Creates a new Jira project',
    usage: "tracker jira project create --name 'Project Name' --key PROJ --type software",
    options: [
      { name: 'name', valueName: 'name', description: 'Project name', required: true },
      { name: 'key', valueName: 'key', description: 'Project key, must be unique', required: true },
      {
        name: 'type',
        valueName: 'type',
        description: 'Project type',
        required: false,
        defaultValue: DEFAULT_PROJECT_TYPE,
        choices: PROJECT_TYPES,
      },
    ],
    handler: createProject,
  },
  {
    category: 'project',
    name: 'statuses',
    description: 'List available statuses for a Jira project',
    summary: 'Lists available statuses for a Jira project',
    usage: 'tracker jira project statuses [--project PROJECT_KEY]',
    options: [
      { name: 'project', valueName: 'key', description: 'Project key', required: false },
    ],
    handler: listStatuses,
  },
  {
    category: 'task',
    name: 'create',
    description: 'Create a new Jira task',
    summary: 'Creates a new Jira task',
    usage: "tracker jira task create --project PROJ --summary 'Task Summary' --type Task",
    options: [
      { name: 'project', valueName: 'key', description: 'Project key', required: true },
      { name: 'summary', valueName: 'text', description: 'Task summary', required: true },
      { name: 'description', valueName: 'text', description: 'Task description', required: false },
      {
        name: 'type',
        valueName: 'type',
        description: 'Task type',
        required: false,
        defaultValue: DEFAULT_TASK_TYPE,
        choices: TASK_TYPES,
      },
    ],
    handler: createTask,
  },
  {
    category: 'task',
    name: 'list',
    description: 'List tasks for a project',
    summary: 'Lists tasks for a project with optional filters',
    usage:
      'tracker jira task list --project KEY [--assignee USER] [--status STATUS] [--labels LABEL1 LABEL2] [--sprint SPRINT]',
    options: [
      { name: 'project', valueName: 'key', description: 'Project key', required: true },
      { name: 'assignee', valueName: 'user', description: "Assignee, or 'unassigned'", required: false },
      { name: 'status', valueName: 'status', description: 'Exact status name from the project workflow', required: false },
      { name: 'labels', valueName: 'labels', description: 'One or more labels', required: false, variadic: true },
      { name: 'sprint', valueName: 'sprint', description: 'Sprint name or id', required: false },
    ],
    handler: listTasks,
  },
];

export function commandsInGroup(category: string): CommandDescriptor[] {
  return COMMAND_REGISTRY.filter((command) => command.category === category);
}

export function isHelpTrigger(token: string | undefined): boolean {
  return token !== undefined && HELP_TRIGGERS.includes(token);
}
