import { isProjectType, isTaskType, type Status } from '../jira/types.js';
import { CliParseError, InvalidStatusFilterError, type TrackerError } from '../utils/errors.js';
import type { CliOutput } from './output.js';
import type { CommandHandler, OptionValue, ParsedInvocation } from './types.js';

function optionalString(invocation: ParsedInvocation, name: string): string | undefined {
  const value: OptionValue = invocation.options[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function requiredString(invocation: ParsedInvocation, name: string): string {
  const value = optionalString(invocation, name);
  if (value === undefined) {
    throw new CliParseError(`error: required option '--${name}' not specified`, { argv: invocation.path });
  }
  return value;
}

function stringList(invocation: ParsedInvocation, name: string): string[] | undefined {
  const value = invocation.options[name];
  if (value === undefined) return undefined;
  const list = (Array.isArray(value) ? value : [value]).filter((item) => item.length > 0);
  return list.length > 0 ? list : undefined;
}

function reportFailure(output: CliOutput, action: string, error: TrackerError): number {
  output.error(`Failed to ${action}: ${error.message}`);
  if (error instanceof InvalidStatusFilterError) {
    output.error(`Run 'tracker jira project statuses --project ${error.projectKey}' to see the statuses this project accepts.`);
  }
  return 1;
}

export const listProjects: CommandHandler = async (_invocation, { tracker, output }) => {
  const result = await tracker.listProjects();
  if (!result.ok) {
    return reportFailure(output, 'list projects', result.error);
  }

  if (result.value.length === 0) {
    output.log('No projects found.');
    return 0;
  }

  output.log('Jira Projects:');
  for (const project of result.value) {
    output.log(`- ${project.key}: ${project.name}`);
  }
  return 0;
};

export const createProject: CommandHandler = async (invocation, { tracker, output }) => {
  const type = optionalString(invocation, 'type');
  const result = await tracker.createProject({
    name: requiredString(invocation, 'name'),
    key: requiredString(invocation, 'key'),
    projectType: isProjectType(type) ? type : undefined,
  });
  if (!result.ok) {
    return reportFailure(output, 'create project', result.error);
  }

  output.log('Project created successfully:');
  output.log(`- Key: ${result.value.key}`);
  output.log(`- Name: ${result.value.name}`);
  return 0;
};

function printStatus(output: CliOutput, status: Status): void {
  output.log(`- ${status.id} - ${status.name}`);
  if (status.description) {
    output.log(`  Description: ${status.description}`);
  }
  if (status.category) {
    output.log(`  Category: ${status.category}`);
  }
}

export const listStatuses: CommandHandler = async (invocation, { tracker, output }) => {
  const projectKey = optionalString(invocation, 'project');
  const result = await tracker.getStatuses(projectKey);
  if (!result.ok) {
    return reportFailure(output, 'retrieve statuses', result.error);
  }

  const statuses = result.value;
  if (statuses.length === 0) {
    output.log('No statuses found.');
    return 0;
  }

  output.log(projectKey ? `Statuses for Project ${projectKey.toUpperCase()}:` : 'Statuses:');

  if (!projectKey) {
    statuses.forEach((status) => printStatus(output, status));
    return 0;
  }

  const byIssueType = new Map<string, Status[]>();
  for (const status of statuses) {
    const issueType = status.issueType ?? 'Unknown';
    byIssueType.set(issueType, [...(byIssueType.get(issueType) ?? []), status]);
  }

  for (const [issueType, typeStatuses] of byIssueType) {
    output.log('');
    output.log(`${issueType} Issue Type Statuses:`);
    typeStatuses.forEach((status) => printStatus(output, status));
  }
  return 0;
};

export const createTask: CommandHandler = async (invocation, { tracker, output }) => {
  const type = optionalString(invocation, 'type');
  const result = await tracker.createTask({
    projectKey: requiredString(invocation, 'project'),
    summary: requiredString(invocation, 'summary'),
    description: optionalString(invocation, 'description'),
    taskType: isTaskType(type) ? type : undefined,
  });
  if (!result.ok) {
    return reportFailure(output, 'create task', result.error);
  }

  output.log('Task created successfully:');
  output.log(`- Key: ${result.value.key}`);
  output.log(`- Summary: ${result.value.summary}`);
  output.log(`- Project: ${result.value.projectKey}`);
  return 0;
};

export const listTasks: CommandHandler = async (invocation, { tracker, output }) => {
  const projectKey = requiredString(invocation, 'project');
  const result = await tracker.listTasks({
    projectKey,
    assignee: optionalString(invocation, 'assignee'),
    status: optionalString(invocation, 'status'),
    labels: stringList(invocation, 'labels'),
    sprint: optionalString(invocation, 'sprint'),
  });
  if (!result.ok) {
    return reportFailure(output, 'list tasks', result.error);
  }

  if (result.value.length === 0) {
    output.log('No tasks found matching the specified criteria.');
    return 0;
  }

  output.log(`Tasks for Project ${projectKey.toUpperCase()}:`);
  for (const task of result.value) {
    output.log(`- ${task.key}: ${task.summary}`);
    output.log(`  Status: ${task.status}`);
    output.log(`  Assignee: ${task.assignee}`);
    if (task.labels.length > 0) {
      output.log(`  Labels: ${task.labels.join(', ')}`);
    }
  }
  return 0;
};
