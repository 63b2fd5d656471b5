import { COMMAND_GROUPS, COMMAND_REGISTRY, PROGRAM_NAME, TOOL_NAME, commandsInGroup } from './registry.js';
import type { CommandDescriptor, OptionSpec } from './types.js';
import type { CliOutput } from './output.js';

const TITLE = 'Jira CLI Tool Help';

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

export function formatFlag(option: OptionSpec): string {
  return `--${option.name} <${option.valueName}${option.variadic ? '...' : ''}>`;
}

/**
 * One line of the Options section, e.g.
 * `  --type <type>          Project type: software, service (optional, default: software)`
 */
export function formatOptionLine(option: OptionSpec): string {
  let text = option.description;
  if (option.choices) {
    text += `: ${option.choices.join(', ')}`;
  }
  if (option.required) {
    text += ' (required)';
  } else if (option.defaultValue !== undefined) {
    text += ` (optional, default: ${option.defaultValue})`;
  } else {
    text += ' (optional)';
  }
  return `  ${formatFlag(option).padEnd(23)}${text}`;
}

function topLevelHelp(): string[] {
  return [
    '',
    `Usage: ${PROGRAM_NAME} ${TOOL_NAME} [command] [subcommand] [options]`,
    '',
    'Commands:',
    ...COMMAND_GROUPS.map((group) => `  ${`${TOOL_NAME} ${group.name}`.padEnd(15)}${group.description}`),
    '',
    `Use '${PROGRAM_NAME} ${TOOL_NAME} [command] --help' for more information about a command.`,
  ];
}

function toolHelp(): string[] {
  return [
    '',
    'Available Jira Commands:',
    ...COMMAND_GROUPS.map((group) => `  ${group.name.padEnd(10)}${group.description}`),
  ];
}

function groupHelp(category: string): string[] {
  return [
    '',
    `Jira ${capitalize(category)} Commands:`,
    ...commandsInGroup(category).map((command) => `  ${command.name.padEnd(10)}${command.description}`),
  ];
}

function commandHelp(command: CommandDescriptor): string[] {
  const lines = [
    '',
    `Jira ${capitalize(command.category)} ${capitalize(command.name)} Command:`,
    `  ${command.summary}`,
  ];

  if (command.usage) {
    lines.push('', 'Usage:', `  ${command.usage}`);
  }

  if (command.options.length > 0) {
    lines.push('', 'Options:', ...command.options.map(formatOptionLine));
  }

  return lines;
}

/**
 * Every help context string mapped to its body
 */
function buildContexts(): Map<string, () => string[]> {
  const contexts = new Map<string, () => string[]>();
  contexts.set(TOOL_NAME, toolHelp);
  for (const group of COMMAND_GROUPS) {
    contexts.set(`${TOOL_NAME} ${group.name}`, () => groupHelp(group.name));
  }
  for (const command of COMMAND_REGISTRY) {
    contexts.set(`${TOOL_NAME} ${command.category} ${command.name}`, () => commandHelp(command));
  }
  return contexts;
}

const HELP_CONTEXTS = buildContexts();

export function isKnownHelpContext(context: string): boolean {
  return HELP_CONTEXTS.has(context);
}

export function knownHelpContexts(): string[] {
  return [...HELP_CONTEXTS.keys()];
}

/**
 * Help text for a context such as `jira task list`. Unknown or missing
 * contexts get the top-level summary.
 */
export function formatHelp(context?: string): string[] {
  const body = (context !== undefined ? HELP_CONTEXTS.get(context) : undefined) ?? topLevelHelp;
  return [TITLE, '='.repeat(TITLE.length), ...body()];
}

export function renderHelp(output: CliOutput, context?: string): void {
  for (const line of formatHelp(context)) {
    output.log(line);
  }
}
