import { Command, CommanderError, Option } from 'commander';
import type { TrackerClient } from '../jira/tracker.js';
import { logger } from '../utils/logger.js';
import { CliParseError } from '../utils/errors.js';
import { consoleOutput, type CliOutput } from './output.js';
import { formatFlag, renderHelp } from './help.js';
import { COMMAND_GROUPS, PROGRAM_NAME, TOOL_NAME, commandsInGroup, isHelpTrigger } from './registry.js';
import type { CommandDescriptor, OptionSpec, OptionValue, ParsedInvocation } from './types.js';

export type DispatchOutcome = 'help' | 'command' | 'parse-failure';

export interface DispatchResult {
  exitCode: number;
  outcome: DispatchOutcome;
  /** Help context that was rendered, when outcome is 'help' */
  helpContext?: string;
  /** Leaf that ran, when outcome is 'command' */
  invocation?: ParsedInvocation;
  error?: CliParseError;
}

export interface DispatchDependencies {
  /** Called once, only when a leaf command is about to run */
  createTracker: () => TrackerClient;
  output?: CliOutput;
}

const log = logger.child('Dispatcher');

function toOptionValue(value: unknown): OptionValue {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return undefined;
}

function buildOption(spec: OptionSpec): Option {
  const option = new Option(formatFlag(spec), spec.description);
  if (spec.choices) option.choices(spec.choices);
  if (spec.defaultValue !== undefined) option.default(spec.defaultValue);
  if (spec.required) option.makeOptionMandatory();
  return option;
}

/**
 * Commander settings shared by every level of the tree. Parse errors are
 * thrown instead of exiting and help is rendered by renderHelp only.
 */
function configure(command: Command, output: CliOutput): Command {
  return command
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output.log(str.trimEnd()),
      writeErr: (str) => output.error(str.trimEnd()),
    })
    .helpOption(false)
    .helpCommand(false);
}

function rejectExtraTokens(command: Command): void {
  if (command.args.length > 0) {
    command.error(`error: unknown command '${command.args[0]}'`, { code: 'commander.unknownCommand', exitCode: 1 });
  }
}

export interface DispatchState {
  result?: DispatchResult;
}

/**
 * Build the `jira` command tree from the registry
 */
export function createJiraCommand(
  dependencies: DispatchDependencies,
  state: DispatchState,
  output: CliOutput
): Command {
  const showHelp = (context: string): void => {
    renderHelp(output, context);
    state.result = { exitCode: 0, outcome: 'help', helpContext: context };
  };

  const jira = configure(new Command(TOOL_NAME), output)
    .description('Jira-related commands')
    .action((_options: unknown, command: Command) => {
      rejectExtraTokens(command);
      showHelp(TOOL_NAME);
    });

  for (const group of COMMAND_GROUPS) {
    const groupCommand = jira
      .command(group.name)
      .description(group.description)
      .action((_options: unknown, command: Command) => {
        rejectExtraTokens(command);
        showHelp(`${TOOL_NAME} ${group.name}`);
      });

    for (const descriptor of commandsInGroup(group.name)) {
      addLeaf(groupCommand, descriptor, dependencies, state, output);
    }
  }

  return jira;
}

function addLeaf(
  parent: Command,
  descriptor: CommandDescriptor,
  dependencies: DispatchDependencies,
  state: DispatchState,
  output: CliOutput
): void {
  const leaf = parent
    .command(descriptor.name)
    .description(descriptor.description)
    .allowExcessArguments(false);

  for (const spec of descriptor.options) {
    leaf.addOption(buildOption(spec));
  }

  leaf.action(async (_options: unknown, command: Command) => {
    const values = command.opts();
    const invocation: ParsedInvocation = {
      path: [descriptor.category, descriptor.name],
      options: {},
    };
    for (const spec of descriptor.options) {
      invocation.options[spec.name] = toOptionValue(values[spec.name]);
    }

    log.debug(`Running ${TOOL_NAME} ${descriptor.category} ${descriptor.name}`, { options: invocation.options });
    const tracker = dependencies.createTracker();
    const exitCode = await descriptor.handler(invocation, { tracker, output });
    state.result = { exitCode, outcome: 'command', invocation };
  });
}

function createProgram(dependencies: DispatchDependencies, state: DispatchState, output: CliOutput): Command {
  const program = configure(new Command(PROGRAM_NAME), output)
    .description('Command-line client for Jira projects and tasks')
    .action((_options: unknown, command: Command) => {
      rejectExtraTokens(command);
      renderHelp(output);
      state.result = { exitCode: 0, outcome: 'help' };
    });

  program.addCommand(createJiraCommand(dependencies, state, output));
  return program;
}

function parseFailure(error: CliParseError): DispatchResult {
  return { exitCode: error.exitCode, outcome: 'parse-failure', error };
}

/**
 * Route one invocation: help, a single leaf handler, or a parse failure.
 * Help triggers are checked before commander sees the arguments, so a
 * command with missing options can still show its help.
 */
export async function dispatch(argv: readonly string[], dependencies: DispatchDependencies): Promise<DispatchResult> {
  const output = dependencies.output ?? consoleOutput;
  log.debug('Dispatching', { argv });

  if (argv.length === 0) {
    renderHelp(output);
    return { exitCode: 0, outcome: 'help' };
  }

  if (isHelpTrigger(argv[argv.length - 1])) {
    const context = argv.slice(0, -1).join(' ');
    renderHelp(output, context || undefined);
    return { exitCode: 0, outcome: 'help', helpContext: context || undefined };
  }

  if (isHelpTrigger(argv[0])) {
    renderHelp(output);
    return { exitCode: 0, outcome: 'help' };
  }

  const state: DispatchState = {};
  const program = createProgram(dependencies, state, output);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander has already written the message through writeErr
      log.debug('Command line rejected', { code: error.code, argv });
      return parseFailure(
        new CliParseError(error.message, { exitCode: error.exitCode || 1, commanderCode: error.code, argv })
      );
    }
    if (error instanceof CliParseError) {
      output.error(error.message);
      return parseFailure(error);
    }
    throw error;
  }

  if (state.result) {
    return state.result;
  }

  renderHelp(output);
  return { exitCode: 0, outcome: 'help' };
}
