import type { TrackerClient } from '../jira/tracker.js';
import type { CliOutput } from './output.js';

/**
 * Declarative description of one named flag on a leaf command
 */
export interface OptionSpec {
  /** Option name without dashes; also the key in ParsedInvocation.options */
  name: string;
  /** Placeholder shown in the flag, e.g. `<key>` */
  valueName: string;
  description: string;
  required: boolean;
  defaultValue?: string;
  choices?: readonly string[];
  /** Accept one or more values */
  variadic?: boolean;
}

export type OptionValue = string | string[] | undefined;

export interface ParsedInvocation {
  /** Resolved command path below the tool token, e.g. ['project', 'create'] */
  path: string[];
  options: Record<string, OptionValue>;
}

export interface HandlerContext {
  tracker: TrackerClient;
  output: CliOutput;
}

/**
 * Runs a leaf command and returns the process exit code
 */
export type CommandHandler = (invocation: ParsedInvocation, context: HandlerContext) => Promise<number>;

export interface CommandDescriptor {
  category: string;
  name: string;
  /** One line, used in group listings */
  description: string;
  /** Longer sentence shown in the command's own help */
  summary: string;
  usage?: string;
  options: readonly OptionSpec[];
  handler: CommandHandler;
}

export interface CommandGroup {
  name: string;
  description: string;
}
