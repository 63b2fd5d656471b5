import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { config as loadEnv } from 'dotenv';
import type { ZodIssue } from 'zod';
import { ConfigSchema, type Config } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigError, ErrorCode, type RecoveryAction } from '../utils/errors.js';

export { ConfigSchema, type Config, type ConfigInput } from './schema.js';

// Load .env file
loadEnv();

export const DEFAULT_CONFIG_PATHS = ['./tracker-cli.config.json', './.tracker-cli.json'];

/**
 * Configuration field metadata for help and validation messages
 */
const configFieldHelp: Record<string, { description: string; envVar: string; example: string }> = {
  'jira.baseUrl': {
    description: 'Base URL of your Jira site',
    envVar: 'JIRA_BASE_URL',
    example: 'https://example.atlassian.net',
  },
  'jira.username': {
    description: 'Jira account email used for authentication',
    envVar: 'JIRA_USERNAME',
    example: 'user@example.com',
  },
  'jira.apiToken': {
    description: 'Jira API token for the account above',
    envVar: 'JIRA_API_TOKEN',
    example: 'test-token',
  },
  'jira.timeoutMs': {
    description: 'Timeout for a single Jira request in milliseconds (1000-300000)',
    envVar: 'JIRA_TIMEOUT_MS',
    example: '30000',
  },
  'generative.apiKey': {
    description: 'API key for the generative-text service (optional, currently unused)',
    envVar: 'GEMINI_API_KEY',
    example: 'test-key',
  },
  'generative.modelName': {
    description: 'Model name for the generative-text service (optional, currently unused)',
    envVar: 'GEMINI_MODEL_NAME',
    example: 'gemini-1.5-flash',
  },
  'logging.level': {
    description: 'Minimum console log level (debug, info, warn, error)',
    envVar: 'LOG_LEVEL',
    example: 'warn',
  },
  'logging.format': {
    description: 'Console log format: pretty or json',
    envVar: 'LOG_FORMAT',
    example: 'pretty',
  },
  'logging.file': {
    description: 'Path of the diagnostic log file',
    envVar: 'LOG_FILE',
    example: 'tracker-cli.log',
  },
  'logging.enableFile': {
    description: 'Write the diagnostic log file',
    envVar: 'LOG_ENABLE_FILE',
    example: 'true',
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = source[key];
  return isRecord(value) ? value : {};
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function envString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Numbers from the environment; anything unparsable is passed through so the
 * schema reports it.
 */
function envNumber(value: string | undefined): number | string | undefined {
  const raw = envString(value);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : raw;
}

function envBoolean(value: string | undefined): boolean | string | undefined {
  const raw = envString(value)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (raw === 'true' || raw === '1' || raw === 'yes') return true;
  if (raw === 'false' || raw === '0' || raw === 'no') return false;
  return raw;
}

function readConfigFile(fullPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Failed to parse config file ${fullPath}: ${error instanceof Error ? error.message : String(error)}`,
      {
        context: { configPath: fullPath },
        recoveryActions: [
          { description: 'Verify your config file is valid JSON', automatic: false },
        ],
        cause: error instanceof Error ? error : undefined,
      }
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Config file ${fullPath} must contain a JSON object`, {
      context: { configPath: fullPath },
    });
  }

  return parsed;
}

function issuePath(issue: ZodIssue): string {
  return issue.path.join('.') || 'root';
}

function isMissingValue(issue: ZodIssue): boolean {
  return issue.code === 'invalid_type' && issue.received === 'undefined';
}

function buildRecoveryActions(issues: ZodIssue[]): RecoveryAction[] {
  const actions: RecoveryAction[] = [];

  for (const issue of issues) {
    const help = configFieldHelp[issuePath(issue)];
    if (help) {
      actions.push({
        description: `Set ${help.envVar} (${help.description}), e.g. ${help.envVar}=${help.example}`,
        automatic: false,
      });
    }
  }

  actions.push({
    description: 'Add the values to a .env file in the working directory',
    automatic: false,
  });

  return actions;
}

/**
 * Turn schema issues into a ConfigError. Missing values get their own code
 * and a message naming the environment variables to set.
 */
function createConfigValidationError(issues: ZodIssue[], configPath?: string): ConfigError {
  const missing = issues.filter(isMissingValue);

  if (missing.length > 0) {
    const names = missing.map((issue) => configFieldHelp[issuePath(issue)]?.envVar ?? issuePath(issue));
    return new ConfigError(
      ErrorCode.CONFIG_MISSING_REQUIRED,
      `Missing required configuration: ${names.join(', ')}`,
      {
        field: issuePath(missing[0]),
        recoveryActions: buildRecoveryActions(missing),
        context: { missing: names, configPath },
      }
    );
  }

  const messages = issues.map((issue) => {
    const envVar = configFieldHelp[issuePath(issue)]?.envVar;
    return `${issuePath(issue)}: ${issue.message}${envVar ? ` (${envVar})` : ''}`;
  });

  return new ConfigError(
    ErrorCode.CONFIG_VALIDATION_FAILED,
    `Configuration validation failed: ${messages.join('; ')}`,
    {
      field: issues[0] ? issuePath(issues[0]) : undefined,
      recoveryActions: buildRecoveryActions(issues),
      context: {
        validationErrors: issues.map((issue) => ({ path: issuePath(issue), message: issue.message, code: issue.code })),
        configPath,
      },
    }
  );
}

/**
 * Options for loading configuration
 */
export interface LoadConfigOptions {
  /** Environment to read from (default: process.env) */
  env?: NodeJS.ProcessEnv;
}

export function loadConfig(configPath?: string, options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const explicitPath = configPath ?? envString(env.TRACKER_CONFIG);
  let fileConfig: Record<string, unknown> = {};
  let configLoadPath: string | undefined;

  if (explicitPath && !existsSync(resolve(explicitPath))) {
    throw new ConfigError(ErrorCode.CONFIG_PARSE_ERROR, `Config file not found: ${resolve(explicitPath)}`, {
      context: { configPath: resolve(explicitPath) },
    });
  }

  const possiblePaths = explicitPath ? [explicitPath] : DEFAULT_CONFIG_PATHS;
  for (const path of possiblePaths) {
    const fullPath = resolve(path);
    if (existsSync(fullPath)) {
      fileConfig = readConfigFile(fullPath);
      configLoadPath = fullPath;
      logger.debug(`Loaded config from ${fullPath}`);
      break;
    }
  }

  const merged = {
    jira: {
      ...section(fileConfig, 'jira'),
      ...definedOnly({
        baseUrl: envString(env.JIRA_BASE_URL),
        username: envString(env.JIRA_USERNAME),
        apiToken: envString(env.JIRA_API_TOKEN),
        timeoutMs: envNumber(env.JIRA_TIMEOUT_MS),
      }),
    },
    generative: {
      ...section(fileConfig, 'generative'),
      ...definedOnly({
        apiKey: envString(env.GEMINI_API_KEY),
        modelName: envString(env.GEMINI_MODEL_NAME),
      }),
    },
    logging: {
      ...section(fileConfig, 'logging'),
      ...definedOnly({
        level: envString(env.LOG_LEVEL),
        format: envString(env.LOG_FORMAT),
        file: envString(env.LOG_FILE),
        enableFile: envBoolean(env.LOG_ENABLE_FILE),
      }),
    },
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    throw createConfigValidationError(result.error.issues, configLoadPath);
  }

  if (!result.data.generative.apiKey || !result.data.generative.modelName) {
    logger.debug('Generative-text API is not configured (GEMINI_API_KEY / GEMINI_MODEL_NAME)');
  }

  return result.data;
}

/**
 * Generate configuration help text
 */
export function getConfigHelp(): string {
  let output = 'CONFIGURATION\n';
  output += '─'.repeat(60) + '\n\n';

  for (const [field, help] of Object.entries(configFieldHelp)) {
    output += `  ${help.envVar.padEnd(18)} ${help.description}\n`;
    output += `  ${''.padEnd(18)} Config file: ${field}, example: ${help.example}\n`;
  }

  output += '\n  Config files are searched in this order:\n';
  output += '    1. Path in the TRACKER_CONFIG environment variable\n';
  DEFAULT_CONFIG_PATHS.forEach((path, index) => {
    output += `    ${index + 2}. ${path}\n`;
  });

  return output;
}
