/**
 * Structured error handling system with error codes, severity levels, and recovery suggestions.
 */

/**
 * Error severity levels
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'transient';

/**
 * Error codes for all known error types
 */
export enum ErrorCode {
  // Tracker errors
  TRACKER_AUTH_FAILED = 'TRACKER_AUTH_FAILED',
  TRACKER_PERMISSION_DENIED = 'TRACKER_PERMISSION_DENIED',
  TRACKER_NOT_FOUND = 'TRACKER_NOT_FOUND',
  TRACKER_REQUEST_REJECTED = 'TRACKER_REQUEST_REJECTED',
  TRACKER_NETWORK_ERROR = 'TRACKER_NETWORK_ERROR',
  TRACKER_API_ERROR = 'TRACKER_API_ERROR',
  TRACKER_INVALID_STATUS_FILTER = 'TRACKER_INVALID_STATUS_FILTER',

  // Configuration errors
  CONFIG_MISSING_REQUIRED = 'CONFIG_MISSING_REQUIRED',
  CONFIG_PARSE_ERROR = 'CONFIG_PARSE_ERROR',
  CONFIG_VALIDATION_FAILED = 'CONFIG_VALIDATION_FAILED',

  // Command line errors
  CLI_PARSE_FAILED = 'CLI_PARSE_FAILED',

  // General errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

/**
 * Recovery action that can be taken for an error
 */
export interface RecoveryAction {
  description: string;
  automatic: boolean;
}

/**
 * Context information for debugging
 */
export interface ErrorContext {
  operation?: string;
  component?: string;
  timestamp?: string;
  [key: string]: unknown;
}

interface StructuredErrorOptions {
  severity?: ErrorSeverity;
  recoveryActions?: RecoveryAction[];
  context?: ErrorContext;
  cause?: Error;
  isRetryable?: boolean;
}

/**
 * Base structured error class
 */
export class StructuredError extends Error {
  public readonly code: ErrorCode;
  public readonly severity: ErrorSeverity;
  public readonly recoveryActions: RecoveryAction[];
  public readonly context: ErrorContext;
  declare readonly cause?: Error;
  public readonly isRetryable: boolean;
  public readonly timestamp: string;

  constructor(code: ErrorCode, message: string, options: StructuredErrorOptions = {}) {
    super(message);
    this.name = 'StructuredError';
    this.code = code;
    this.severity = options.severity ?? this.inferSeverity(code);
    this.recoveryActions = options.recoveryActions ?? [];
    this.timestamp = new Date().toISOString();
    this.context = {
      ...options.context,
      timestamp: this.timestamp,
    };
    this.cause = options.cause;
    this.isRetryable = options.isRetryable ?? this.inferRetryable(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  private inferSeverity(code: ErrorCode): ErrorSeverity {
    const transientCodes = [ErrorCode.TRACKER_NETWORK_ERROR];
    if (transientCodes.includes(code)) return 'transient';

    const criticalCodes = [
      ErrorCode.TRACKER_AUTH_FAILED,
      ErrorCode.CONFIG_MISSING_REQUIRED,
      ErrorCode.CONFIG_VALIDATION_FAILED,
    ];
    if (criticalCodes.includes(code)) return 'critical';

    return 'error';
  }

  private inferRetryable(code: ErrorCode): boolean {
    return code === ErrorCode.TRACKER_NETWORK_ERROR;
  }

  getRecoverySuggestions(): string[] {
    return this.recoveryActions.map((a) => a.description);
  }
}

/**
 * How a failed tracker call is reported to the command layer
 */
export type TrackerErrorKind = 'RemoteOperationFailed' | 'InvalidStatusFilter';

/**
 * Tracker-specific error. Every failure of the remote issue tracker is
 * surfaced as one of these; library exception types never escape the adapter.
 */
export class TrackerError extends StructuredError {
  public readonly kind: TrackerErrorKind;
  public readonly statusCode?: number;
  public readonly details: string[];

  constructor(
    code: ErrorCode,
    message: string,
    options: {
      statusCode?: number;
      operation?: string;
      details?: string[];
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(code, message, {
      severity: getTrackerSeverity(options.statusCode),
      recoveryActions: options.recoveryActions ?? getTrackerRecoveryActions(code),
      context: {
        ...options.context,
        operation: options.operation,
        statusCode: options.statusCode,
      },
      cause: options.cause,
    });
    this.name = 'TrackerError';
    this.kind = code === ErrorCode.TRACKER_INVALID_STATUS_FILTER ? 'InvalidStatusFilter' : 'RemoteOperationFailed';
    this.statusCode = options.statusCode;
    this.details = options.details ?? [];
  }
}

/**
 * A status filter that the project's workflow does not know about
 */
export class InvalidStatusFilterError extends TrackerError {
  public readonly status: string;
  public readonly projectKey: string;

  constructor(status: string, projectKey: string, options: { cause?: TrackerError } = {}) {
    super(
      ErrorCode.TRACKER_INVALID_STATUS_FILTER,
      `Status '${status}' is not valid for project ${projectKey}`,
      {
        statusCode: options.cause?.statusCode,
        operation: 'list tasks',
        details: options.cause?.details,
        recoveryActions: [
          {
            description: `Run "tracker jira project statuses --project ${projectKey}" to list valid statuses`,
            automatic: false,
          },
        ],
        context: { status, projectKey },
        cause: options.cause,
      }
    );
    this.name = 'InvalidStatusFilterError';
    this.status = status;
    this.projectKey = projectKey;
  }
}

function getTrackerSeverity(statusCode?: number): ErrorSeverity | undefined {
  if (statusCode === undefined) return undefined;
  if (statusCode === 429) return 'transient';
  if (statusCode === 401 || statusCode === 403) return 'critical';
  if (statusCode >= 500) return 'transient';
  return undefined;
}

function getTrackerRecoveryActions(code: ErrorCode): RecoveryAction[] {
  const actions: RecoveryAction[] = [];

  switch (code) {
    case ErrorCode.TRACKER_AUTH_FAILED:
      actions.push({
        description: 'Verify JIRA_USERNAME and JIRA_API_TOKEN are correct',
        automatic: false,
      });
      actions.push({
        description: 'Create a new API token at https://id.atlassian.com/manage-profile/security/api-tokens',
        automatic: false,
      });
      break;

    case ErrorCode.TRACKER_PERMISSION_DENIED:
      actions.push({
        description: 'Ask a Jira administrator for the required project permissions',
        automatic: false,
      });
      break;

    case ErrorCode.TRACKER_NOT_FOUND:
      actions.push({
        description: 'Check the project key with "tracker jira project list"',
        automatic: false,
      });
      break;

    case ErrorCode.TRACKER_NETWORK_ERROR:
      actions.push({
        description: 'Check your network connection and JIRA_BASE_URL',
        automatic: false,
      });
      break;
  }

  return actions;
}

/**
 * Configuration-specific error
 */
export class ConfigError extends StructuredError {
  constructor(
    code: ErrorCode,
    message: string,
    options: {
      field?: string;
      recoveryActions?: RecoveryAction[];
      context?: ErrorContext;
      cause?: Error;
    } = {}
  ) {
    super(code, message, {
      severity: 'critical',
      recoveryActions: options.recoveryActions ?? [
        {
          description: 'Set the missing values in your environment or .env file',
          automatic: false,
        },
      ],
      context: {
        ...options.context,
        field: options.field,
      },
      cause: options.cause,
      isRetryable: false,
    });
    this.name = 'ConfigError';
  }
}

/**
 * Malformed command line input
 */
export class CliParseError extends StructuredError {
  public readonly exitCode: number;

  constructor(message: string, options: { exitCode?: number; commanderCode?: string; argv?: readonly string[] } = {}) {
    super(ErrorCode.CLI_PARSE_FAILED, message, {
      severity: 'error',
      recoveryActions: [
        {
          description: 'Append --help to the command to see its options',
          automatic: false,
        },
      ],
      context: {
        commanderCode: options.commanderCode,
        argv: options.argv,
      },
      isRetryable: false,
    });
    this.name = 'CliParseError';
    this.exitCode = options.exitCode ?? 1;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readStatusCode(error: Record<string, unknown>): number | undefined {
  if (typeof error.status === 'number') return error.status;
  if (isRecord(error.response) && typeof error.response.status === 'number') {
    return error.response.status;
  }
  return undefined;
}

/**
 * Collect Jira's error strings from an `{ errorMessages, errors }` body
 */
function readJiraMessages(error: Record<string, unknown>): string[] {
  const body = isRecord(error.response) && isRecord(error.response.data) ? error.response.data : error;
  const messages: string[] = [];

  if (Array.isArray(body.errorMessages)) {
    for (const message of body.errorMessages) {
      if (typeof message === 'string' && message.length > 0) messages.push(message);
    }
  }

  if (isRecord(body.errors)) {
    for (const [field, message] of Object.entries(body.errors)) {
      if (typeof message === 'string' && message.length > 0) messages.push(`${field}: ${message}`);
    }
  }

  return messages;
}

/**
 * Create a TrackerError from whatever the Jira client threw
 */
export function createTrackerErrorFromResponse(
  error: unknown,
  operation: string,
  context?: ErrorContext
): TrackerError {
  if (error instanceof TrackerError) {
    return error;
  }

  const record = isRecord(error) ? error : {};
  const statusCode = readStatusCode(record);
  const details = readJiraMessages(record);
  const fallbackMessage = error instanceof Error ? error.message : String(error);
  const message = details.length > 0 ? details.join('; ') : fallbackMessage || 'Jira request failed';

  let code: ErrorCode;
  switch (statusCode) {
    case 401:
      code = ErrorCode.TRACKER_AUTH_FAILED;
      break;
    case 403:
      code = ErrorCode.TRACKER_PERMISSION_DENIED;
      break;
    case 404:
      code = ErrorCode.TRACKER_NOT_FOUND;
      break;
    case 400:
    case 409:
      code = ErrorCode.TRACKER_REQUEST_REJECTED;
      break;
    default:
      if (record.code === 'ENOTFOUND' || record.code === 'ECONNREFUSED' || record.code === 'ETIMEDOUT' || record.code === 'ECONNABORTED') {
        code = ErrorCode.TRACKER_NETWORK_ERROR;
      } else {
        code = ErrorCode.TRACKER_API_ERROR;
      }
  }

  return new TrackerError(code, message, {
    statusCode,
    operation,
    details,
    context,
    cause: error instanceof Error ? error : undefined,
  });
}

/**
 * Wrap an error as a StructuredError if it isn't already
 */
export function wrapError(
  error: unknown,
  defaultCode: ErrorCode = ErrorCode.UNKNOWN_ERROR,
  context?: ErrorContext
): StructuredError {
  if (error instanceof StructuredError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new StructuredError(defaultCode, message, {
    context,
    cause,
  });
}

/**
 * Format a StructuredError for display
 */
export function formatError(error: StructuredError): string {
  const lines: string[] = [];

  lines.push(`[${error.code}] ${error.message}`);
  lines.push(`  Severity: ${error.severity}`);

  if (error.recoveryActions.length > 0) {
    lines.push('  Recovery suggestions:');
    for (const action of error.recoveryActions) {
      const prefix = action.automatic ? '(auto)' : '(manual)';
      lines.push(`    ${prefix} ${action.description}`);
    }
  }

  return lines.join('\n');
}
