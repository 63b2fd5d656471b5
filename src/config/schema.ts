import { z } from 'zod';

/**
 * Configuration Schema for the tracker CLI
 *
 * Configuration can be provided via:
 *   1. Environment variables (or a .env file)
 *   2. JSON config file (tracker-cli.config.json)
 *   3. Default values
 *
 * Priority: Environment variables > Config file > Defaults
 */
export const ConfigSchema = z.object({
  /**
   * Issue tracker connection
   */
  jira: z.object({
    /** Base URL of the Jira site, e.g. https://example.atlassian.net */
    baseUrl: z.string({ required_error: 'Jira base URL is required' }).url('Jira base URL must be a valid URL'),
    /** Account email or username used for basic auth */
    username: z.string({ required_error: 'Jira username is required' }).min(1, 'Jira username is required'),
    /** API token paired with the username */
    apiToken: z.string({ required_error: 'Jira API token is required' }).min(1, 'Jira API token is required'),
    /** HTTP timeout for a single request in milliseconds */
    timeoutMs: z.number().int().min(1000).max(300000).default(30000),
  }),

  /**
   * Generative-text API settings. Loaded and validated, but no command uses them yet.
   */
  generative: z.object({
    apiKey: z.string().min(1).optional(),
    modelName: z.string().min(1).optional(),
  }).default({}),

  logging: z.object({
    /** Minimum console log level */
    level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
    /** Console format: pretty (colored text) or json */
    format: z.enum(['pretty', 'json']).default('pretty'),
    /** Diagnostic log file, appended to on every command run */
    file: z.string().min(1).default('tracker-cli.log'),
    enableFile: z.boolean().default(true),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Input shape accepted before defaults are applied
 */
export type ConfigInput = z.input<typeof ConfigSchema>;
