#!/usr/bin/env node

import { dispatch } from './cli/dispatcher.js';
import { loadConfig, getConfigHelp, type Config } from './config/index.js';
import { createLazyTracker, createTracker } from './jira/index.js';
import { logger, generateCorrelationId, initStructuredFileLogging } from './utils/logger.js';
import { ConfigError, ErrorCode, wrapError } from './utils/errors.js';

function configureLogging(config: Config): void {
  logger.setLevel(config.logging.level);
  logger.setFormat(config.logging.format);
  if (config.logging.enableFile) {
    initStructuredFileLogging({ filePath: config.logging.file });
  }
}

async function main(argv: string[]): Promise<number> {
  logger.setCorrelationId(generateCorrelationId());

  const getTracker = createLazyTracker(() => {
    const config = loadConfig();
    configureLogging(config);
    logger.debug('Configuration loaded', { baseUrl: config.jira.baseUrl, timeoutMs: config.jira.timeoutMs });
    return createTracker(config.jira);
  });

  try {
    const result = await dispatch(argv, { createTracker: getTracker });
    return result.exitCode;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.structuredError(error);
      if (error.code === ErrorCode.CONFIG_MISSING_REQUIRED) {
        console.error('\n' + getConfigHelp());
      }
      return 1;
    }

    logger.structuredError(wrapError(error, ErrorCode.INTERNAL_ERROR, { operation: 'dispatch' }), {
      includeStack: true,
    });
    return 1;
  }
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
