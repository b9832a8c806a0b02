#!/usr/bin/env node

/**
 * params2env
 * AWS SSM Parameter Store entries as environment variables
 */

import { buildProgram } from './program.js';
import { SSMClientFactory } from './utils/aws/ssm.js';
import { resolveConfig } from './utils/config.js';
import { handleError } from './utils/error.js';
import { Logger } from './utils/logger.js';

const logger = new Logger();

const program = buildProgram({
  logger,
  clientFactory: new SSMClientFactory(),
  loadConfig: () => resolveConfig({ logger }),
  env: process.env,
});

program.parseAsync(process.argv).catch((error: unknown) => handleError(error, logger));
