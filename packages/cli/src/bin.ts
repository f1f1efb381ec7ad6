#!/usr/bin/env node
import 'source-map-support/register';
import dotenv from 'dotenv';

import { createEnvReader } from '@shipyard/env-parser';
import { createLogger, logLevelSchema } from '@shipyard/shared';

import { main } from './cli';
import { ProcessRunner } from './process-runner';

dotenv.config({ path: '.env.local' });

const { readOptionalString } = createEnvReader(process.env);
const requestedLevel = logLevelSchema.safeParse(readOptionalString('LOG_LEVEL', 'info'));
const logger = createLogger({ level: requestedLevel.success ? requestedLevel.data : 'info' });

if (!requestedLevel.success) {
  logger.warn(`Ignoring unknown LOG_LEVEL "${readOptionalString('LOG_LEVEL')}"`);
}

main(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  stdout: process.stdout,
  logger,
  runner: new ProcessRunner(),
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error(String(error));
    process.exitCode = 1;
  });
