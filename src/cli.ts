#!/usr/bin/env node
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/bestEffort';
import { runCli } from '@/runtime/bootstrap';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    const log = createLogger('Runtime');
    log.error('fatal error', { message: errorMessage(error) });
    process.exit(1);
  });
