import { loadEnvironment } from '@/config/environment';
import { parseCliArgs } from '@/config/cli';
import { logManager, levelFromDebug } from '@/shared/logging/logger';

/**
 * Aggregates the static environment and the command line into one bootstrap
 * helper.
 */
export const loadConfig = (argv: string[]) => {
  const env = loadEnvironment();
  const cli = parseCliArgs(argv);
  return {
    env: {
      ...env,
      logLevel: cli.debug > 0 ? levelFromDebug(cli.debug) : env.logLevel,
      logJson: cli.jsonLogs || env.logJson,
    },
    cli,
  };
};

export type AppConfig = ReturnType<typeof loadConfig>;

export function applyLogging(config: AppConfig): void {
  logManager.configure({ level: config.env.logLevel, json: config.env.logJson });
}
