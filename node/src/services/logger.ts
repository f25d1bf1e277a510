// node/src/services/logger.ts — structured logging for the recipe service
import { Logger, type ILogObj } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function minLevelFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const raw = (env.LOG_LEVEL ?? '').trim().toLowerCase();
  if (Object.hasOwn(LEVELS, raw)) return LEVELS[raw];
  // Quiet under the test runner unless asked otherwise.
  return env.VITEST ? LEVELS.error : LEVELS.info;
}

export const logger: Logger<ILogObj> = new Logger<ILogObj>({
  name: 'recipe-orchestrator',
  minLevel: minLevelFromEnv(),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});
