import pino from 'pino';
import type { Logger } from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
type Level = (typeof LEVELS)[number];

function resolveLevel(raw: string | undefined): Level {
  const level = LEVELS.find((l) => l === raw);
  return level ?? 'info';
}

/**
 * Stdout belongs to the CLI output and the MCP stdio transport, so logs go to stderr.
 */
function createLogger(): Logger {
  return pino(
    {
      level: resolveLevel(process.env.LOG_LEVEL),
      base: { service: 'sparql-schema-lens' },
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
}

export const logger = createLogger();

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
