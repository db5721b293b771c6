/**
 * Logger — TypeScript
 *
 * winston logger for MCP servers. stdout carries the protocol, so every
 * level is routed to stderr.
 */

import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function resolveLevel(env: NodeJS.ProcessEnv): string {
  if (env.MCP_DEBUG !== undefined) return 'debug';
  const requested = env.FS_GATEWAY_LOG_LEVEL?.toLowerCase();
  return requested && LEVELS.includes(requested) ? requested : 'info';
}

export const logger = winston.createLogger({
  level: resolveLevel(process.env),
  silent: process.env.FS_GATEWAY_LOG_LEVEL === 'silent',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
      const scope = typeof component === 'string' ? ` [${component}]` : '';
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} ${level}${scope}: ${String(message)}${extra}`;
    }),
  ),
  transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
});

/** Logger tagged with the component that emits it */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export type Logger = winston.Logger;
