/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Keeps logging consistent across the factory and the registry.
 * - Adds stable metadata (service, env) so events can be filtered per deployment.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs, or accept a `Logger` in a constructor
 *   and default it to this instance.
 * - Event names are dotted: 'hasher.cache_miss', 'hasher.registered'.
 * - Never put a salt in log meta.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'hashid-hashers';
const level = process.env.LOG_LEVEL ?? 'info';

export type Logger = winston.Logger;

export const logger: Logger = winston.createLogger({
  level,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }), // ensures Error.stack is serialized
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});
