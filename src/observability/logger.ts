import pino from 'pino';
import type { TraceContext } from './trace';
import { env } from '../config/env';

/** Header and profile fields that never reach the log sink */
const REDACTED_PATHS = [
  'userProfile.phone',
  'req.headers["x-admin-api-key"]',
  'req.headers["x-hub-signature-256"]',
  'headers["x-admin-api-key"]',
  'headers["x-hub-signature-256"]',
];

export const logger = pino({
  level: env.logLevel,
  base: { service: 'encore-desk' },
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { err: pino.stdSerializers.err },
  redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
});

/** Child logger that stamps every line with the turn's correlation fields */
export function turnLogger(trace: TraceContext, component: string): pino.Logger {
  return logger.child({
    requestId: trace.requestId,
    component,
    conversationKey: trace.conversationKey,
    channel: trace.channel,
    tenantId: trace.tenantId,
  });
}
