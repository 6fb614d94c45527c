/**
 * Logging with Pino - patient identifiers are redacted
 */

import pino from 'pino';

const redactPaths = [
  'patient_id',
  'patientId',
  'ssn',
  'name',
  'dob',
  'password',
  'secret',
  'token',
  '*.patient_id',
  '*.patientId',
  'record.*',
  'records[*]',
];

const nodeEnv = process.env.NODE_ENV;

export const logger = pino({
  level: process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'silent' : 'info'),
  redact: {
    paths: redactPaths,
    censor: '[REDACTED]',
  },
  transport:
    nodeEnv !== 'production' && nodeEnv !== 'test'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
