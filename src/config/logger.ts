import pino from 'pino';

/**
 * Pino redaction paths. Slack credentials travel as the `token` field of a
 * task, inside `Authorization` headers, and embedded in webhook URLs, so all
 * three are censored wherever they show up in a log object.
 */
export const REDACT_PATHS = [
  'token',
  'authorization',
  'Authorization',
  'url',
  'upload_url',
  'uploadUrl',
  'secret',
  'password',

  '*.token',
  '*.authorization',
  '*.Authorization',
  '*.url',
  '*.upload_url',
  '*.uploadUrl',
  '*.secret',
  '*.password',

  '*.*.token',
  '*.*.authorization',
  '*.*.Authorization',
  '*.*.upload_url',
];

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  redact: {
    paths: REDACT_PATHS,
    censor: '[REDACTED]',
  },
  transport:
    process.env.NODE_ENV === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

export function createChildLogger(name: string) {
  return logger.child({ component: name });
}
