import pino from 'pino';

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport:
    process.env['NODE_ENV'] !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  redact: {
    paths: [
      'bot_token',
      'botToken',
      'smtp_pass',
      'password',
      'secret',
      '*.bot_token',
      '*.smtp_pass',
      '*.password',
    ],
    censor: '***REDACTED***',
  },
});
