import pino from 'pino';

const nodeEnv = process.env.NODE_ENV ?? 'development';

export const logger = pino({
  // Replaced by the validated LOG_LEVEL once loadConfig() runs
  level: nodeEnv === 'production' ? 'info' : 'debug',
  redact: {
    paths: ['*.apiKey', '*.password', 'openai.apiKey', 'database.url'],
    censor: '***',
  },
  transport: nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'HH:MM:ss UTC',
    },
  } : undefined,
});

export type Logger = typeof logger;
