import pino from 'pino';
import { logLevelSchema } from '../config/index.js';

let sessionId: string | undefined;
let baseLogger: pino.Logger | undefined;

export function generateSessionId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function getSessionId(): string {
  if (!sessionId) {
    sessionId = generateSessionId();
  }
  return sessionId;
}

// Loggers exist before the config is loaded; an invalid LOG_LEVEL is reported by loadConfig.
export function resolveLogLevel(value: string | undefined): string {
  const parsed = logLevelSchema.safeParse(value || undefined);
  return parsed.success ? parsed.data : logLevelSchema.parse(undefined);
}

// Logs go to stderr; stdout belongs to the weather output.
function getBaseLogger(): pino.Logger {
  if (baseLogger) {
    return baseLogger;
  }

  const level = resolveLogLevel(process.env.LOG_LEVEL);
  baseLogger =
    process.env.NODE_ENV === 'development'
      ? pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
              destination: 2,
            },
          },
        })
      : pino({ level }, pino.destination(2));

  return baseLogger;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getBaseLogger().child({
    sessionId: getSessionId(),
    ...context,
  });
}
