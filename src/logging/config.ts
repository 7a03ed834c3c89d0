import type pino from 'pino';
import { z } from 'zod';

/**
 * `destination` is a file path unless it names one of the standard streams
 */
export interface LoggingConfig {
  level: pino.Level;
  destination: string;
  format: 'json' | 'pretty';
}

const LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

// Read straight from the environment; the logger is built before the main
// configuration is validated.
const loggingEnvSchema = z.object({
  LOG_LEVEL: z.string().toLowerCase().optional(),
  LOG_FORMAT: z
    .string()
    .toLowerCase()
    .pipe(z.enum(['json', 'pretty'], { errorMap: () => ({ message: 'LOG_FORMAT must be "json" or "pretty".' }) }))
    .optional(),
  LOG_PRETTY: z.string().toLowerCase().optional(),
  LOG_DESTINATION: z.string().optional(),
  NODE_ENV: z.string().optional(),
  VITEST: z.string().optional(),
});

type LoggingEnv = z.infer<typeof loggingEnvSchema>;

function readLoggingEnv(env: NodeJS.ProcessEnv): LoggingEnv {
  const present: Record<string, string> = {};
  for (const key of Object.keys(loggingEnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }

  const result = loggingEnvSchema.safeParse(present);
  if (!result.success) {
    throw new Error(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

function isLevel(value: string): value is pino.Level {
  return LEVELS.some((level) => level === value);
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = readLoggingEnv(env);
  const underTest = parsed.NODE_ENV === 'test' || parsed.VITEST === 'true';

  const level = parsed.LOG_LEVEL !== undefined && isLevel(parsed.LOG_LEVEL)
    ? parsed.LOG_LEVEL
    : underTest ? 'warn' : 'info';

  const prettyFlag = parsed.LOG_PRETTY === '1' || parsed.LOG_PRETTY === 'true';
  const format = parsed.LOG_FORMAT ?? (prettyFlag ? 'pretty' : 'json');

  return {
    level,
    destination: parsed.LOG_DESTINATION ?? 'stdout',
    format,
  };
}
