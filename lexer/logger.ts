import { createConsola, type ConsolaInstance } from 'consola';
import { z } from 'zod';

const parseLevel = (value: unknown): number | undefined => {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  return undefined;
};

const envSchema = z.object({
  // Blank or non-numeric values fall back to the default level
  LEXER_LOG_LEVEL: z.preprocess(parseLevel, z.number().int().min(0).max(5).optional()),
  NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
});

export type LoggerEnv = z.infer<typeof envSchema>;

type EnvRecord = Record<string, string | undefined>;

function levelFor(env: LoggerEnv): number {
  return env.LEXER_LOG_LEVEL ?? (env.NODE_ENV === 'test' ? 1 : 3);
}

/** Log level for an environment: explicit level, quiet under tests, info otherwise. */
export function resolveLogLevel(env: EnvRecord): number {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success)
    throw new Error(z.prettifyError(parsed.error));

  return levelFor(parsed.data);
}

/**
 * Like `resolveLogLevel`, but an environment the schema rejects yields the
 * default level along with the reason, instead of throwing.
 */
export function lenientLogLevel(env: EnvRecord): { level: number; problem?: string } {
  const parsed = envSchema.safeParse(env);
  if (parsed.success) return { level: levelFor(parsed.data) };

  return {
    level: env.NODE_ENV === 'test' ? 1 : 3,
    problem: z.prettifyError(parsed.error),
  };
}

const initial = lenientLogLevel(process.env);

export const logger: ConsolaInstance = createConsola({
  level: initial.level,
}).withTag('lexer');

if (initial.problem !== undefined)
  logger.warn(`Ignoring invalid logger environment:\n${initial.problem}`);
