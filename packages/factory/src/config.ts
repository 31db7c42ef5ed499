import { allLocales } from '@faker-js/faker';
import { z } from 'zod/v4';

/**
 * Locales shipped with @faker-js/faker.
 */
export type FakerLocale = keyof typeof allLocales;

export function isFakerLocale(value: string): value is FakerLocale {
  return Object.hasOwn(allLocales, value);
}

const LOG_LEVELS = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
] as const;

const configSchema = z.object({
  FACTORY_LOCALE: z
    .string()
    .default('en')
    .transform((value, ctx): FakerLocale => {
      if (!isFakerLocale(value)) {
        ctx.addIssue({ code: 'custom', message: `Unknown faker locale "${value}"` });
        return z.NEVER;
      }
      return value;
    }),
  FACTORY_SEED: z.coerce.number().int().nonnegative().optional(),
  FACTORY_LOG_LEVEL: z.enum(LOG_LEVELS).default('silent'),
  FACTORY_LOG_PRETTY: z.stringbool().default(false),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface FactoryConfig {
  /** Locale of every factory's faker */
  locale: FakerLocale;
  /** Seed applied to every factory's faker, unset for random values */
  seed?: number;
  /** Level of the shared engine logger */
  logLevel: LogLevel;
  /** Pipe the shared logger through pino-pretty */
  prettyLogs: boolean;
}

/**
 * Parses factory configuration from environment variables.
 * Validation messages name the offending variable.
 *
 * @param env - The environment to read (defaults to process.env)
 * @throws z.ZodError when a variable is invalid
 *
 * @example
 * ```typescript
 * const config = parseConfig({ FACTORY_LOCALE: 'de', FACTORY_SEED: '42' });
 * // { locale: 'de', seed: 42, logLevel: 'silent', prettyLogs: false }
 * ```
 */
export function parseConfig(
  env: Record<string, string | undefined> = process.env,
): FactoryConfig {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      ...issue,
      message: `Environment variable "${String(issue.path[0])}": ${issue.message}`,
    }));
    throw new z.ZodError(issues);
  }

  return {
    locale: result.data.FACTORY_LOCALE,
    seed: result.data.FACTORY_SEED,
    logLevel: result.data.FACTORY_LOG_LEVEL,
    prettyLogs: result.data.FACTORY_LOG_PRETTY,
  };
}

let cached: FactoryConfig | undefined;

/**
 * Returns the process configuration, parsed once from process.env.
 */
export function getConfig(): FactoryConfig {
  cached ??= parseConfig();
  return cached;
}

/**
 * Drops the cached configuration so the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
  cached = undefined;
}
