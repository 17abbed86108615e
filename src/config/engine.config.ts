import type { LogLevel } from '@nestjs/common';
import { z } from 'zod';

export const ENGINE_CONFIG = Symbol('ENGINE_CONFIG');

const commaList = z
  .string()
  .optional()
  .transform((value) =>
    (value ?? '')
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value === 'true'));

const actorRole = z.enum(['user', 'facility_manager', 'admin', 'auditor']);

const DEFAULT_OVERRIDE_ROLES: z.infer<typeof actorRole>[] = [
  'admin',
  'facility_manager',
];

const engineConfigSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['error', 'warn', 'log', 'debug', 'verbose']).default('log'),
    STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    ROOM_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    MAX_OCCURRENCES: z.coerce.number().int().positive().default(500),
    MIN_BOOKING_MINUTES: z.coerce.number().int().positive().default(15),
    MAX_BOOKING_MINUTES: z.coerce.number().int().positive().default(7 * 24 * 60),
    ALLOW_PAST_BOOKINGS: flag(false),
    OVERRIDE_ROLES: commaList.pipe(z.array(actorRole)),
    KNOWN_ROOM_IDS: commaList,
    SUGGESTION_STEP_MINUTES: z.coerce.number().int().positive().default(60),
    SUGGESTION_WINDOW_DAYS: z.coerce.number().int().positive().default(90),
    MAX_SUGGESTIONS: z.coerce.number().int().nonnegative().default(3),
    SUGGESTION_MAX_ATTEMPTS: z.coerce.number().int().positive().default(200),
    SUGGESTION_OCCURRENCE_BUDGET: z.coerce.number().int().positive().default(2000),
  })
  .refine((values) => values.MIN_BOOKING_MINUTES <= values.MAX_BOOKING_MINUTES, {
    message: 'MIN_BOOKING_MINUTES must not exceed MAX_BOOKING_MINUTES',
    path: ['MIN_BOOKING_MINUTES'],
  })
  .transform((values) => ({
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    storageDriver: values.STORAGE_DRIVER,
    roomLockTimeoutMs: values.ROOM_LOCK_TIMEOUT_MS,
    maxOccurrences: values.MAX_OCCURRENCES,
    minBookingMinutes: values.MIN_BOOKING_MINUTES,
    maxBookingMinutes: values.MAX_BOOKING_MINUTES,
    allowPastBookings: values.ALLOW_PAST_BOOKINGS,
    overrideRoles:
      values.OVERRIDE_ROLES.length > 0
        ? values.OVERRIDE_ROLES
        : DEFAULT_OVERRIDE_ROLES,
    knownRoomIds: values.KNOWN_ROOM_IDS,
    suggestionStepMinutes: values.SUGGESTION_STEP_MINUTES,
    suggestionWindowDays: values.SUGGESTION_WINDOW_DAYS,
    maxSuggestions: values.MAX_SUGGESTIONS,
    suggestionMaxAttempts: values.SUGGESTION_MAX_ATTEMPTS,
    suggestionOccurrenceBudget: values.SUGGESTION_OCCURRENCE_BUDGET,
  }));

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}

export function loadEngineConfig(
  env: Record<string, string | undefined> = process.env,
): EngineConfig {
  const result = engineConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return Object.freeze(result.data);
}

const LOG_LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** Every Nest log level at or above `level` in severity. */
export function logLevelsFor(level: EngineConfig['logLevel']): LogLevel[] {
  return LOG_LEVEL_ORDER.slice(0, LOG_LEVEL_ORDER.indexOf(level) + 1);
}
