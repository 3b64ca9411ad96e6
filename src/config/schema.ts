import { z } from 'zod';
import { isCacheStore, type CacheStore } from '../cache/types.js';
import { ConfigurationError } from '../core/exceptions.js';
import type { LoggerFactory } from '../logging/logger.js';

const pathPatternSchema = z.union([z.string().min(1), z.instanceof(RegExp)]);

function collection<T extends z.ZodTypeAny>(item: T) {
  return z.union([z.array(item), z.set(item)]);
}

/**
 * Every option accepted by `configure()` and `withConfiguration()`.
 * Unknown keys are rejected so that typos fail at configuration time.
 */
export const configurationOptionsSchema = z
  .object({
    enabled: z.boolean(),
    debugLogging: z.boolean(),
    maxBodySize: z.number().int().nonnegative(),
    excludedPaths: collection(pathPatternSchema),
    excludedContentTypes: collection(z.string().min(1)),
    sensitiveHeaders: collection(z.string().min(1)),
    sensitiveBodyKeys: collection(z.string().min(1)),
    excludedControllers: collection(z.string().min(1)),
    excludedActions: z.record(collection(z.string().min(1))),
    secondaryDatabaseUrl: z.string().min(1).nullable(),
    secondaryDatabaseAdapter: z.enum(['memory', 'sqlite', 'postgresql']),
    loggerFactory: z
      .custom<LoggerFactory>((value) => typeof value === 'function', 'loggerFactory must be a function')
      .nullable(),
    cache: z.custom<CacheStore>(isCacheStore, 'cache must implement get/set/delete/clear').nullable(),
  })
  .partial()
  .strict();

export type ConfigurationOptions = z.infer<typeof configurationOptionsSchema>;

/**
 * Validates raw options, throwing {@link ConfigurationError} with every issue listed.
 */
export function parseConfigurationOptions(input: unknown): ConfigurationOptions {
  const result = configurationOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
