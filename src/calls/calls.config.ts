import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import {
  CallCoordinatorOptions,
  DEFAULT_CALL_COORDINATOR_OPTIONS,
} from './interfaces/call-coordinator-options';

const logger = new Logger('CallsConfig');

// Values coming from the environment are strings
export const positiveNumberSchema = z.coerce.number().finite().positive();
export const nonNegativeNumberSchema = z.coerce.number().finite().nonnegative();

/**
 * Reads a numeric setting, falling back to `fallback` when it is unset or
 * does not parse with `schema`.
 */
export function readConfigNumber(
  configService: ConfigService,
  key: string,
  fallback: number,
  schema: z.ZodType<number> = positiveNumberSchema,
): number {
  const value = configService.get<unknown>(key);
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    logger.warn(`Ignoring invalid ${key}="${String(value)}", using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

export function callCoordinatorOptionsFactory(
  configService: ConfigService,
): CallCoordinatorOptions {
  const defaults = DEFAULT_CALL_COORDINATOR_OPTIONS;
  const ringTimeoutSeconds = readConfigNumber(
    configService,
    'CALL_RING_TIMEOUT_SECONDS',
    defaults.ringTimeoutMs / 1000,
  );
  const connectTimeoutSeconds = readConfigNumber(
    configService,
    'CALL_CONNECT_TIMEOUT_SECONDS',
    defaults.connectTimeoutMs / 1000,
  );
  const endGraceMs = readConfigNumber(
    configService,
    'CALL_END_GRACE_MS',
    defaults.endGraceMs,
    nonNegativeNumberSchema,
  );

  return {
    ringTimeoutMs: ringTimeoutSeconds * 1000,
    connectTimeoutMs: connectTimeoutSeconds * 1000,
    endGraceMs,
  };
}
