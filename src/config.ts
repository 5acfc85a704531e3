import dotenv from 'dotenv';
import path from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { KeyThresholds } from './types/index.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export const DEFAULT_THRESHOLDS: Readonly<KeyThresholds> = Object.freeze({
    neverUsedDays: 90,
    criticalStaleDays: 180,
    highStaleDays: 90,
    mediumStaleDays: 60,
    maxKeyAgeDays: 365,
});

export const DEFAULT_REGION = 'us-east-1';

const days = z.coerce.number().int().nonnegative();

/**
 * Threshold overrides. Staleness windows must nest: medium ≤ high ≤ critical.
 */
export const thresholdsSchema = z
    .object({
        neverUsedDays: days.default(DEFAULT_THRESHOLDS.neverUsedDays),
        criticalStaleDays: days.default(DEFAULT_THRESHOLDS.criticalStaleDays),
        highStaleDays: days.default(DEFAULT_THRESHOLDS.highStaleDays),
        mediumStaleDays: days.default(DEFAULT_THRESHOLDS.mediumStaleDays),
        maxKeyAgeDays: days.default(DEFAULT_THRESHOLDS.maxKeyAgeDays),
    })
    .refine(
        (t) => t.mediumStaleDays <= t.highStaleDays && t.highStaleDays <= t.criticalStaleDays,
        { message: 'Staleness thresholds must satisfy medium <= high <= critical' }
    );

export type ThresholdOverrides = Partial<Record<keyof KeyThresholds, unknown>>;

const optionalString = z
    .string()
    .optional()
    .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const envSchema = z.object({
    AWS_PROFILE: optionalString,
    AWS_REGION: optionalString,
    AWS_DEFAULT_REGION: optionalString,
    AWS_MAX_ATTEMPTS: optionalString,
    KEY_AUDIT_OUTPUT_DIR: optionalString,
    LOG_LEVEL: optionalString,
    KEY_AUDIT_NEVER_USED_DAYS: optionalString,
    KEY_AUDIT_CRITICAL_STALE_DAYS: optionalString,
    KEY_AUDIT_HIGH_STALE_DAYS: optionalString,
    KEY_AUDIT_MEDIUM_STALE_DAYS: optionalString,
    KEY_AUDIT_MAX_KEY_AGE_DAYS: optionalString,
});

export interface AuditConfig {
    profile?: string;
    region: string;
    maxAttempts: number;
    outputDir: string;
    logLevel: LogLevel;
    thresholds: KeyThresholds;
}

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

export function parseThresholds(overrides: ThresholdOverrides = {}): KeyThresholds {
    const parsed = thresholdsSchema.safeParse(overrides);
    if (!parsed.success) {
        throw new ConfigError(`Invalid thresholds: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
}

/**
 * Builds the run configuration from environment variables.
 * Call loadDotenv() first to pick up a local .env file.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
    const vars = envSchema.parse(env);

    const maxAttempts = z.coerce.number().int().min(1).safeParse(vars.AWS_MAX_ATTEMPTS ?? 3);
    if (!maxAttempts.success) {
        throw new ConfigError(`Invalid AWS_MAX_ATTEMPTS: ${formatIssues(maxAttempts.error)}`);
    }

    const logLevel = z.enum(LOG_LEVELS).safeParse(vars.LOG_LEVEL ?? 'info');
    if (!logLevel.success) {
        throw new ConfigError(`Invalid LOG_LEVEL: ${formatIssues(logLevel.error)}`);
    }

    return {
        profile: vars.AWS_PROFILE,
        region: vars.AWS_REGION ?? vars.AWS_DEFAULT_REGION ?? DEFAULT_REGION,
        maxAttempts: maxAttempts.data,
        outputDir: vars.KEY_AUDIT_OUTPUT_DIR ?? 'reports',
        logLevel: logLevel.data,
        thresholds: parseThresholds({
            neverUsedDays: vars.KEY_AUDIT_NEVER_USED_DAYS,
            criticalStaleDays: vars.KEY_AUDIT_CRITICAL_STALE_DAYS,
            highStaleDays: vars.KEY_AUDIT_HIGH_STALE_DAYS,
            mediumStaleDays: vars.KEY_AUDIT_MEDIUM_STALE_DAYS,
            maxKeyAgeDays: vars.KEY_AUDIT_MAX_KEY_AGE_DAYS,
        }),
    };
}

export function loadDotenv(): void {
    dotenv.config({ path: path.resolve(process.cwd(), '.env') });
}
