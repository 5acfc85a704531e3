import { z } from 'zod';
import { aggregateClassifications } from '../analyzers/aggregate.js';
import { classifyAccessKeys } from '../analyzers/key-rules.js';
import { runAssessment, systemClock } from '../assessment.js';
import { type AuditConfig, parseThresholds } from '../config.js';
import {
    accountRecommendations,
    buildJsonReport,
    type JsonReport,
    type KeyFinding,
    toKeyFinding,
} from '../reports/json-report.js';
import { type AccessKeyFactSource, type AwsContext, IamFactSource } from '../sources/iam-fact-source.js';
import type { AccessKeyFact, AssessmentSummary, Clock } from '../types/index.js';

const thresholdsInput = z
    .object({
        neverUsedDays: z.number().int().nonnegative(),
        criticalStaleDays: z.number().int().nonnegative(),
        highStaleDays: z.number().int().nonnegative(),
        mediumStaleDays: z.number().int().nonnegative(),
        maxKeyAgeDays: z.number().int().nonnegative(),
    })
    .partial()
    .describe('Overrides for the staleness thresholds, in days');

const isoDate = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value));

/**
 * Zod schema for validating audit_access_keys tool input.
 */
export const auditAccessKeysSchema = z.object({
    profile: z.string().min(1).optional().describe('AWS named profile to audit'),
    region: z.string().min(1).optional().describe('AWS region for the IAM and STS clients'),
    thresholds: thresholdsInput.optional(),
});

export type AuditAccessKeysInput = z.infer<typeof auditAccessKeysSchema>;

export const accessKeyFactSchema = z.object({
    userName: z.string().min(1),
    accessKeyId: z.string().min(1),
    createdAt: isoDate.optional(),
    lastUsedAt: isoDate.nullish().transform((value) => value ?? undefined),
    isActive: z.boolean(),
    lastUsedService: z.string().optional(),
    lastUsedRegion: z.string().optional(),
});

/**
 * Zod schema for validating classify_access_keys tool input.
 */
export const classifyAccessKeysSchema = z.object({
    facts: z.array(accessKeyFactSchema).describe('Access key facts to classify'),
    now: isoDate.optional().describe('Reference instant; defaults to the current time'),
    thresholds: thresholdsInput.optional(),
});

export type ClassifyAccessKeysInput = z.infer<typeof classifyAccessKeysSchema>;

export interface ClassifyAccessKeysResult {
    assessedAt: string;
    summary: AssessmentSummary;
    recommendations: string[];
    findings: KeyFinding[];
}

export interface AuditDependencies {
    config: AuditConfig;
    createSource?: (context: AwsContext) => AccessKeyFactSource;
    clock?: Clock;
}

/**
 * Audits every IAM user's access keys in the target account and returns the
 * full JSON report.
 */
export async function auditAccessKeys(
    input: AuditAccessKeysInput,
    deps: AuditDependencies
): Promise<JsonReport> {
    const { config } = deps;
    const context: AwsContext = {
        profile: input.profile ?? config.profile,
        region: input.region ?? config.region,
        maxAttempts: config.maxAttempts,
    };
    const createSource = deps.createSource ?? ((ctx: AwsContext) => new IamFactSource(ctx));

    const result = await runAssessment({
        source: createSource(context),
        target: { profile: context.profile, region: context.region },
        thresholds: parseThresholds({ ...config.thresholds, ...input.thresholds }),
        clock: deps.clock,
    });
    return buildJsonReport(result);
}

/**
 * Classifies caller-supplied key facts without contacting AWS.
 */
export function classifyAccessKeyFacts(
    input: ClassifyAccessKeysInput,
    config: AuditConfig,
    clock: Clock = systemClock
): ClassifyAccessKeysResult {
    const now = input.now ?? clock();
    const thresholds = parseThresholds({ ...config.thresholds, ...input.thresholds });
    const facts: AccessKeyFact[] = input.facts;

    const classifications = classifyAccessKeys(facts, now, thresholds);
    const totalUsers = new Set(facts.map((fact) => fact.userName)).size;
    const summary = aggregateClassifications(classifications, { totalUsers });

    return {
        assessedAt: now.toISOString(),
        summary,
        recommendations: accountRecommendations(summary),
        findings: classifications.map(toKeyFinding),
    };
}
