import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_THRESHOLDS, type AuditConfig } from '../config.js';
import { InvalidFactError } from '../errors.js';
import type { AccessKeyFactSource, AwsContext } from '../sources/iam-fact-source.js';
import {
    auditAccessKeys,
    auditAccessKeysSchema,
    classifyAccessKeyFacts,
    classifyAccessKeysSchema,
} from '../tools/audit-access-keys.js';

const NOW = new Date('2026-06-01T00:00:00Z');

const config: AuditConfig = {
    profile: 'default-profile',
    region: 'us-east-1',
    maxAttempts: 2,
    outputDir: 'reports',
    logLevel: 'info',
    thresholds: DEFAULT_THRESHOLDS,
};

const emptySource: AccessKeyFactSource = {
    describeAccount: async () => ({ accountId: '123456789012' }),
    listUsers: async () => ['alice'],
    listAccessKeysForUser: async () => [
        {
            userName: 'alice',
            accessKeyId: 'AKIA1',
            createdAt: new Date('2026-05-01T00:00:00Z'),
            lastUsedAt: new Date('2026-05-31T00:00:00Z'),
            isActive: true,
        },
    ],
};

describe('auditAccessKeysSchema', () => {
    it('should accept an empty request', () => {
        expect(auditAccessKeysSchema.parse({})).toEqual({});
    });

    it('should reject malformed thresholds', () => {
        expect(() => auditAccessKeysSchema.parse({ thresholds: { highStaleDays: 'ninety' } })).toThrow();
    });
});

describe('auditAccessKeys', () => {
    it('should build the source from request overrides and config', async () => {
        const createSource = vi.fn((_context: AwsContext) => emptySource);

        const report = await auditAccessKeys(
            { region: 'eu-west-2' },
            { config, createSource, clock: () => NOW }
        );

        expect(createSource).toHaveBeenCalledWith({
            profile: 'default-profile',
            region: 'eu-west-2',
            maxAttempts: 2,
        });
        expect(report.reportMetadata.profile).toBe('default-profile');
        expect(report.reportMetadata.region).toBe('eu-west-2');
        expect(report.findings).toHaveLength(1);
        expect(report.findings[0].riskLevel).toBe('COMPLIANT');
        expect(report.complianceAssessment.overallStatus).toBe('COMPLIANT');
    });

    it('should merge threshold overrides over the configured ones', async () => {
        const report = await auditAccessKeys(
            { thresholds: { maxKeyAgeDays: 10 } },
            { config, createSource: () => emptySource, clock: () => NOW }
        );

        expect(report.reportMetadata.thresholds.maxKeyAgeDays).toBe(10);
        expect(report.findings[0]).toMatchObject({ riskLevel: 'HIGH', exceedsMaxAge: true });
    });
});

describe('classifyAccessKeyFacts', () => {
    it('should classify facts supplied as JSON', () => {
        const input = classifyAccessKeysSchema.parse({
            now: '2026-06-01T00:00:00Z',
            facts: [
                { userName: 'alice', accessKeyId: 'AKIA1', createdAt: '2025-11-13T00:00:00Z', isActive: true },
                {
                    userName: 'bob',
                    accessKeyId: 'AKIA2',
                    createdAt: '2026-05-22T00:00:00Z',
                    lastUsedAt: '2026-05-27T00:00:00Z',
                    isActive: true,
                },
                {
                    userName: 'bob',
                    accessKeyId: 'AKIA3',
                    createdAt: '2026-05-22T00:00:00Z',
                    lastUsedAt: null,
                    isActive: false,
                },
            ],
        });

        const result = classifyAccessKeyFacts(input, config);

        expect(result.assessedAt).toBe('2026-06-01T00:00:00.000Z');
        expect(result.findings.map((f) => [f.accessKeyId, f.riskLevel, f.ageDays, f.daysSinceUse])).toEqual([
            ['AKIA1', 'CRITICAL', 200, 'never'],
            ['AKIA2', 'COMPLIANT', 10, 5],
            ['AKIA3', 'LOW', 10, 'never'],
        ]);
        expect(result.summary.totalUsers).toBe(2);
        expect(result.summary.complianceRate).toBe(33.3);
        expect(result.recommendations).toEqual([
            'Rotate or delete 1 critical key(s) immediately.',
            'Delete 1 inactive key(s) if they are no longer needed.',
        ]);
    });

    it('should fall back to the clock when no instant is given', () => {
        const input = classifyAccessKeysSchema.parse({ facts: [] });
        const result = classifyAccessKeyFacts(input, config, () => NOW);

        expect(result.assessedAt).toBe('2026-06-01T00:00:00.000Z');
        expect(result.summary.noKeysFound).toBe(true);
        expect(result.recommendations).toEqual(['No access keys found; nothing to rotate.']);
    });

    it('should report a fact without a creation date as a data-integrity error', () => {
        const input = classifyAccessKeysSchema.parse({
            now: '2026-06-01T00:00:00Z',
            facts: [{ userName: 'carol', accessKeyId: 'AKIA9', isActive: true }],
        });

        expect(() => classifyAccessKeyFacts(input, config)).toThrow(InvalidFactError);
    });

    it('should reject dates that are not ISO-8601', () => {
        expect(() =>
            classifyAccessKeysSchema.parse({
                facts: [{ userName: 'dave', accessKeyId: 'AKIA4', createdAt: 'last tuesday', isActive: true }],
            })
        ).toThrow();
    });
});
