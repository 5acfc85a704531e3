import { describe, it, expect, vi } from 'vitest';
import { runAssessment } from '../assessment.js';
import { DEFAULT_THRESHOLDS } from '../config.js';
import { FetchError, InvalidFactError } from '../errors.js';
import type { AccessKeyFactSource } from '../sources/iam-fact-source.js';
import type { AccessKeyFact } from '../types/index.js';

const NOW = new Date('2026-06-01T00:00:00Z');
const DAY = 24 * 60 * 60 * 1000;
const clock = () => NOW;

function daysAgo(days: number): Date {
    return new Date(NOW.getTime() - days * DAY);
}

class FakeFactSource implements AccessKeyFactSource {
    constructor(private readonly keys: Record<string, AccessKeyFact[]>) {}

    async describeAccount() {
        return { accountId: '111122223333' };
    }

    async listUsers() {
        return Object.keys(this.keys);
    }

    async listAccessKeysForUser(userName: string) {
        return this.keys[userName] ?? [];
    }
}

describe('runAssessment', () => {
    it('should classify and aggregate keys across users', async () => {
        const source = new FakeFactSource({
            alice: [
                { userName: 'alice', accessKeyId: 'AKIA1', createdAt: daysAgo(10), lastUsedAt: daysAgo(5), isActive: true },
            ],
            bob: [
                { userName: 'bob', accessKeyId: 'AKIA2', createdAt: daysAgo(200), isActive: true },
                { userName: 'bob', accessKeyId: 'AKIA3', createdAt: daysAgo(400), lastUsedAt: daysAgo(10), isActive: true },
            ],
            carol: [],
        });

        const result = await runAssessment({
            source,
            target: { region: 'us-east-1' },
            clock,
        });

        expect(result.account.accountId).toBe('111122223333');
        expect(result.assessedAt).toBe(NOW);
        expect(result.thresholds).toEqual(DEFAULT_THRESHOLDS);
        expect(result.classifications.map((c) => c.riskLevel)).toEqual(['COMPLIANT', 'CRITICAL', 'HIGH']);
        expect(result.summary).toMatchObject({
            totalUsers: 3,
            usersWithKeys: 2,
            totalKeys: 3,
            neverUsedKeys: 1,
            complianceRate: 33.3,
            overallStatus: 'NON_COMPLIANT',
            noKeysFound: false,
        });
    });

    it('should report an empty account as compliant with no keys found', async () => {
        const result = await runAssessment({
            source: new FakeFactSource({}),
            target: { region: 'us-east-1' },
            clock,
        });

        expect(result.classifications).toEqual([]);
        expect(result.summary.totalKeys).toBe(0);
        expect(result.summary.complianceRate).toBe(100);
        expect(result.summary.overallStatus).toBe('COMPLIANT');
        expect(result.summary.noKeysFound).toBe(true);
    });

    it('should apply custom thresholds', async () => {
        const source = new FakeFactSource({
            alice: [
                { userName: 'alice', accessKeyId: 'AKIA1', createdAt: daysAgo(40), lastUsedAt: daysAgo(20), isActive: true },
            ],
        });

        const result = await runAssessment({
            source,
            target: { region: 'us-east-1' },
            thresholds: { ...DEFAULT_THRESHOLDS, mediumStaleDays: 5, highStaleDays: 10, criticalStaleDays: 15 },
            clock,
        });

        expect(result.classifications[0].riskLevel).toBe('CRITICAL');
    });

    it('should produce no result when a fetch fails midway', async () => {
        const source = new FakeFactSource({ alice: [], bob: [] });
        const failure = new FetchError('ListAccessKeys', 'transient', 'socket hang up');
        vi.spyOn(source, 'listAccessKeysForUser')
            .mockResolvedValueOnce([])
            .mockRejectedValueOnce(failure);

        await expect(
            runAssessment({ source, target: { region: 'us-east-1' }, clock })
        ).rejects.toBe(failure);
    });

    it('should surface the offending key on a data-integrity error', async () => {
        const source = new FakeFactSource({
            mallory: [
                { userName: 'mallory', accessKeyId: 'AKIABAD', createdAt: daysAgo(5), lastUsedAt: daysAgo(9), isActive: true },
            ],
        });

        const error = await runAssessment({ source, target: { region: 'us-east-1' }, clock }).catch(
            (e: unknown) => e
        );
        expect(error).toBeInstanceOf(InvalidFactError);
        expect(error).toMatchObject({ userName: 'mallory', accessKeyId: 'AKIABAD' });
    });

    it('should read the clock once, after every fact is fetched', async () => {
        const source = new FakeFactSource({});
        const tick = vi.fn(() => NOW);

        await runAssessment({ source, target: { region: 'us-east-1' }, clock: tick });
        expect(tick).toHaveBeenCalledTimes(1);
    });
});
