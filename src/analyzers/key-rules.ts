import { DEFAULT_THRESHOLDS } from '../config.js';
import { InvalidFactError } from '../errors.js';
import type { AccessKeyFact, Classification, KeyThresholds, RiskLevel } from '../types/index.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// IAM stamps last use on the AWS side; the local clock may trail it slightly.
export const LAST_USED_SKEW_MS = 5 * 60 * 1000;

export const RECOMMENDATIONS = {
    inactive: 'inactive key, safe to delete if unused.',
    neverUsedLongLived: 'delete or justify — never used, long-lived.',
    neverUsedNew: 'monitor — newly created, unused.',
    severelyStale: 'rotate immediately — severely stale.',
    stale: 'rotate soon — stale key.',
    approachingStale: 'review — approaching staleness.',
    withinPolicy: 'within rotation policy.',
    exceedsMaxAge: 'Also exceeds maximum key age.',
} as const;

/**
 * Ordinal severity used for escalation. LOW sits outside the staleness chain
 * but still ranks below MEDIUM.
 */
export const RISK_SEVERITY: Record<RiskLevel, number> = {
    COMPLIANT: 0,
    LOW: 1,
    MEDIUM: 2,
    HIGH: 3,
    CRITICAL: 4,
};

function isValidDate(value: Date | undefined): value is Date {
    return value instanceof Date && !Number.isNaN(value.getTime());
}

function wholeDaysBetween(from: Date, to: Date): number {
    return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * Classifies one access key against the staleness policy at the given instant.
 * Throws InvalidFactError for facts that cannot be dated consistently.
 */
export function classifyAccessKey(
    fact: AccessKeyFact,
    now: Date,
    thresholds: KeyThresholds = DEFAULT_THRESHOLDS
): Classification {
    const { createdAt, lastUsedAt } = fact;

    if (!isValidDate(createdAt)) {
        throw new InvalidFactError(fact.userName, fact.accessKeyId, 'creation date is missing or invalid');
    }
    if (createdAt.getTime() > now.getTime()) {
        throw new InvalidFactError(
            fact.userName,
            fact.accessKeyId,
            `creation date ${createdAt.toISOString()} is after ${now.toISOString()}`
        );
    }
    if (lastUsedAt !== undefined) {
        if (!isValidDate(lastUsedAt)) {
            throw new InvalidFactError(fact.userName, fact.accessKeyId, 'last used date is invalid');
        }
        if (lastUsedAt.getTime() < createdAt.getTime()) {
            throw new InvalidFactError(
                fact.userName,
                fact.accessKeyId,
                `last used date ${lastUsedAt.toISOString()} precedes creation date ${createdAt.toISOString()}`
            );
        }
        if (lastUsedAt.getTime() > now.getTime() + LAST_USED_SKEW_MS) {
            throw new InvalidFactError(
                fact.userName,
                fact.accessKeyId,
                `last used date ${lastUsedAt.toISOString()} is after ${now.toISOString()}`
            );
        }
    }

    const ageDays = wholeDaysBetween(createdAt, now);
    const daysSinceUse = lastUsedAt ? Math.max(0, wholeDaysBetween(lastUsedAt, now)) : 'never';

    // Rule 1: disabled keys are low concern whatever their history
    if (!fact.isActive) {
        return {
            fact,
            ageDays,
            daysSinceUse,
            riskLevel: 'LOW',
            recommendation: RECOMMENDATIONS.inactive,
            exceedsMaxAge: false,
        };
    }

    let riskLevel: RiskLevel;
    let recommendation: string;

    if (daysSinceUse === 'never') {
        // Rule 2: never used
        if (ageDays > thresholds.neverUsedDays) {
            riskLevel = 'CRITICAL';
            recommendation = RECOMMENDATIONS.neverUsedLongLived;
        } else {
            riskLevel = 'MEDIUM';
            recommendation = RECOMMENDATIONS.neverUsedNew;
        }
    } else if (daysSinceUse > thresholds.criticalStaleDays) {
        // Rule 3: staleness since last use
        riskLevel = 'CRITICAL';
        recommendation = RECOMMENDATIONS.severelyStale;
    } else if (daysSinceUse > thresholds.highStaleDays) {
        riskLevel = 'HIGH';
        recommendation = RECOMMENDATIONS.stale;
    } else if (daysSinceUse > thresholds.mediumStaleDays) {
        riskLevel = 'MEDIUM';
        recommendation = RECOMMENDATIONS.approachingStale;
    } else {
        riskLevel = 'COMPLIANT';
        recommendation = RECOMMENDATIONS.withinPolicy;
    }

    // Rule 4: age escalation runs last and only raises severity
    const exceedsMaxAge = ageDays > thresholds.maxKeyAgeDays;
    if (exceedsMaxAge) {
        if (RISK_SEVERITY[riskLevel] < RISK_SEVERITY.HIGH) {
            riskLevel = 'HIGH';
        }
        recommendation = `${recommendation} ${RECOMMENDATIONS.exceedsMaxAge}`;
    }

    return { fact, ageDays, daysSinceUse, riskLevel, recommendation, exceedsMaxAge };
}

/**
 * Classifies every fact in order. The first invalid fact aborts the batch.
 */
export function classifyAccessKeys(
    facts: readonly AccessKeyFact[],
    now: Date,
    thresholds: KeyThresholds = DEFAULT_THRESHOLDS
): Classification[] {
    return facts.map((fact) => classifyAccessKey(fact, now, thresholds));
}
