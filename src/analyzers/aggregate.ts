import type { AssessmentSummary, Classification, RiskCounts } from '../types/index.js';

function emptyCounts(): RiskCounts {
    return { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, COMPLIANT: 0 };
}

/**
 * Percentage of COMPLIANT keys, one decimal, half-up. An empty audit counts as 100.
 */
export function complianceRate(compliant: number, total: number): number {
    if (total === 0) return 100;
    // integer numerator keeps .5 boundaries exact before rounding
    return Math.round((compliant * 1000) / total) / 10;
}

/**
 * Folds per-key classifications into the account summary.
 * The result does not depend on the order of the input.
 */
export function aggregateClassifications(
    classifications: readonly Classification[],
    options: { totalUsers: number }
): AssessmentSummary {
    const riskCounts = emptyCounts();
    const users = new Set<string>();
    let activeKeys = 0;
    let neverUsedKeys = 0;

    for (const c of classifications) {
        riskCounts[c.riskLevel] += 1;
        users.add(c.fact.userName);
        if (c.fact.isActive) activeKeys += 1;
        if (c.daysSinceUse === 'never') neverUsedKeys += 1;
    }

    const totalKeys = classifications.length;
    return {
        totalUsers: options.totalUsers,
        usersWithKeys: users.size,
        totalKeys,
        riskCounts,
        activeKeys,
        inactiveKeys: totalKeys - activeKeys,
        neverUsedKeys,
        complianceRate: complianceRate(riskCounts.COMPLIANT, totalKeys),
        overallStatus:
            riskCounts.CRITICAL === 0 && riskCounts.HIGH === 0 ? 'COMPLIANT' : 'NON_COMPLIANT',
        noKeysFound: totalKeys === 0,
    };
}
