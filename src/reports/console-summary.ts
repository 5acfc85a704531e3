import type { AssessmentResult } from '../types/index.js';

const RULE = '='.repeat(60);

/**
 * Human-readable summary lines. Every number is read from the assessment summary.
 */
export function formatSummaryLines(result: AssessmentResult): string[] {
    const { summary, account } = result;

    const lines = [
        RULE,
        'ACCESS KEY ASSESSMENT SUMMARY',
        RULE,
        `Account ID: ${account.accountId}`,
        `Total Users: ${summary.totalUsers}`,
        `Users With Keys: ${summary.usersWithKeys}`,
        `Total Access Keys: ${summary.totalKeys}`,
        `Critical Risk Keys: ${summary.riskCounts.CRITICAL}`,
        `High Risk Keys: ${summary.riskCounts.HIGH}`,
        `Medium Risk Keys: ${summary.riskCounts.MEDIUM}`,
        `Low Risk (Inactive) Keys: ${summary.riskCounts.LOW}`,
        `Compliant Keys: ${summary.riskCounts.COMPLIANT}`,
        `Never Used Keys: ${summary.neverUsedKeys}`,
        `Compliance Rate: ${summary.complianceRate.toFixed(1)}%`,
        `Overall Status: ${summary.overallStatus}`,
    ];

    if (summary.noKeysFound) {
        lines.push('No access keys found in this account.');
    } else if (summary.overallStatus === 'COMPLIANT') {
        lines.push('Access key management meets compliance requirements.');
    } else {
        lines.push('Access key management requires attention; see the report findings.');
    }

    return lines;
}
