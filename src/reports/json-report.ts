import type {
    AssessmentResult,
    AssessmentSummary,
    Classification,
    KeyThresholds,
    OverallStatus,
    RiskLevel,
} from '../types/index.js';

export const TOOL_VERSION = '1.0.0';

export interface FrameworkMapping {
    framework: string;
    control: string;
    title: string;
    status: OverallStatus;
}

export interface KeyFinding {
    userName: string;
    accessKeyId: string;
    status: 'Active' | 'Inactive';
    createdAt: string | null;
    lastUsedAt: string | null;
    lastUsedService: string | null;
    lastUsedRegion: string | null;
    ageDays: number;
    daysSinceUse: number | 'never';
    riskLevel: RiskLevel;
    recommendation: string;
    exceedsMaxAge: boolean;
}

export interface JsonReport {
    reportMetadata: {
        generatedAt: string;
        toolVersion: string;
        accountId: string;
        callerArn: string | null;
        profile: string | null;
        region: string;
        thresholds: KeyThresholds;
    };
    summary: AssessmentSummary;
    complianceAssessment: {
        overallStatus: OverallStatus;
        complianceRate: number;
        noKeysFound: boolean;
        frameworks: FrameworkMapping[];
        recommendations: string[];
    };
    findings: KeyFinding[];
}

const FRAMEWORK_CONTROLS: ReadonlyArray<Omit<FrameworkMapping, 'status'>> = [
    {
        framework: 'CIS AWS Foundations Benchmark',
        control: '1.14',
        title: 'Ensure access keys are rotated every 90 days or less',
    },
    {
        framework: 'CIS AWS Foundations Benchmark',
        control: '1.12',
        title: 'Ensure credentials unused for 45 days or greater are disabled',
    },
    {
        framework: 'NIST SP 800-53',
        control: 'IA-5(1)',
        title: 'Authenticator management: credential lifetime restrictions',
    },
    {
        framework: 'SOC 2',
        control: 'CC6.1',
        title: 'Logical access security over protected information assets',
    },
    {
        framework: 'PCI DSS v4.0',
        control: '8.3.9',
        title: 'Authentication factors are changed at least once every 90 days',
    },
];

export function frameworkMappings(status: OverallStatus): FrameworkMapping[] {
    return FRAMEWORK_CONTROLS.map((control) => ({ ...control, status }));
}

/**
 * One account-level recommendation per non-empty risk bucket, most severe first.
 */
export function accountRecommendations(summary: AssessmentSummary): string[] {
    if (summary.noKeysFound) {
        return ['No access keys found; nothing to rotate.'];
    }

    const { CRITICAL, HIGH, MEDIUM, LOW } = summary.riskCounts;
    const recommendations: string[] = [];

    if (CRITICAL > 0) {
        recommendations.push(`Rotate or delete ${CRITICAL} critical key(s) immediately.`);
    }
    if (HIGH > 0) {
        recommendations.push(`Schedule rotation for ${HIGH} high-risk key(s).`);
    }
    if (MEDIUM > 0) {
        recommendations.push(`Review ${MEDIUM} key(s) that are unused or approaching staleness.`);
    }
    if (LOW > 0) {
        recommendations.push(`Delete ${LOW} inactive key(s) if they are no longer needed.`);
    }
    if (recommendations.length === 0) {
        recommendations.push('All access keys are within rotation policy.');
    }
    return recommendations;
}

export function toKeyFinding(c: Classification): KeyFinding {
    return {
        userName: c.fact.userName,
        accessKeyId: c.fact.accessKeyId,
        status: c.fact.isActive ? 'Active' : 'Inactive',
        createdAt: c.fact.createdAt?.toISOString() ?? null,
        lastUsedAt: c.fact.lastUsedAt?.toISOString() ?? null,
        lastUsedService: c.fact.lastUsedService ?? null,
        lastUsedRegion: c.fact.lastUsedRegion ?? null,
        ageDays: c.ageDays,
        daysSinceUse: c.daysSinceUse,
        riskLevel: c.riskLevel,
        recommendation: c.recommendation,
        exceedsMaxAge: c.exceedsMaxAge,
    };
}

/**
 * Structured report for one assessment. The generation time defaults to the
 * assessment instant.
 */
export function buildJsonReport(result: AssessmentResult, generatedAt: Date = result.assessedAt): JsonReport {
    const { summary } = result;

    return {
        reportMetadata: {
            generatedAt: generatedAt.toISOString(),
            toolVersion: TOOL_VERSION,
            accountId: result.account.accountId,
            callerArn: result.account.arn ?? null,
            profile: result.target.profile ?? null,
            region: result.target.region,
            thresholds: { ...result.thresholds },
        },
        summary,
        complianceAssessment: {
            overallStatus: summary.overallStatus,
            complianceRate: summary.complianceRate,
            noKeysFound: summary.noKeysFound,
            frameworks: frameworkMappings(summary.overallStatus),
            recommendations: accountRecommendations(summary),
        },
        findings: result.classifications.map(toKeyFinding),
    };
}
