export type RiskLevel = 'CRITICAL' | 'HIGH' | 'MEDIUM' | 'LOW' | 'COMPLIANT';

export type OverallStatus = 'COMPLIANT' | 'NON_COMPLIANT';

export interface AccessKeyFact {
    readonly userName: string;
    readonly accessKeyId: string;
    readonly createdAt?: Date;
    readonly lastUsedAt?: Date;
    readonly isActive: boolean;
    readonly lastUsedService?: string;
    readonly lastUsedRegion?: string;
}

export interface KeyThresholds {
    neverUsedDays: number;
    criticalStaleDays: number;
    highStaleDays: number;
    mediumStaleDays: number;
    maxKeyAgeDays: number;
}

export interface Classification {
    fact: AccessKeyFact;
    ageDays: number;
    daysSinceUse: number | 'never';
    riskLevel: RiskLevel;
    recommendation: string;
    exceedsMaxAge: boolean;
}

export type RiskCounts = Record<RiskLevel, number>;

export interface AssessmentSummary {
    totalUsers: number;
    usersWithKeys: number;
    totalKeys: number;
    riskCounts: RiskCounts;
    activeKeys: number;
    inactiveKeys: number;
    neverUsedKeys: number;
    complianceRate: number;
    overallStatus: OverallStatus;
    noKeysFound: boolean;
}

export interface AccountIdentity {
    accountId: string;
    arn?: string;
}

/**
 * Opaque audit target, passed through to the report metadata.
 */
export interface AuditTarget {
    profile?: string;
    region: string;
}

export interface AssessmentResult {
    account: AccountIdentity;
    target: AuditTarget;
    thresholds: KeyThresholds;
    assessedAt: Date;
    classifications: Classification[];
    summary: AssessmentSummary;
}

export type Clock = () => Date;
