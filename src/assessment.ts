import { aggregateClassifications } from './analyzers/aggregate.js';
import { classifyAccessKeys } from './analyzers/key-rules.js';
import { DEFAULT_THRESHOLDS } from './config.js';
import type { AccessKeyFactSource } from './sources/iam-fact-source.js';
import type {
    AccessKeyFact,
    AssessmentResult,
    AuditTarget,
    Clock,
    KeyThresholds,
} from './types/index.js';
import { createModuleLogger } from './utils/logger.js';

const log = createModuleLogger('assessment');

export const systemClock: Clock = () => new Date();

export interface AssessmentOptions {
    source: AccessKeyFactSource;
    target: AuditTarget;
    thresholds?: KeyThresholds;
    clock?: Clock;
}

/**
 * Fetches every key fact, then classifies and aggregates them.
 * Any fetch or data error aborts the whole run; there is no partial result.
 */
export async function runAssessment(options: AssessmentOptions): Promise<AssessmentResult> {
    const { source, target } = options;
    const thresholds = options.thresholds ?? DEFAULT_THRESHOLDS;
    const clock = options.clock ?? systemClock;

    const account = await source.describeAccount();
    const users = await source.listUsers();
    log.info('Collecting access keys', { users: users.length });

    const facts: AccessKeyFact[] = [];
    for (const user of users) {
        facts.push(...(await source.listAccessKeysForUser(user)));
    }

    const assessedAt = clock();
    const classifications = classifyAccessKeys(facts, assessedAt, thresholds);
    const summary = aggregateClassifications(classifications, { totalUsers: users.length });

    if (summary.noKeysFound) {
        log.warn('No access keys found', { users: users.length });
    }
    log.info('Access key analysis complete', {
        keys: summary.totalKeys,
        critical: summary.riskCounts.CRITICAL,
        high: summary.riskCounts.HIGH,
        complianceRate: summary.complianceRate,
    });

    return { account, target, thresholds, assessedAt, classifications, summary };
}
