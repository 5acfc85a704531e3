import { createObjectCsvStringifier, createObjectCsvWriter } from 'csv-writer';
import type { Classification } from '../types/index.js';
import { toKeyFinding } from './json-report.js';

export type CsvRow = {
    userName: string;
    accessKeyId: string;
    status: string;
    createdAt: string;
    lastUsedAt: string;
    lastUsedService: string;
    lastUsedRegion: string;
    ageDays: number;
    daysSinceUse: number | string;
    riskLevel: string;
    recommendation: string;
    exceedsMaxAge: string;
};

export const CSV_HEADER: ReadonlyArray<{ id: keyof CsvRow; title: string }> = [
    { id: 'userName', title: 'User Name' },
    { id: 'accessKeyId', title: 'Access Key ID' },
    { id: 'status', title: 'Status' },
    { id: 'createdAt', title: 'Created' },
    { id: 'lastUsedAt', title: 'Last Used' },
    { id: 'lastUsedService', title: 'Last Used Service' },
    { id: 'lastUsedRegion', title: 'Last Used Region' },
    { id: 'ageDays', title: 'Age (Days)' },
    { id: 'daysSinceUse', title: 'Days Since Use' },
    { id: 'riskLevel', title: 'Risk Level' },
    { id: 'recommendation', title: 'Recommendation' },
    { id: 'exceedsMaxAge', title: 'Exceeds Max Age' },
];

/**
 * Flattens classifications into one row per key. Absent values become empty cells.
 */
export function buildCsvRows(classifications: readonly Classification[]): CsvRow[] {
    return classifications.map((c) => {
        const finding = toKeyFinding(c);
        return {
            userName: finding.userName,
            accessKeyId: finding.accessKeyId,
            status: finding.status,
            createdAt: finding.createdAt ?? '',
            lastUsedAt: finding.lastUsedAt ?? '',
            lastUsedService: finding.lastUsedService ?? '',
            lastUsedRegion: finding.lastUsedRegion ?? '',
            ageDays: finding.ageDays,
            daysSinceUse: finding.daysSinceUse,
            riskLevel: finding.riskLevel,
            recommendation: finding.recommendation,
            exceedsMaxAge: finding.exceedsMaxAge ? 'true' : 'false',
        };
    });
}

export function renderCsv(rows: readonly CsvRow[]): string {
    const stringifier = createObjectCsvStringifier({ header: [...CSV_HEADER] });
    return (stringifier.getHeaderString() ?? '') + stringifier.stringifyRecords([...rows]);
}

export async function writeCsvReport(rows: readonly CsvRow[], outputPath: string): Promise<void> {
    const csvWriter = createObjectCsvWriter({
        path: outputPath,
        header: [...CSV_HEADER],
    });
    await csvWriter.writeRecords([...rows]);
}
