import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import type { AssessmentResult } from '../types/index.js';
import { buildCsvRows, writeCsvReport } from './csv-report.js';
import { buildJsonReport } from './json-report.js';

export type ReportFormat = 'json' | 'csv' | 'both';

export function reportBaseName(result: AssessmentResult): string {
    const stamp = result.assessedAt.toISOString().replace(/[:.]/g, '-');
    return `access-key-assessment-${result.account.accountId}-${stamp}`;
}

/**
 * Writes the requested report files and returns their paths. Both payloads are
 * built before anything touches the disk, and a failed write removes the files
 * already written, so a run leaves either every requested report or none.
 */
export async function writeReports(
    result: AssessmentResult,
    outputDir: string,
    format: ReportFormat
): Promise<string[]> {
    const wantJson = format === 'json' || format === 'both';
    const wantCsv = format === 'csv' || format === 'both';
    const jsonText = wantJson ? `${JSON.stringify(buildJsonReport(result), null, 2)}\n` : undefined;
    const csvRows = wantCsv ? buildCsvRows(result.classifications) : undefined;

    mkdirSync(outputDir, { recursive: true });
    const base = path.join(outputDir, reportBaseName(result));
    const written: string[] = [];

    try {
        if (jsonText !== undefined) {
            const jsonPath = `${base}.json`;
            writeFileSync(jsonPath, jsonText);
            written.push(jsonPath);
        }
        if (csvRows !== undefined) {
            const csvPath = `${base}.csv`;
            await writeCsvReport(csvRows, csvPath);
            written.push(csvPath);
        }
    } catch (error) {
        for (const file of written) {
            rmSync(file, { force: true });
        }
        throw error;
    }
    return written;
}
