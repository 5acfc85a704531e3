#!/usr/bin/env node
import { runAssessment } from './assessment.js';
import { parseCliArgs } from './cli-args.js';
import { loadConfig, loadDotenv } from './config.js';
import { formatSummaryLines } from './reports/console-summary.js';
import { writeReports } from './reports/write-reports.js';
import { IamFactSource } from './sources/iam-fact-source.js';
import { createModuleLogger, logger } from './utils/logger.js';

const log = createModuleLogger('cli');

async function main() {
    loadDotenv();
    const args = parseCliArgs(process.argv.slice(2));
    const config = loadConfig();
    logger.level = config.logLevel;

    const profile = args.profile ?? config.profile;
    const region = args.region ?? config.region;
    log.info('Starting access key lifecycle assessment', { profile: profile ?? 'default', region });

    const result = await runAssessment({
        source: new IamFactSource({ profile, region, maxAttempts: config.maxAttempts }),
        target: { profile, region },
        thresholds: config.thresholds,
    });

    const files = await writeReports(result, args.outputDir ?? config.outputDir, args.format);
    for (const file of files) {
        log.info('Report written', { file });
    }

    console.log(formatSummaryLines(result).join('\n'));
}

main().catch((error: unknown) => {
    log.error(error instanceof Error ? `${error.name}: ${error.message}` : String(error));
    process.exit(1);
});
