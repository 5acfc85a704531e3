import { z } from 'zod';
import { ConfigError } from './errors.js';

export const USAGE =
    'Usage: key-audit [--profile <name>] [--region <region>] [--output-dir <dir>] [--format json|csv|both]';

export const cliArgsSchema = z.object({
    profile: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    format: z.enum(['json', 'csv', 'both']).default('both'),
});

export type CliArgs = z.infer<typeof cliArgsSchema>;

const FLAGS = new Map<string, keyof CliArgs>([
    ['--profile', 'profile'],
    ['--region', 'region'],
    ['--output-dir', 'outputDir'],
    ['--format', 'format'],
]);

export function parseCliArgs(argv: readonly string[]): CliArgs {
    const raw: Partial<Record<keyof CliArgs, string>> = {};

    for (let i = 0; i < argv.length; i++) {
        const key = FLAGS.get(argv[i]);
        const value = argv[i + 1];
        if (!key || value === undefined || value.startsWith('--')) {
            throw new ConfigError(`Unexpected argument "${argv[i]}". ${USAGE}`);
        }
        raw[key] = value;
        i++;
    }

    const parsed = cliArgsSchema.safeParse(raw);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`${problems}. ${USAGE}`);
    }
    return parsed.data;
}
