import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type { AuditConfig } from './config.js';
import { TOOL_VERSION } from './reports/json-report.js';
import {
    type AuditDependencies,
    auditAccessKeys,
    auditAccessKeysSchema,
    classifyAccessKeyFacts,
    classifyAccessKeysSchema,
} from './tools/audit-access-keys.js';
import { createModuleLogger } from './utils/logger.js';

const log = createModuleLogger('mcp');

const thresholdProperties = {
    type: 'object' as const,
    description: 'Optional threshold overrides, in days',
    properties: {
        neverUsedDays: { type: 'integer', minimum: 0 },
        criticalStaleDays: { type: 'integer', minimum: 0 },
        highStaleDays: { type: 'integer', minimum: 0 },
        mediumStaleDays: { type: 'integer', minimum: 0 },
        maxKeyAgeDays: { type: 'integer', minimum: 0 },
    },
};

export function createServer(
    config: AuditConfig,
    deps: Omit<AuditDependencies, 'config'> = {}
): Server {
    const server = new Server(
        { name: 'iam-key-auditor', version: TOOL_VERSION },
        { capabilities: { tools: {} } }
    );

    /**
     * List all available tools.
     */
    server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: [
            {
                name: 'audit_access_keys',
                description:
                    'Audits every IAM user access key in an AWS account for staleness. ' +
                    'Classifies each key as CRITICAL/HIGH/MEDIUM/LOW/COMPLIANT from its age and ' +
                    'last-use date, and returns a compliance report with summary counts, ' +
                    'compliance rate, framework mappings and per-key recommendations. ' +
                    'Read-only: never rotates, disables or deletes keys.',
                inputSchema: {
                    type: 'object' as const,
                    properties: {
                        profile: { type: 'string', description: 'AWS named profile to audit' },
                        region: { type: 'string', description: 'AWS region for the IAM and STS clients' },
                        thresholds: thresholdProperties,
                    },
                },
            },
            {
                name: 'classify_access_keys',
                description:
                    'Classifies supplied access key facts (user, key id, creation date, ' +
                    'last-used date, active flag) against the staleness policy without calling AWS.',
                inputSchema: {
                    type: 'object' as const,
                    properties: {
                        facts: {
                            type: 'array',
                            items: {
                                type: 'object',
                                properties: {
                                    userName: { type: 'string' },
                                    accessKeyId: { type: 'string' },
                                    createdAt: { type: 'string', format: 'date-time' },
                                    lastUsedAt: { type: ['string', 'null'], format: 'date-time' },
                                    isActive: { type: 'boolean' },
                                    lastUsedService: { type: 'string' },
                                    lastUsedRegion: { type: 'string' },
                                },
                                required: ['userName', 'accessKeyId', 'isActive'],
                            },
                        },
                        now: {
                            type: 'string',
                            format: 'date-time',
                            description: 'Reference instant; defaults to the current time',
                        },
                        thresholds: thresholdProperties,
                    },
                    required: ['facts'],
                },
            },
        ],
    }));

    /**
     * Handle tool execution requests.
     */
    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;

        try {
            let result: unknown;
            if (name === 'audit_access_keys') {
                result = await auditAccessKeys(auditAccessKeysSchema.parse(args ?? {}), { ...deps, config });
            } else if (name === 'classify_access_keys') {
                result = classifyAccessKeyFacts(classifyAccessKeysSchema.parse(args), config, deps.clock);
            } else {
                throw new Error(`Unknown tool: ${name}`);
            }
            return {
                content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
            };
        } catch (error) {
            const message =
                error instanceof Error ? error.message : 'Unknown error occurred';
            log.error('Tool call failed', { tool: name, error: message });
            return {
                content: [{ type: 'text', text: `Error: ${message}` }],
                isError: true,
            };
        }
    });

    return server;
}
