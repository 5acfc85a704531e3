#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, loadDotenv } from './config.js';
import { createServer } from './server.js';
import { createModuleLogger, logger } from './utils/logger.js';

const log = createModuleLogger('mcp');

/**
 * Start the MCP server using stdio transport.
 */
async function main() {
    loadDotenv();
    const config = loadConfig();
    logger.level = config.logLevel;

    const server = createServer(config);
    const transport = new StdioServerTransport();
    await server.connect(transport);
    log.info('IAM key auditor MCP server running');
}

main().catch((error: unknown) => {
    log.error('Server failed to start', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
});
