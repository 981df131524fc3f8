#!/usr/bin/env node
/**
 * Allocation Connect MCP Server
 * Exposes credential status, refresh and authenticated requests via Model Context Protocol
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { getConfig } from './utils/config.js';
import { ApiClient } from './client/ApiClient.js';
import { createMcpServer } from './mcp/server.js';
import { describeCredentialEvent } from './commands/shared.js';

async function start() {
    const client = await ApiClient.create(getConfig());

    // stdout carries the protocol; diagnostics go to stderr
    client.manager.on((event) => {
        const { level, message } = describeCredentialEvent(event);
        if (level !== 'debug') console.error(`[${level}] ${message}`);
    });

    const server = createMcpServer(client);
    await server.connect(new StdioServerTransport());
    console.error('Allocation Connect MCP Server running on stdio');
}

start().catch((err) => {
    console.error(`Failed to start: ${err instanceof Error ? err.message : err}`);
    process.exit(1);
});
