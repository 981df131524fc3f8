/**
 * MCP server assembly
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ApiClient } from '../client/ApiClient.js';
import { registerCredentialTools } from './tools/index.js';
import { registerResources } from './resources.js';
import { PACKAGE_NAME, VERSION } from '../version.js';

export function createMcpServer(client: ApiClient): McpServer {
    const server = new McpServer({
        name: PACKAGE_NAME,
        version: VERSION,
    });

    registerCredentialTools(server, client);
    registerResources(server, client);

    return server;
}
