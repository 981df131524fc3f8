/**
 * MCP Resource Registrar
 * Read-only credential diagnostics exposed via alc:// URIs
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ApiClient } from '../client/ApiClient.js';

export function registerResources(server: McpServer, client: ApiClient) {
    server.registerResource(
        'token-status',
        'alc://credentials/status',
        {
            description: 'Token presence, expiry and refresh accounting for the current process',
            mimeType: 'application/json',
        },
        async (uri) => ({
            contents: [
                {
                    uri: uri.href,
                    text: JSON.stringify(client.getStatus(), null, 2),
                    mimeType: 'application/json',
                },
            ],
        }),
    );
}
