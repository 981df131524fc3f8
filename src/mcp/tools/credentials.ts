/**
 * MCP Tool Registrar — Credential tools
 * token_status, refresh_token, api_request
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { ApiClient } from '../../client/ApiClient.js';
import { mcpError, mcpJson } from './shared.js';

const METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'] as const;

export function registerCredentialTools(server: McpServer, client: ApiClient) {
    server.registerTool(
        'token_status',
        {
            title: 'Token Status',
            description:
                'Reports whether an access token and refresh token are held, when the access token expires, whether it counts as expired (5 minute safety buffer), how many refreshes were spent today against the daily limit, and when the last refresh happened. Never triggers a refresh.',
            annotations: { readOnlyHint: true },
        },
        async () => mcpJson(client.getStatus()),
    );

    server.registerTool(
        'refresh_token',
        {
            title: 'Refresh Access Token',
            description:
                'Mints a new access token from the stored refresh token. Counts against the daily refresh limit and is refused within 2 minutes of the previous refresh; the error says how long to wait.',
            annotations: { readOnlyHint: false, idempotentHint: false },
        },
        async () => {
            const result = await client.refresh();
            if (!result.ok) {
                return mcpError(result.error);
            }
            const status = client.getStatus();
            return mcpJson({
                refreshed: true,
                expiresAt: status.expiresAt,
                refreshCountToday: status.refreshCountToday,
                dailyLimit: status.dailyLimit,
            });
        },
    );

    server.registerTool(
        'api_request',
        {
            title: 'Authenticated API Request',
            description:
                'Sends an HTTP request with the current bearer token. On a 401 the token is refreshed once and the request is resent once. Returns status, headers and body. Relative URLs are resolved against the configured base URL.',
            inputSchema: {
                method: z.enum(METHODS).describe('HTTP method'),
                url: z.string().describe('Absolute URL or path relative to the configured base URL'),
                body: z.unknown().optional().describe('JSON request body'),
                headers: z.record(z.string()).optional().describe('Extra request headers'),
            },
            annotations: { readOnlyHint: false, openWorldHint: true },
        },
        async ({ method, url, body, headers }) => {
            try {
                const result = await client.request(method, url, { data: body, headers });
                if (!result.ok) {
                    return mcpError(result.error);
                }
                const { status, headers: responseHeaders, data } = result.value;
                return mcpJson({ status, headers: responseHeaders, body: data });
            } catch (error) {
                return mcpError(error);
            }
        },
    );
}
