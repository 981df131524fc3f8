/**
 * Shared MCP tool utilities
 * Common helpers used across all MCP tool registrars
 */

import { describeCredentialError } from '../../utils/errors.js';

/**
 * Build a standard MCP error response.
 * Every tool handler failure path should return this.
 */
export function mcpError(error: unknown) {
    return {
        content: [{ type: 'text' as const, text: `Error: ${describeCredentialError(error)}` }],
        isError: true as const,
    };
}

export function mcpJson(value: unknown) {
    return {
        content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    };
}
