/**
 * Error utilities
 * Shared error formatting for CLI and MCP error handling
 */

import { AxiosError } from 'axios';
import { isCredentialError } from '../auth/errors.js';
import { formatMs } from './formatter.js';

/**
 * Extracts a human-readable message from an unknown error value.
 * For AxiosErrors, prefers the API response body (which often contains
 * a more descriptive message than the generic HTTP status).
 */
export function errorMessage(error: unknown): string {
    if (error instanceof AxiosError && error.response) {
        const data: unknown = error.response.data;
        if (typeof data === 'string' && data.length > 0) return data;
        if (data && typeof data === 'object' && 'message' in data) return String(data.message);
        return `HTTP ${error.response.status || 'unknown'}`;
    }
    return error instanceof Error ? error.message : String(error);
}

/**
 * Operator-facing description of a credential error, with the context
 * needed to back off (cap and count, remaining wait, endpoint status).
 */
export function describeCredentialError(error: unknown): string {
    if (!isCredentialError(error)) return errorMessage(error);

    switch (error.kind) {
        case 'RateLimitExceeded':
            return `${error.message}. Try again tomorrow.`;
        case 'RefreshTooSoon':
            return `Token was refreshed recently. Wait ${formatMs(error.retryAfterMs)} before refreshing again.`;
        case 'RefreshFailed':
            return error.status ? `${error.message} (HTTP ${error.status})` : error.message;
        case 'StillUnauthorized':
            return `${error.message} (HTTP ${error.response.status})`;
        case 'NoCredential':
            return `${error.message}. Run: alc auth set --refresh-token <token>`;
        default:
            return error.message;
    }
}
