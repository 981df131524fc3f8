/**
 * Shared command utilities
 * Client construction and credential event rendering for CLI commands
 */

import { getConfig } from '../utils/config.js';
import { ApiClient } from '../client/ApiClient.js';
import type { CredentialEvent } from '../auth/events.js';
import { errorMessage } from '../utils/errors.js';
import { formatDate, formatMs, formatRelative } from '../utils/formatter.js';
import { log } from '../utils/logger.js';

let verbose = false;

export function setVerbose(value: boolean): void {
    verbose = value;
}

/**
 * Creates an ApiClient from the resolved configuration and prints its
 * credential events while the command runs.
 */
export async function createClient(): Promise<ApiClient> {
    const client = await ApiClient.create(getConfig());
    client.manager.on((event) => printCredentialEvent(event, verbose));
    return client;
}

export type EventLevel = 'debug' | 'success' | 'warn' | 'error';

export interface EventLine {
    level: EventLevel;
    message: string;
}

export function describeCredentialEvent(event: CredentialEvent, now: number = Date.now()): EventLine {
    switch (event.type) {
        case 'token-valid':
            return { level: 'debug', message: `Using cached token (expires ${formatRelative(event.expiresAt, now)})` };
        case 'refresh-attempted':
            return { level: 'debug', message: `Refreshing access token (${event.trigger})` };
        case 'refresh-succeeded':
            return {
                level: 'success',
                message: `Access token refreshed (${event.refreshCountToday} today), expires ${formatDate(event.expiresAt)}`,
            };
        case 'refresh-denied-rate-limit':
            return { level: 'warn', message: `Daily token refresh limit reached (${event.count}/${event.limit})` };
        case 'refresh-denied-too-soon':
            return { level: 'warn', message: `Refresh skipped, last one was too recent (wait ${formatMs(event.retryAfterMs)})` };
        case 'refresh-failed':
            return { level: 'error', message: event.error.message };
        case 'stale-token-used':
            return { level: 'warn', message: `Using potentially expired token as fallback: ${event.reason.message}` };
        case 'forced-invalidation':
            return { level: 'warn', message: `${event.method} ${event.url} answered 401; refreshing token and retrying once` };
        case 'retry-exhausted':
            return { level: 'error', message: `Giving up on ${event.method} ${event.url}: ${event.reason}` };
        case 'persist-failed':
            return { level: 'warn', message: `Could not save tokens: ${errorMessage(event.error)}` };
    }
}

function printCredentialEvent(event: CredentialEvent, showDebug: boolean): void {
    const { level, message } = describeCredentialEvent(event);
    if (level === 'debug' && !showDebug) return;
    log[level](message);
}
