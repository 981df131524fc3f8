/**
 * Credential events
 * One event per state transition of the credential manager
 */

import type {
    MissingRefreshTokenError,
    RefreshError,
    RefreshFailedError,
} from './errors.js';

export type RefreshTrigger = 'expired' | 'manual';

export type CredentialEvent =
    | { type: 'token-valid'; expiresAt: number }
    | { type: 'refresh-attempted'; trigger: RefreshTrigger }
    | { type: 'refresh-succeeded'; expiresAt: number; refreshCountToday: number }
    | { type: 'refresh-denied-rate-limit'; limit: number; count: number }
    | { type: 'refresh-denied-too-soon'; retryAfterMs: number }
    | { type: 'refresh-failed'; error: RefreshFailedError | MissingRefreshTokenError }
    | { type: 'stale-token-used'; reason: RefreshError }
    | { type: 'forced-invalidation'; method: string; url: string }
    | { type: 'retry-exhausted'; method: string; url: string; reason: string }
    | { type: 'persist-failed'; error: unknown };

export type CredentialEventType = CredentialEvent['type'];

export type CredentialListener = (event: CredentialEvent) => void;
