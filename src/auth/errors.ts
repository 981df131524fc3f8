/**
 * Credential errors
 * Named failure kinds returned by the credential manager
 */

import type { AxiosResponse } from 'axios';

export type CredentialErrorKind =
    | 'NoCredential'
    | 'MissingRefreshToken'
    | 'RateLimitExceeded'
    | 'RefreshTooSoon'
    | 'RefreshFailed'
    | 'TransportError'
    | 'StillUnauthorized';

abstract class BaseCredentialError<K extends CredentialErrorKind> extends Error {
    abstract readonly kind: K;
}

export class NoCredentialError extends BaseCredentialError<'NoCredential'> {
    readonly kind = 'NoCredential';

    constructor(message = 'No access token or refresh token available', options?: ErrorOptions) {
        super(message, options);
        this.name = 'NoCredentialError';
    }
}

export class MissingRefreshTokenError extends BaseCredentialError<'MissingRefreshToken'> {
    readonly kind = 'MissingRefreshToken';

    constructor() {
        super('No refresh token available');
        this.name = 'MissingRefreshTokenError';
    }
}

export class RateLimitExceededError extends BaseCredentialError<'RateLimitExceeded'> {
    readonly kind = 'RateLimitExceeded';

    constructor(
        readonly limit: number,
        readonly count: number,
    ) {
        super(`Daily token refresh limit (${limit}) reached: ${count} refreshes today`);
        this.name = 'RateLimitExceededError';
    }
}

export class RefreshTooSoonError extends BaseCredentialError<'RefreshTooSoon'> {
    readonly kind = 'RefreshTooSoon';

    constructor(readonly retryAfterMs: number) {
        super(`Token was refreshed recently; retry in ${Math.ceil(retryAfterMs / 1000)}s`);
        this.name = 'RefreshTooSoonError';
    }
}

export class RefreshFailedError extends BaseCredentialError<'RefreshFailed'> {
    readonly kind = 'RefreshFailed';

    /** HTTP status returned by the auth endpoint, when it answered at all */
    readonly status?: number;

    constructor(message: string, options?: ErrorOptions & { status?: number }) {
        super(`Token refresh failed: ${message}`, options);
        this.name = 'RefreshFailedError';
        this.status = options?.status;
    }
}

export class TransportError extends BaseCredentialError<'TransportError'> {
    readonly kind = 'TransportError';

    constructor(message: string, options?: ErrorOptions) {
        super(`Request error: ${message}`, options);
        this.name = 'TransportError';
    }
}

export class StillUnauthorizedError extends BaseCredentialError<'StillUnauthorized'> {
    readonly kind = 'StillUnauthorized';

    constructor(readonly response: AxiosResponse) {
        super('Still unauthorized after token refresh. Check the client credentials.');
        this.name = 'StillUnauthorizedError';
    }
}

/** Failures of a refresh, whether denied up front or rejected by the endpoint */
export type RefreshError =
    | MissingRefreshTokenError
    | RateLimitExceededError
    | RefreshTooSoonError
    | RefreshFailedError;

export type AuthenticatedRequestError =
    | NoCredentialError
    | RefreshError
    | TransportError
    | StillUnauthorizedError;

export type CredentialError = AuthenticatedRequestError;

export function isCredentialError(error: unknown): error is CredentialError {
    return (
        error instanceof NoCredentialError ||
        error instanceof MissingRefreshTokenError ||
        error instanceof RateLimitExceededError ||
        error instanceof RefreshTooSoonError ||
        error instanceof RefreshFailedError ||
        error instanceof TransportError ||
        error instanceof StillUnauthorizedError
    );
}
