/**
 * Tests for error formatting
 */
import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders, type AxiosResponse } from 'axios';
import { describeCredentialError, errorMessage } from '../../src/utils/errors.js';
import {
    MissingRefreshTokenError,
    NoCredentialError,
    RateLimitExceededError,
    RefreshFailedError,
    RefreshTooSoonError,
    StillUnauthorizedError,
    TransportError,
    isCredentialError,
} from '../../src/auth/errors.js';

function response(status: number, data: unknown): AxiosResponse {
    return { status, statusText: '', data, headers: {}, config: { headers: new AxiosHeaders() } };
}

describe('errorMessage', () => {
    it('should prefer a string response body', () => {
        const error = new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, response(502, 'gateway down'));
        expect(errorMessage(error)).toBe('gateway down');
    });

    it('should use the message field of a JSON body', () => {
        const error = new AxiosError('Request failed', 'ERR_BAD_REQUEST', undefined, undefined, response(400, { message: 'bad grant' }));
        expect(errorMessage(error)).toBe('bad grant');
    });

    it('should fall back to the status', () => {
        const error = new AxiosError('Request failed', 'ERR_BAD_RESPONSE', undefined, undefined, response(503, {}));
        expect(errorMessage(error)).toBe('HTTP 503');
    });

    it('should handle plain errors and other values', () => {
        expect(errorMessage(new Error('boom'))).toBe('boom');
        expect(errorMessage('just text')).toBe('just text');
    });
});

describe('describeCredentialError', () => {
    it('should tell the operator to come back tomorrow at the daily cap', () => {
        expect(describeCredentialError(new RateLimitExceededError(10, 10))).toBe(
            'Daily token refresh limit (10) reached: 10 refreshes today. Try again tomorrow.'
        );
    });

    it('should state the remaining wait when refreshing too soon', () => {
        expect(describeCredentialError(new RefreshTooSoonError(90000))).toBe(
            'Token was refreshed recently. Wait 1.5min before refreshing again.'
        );
    });

    it('should append the auth endpoint status', () => {
        expect(describeCredentialError(new RefreshFailedError('invalid_grant', { status: 400 }))).toBe(
            'Token refresh failed: invalid_grant (HTTP 400)'
        );
        expect(describeCredentialError(new RefreshFailedError('socket hang up'))).toBe(
            'Token refresh failed: socket hang up'
        );
    });

    it('should append the status of the rejected resend', () => {
        expect(describeCredentialError(new StillUnauthorizedError(response(401, '')))).toBe(
            'Still unauthorized after token refresh. Check the client credentials. (HTTP 401)'
        );
    });

    it('should point at the set command when no credential exists', () => {
        expect(describeCredentialError(new NoCredentialError())).toBe(
            'No access token or refresh token available. Run: alc auth set --refresh-token <token>'
        );
    });

    it('should pass other kinds through', () => {
        expect(describeCredentialError(new MissingRefreshTokenError())).toBe('No refresh token available');
        expect(describeCredentialError(new TransportError('ECONNRESET'))).toBe('Request error: ECONNRESET');
        expect(describeCredentialError(new Error('plain'))).toBe('plain');
    });
});

describe('isCredentialError', () => {
    it('should recognise credential errors only', () => {
        expect(isCredentialError(new RefreshTooSoonError(1000))).toBe(true);
        expect(isCredentialError(new Error('other'))).toBe(false);
        expect(isCredentialError(undefined)).toBe(false);
    });
});
