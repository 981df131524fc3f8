/**
 * Tests for CredentialManager.authenticatedRequest and its single 401 recovery
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { API_URL, bearerOf } from '../helpers/fakeHttp.js';
import { setupManager } from '../helpers/manager.js';

const MINUTE = 60 * 1000;
const NOW = new Date(2026, 5, 1, 9, 0, 0).getTime();

const validOld = { accessToken: 'old', refreshToken: 'R0', expiresAt: NOW + 60 * MINUTE };

describe('CredentialManager.authenticatedRequest', () => {
    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(NOW);
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should send the current token as a bearer header', async () => {
        const { manager, apiCalls, authCalls } = setupManager({
            initial: validOld,
            api: () => ({ status: 200, data: { rows: 3 } }),
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.status).toBe(200);
        expect(result.value.data).toEqual({ rows: 3 });
        expect(apiCalls().map(bearerOf)).toEqual(['old']);
        expect(authCalls()).toHaveLength(0);
    });

    it('should abort without any HTTP call when no credentials exist', async () => {
        const { manager, calls } = setupManager();

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok || result.error.kind).toBe('NoCredential');
        expect(calls).toHaveLength(0);
    });

    it('should report the daily cap instead of NoCredential when only a refresh token is held', async () => {
        const { manager, calls } = setupManager({
            initial: { refreshToken: 'R0', refreshCountToday: 10, refreshDate: '2026-06-01' },
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok).toBe(false);
        if (result.ok || result.error.kind !== 'RateLimitExceeded') return;
        expect(result.error.limit).toBe(10);
        expect(result.error.count).toBe(10);
        expect(result.error.message).toBe('Daily token refresh limit (10) reached: 10 refreshes today');
        expect(calls).toHaveLength(0);
    });

    it('should refresh once and resend once after a 401', async () => {
        const { manager, apiCalls, authCalls, events } = setupManager({
            initial: validOld,
            api: (config) =>
                bearerOf(config) === 'old' ? { status: 401, data: 'expired' } : { status: 200, data: { rows: [] } },
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.status).toBe(200);
        expect(result.value.data).toEqual({ rows: [] });
        expect(apiCalls().map(bearerOf)).toEqual(['old', 'A1']);
        expect(authCalls()).toHaveLength(1);
        expect(events.map((e) => e.type)).toEqual([
            'token-valid',
            'forced-invalidation',
            'refresh-attempted',
            'refresh-succeeded',
        ]);
    });

    it('should not resend when the refresh after a 401 fails', async () => {
        const { manager, apiCalls, events } = setupManager({
            initial: validOld,
            auth: () => ({ status: 500, data: 'auth down' }),
            api: () => ({ status: 401, data: 'expired' }),
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok || result.error.kind).toBe('RefreshFailed');
        expect(apiCalls()).toHaveLength(1);
        expect(events.at(-1)).toEqual({
            type: 'retry-exhausted',
            method: 'GET',
            url: API_URL,
            reason: 'Token refresh failed: auth endpoint answered 500: auth down',
        });
    });

    it('should surface StillUnauthorized when the resend is rejected again', async () => {
        const { manager, apiCalls, authCalls } = setupManager({
            initial: validOld,
            api: () => ({ status: 401, data: 'nope' }),
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok).toBe(false);
        if (result.ok || result.error.kind !== 'StillUnauthorized') return;
        expect(result.error.response.status).toBe(401);
        expect(result.error.response.data).toBe('nope');
        expect(apiCalls().map(bearerOf)).toEqual(['old', 'A1']);
        expect(authCalls()).toHaveLength(1);
    });

    it('should force-expire the token and respect the refresh interval after a 401', async () => {
        const { manager, store, apiCalls, authCalls } = setupManager({
            initial: { ...validOld, lastRefreshTime: NOW - 30 * 1000 },
            api: () => ({ status: 401, data: '' }),
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok || result.error.kind).toBe('RefreshTooSoon');
        expect(store.snapshot().expiresAt).toBe(NOW - MINUTE);
        expect(store.snapshot().accessToken).toBe('old');
        expect(apiCalls()).toHaveLength(1);
        expect(authCalls()).toHaveLength(0);
    });

    it('should return non-401 responses verbatim without refreshing', async () => {
        const statuses = [403, 404, 500];
        for (const status of statuses) {
            const { manager, authCalls, apiCalls } = setupManager({
                initial: validOld,
                api: () => ({ status, data: { status } }),
            });

            const result = await manager.authenticatedRequest('GET', API_URL);

            expect(result.ok && result.value.status).toBe(status);
            expect(result.ok && result.value.data).toEqual({ status });
            expect(apiCalls()).toHaveLength(1);
            expect(authCalls()).toHaveLength(0);
        }
    });

    it('should surface a transport failure as TransportError without retrying', async () => {
        const { manager, apiCalls } = setupManager({
            initial: validOld,
            api: () => new Error('ECONNRESET'),
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok || result.error.message).toBe('Request error: ECONNRESET');
        expect(result.ok || result.error.kind).toBe('TransportError');
        expect(apiCalls()).toHaveLength(1);
    });

    it('should pass body, params, headers and timeout through', async () => {
        const { manager, apiCalls } = setupManager({ initial: validOld });

        await manager.authenticatedRequest('POST', API_URL, {
            data: { start_date: '2026-06-01' },
            params: { page: 2 },
            headers: { 'X-Report': 'allocation' },
            timeoutMs: 1234,
        });

        const [call] = apiCalls();
        expect(call.method).toBe('post');
        expect(JSON.parse(String(call.data))).toEqual({ start_date: '2026-06-01' });
        expect(call.params).toEqual({ page: 2 });
        expect(call.headers['X-Report']).toBe('allocation');
        expect(call.headers.Authorization).toBe('Bearer old');
        expect(call.timeout).toBe(1234);
    });

    it('should let a caller header never override the bearer token', async () => {
        const { manager, apiCalls } = setupManager({ initial: validOld });

        await manager.authenticatedRequest('GET', API_URL, { headers: { Authorization: 'Basic abc' } });

        expect(apiCalls()[0].headers.Authorization).toBe('Bearer old');
    });

    it('should try the stale token when a refresh is denied', async () => {
        const { manager, apiCalls, events } = setupManager({
            initial: {
                accessToken: 'stale',
                refreshToken: 'R0',
                expiresAt: NOW - MINUTE,
                refreshCountToday: 10,
                refreshDate: '2026-06-01',
            },
        });

        const result = await manager.authenticatedRequest('GET', API_URL);

        expect(result.ok && result.value.status).toBe(200);
        expect(apiCalls().map(bearerOf)).toEqual(['stale']);
        expect(events.map((e) => e.type)).toEqual(['refresh-denied-rate-limit', 'stale-token-used']);
    });

    it('should share one refresh when concurrent requests both see a 401', async () => {
        const { manager, authCalls, apiCalls } = setupManager({
            initial: validOld,
            api: (config) => (bearerOf(config) === 'old' ? { status: 401 } : { status: 200, data: 'ok' }),
        });

        const [first, second] = await Promise.all([
            manager.authenticatedRequest('GET', API_URL),
            manager.authenticatedRequest('GET', `${API_URL}?page=2`),
        ]);

        expect(first.ok && first.value.status).toBe(200);
        expect(second.ok && second.value.status).toBe(200);
        expect(authCalls()).toHaveLength(1);
        expect(apiCalls().map(bearerOf).sort()).toEqual(['A1', 'A1', 'old', 'old']);
    });
});
