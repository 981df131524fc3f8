/**
 * Credential Manager
 * Token lifecycle: validity, rate-limited refresh, 401 recovery
 */

import { EventEmitter } from 'events';
import axios, { type AxiosInstance, type AxiosResponse, type Method, type ResponseType } from 'axios';
import { OAuthFlow, type OAuthConfig } from './OAuthFlow.js';
import { TokenStore, effectiveRefreshCount, type TokenState } from './TokenStore.js';
import type { CredentialSink, PersistedCredentials } from './CredentialSink.js';
import type { CredentialEvent, CredentialListener, RefreshTrigger } from './events.js';
import {
    MissingRefreshTokenError,
    NoCredentialError,
    RateLimitExceededError,
    RefreshTooSoonError,
    StillUnauthorizedError,
    TransportError,
    type AuthenticatedRequestError,
    type RefreshError,
} from './errors.js';
import { calendarDate } from '../utils/dates.js';
import { errorMessage } from '../utils/errors.js';
import { ok, err, type Result } from '../utils/result.js';

export interface RefreshPolicy {
    dailyLimit: number;
    minIntervalMs: number;
    /** Tokens this close to their nominal expiry count as expired */
    expiryBufferMs: number;
}

export const DEFAULT_REFRESH_POLICY: Readonly<RefreshPolicy> = {
    dailyLimit: 10,
    minIntervalMs: 2 * 60 * 1000,
    expiryBufferMs: 5 * 60 * 1000,
};

const FORCED_EXPIRY_OFFSET_MS = 60 * 1000;
const DEFAULT_TIMEOUT_MS = 30000;

export interface CredentialManagerConfig extends OAuthConfig {
    store: TokenStore;
    sink?: CredentialSink;
    http?: AxiosInstance;
    timeoutMs?: number;
    policy?: Partial<RefreshPolicy>;
}

export type ValidToken =
    | { token: string; stale: false }
    | { token: string; stale: true; warning: RefreshError };

export interface AuthenticatedRequestOptions {
    headers?: Record<string, string>;
    params?: Record<string, string | number | boolean>;
    data?: unknown;
    responseType?: ResponseType;
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface TokenStatus {
    hasAccessToken: boolean;
    hasRefreshToken: boolean;
    expiresAt?: Date;
    isExpired: boolean;
    refreshCountToday: number;
    dailyLimit: number;
    lastRefreshTime?: Date;
}

export interface CredentialUpdate {
    accessToken?: string;
    refreshToken?: string;
    expiresAt?: number;
}

type PreconditionError = MissingRefreshTokenError | RateLimitExceededError | RefreshTooSoonError;

export class CredentialManager {
    private readonly store: TokenStore;
    private readonly sink?: CredentialSink;
    private readonly http: AxiosInstance;
    private readonly oauthFlow: OAuthFlow;
    private readonly policy: RefreshPolicy;
    private readonly timeoutMs: number;
    private readonly events = new EventEmitter();
    private refreshInFlight: Promise<Result<string, RefreshError>> | null = null;

    constructor(config: CredentialManagerConfig) {
        this.store = config.store;
        this.sink = config.sink;
        this.http = config.http ?? axios.create();
        this.policy = { ...DEFAULT_REFRESH_POLICY, ...config.policy };
        this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.oauthFlow = new OAuthFlow(
            {
                authUrl: config.authUrl,
                clientId: config.clientId,
                clientSecret: config.clientSecret,
            },
            this.http
        );
    }

    on(listener: CredentialListener): () => void {
        this.events.on('event', listener);
        return () => {
            this.events.off('event', listener);
        };
    }

    /**
     * Get a bearer token, refreshing it when expired.
     * When the refresh fails but an old token exists, that token comes back
     * marked stale together with the refresh error; without one, the refresh
     * error itself is returned.
     */
    async getValidToken(): Promise<Result<ValidToken, NoCredentialError | RefreshError>> {
        const state = this.store.snapshot();

        if (state.accessToken && state.expiresAt !== undefined && !this.isExpired(state, Date.now())) {
            this.emit({ type: 'token-valid', expiresAt: state.expiresAt });
            return ok<ValidToken>({ token: state.accessToken, stale: false });
        }

        if (!state.accessToken && !state.refreshToken) {
            return err(new NoCredentialError());
        }

        const refreshed = await this.refresh('expired');
        if (refreshed.ok) {
            return ok<ValidToken>({ token: refreshed.value, stale: false });
        }

        const fallback = this.store.snapshot().accessToken;
        if (fallback) {
            this.emit({ type: 'stale-token-used', reason: refreshed.error });
            return ok<ValidToken>({ token: fallback, stale: true, warning: refreshed.error });
        }

        return refreshed;
    }

    /**
     * Operator-triggered refresh; same preconditions as an automatic one
     */
    manualRefresh(): Promise<Result<string, RefreshError>> {
        return this.refresh('manual');
    }

    /**
     * Send a request with a bearer token. A 401 invalidates the token and
     * allows exactly one refresh and one resend.
     */
    async authenticatedRequest<T = unknown>(
        method: Method,
        url: string,
        options: AuthenticatedRequestOptions = {}
    ): Promise<Result<AxiosResponse<T>, AuthenticatedRequestError>> {
        const first = await this.getValidToken();
        if (!first.ok) {
            return first;
        }

        const response = await this.send<T>(method, url, options, first.value.token);
        if (!response.ok || response.value.status !== 401) {
            return response;
        }

        this.invalidate(first.value.token);
        this.emit({ type: 'forced-invalidation', method, url });

        const second = await this.getValidToken();
        if (!second.ok) {
            this.emit({ type: 'retry-exhausted', method, url, reason: second.error.message });
            return second;
        }
        if (second.value.stale) {
            this.emit({ type: 'retry-exhausted', method, url, reason: second.value.warning.message });
            return err(second.value.warning);
        }

        const retried = await this.send<T>(method, url, options, second.value.token);
        if (retried.ok && retried.value.status === 401) {
            const error = new StillUnauthorizedError(retried.value);
            this.emit({ type: 'retry-exhausted', method, url, reason: error.message });
            return err(error);
        }
        return retried;
    }

    getStatus(now: number = Date.now()): TokenStatus {
        const state = this.store.snapshot();
        return {
            hasAccessToken: !!state.accessToken,
            hasRefreshToken: !!state.refreshToken,
            expiresAt: state.expiresAt !== undefined ? new Date(state.expiresAt) : undefined,
            isExpired: this.isExpired(state, now),
            refreshCountToday: effectiveRefreshCount(state, calendarDate(now)),
            dailyLimit: this.policy.dailyLimit,
            lastRefreshTime: state.lastRefreshTime !== undefined ? new Date(state.lastRefreshTime) : undefined,
        };
    }

    /**
     * Replace the token fields (refresh accounting is kept) and persist them.
     * A refresh token left out of the update keeps its current value.
     */
    async setCredentials(update: CredentialUpdate): Promise<void> {
        const next = this.store.update((current) => ({
            ...current,
            accessToken: update.accessToken || undefined,
            refreshToken: update.refreshToken || current.refreshToken,
            expiresAt: update.expiresAt,
        }));
        if (this.sink) {
            await this.sink.save(toPersisted(next));
        }
    }

    /**
     * Drop both tokens. Refresh accounting survives so the daily cap still holds.
     */
    async logout(): Promise<void> {
        const next = this.store.update((current) => ({
            ...current,
            accessToken: undefined,
            refreshToken: undefined,
            expiresAt: undefined,
        }));
        if (this.sink) {
            await this.sink.save(toPersisted(next));
        }
    }

    private refresh(trigger: RefreshTrigger): Promise<Result<string, RefreshError>> {
        // Join a refresh already on the wire instead of spending another one
        if (this.refreshInFlight) {
            return this.refreshInFlight;
        }

        const allowed = this.checkRefreshPreconditions(Date.now());
        if (!allowed.ok) {
            return Promise.resolve(allowed);
        }

        this.emit({ type: 'refresh-attempted', trigger });
        const inFlight = this.performRefresh(allowed.value).finally(() => {
            this.refreshInFlight = null;
        });
        this.refreshInFlight = inFlight;
        return inFlight;
    }

    private checkRefreshPreconditions(now: number): Result<string, PreconditionError> {
        let state = this.store.snapshot();
        const refreshToken = state.refreshToken;

        if (!refreshToken) {
            const error = new MissingRefreshTokenError();
            this.emit({ type: 'refresh-failed', error });
            return err(error);
        }

        const today = calendarDate(now);
        if (state.refreshDate !== today) {
            state = this.store.update((current) => ({ ...current, refreshCountToday: 0, refreshDate: today }));
        }

        if (state.refreshCountToday >= this.policy.dailyLimit) {
            this.emit({
                type: 'refresh-denied-rate-limit',
                limit: this.policy.dailyLimit,
                count: state.refreshCountToday,
            });
            return err(new RateLimitExceededError(this.policy.dailyLimit, state.refreshCountToday));
        }

        if (state.lastRefreshTime !== undefined) {
            const elapsed = now - state.lastRefreshTime;
            if (elapsed < this.policy.minIntervalMs) {
                const retryAfterMs = this.policy.minIntervalMs - elapsed;
                this.emit({ type: 'refresh-denied-too-soon', retryAfterMs });
                return err(new RefreshTooSoonError(retryAfterMs));
            }
        }

        return ok(refreshToken);
    }

    private async performRefresh(refreshToken: string): Promise<Result<string, RefreshError>> {
        const issued = await this.oauthFlow.refreshToken(refreshToken, { timeoutMs: this.timeoutMs });
        if (!issued.ok) {
            this.emit({ type: 'refresh-failed', error: issued.error });
            return issued;
        }

        const tokens = issued.value;
        const now = Date.now();
        const today = calendarDate(now);
        const next = this.store.update((current) => ({
            ...current,
            accessToken: tokens.accessToken,
            refreshToken: tokens.refreshToken,
            expiresAt: now + tokens.expiresIn * 1000,
            lastRefreshTime: now,
            refreshCountToday: effectiveRefreshCount(current, today) + 1,
            refreshDate: today,
        }));

        this.emit({
            type: 'refresh-succeeded',
            expiresAt: now + tokens.expiresIn * 1000,
            refreshCountToday: next.refreshCountToday,
        });

        // Not awaited; failures surface as persist-failed
        void this.persist(next);
        return ok(tokens.accessToken);
    }

    private async persist(state: TokenState): Promise<void> {
        if (!this.sink) return;
        try {
            await this.sink.save(toPersisted(state));
        } catch (error) {
            this.emit({ type: 'persist-failed', error });
        }
    }

    /** Expire the stored token, unless it was already replaced by someone else's refresh */
    private invalidate(rejectedToken: string): void {
        this.store.update((current) =>
            current.accessToken === rejectedToken
                ? { ...current, expiresAt: Date.now() - FORCED_EXPIRY_OFFSET_MS }
                : current
        );
    }

    private isExpired(state: TokenState, now: number): boolean {
        if (!state.accessToken || state.expiresAt === undefined) return true;
        return now >= state.expiresAt - this.policy.expiryBufferMs;
    }

    private async send<T>(
        method: Method,
        url: string,
        options: AuthenticatedRequestOptions,
        token: string
    ): Promise<Result<AxiosResponse<T>, TransportError>> {
        try {
            const response = await this.http.request<T>({
                method,
                url,
                data: options.data,
                params: options.params,
                responseType: options.responseType,
                headers: { ...options.headers, Authorization: `Bearer ${token}` },
                timeout: options.timeoutMs ?? this.timeoutMs,
                signal: options.signal,
                validateStatus: () => true,
            });
            return ok(response);
        } catch (error) {
            return err(new TransportError(errorMessage(error), { cause: error }));
        }
    }

    private emit(event: CredentialEvent): void {
        this.events.emit('event', event);
    }
}

function toPersisted(state: TokenState): PersistedCredentials {
    return {
        accessToken: state.accessToken,
        refreshToken: state.refreshToken,
        expiresAt: state.expiresAt,
        lastRefreshTime: state.lastRefreshTime,
        refreshCountToday: state.refreshCountToday,
        refreshDate: state.refreshDate,
    };
}
