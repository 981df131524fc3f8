/**
 * OAuth Flow
 * refresh_token grant against the allocation API's auth endpoint
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { RefreshFailedError } from './errors.js';
import { errorMessage } from '../utils/errors.js';
import { ok, err, type Result } from '../utils/result.js';

const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const DEFAULT_TIMEOUT_MS = 30000;

const tokenResponseSchema = z.object({
    access_token: z.string().min(1),
    refresh_token: z.string().nullish(),
    token_type: z.string().nullish(),
    expires_in: z.number().int().nonnegative().nullish(),
});

export interface OAuthConfig {
    authUrl: string;
    clientId: string;
    clientSecret: string;
}

export interface IssuedTokens {
    accessToken: string;
    /** The endpoint's new refresh token, or the one that was presented */
    refreshToken: string;
    expiresIn: number; // seconds
}

export interface RefreshRequestOptions {
    timeoutMs?: number;
    signal?: AbortSignal;
}

export class OAuthFlow {
    private readonly config: OAuthConfig;
    private readonly http: AxiosInstance;

    constructor(config: OAuthConfig, http: AxiosInstance = axios.create()) {
        this.config = config;
        this.http = http;
    }

    /**
     * Exchange a refresh token for a new access token.
     * Transport errors, non-2xx answers and malformed bodies all become RefreshFailed.
     */
    async refreshToken(
        refreshToken: string,
        options: RefreshRequestOptions = {}
    ): Promise<Result<IssuedTokens, RefreshFailedError>> {
        const payload = {
            grant_type: 'refresh_token',
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            refresh_token: refreshToken,
        };

        let status: number;
        let body: unknown;
        try {
            const response = await this.http.post<unknown>(this.config.authUrl, payload, {
                headers: { 'Content-Type': 'application/json' },
                timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
                signal: options.signal,
                validateStatus: () => true,
            });
            status = response.status;
            body = response.data;
        } catch (error) {
            return err(new RefreshFailedError(errorMessage(error), { cause: error }));
        }

        if (status < 200 || status >= 300) {
            const detail = typeof body === 'string' && body.length > 0 ? body : JSON.stringify(body ?? null);
            return err(new RefreshFailedError(`auth endpoint answered ${status}: ${detail}`, { status }));
        }

        const parsed = tokenResponseSchema.safeParse(body);
        if (!parsed.success) {
            return err(new RefreshFailedError('malformed token response', { status, cause: parsed.error }));
        }

        return ok({
            accessToken: parsed.data.access_token,
            refreshToken: parsed.data.refresh_token || refreshToken,
            expiresIn: parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS,
        });
    }
}
