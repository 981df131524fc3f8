/**
 * API Client
 * Facade wiring config, persisted credentials and the credential manager
 */

import type { AxiosInstance, AxiosResponse, Method } from 'axios';
import {
    CredentialManager,
    type AuthenticatedRequestOptions,
    type CredentialUpdate,
    type RefreshPolicy,
    type TokenStatus,
    type ValidToken,
} from '../auth/CredentialManager.js';
import { TokenStore, type InitialCredentials } from '../auth/TokenStore.js';
import { FileStore } from '../auth/FileStore.js';
import type { CredentialSink, PersistedCredentials } from '../auth/CredentialSink.js';
import type { AuthenticatedRequestError, NoCredentialError, RefreshError } from '../auth/errors.js';
import type { Result } from '../utils/result.js';
import { DEFAULT_TIMEOUT_MS } from '../utils/config.js';

export interface ApiClientConfig {
    authUrl: string;
    clientId: string;
    clientSecret: string;
    baseUrl?: string;
    timeoutMs?: number;
    accessToken?: string;
    refreshToken?: string;
    tokenExpiresAt?: number;
}

export interface ApiClientOptions {
    sink?: CredentialSink;
    http?: AxiosInstance;
    policy?: Partial<RefreshPolicy>;
}

export class ApiClient {
    readonly manager: CredentialManager;
    private readonly baseUrl?: string;

    private constructor(manager: CredentialManager, baseUrl?: string) {
        this.manager = manager;
        this.baseUrl = baseUrl;
    }

    /**
     * Build a client whose token store is seeded from the sink, falling back
     * to the configured credentials when nothing usable was persisted.
     */
    static async create(config: ApiClientConfig, options: ApiClientOptions = {}): Promise<ApiClient> {
        const sink = options.sink ?? new FileStore();
        const persisted = await sink.load();

        const manager = new CredentialManager({
            authUrl: config.authUrl,
            clientId: config.clientId,
            clientSecret: config.clientSecret,
            store: new TokenStore(seedCredentials(config, persisted)),
            sink,
            http: options.http,
            timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
            policy: options.policy,
        });

        return new ApiClient(manager, config.baseUrl);
    }

    // ── Auth ──────────────────────────────────────────

    getStatus(): TokenStatus {
        return this.manager.getStatus();
    }

    getValidToken(): Promise<Result<ValidToken, NoCredentialError | RefreshError>> {
        return this.manager.getValidToken();
    }

    refresh(): Promise<Result<string, RefreshError>> {
        return this.manager.manualRefresh();
    }

    setCredentials(update: CredentialUpdate): Promise<void> {
        return this.manager.setCredentials(update);
    }

    logout(): Promise<void> {
        return this.manager.logout();
    }

    // ── Requests ──────────────────────────────────────

    request<T = unknown>(
        method: Method,
        pathOrUrl: string,
        options?: AuthenticatedRequestOptions
    ): Promise<Result<AxiosResponse<T>, AuthenticatedRequestError>> {
        return this.manager.authenticatedRequest<T>(method, this.resolveUrl(pathOrUrl), options);
    }

    resolveUrl(pathOrUrl: string): string {
        if (/^https?:\/\//i.test(pathOrUrl)) {
            return pathOrUrl;
        }
        if (!this.baseUrl) {
            throw new Error(`Cannot resolve "${pathOrUrl}": no base URL configured. Run: alc config set baseUrl <url>`);
        }
        return `${this.baseUrl.replace(/\/+$/, '')}/${pathOrUrl.replace(/^\/+/, '')}`;
    }
}

function seedCredentials(config: ApiClientConfig, persisted: PersistedCredentials | null): InitialCredentials {
    if (persisted && (persisted.accessToken || persisted.refreshToken)) {
        return persisted;
    }
    return {
        ...persisted,
        accessToken: config.accessToken,
        refreshToken: config.refreshToken,
        expiresAt: config.tokenExpiresAt,
    };
}
