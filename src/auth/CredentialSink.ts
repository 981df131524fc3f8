/**
 * Credential persistence interface
 * Called after every successful refresh; read once at startup
 */

export interface PersistedCredentials {
    accessToken?: string;
    refreshToken?: string;
    expiresAt?: number; // Unix timestamp ms
    lastRefreshTime?: number;
    refreshCountToday?: number;
    refreshDate?: string;
}

export interface CredentialSink {
    save(credentials: PersistedCredentials): Promise<void>;
    load(): Promise<PersistedCredentials | null>;
    clear(): Promise<void>;
    exists(): Promise<boolean>;
}
