export { OAuthFlow, type OAuthConfig, type IssuedTokens, type RefreshRequestOptions } from './OAuthFlow.js';
export {
    CredentialManager,
    DEFAULT_REFRESH_POLICY,
    type CredentialManagerConfig,
    type RefreshPolicy,
    type ValidToken,
    type AuthenticatedRequestOptions,
    type TokenStatus,
    type CredentialUpdate,
} from './CredentialManager.js';
export { TokenStore, effectiveRefreshCount, type TokenState, type InitialCredentials } from './TokenStore.js';
export { FileStore } from './FileStore.js';
export { MemoryStore } from './MemoryStore.js';
export type { CredentialSink, PersistedCredentials } from './CredentialSink.js';
export type { CredentialEvent, CredentialEventType, CredentialListener, RefreshTrigger } from './events.js';
export * from './errors.js';
