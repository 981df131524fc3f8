/**
 * Allocation Connect — Library Barrel Export
 */

// Client
export { ApiClient, type ApiClientConfig, type ApiClientOptions } from './client/ApiClient.js';

// Auth
export * from './auth/index.js';

// Utils
export { ok, err, type Result } from './utils/result.js';
export { getConfig, clearConfigCache, type Config } from './utils/config.js';
export { errorMessage, describeCredentialError } from './utils/errors.js';
