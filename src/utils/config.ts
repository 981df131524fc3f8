/**
 * Config utility
 *
 * Resolution chain (highest priority wins):
 * 1. Environment variables (ALLOC_CLIENT_ID, etc.)
 * 2. Global config file (~/.allocation-connect/config.json)
 * 3. Project-local .env (cwd fallback)
 *
 * Persistent config lives at ~/.allocation-connect/config.json
 * Tokens live at ~/.allocation-connect/tokens.enc
 */

import { config as dotenvConfig } from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import { z } from 'zod';
import { parseOptionalTimestamp } from './dates.js';

// ── Config Dir ──────────────────────────────────────

const CONFIG_DIR_NAME = '.allocation-connect';
const CONFIG_FILE_NAME = 'config.json';

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Get config directory path (~/.allocation-connect/)
 */
export function getConfigDir(): string {
    const dir = path.join(
        process.env.HOME || process.env.USERPROFILE || '/tmp',
        CONFIG_DIR_NAME
    );
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    return dir;
}

function getConfigFilePath(): string {
    return path.join(getConfigDir(), CONFIG_FILE_NAME);
}

// ── Saved Config (persistent) ───────────────────────

const savedConfigSchema = z.object({
    authUrl: z.string(),
    clientId: z.string(),
    clientSecret: z.string(),
    baseUrl: z.string().optional(),
    timeoutMs: z.number().int().positive().optional(),
});

export type SavedConfig = z.infer<typeof savedConfigSchema>;

export const SAVED_CONFIG_KEYS = ['authUrl', 'clientId', 'clientSecret', 'baseUrl', 'timeoutMs'] as const;

export type SavedConfigKey = (typeof SAVED_CONFIG_KEYS)[number];

export function isSavedConfigKey(key: string): key is SavedConfigKey {
    return SAVED_CONFIG_KEYS.some((k) => k === key);
}

/**
 * Read the saved global config file
 */
export function readSavedConfig(): SavedConfig | null {
    const configPath = getConfigFilePath();
    if (!fs.existsSync(configPath)) return null;

    try {
        const content = fs.readFileSync(configPath, 'utf8');
        const parsed = savedConfigSchema.safeParse(JSON.parse(content));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
}

/**
 * Write config to the global config file
 */
export function writeSavedConfig(config: SavedConfig): void {
    const configPath = getConfigFilePath();
    fs.writeFileSync(
        configPath,
        JSON.stringify(config, null, 2) + '\n',
        { mode: 0o600 }
    );
}

/**
 * Update specific fields in the saved config
 */
export function updateSavedConfig(updates: Partial<SavedConfig>): SavedConfig {
    const current = readSavedConfig() || {
        authUrl: '',
        clientId: '',
        clientSecret: '',
    };

    const merged = { ...current, ...updates };
    writeSavedConfig(merged);
    return merged;
}

/**
 * Check if a saved config exists and has credentials
 */
export function hasSavedConfig(): boolean {
    const saved = readSavedConfig();
    return !!(saved?.authUrl && saved?.clientId && saved?.clientSecret);
}

// ── Resolved Config (runtime) ───────────────────────

export interface Config {
    authUrl: string;
    clientId: string;
    clientSecret: string;
    /** Base for relative request paths */
    baseUrl?: string;
    timeoutMs: number;
    /** Seed credentials; persisted tokens take precedence over these */
    accessToken?: string;
    refreshToken?: string;
    tokenExpiresAt?: number;
}

let cachedConfig: Config | null = null;

/**
 * Resolve config using the priority chain:
 * 1. Environment variables
 * 2. Global config (~/.allocation-connect/config.json)
 * 3. Project-local .env
 */
export function getConfig(): Config {
    if (cachedConfig) return cachedConfig;

    // Layer 3: Try loading project-local .env as lowest priority
    const envPath = path.resolve(process.cwd(), '.env');
    if (fs.existsSync(envPath)) {
        dotenvConfig({ path: envPath, override: false });
    }

    // Layer 2: Load global saved config
    const saved = readSavedConfig();

    // Layer 1 + 2 merge: env vars override saved config
    const authUrl = process.env.ALLOC_AUTH_URL || saved?.authUrl;
    const clientId = process.env.ALLOC_CLIENT_ID || saved?.clientId;
    const clientSecret = process.env.ALLOC_CLIENT_SECRET || saved?.clientSecret;

    if (!authUrl || !clientId || !clientSecret) {
        throw new Error(
            'Allocation Connect is not configured.\n\n' +
            'Run this first:\n' +
            '  alc config init\n\n' +
            'Or set environment variables:\n' +
            '  export ALLOC_AUTH_URL=...\n' +
            '  export ALLOC_CLIENT_ID=...\n' +
            '  export ALLOC_CLIENT_SECRET=...\n'
        );
    }

    const envTimeout = parseInt(process.env.ALLOC_TIMEOUT_MS || '', 10);

    cachedConfig = {
        authUrl,
        clientId,
        clientSecret,
        baseUrl: process.env.ALLOC_BASE_URL || saved?.baseUrl,
        timeoutMs: envTimeout > 0 ? envTimeout : saved?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        accessToken: process.env.ALLOC_ACCESS_TOKEN || undefined,
        refreshToken: process.env.ALLOC_REFRESH_TOKEN || undefined,
        tokenExpiresAt: parseOptionalTimestamp(process.env.ALLOC_TOKEN_EXPIRES_AT),
    };

    return cachedConfig;
}

/**
 * Clear the cached config (for testing or after config changes)
 */
export function clearConfigCache(): void {
    cachedConfig = null;
}
