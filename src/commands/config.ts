/**
 * Config CLI Commands
 * alc config init | show | set <key> <value> | path
 */

import { Command } from 'commander';
import * as readline from 'readline';
import chalk from 'chalk';
import { log } from '../utils/logger.js';
import { maskSecret } from '../utils/formatter.js';
import {
    readSavedConfig,
    writeSavedConfig,
    updateSavedConfig,
    hasSavedConfig,
    getConfigDir,
    isSavedConfigKey,
    SAVED_CONFIG_KEYS,
    type SavedConfig,
} from '../utils/config.js';

function ask(rl: readline.Interface, prompt: string, defaultValue?: string): Promise<string> {
    const display = defaultValue ? `${prompt} ${chalk.dim(`(${defaultValue})`)} ` : `${prompt} `;
    return new Promise((resolve) => {
        rl.question(display, (answer) => {
            resolve(answer.trim() || defaultValue || '');
        });
    });
}

function parseTimeout(value: string): number | undefined {
    const timeoutMs = parseInt(value, 10);
    return timeoutMs > 0 ? timeoutMs : undefined;
}

export function createConfigCommand(): Command {
    const config = new Command('config').description('Manage Allocation Connect configuration');

    // ── config init ──────────────────────────────────
    config
        .command('init')
        .description('Interactive setup — saves client credentials to ~/.allocation-connect/config.json')
        .action(async () => {
            const existing = readSavedConfig();

            if (existing && hasSavedConfig()) {
                log.info('Existing configuration found. Values will be used as defaults.');
                log.dim(`  Config file: ${getConfigDir()}/config.json`);
                console.log();
            }

            const rl = readline.createInterface({
                input: process.stdin,
                output: process.stdout,
            });

            try {
                log.header('Allocation Connect Setup');
                log.dim('  Credentials are saved to ~/.allocation-connect/config.json (chmod 600)');
                log.dim('  Tokens are saved to ~/.allocation-connect/tokens.enc (AES-256-GCM)');
                console.log();

                const authUrl = await ask(rl, '  Auth URL:', existing?.authUrl);
                const clientId = await ask(rl, '  Client ID:', existing?.clientId);
                const clientSecret = await ask(
                    rl,
                    '  Client Secret:',
                    existing?.clientSecret ? maskSecret(existing.clientSecret) : undefined
                );
                const baseUrl = await ask(rl, '  API Base URL (optional):', existing?.baseUrl);
                const timeout = await ask(rl, '  Request timeout ms:', String(existing?.timeoutMs ?? 30000));

                rl.close();

                // If user entered the masked secret, keep the original
                const resolvedSecret =
                    clientSecret.startsWith('••••••') && existing?.clientSecret
                        ? existing.clientSecret
                        : clientSecret;

                if (!authUrl || !clientId || !resolvedSecret) {
                    log.error('Auth URL, Client ID and Client Secret are required');
                    process.exit(1);
                }

                const timeoutMs = parseTimeout(timeout);
                const saved: SavedConfig = {
                    authUrl,
                    clientId,
                    clientSecret: resolvedSecret,
                    ...(baseUrl ? { baseUrl } : {}),
                    ...(timeoutMs ? { timeoutMs } : {}),
                };

                writeSavedConfig(saved);

                console.log();
                log.success('Configuration saved!');
                log.kv('Location', `${getConfigDir()}/config.json`);
                console.log();
                log.info('Next step: store a refresh token');
                log.dim('  alc auth set --refresh-token <token>');
            } catch (error) {
                rl.close();
                log.error(`Setup failed: ${error instanceof Error ? error.message : error}`);
                process.exit(1);
            }
        });

    // ── config show ──────────────────────────────────
    config
        .command('show')
        .description('Display current configuration (secrets masked)')
        .action(() => {
            const saved = readSavedConfig();

            if (!saved) {
                log.warn('No configuration found. Run: alc config init');
                return;
            }

            log.header('Allocation Connect Configuration');
            log.kv('Config File', `${getConfigDir()}/config.json`);
            console.log();
            log.kv('Auth URL', saved.authUrl);
            log.kv('Client ID', saved.clientId);
            log.kv('Client Secret', maskSecret(saved.clientSecret));
            if (saved.baseUrl) {
                log.kv('API Base URL', saved.baseUrl);
            }
            log.kv('Timeout', `${saved.timeoutMs ?? 30000}ms`);
        });

    // ── config set ───────────────────────────────────
    config
        .command('set')
        .description('Set a single config value')
        .argument('<key>', `Config key: ${SAVED_CONFIG_KEYS.join(', ')}`)
        .argument('<value>', 'Value to set')
        .action((key: string, value: string) => {
            if (!isSavedConfigKey(key)) {
                log.error(`Invalid key "${key}". Valid keys: ${SAVED_CONFIG_KEYS.join(', ')}`);
                process.exit(1);
            }

            if (key === 'timeoutMs') {
                const timeoutMs = parseTimeout(value);
                if (!timeoutMs) {
                    log.error('timeoutMs must be a positive integer');
                    process.exit(1);
                }
                updateSavedConfig({ timeoutMs });
            } else {
                updateSavedConfig({ [key]: value });
            }

            const display = key === 'clientSecret' ? maskSecret(value) : value;
            log.success(`Set ${key} = ${display}`);
        });

    // ── config path ──────────────────────────────────
    config
        .command('path')
        .description('Print the config directory path')
        .action(() => {
            console.log(getConfigDir());
        });

    return config;
}
