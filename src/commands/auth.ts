/**
 * Auth CLI Commands
 * alc auth status | refresh | set | logout
 */

import { Command } from 'commander';
import ora from 'ora';
import { log } from '../utils/logger.js';
import { describeCredentialError, errorMessage } from '../utils/errors.js';
import { parseExpiry } from '../utils/dates.js';
import { formatDate, formatRelative } from '../utils/formatter.js';
import { createClient } from './shared.js';

interface SetOptions {
    accessToken?: string;
    refreshToken?: string;
    expiresIn?: string;
}

export function createAuthCommand(): Command {
    const auth = new Command('auth').description('Manage API credentials');

    auth.command('status')
        .description('Show current token status (never triggers a refresh)')
        .action(async () => {
            try {
                const client = await createClient();
                const status = client.getStatus();

                if (!status.hasAccessToken && !status.hasRefreshToken) {
                    log.warn('No credentials. Run: alc auth set --refresh-token <token>');
                    return;
                }

                log.header('Token Status');
                log.kv('Access Token', status.hasAccessToken ? 'present' : 'missing');
                log.kv('Refresh Token', status.hasRefreshToken ? 'present' : 'missing');
                if (status.expiresAt) {
                    log.kv('Expires At', `${formatDate(status.expiresAt)} (${formatRelative(status.expiresAt.getTime())})`);
                }
                log.kv('Expired', status.isExpired ? 'Yes' : 'No');
                log.kv('Refreshes Today', `${status.refreshCountToday}/${status.dailyLimit}`);
                log.kv('Last Refresh', status.lastRefreshTime ? formatDate(status.lastRefreshTime) : 'never');
            } catch (error) {
                log.error(`Status check failed: ${errorMessage(error)}`);
                process.exit(1);
            }
        });

    auth.command('refresh')
        .description('Refresh the access token now (counts against the daily limit)')
        .action(async () => {
            try {
                const client = await createClient();
                const spinner = ora('Refreshing access token...').start();
                const result = await client.refresh();
                spinner.stop();

                if (!result.ok) {
                    log.error(`Manual token refresh failed: ${describeCredentialError(result.error)}`);
                    process.exit(1);
                }

                const status = client.getStatus();
                log.kv('Refreshes Today', `${status.refreshCountToday}/${status.dailyLimit}`);
            } catch (error) {
                log.error(`Refresh failed: ${errorMessage(error)}`);
                process.exit(1);
            }
        });

    auth.command('set')
        .description('Store credentials obtained elsewhere')
        .option('--access-token <token>', 'Access token')
        .option('--refresh-token <token>', 'Refresh token')
        .option('--expires-in <when>', 'Access token expiry: relative (55m, 1h) or ISO date', '1h')
        .action(async (options: SetOptions) => {
            try {
                if (!options.accessToken && !options.refreshToken) {
                    log.error('Provide --access-token and/or --refresh-token');
                    process.exit(1);
                }

                const client = await createClient();
                await client.setCredentials({
                    accessToken: options.accessToken,
                    refreshToken: options.refreshToken,
                    expiresAt: options.accessToken && options.expiresIn ? parseExpiry(options.expiresIn) : undefined,
                });
                log.success('Credentials saved');
            } catch (error) {
                log.error(`Saving credentials failed: ${errorMessage(error)}`);
                process.exit(1);
            }
        });

    auth.command('logout')
        .description('Clear stored tokens')
        .action(async () => {
            try {
                const client = await createClient();
                await client.logout();
                log.success('Logged out successfully');
            } catch (error) {
                log.error(`Logout failed: ${errorMessage(error)}`);
                process.exit(1);
            }
        });

    return auth;
}
