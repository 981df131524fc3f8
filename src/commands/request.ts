/**
 * Request CLI Command
 * alc request <method> <url> — authenticated call with one 401 recovery
 */

import { Command } from 'commander';
import type { Method } from 'axios';
import chalk from 'chalk';
import { log } from '../utils/logger.js';
import { describeCredentialError, errorMessage } from '../utils/errors.js';
import { createClient } from './shared.js';

const METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const satisfies readonly Method[];

type HttpMethod = (typeof METHODS)[number];

interface RequestOptions {
    data?: string;
    header: string[];
    timeout?: string;
}

function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

export function parseMethod(value: string): HttpMethod | undefined {
    const upper = value.toUpperCase();
    return METHODS.find((m) => m === upper);
}

/**
 * Parse repeated `Name: value` header flags
 */
export function parseHeaders(values: string[]): Record<string, string> {
    const headers: Record<string, string> = {};
    for (const entry of values) {
        const separator = entry.indexOf(':');
        if (separator <= 0) {
            throw new Error(`Invalid header "${entry}". Use "Name: value"`);
        }
        headers[entry.slice(0, separator).trim()] = entry.slice(separator + 1).trim();
    }
    return headers;
}

/**
 * JSON bodies are sent as JSON; anything else as a raw string
 */
export function parseBody(data: string | undefined): unknown {
    if (data === undefined) return undefined;
    try {
        return JSON.parse(data);
    } catch {
        return data;
    }
}

function printBody(body: unknown): void {
    if (body === undefined || body === '') return;
    console.log(typeof body === 'string' ? body : JSON.stringify(body, null, 2));
}

export function createRequestCommand(): Command {
    return new Command('request')
        .description('Perform an authenticated API request')
        .argument('<method>', `HTTP method: ${METHODS.join(', ')}`)
        .argument('<url>', 'Absolute URL, or a path relative to the configured base URL')
        .option('-d, --data <body>', 'Request body (JSON or raw text)')
        .option('-H, --header <header>', 'Extra header "Name: value" (repeatable)', collect, [])
        .option('--timeout <ms>', 'Request timeout in milliseconds')
        .action(async (methodArg: string, url: string, options: RequestOptions) => {
            try {
                const method = parseMethod(methodArg);
                if (!method) {
                    log.error(`Unsupported method "${methodArg}". Use one of: ${METHODS.join(', ')}`);
                    process.exit(1);
                }

                const client = await createClient();
                const timeoutMs = options.timeout ? parseInt(options.timeout, 10) : undefined;
                const result = await client.request(method, url, {
                    data: parseBody(options.data),
                    headers: parseHeaders(options.header),
                    timeoutMs: timeoutMs && timeoutMs > 0 ? timeoutMs : undefined,
                });

                if (!result.ok) {
                    log.error(describeCredentialError(result.error));
                    process.exit(1);
                }

                const { status, statusText, data } = result.value;
                const line = `${status} ${statusText}`.trim();
                console.log(status < 400 ? chalk.green(line) : chalk.red(line));
                printBody(data);

                if (status >= 400) {
                    process.exit(1);
                }
            } catch (error) {
                log.error(`Request failed: ${errorMessage(error)}`);
                process.exit(1);
            }
        });
}
