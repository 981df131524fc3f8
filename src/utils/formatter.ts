/**
 * Formatter utility
 * Human-readable dates and durations for CLI output
 */

/**
 * Format a date as a short readable string
 */
export function formatDate(date: Date | string | number): string {
    const d = new Date(date);
    return d.toLocaleString('en-US', {
        month: 'short',
        day: 'numeric',
        hour: '2-digit',
        minute: '2-digit',
    });
}

/**
 * Format milliseconds into human-readable string
 */
export function formatMs(ms: number): string {
    if (ms >= 3600000) return `${(ms / 3600000).toFixed(1)}h`;
    if (ms >= 60000) return `${(ms / 60000).toFixed(1)}min`;
    if (ms >= 1000) return `${(ms / 1000).toFixed(1)}s`;
    return `${Math.round(ms)}ms`;
}

/**
 * Describe how far a timestamp lies from now, e.g. "in 42.0min" or "3.5min ago"
 */
export function formatRelative(timestamp: number, now: number = Date.now()): string {
    const delta = timestamp - now;
    return delta >= 0 ? `in ${formatMs(delta)}` : `${formatMs(-delta)} ago`;
}

/**
 * Mask a secret for display, keeping the last four characters
 */
export function maskSecret(secret: string | undefined): string {
    if (!secret) return '';
    return '••••••' + secret.slice(-4);
}
