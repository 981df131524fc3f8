/**
 * Date utilities
 * Calendar-day keys for refresh accounting and expiry parsing for the CLI
 */

/**
 * Local calendar date of a timestamp as `YYYY-MM-DD`.
 * The daily refresh counter is keyed on this value.
 */
export function calendarDate(timestamp: number): string {
    const d = new Date(timestamp);
    const month = String(d.getMonth() + 1).padStart(2, '0');
    const day = String(d.getDate()).padStart(2, '0');
    return `${d.getFullYear()}-${month}-${day}`;
}

/**
 * Parses an expiry into a Unix timestamp (milliseconds).
 *
 * Supports:
 * - Relative durations from now: `"30m"`, `"2h"`, `"7d"`
 * - ISO 8601 dates: `"2024-01-15T10:30:00Z"`
 * - Any string accepted by `Date.parse()`
 *
 * @throws {Error} If the string is not a valid date or relative format
 */
export function parseExpiry(value: string, now: number = Date.now()): number {
    const relativeMatch = value.match(/^(\d+)(s|m|h|d)$/);
    if (relativeMatch) {
        const amount = parseInt(relativeMatch[1]);
        switch (relativeMatch[2]) {
            case 's':
                return now + amount * 1000;
            case 'm':
                return now + amount * 60 * 1000;
            case 'h':
                return now + amount * 60 * 60 * 1000;
            default:
                return now + amount * 24 * 60 * 60 * 1000;
        }
    }

    const ts = Date.parse(value);
    if (isNaN(ts)) {
        throw new Error(`Invalid expiry: "${value}". Use ISO format or relative (e.g., 30m, 1h, 2d)`);
    }
    return ts;
}

/**
 * Absolute timestamp from configuration; absent or malformed yields undefined.
 */
export function parseOptionalTimestamp(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const ts = Date.parse(value);
    return isNaN(ts) ? undefined : ts;
}
