/**
 * Token Store
 * In-memory credential state owned by a single CredentialManager
 */

import { calendarDate } from '../utils/dates.js';

export interface TokenState {
    readonly accessToken?: string;
    readonly refreshToken?: string;
    readonly expiresAt?: number; // Unix timestamp ms
    readonly lastRefreshTime?: number; // Unix timestamp ms
    readonly refreshCountToday: number;
    /** Local calendar date (YYYY-MM-DD) that refreshCountToday applies to */
    readonly refreshDate: string;
}

export interface InitialCredentials {
    accessToken?: string;
    refreshToken?: string;
    expiresAt?: number;
    lastRefreshTime?: number;
    refreshCountToday?: number;
    refreshDate?: string;
}

/**
 * Holds one immutable snapshot. Every mutation swaps the whole snapshot in a
 * single assignment, so readers never see a token paired with a stale expiry.
 */
export class TokenStore {
    private state: TokenState;

    constructor(initial: InitialCredentials = {}, now: number = Date.now()) {
        this.state = Object.freeze({
            accessToken: initial.accessToken || undefined,
            refreshToken: initial.refreshToken || undefined,
            expiresAt: initial.expiresAt,
            lastRefreshTime: initial.lastRefreshTime,
            refreshCountToday: initial.refreshCountToday ?? 0,
            refreshDate: initial.refreshDate ?? calendarDate(now),
        });
    }

    snapshot(): TokenState {
        return this.state;
    }

    update(mutate: (current: TokenState) => TokenState): TokenState {
        this.state = Object.freeze({ ...mutate(this.state) });
        return this.state;
    }
}

/**
 * Refresh count that applies on the given day; a counter recorded for an
 * earlier date counts as zero.
 */
export function effectiveRefreshCount(state: TokenState, today: string): number {
    return state.refreshDate === today ? state.refreshCountToday : 0;
}
