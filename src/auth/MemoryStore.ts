/**
 * Memory Credential Store
 * Ephemeral sink; credentials vanish with the process
 */

import type { CredentialSink, PersistedCredentials } from './CredentialSink.js';

export class MemoryStore implements CredentialSink {
    private saved: PersistedCredentials | null;

    constructor(initial: PersistedCredentials | null = null) {
        this.saved = initial ? { ...initial } : null;
    }

    async save(credentials: PersistedCredentials): Promise<void> {
        this.saved = { ...credentials };
    }

    async load(): Promise<PersistedCredentials | null> {
        return this.saved ? { ...this.saved } : null;
    }

    async clear(): Promise<void> {
        this.saved = null;
    }

    async exists(): Promise<boolean> {
        return this.saved !== null;
    }
}
