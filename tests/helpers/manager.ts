/**
 * Builds a CredentialManager over a fake transport: AUTH_URL answers refreshes,
 * every other URL goes to the api handler.
 */
import type { InternalAxiosRequestConfig } from 'axios';
import { CredentialManager, type RefreshPolicy } from '../../src/auth/CredentialManager.js';
import { TokenStore, type InitialCredentials } from '../../src/auth/TokenStore.js';
import { MemoryStore } from '../../src/auth/MemoryStore.js';
import type { CredentialSink } from '../../src/auth/CredentialSink.js';
import type { CredentialEvent } from '../../src/auth/events.js';
import { AUTH_URL, createFakeHttp, type FakeReply } from './fakeHttp.js';

type Handler = (config: InternalAxiosRequestConfig) => FakeReply | Error;

export interface ManagerSetup {
    initial?: InitialCredentials;
    auth?: Handler;
    api?: Handler;
    sink?: CredentialSink;
    timeoutMs?: number;
    policy?: Partial<RefreshPolicy>;
}

/** Issues A1/R1, A2/R2, ... with a one hour lifetime */
export function issuingAuth(): Handler {
    let issued = 0;
    return () => {
        issued++;
        return {
            status: 200,
            data: { access_token: `A${issued}`, refresh_token: `R${issued}`, expires_in: 3600 },
        };
    };
}

export function setupManager(setup: ManagerSetup = {}) {
    const auth = setup.auth ?? issuingAuth();
    const api = setup.api ?? (() => ({ status: 200, data: { ok: true } }));
    const fake = createFakeHttp((config) => (config.url === AUTH_URL ? auth(config) : api(config)));
    const store = new TokenStore(setup.initial);
    const sink = setup.sink ?? new MemoryStore();
    const manager = new CredentialManager({
        authUrl: AUTH_URL,
        clientId: 'test-client',
        clientSecret: 'test-secret',
        store,
        sink,
        http: fake.http,
        timeoutMs: setup.timeoutMs,
        policy: setup.policy,
    });
    const events: CredentialEvent[] = [];
    manager.on((event) => events.push(event));

    return {
        manager,
        store,
        sink,
        events,
        calls: fake.calls,
        authCalls: () => fake.calls.filter((c) => c.url === AUTH_URL),
        apiCalls: () => fake.calls.filter((c) => c.url !== AUTH_URL),
    };
}
