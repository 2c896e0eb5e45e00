import type { Server } from 'http';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createApp } from './app';
import { LocalVrfCoordinator } from './oracle/coordinator';
import { PlayerDirectory } from './player/state';
import { Raffle } from './raffle/raffle';
import { WalletLedger } from './wallet/state';
import { Treasury } from './wallet/treasury';

const FEE = 10_000;
const OPERATOR = 'test-operator-token';

describe('HTTP app', () => {
    let now = 1_700_000_000_000;
    let server: Server;
    let baseUrl = '';
    const wallets = new WalletLedger();
    const players = new PlayerDirectory();
    const coordinator = new LocalVrfCoordinator({
        key: Buffer.from('test-secret', 'utf8'),
        blockTimeMs: 0,
        autoFulfill: false,
    });
    const raffle = new Raffle({
        settings: { entranceFee: FEE, intervalMs: 30_000, keyHash: '0xlane', subscriptionId: 1, callbackGasLimit: 500_000 },
        oracle: coordinator,
        treasury: new Treasury((playerId, amount) => {
            wallets.addToBalance(playerId, amount);
        }),
        clock: () => now,
    });

    async function call(method: string, path: string, options: { body?: unknown; auth?: string } = {}) {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (options.auth) headers.Authorization = `Bearer ${options.auth}`;
        const res = await fetch(`${baseUrl}${path}`, {
            method,
            headers,
            body: options.body === undefined ? undefined : JSON.stringify(options.body),
        });
        const json: unknown = await res.json();
        return { status: res.status, json };
    }

    async function register(playerId: string): Promise<string> {
        const res = await fetch(`${baseUrl}/player/register`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ playerId }),
        });
        const body: unknown = await res.json();
        if (typeof body !== 'object' || body === null || !('key' in body) || typeof body.key !== 'string') {
            throw new Error('registration returned no key');
        }
        return body.key;
    }

    beforeAll(async () => {
        const app = createApp({ raffle, wallets, players, operatorToken: OPERATOR });
        server = await new Promise<Server>(resolve => {
            const s = app.listen(0, '127.0.0.1', () => resolve(s));
        });
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server has no port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await new Promise<void>(resolve => server.close(() => resolve()));
    });

    it('answers the health check', async () => {
        expect(await call('GET', '/health')).toEqual({ status: 200, json: { ok: true } });
    });

    it('runs a round from registration to payout', async () => {
        const aliceKey = await register('alice');
        const bobKey = await register('bob');
        expect(await call('POST', '/player/register', { body: { playerId: 'alice' } })).toEqual({
            status: 409,
            json: { error: 'Player with this ID already exists' },
        });

        await call('POST', '/wallet/mint', { body: { playerId: 'alice', amount: 25_000 } });
        await call('POST', '/wallet/mint', { body: { playerId: 'bob', amount: 5_000 } });

        expect(await call('POST', '/raffle/enter', { auth: aliceKey })).toEqual({
            status: 200,
            json: { playerId: 'alice', feePaid: FEE, numberOfPlayers: 1 },
        });
        expect(await call('POST', '/raffle/enter', { auth: bobKey })).toEqual({
            status: 402,
            json: { error: 'Insufficient funds for entrance fee' },
        });
        expect(await call('POST', '/raffle/enter', { auth: 'sk_nobody' })).toEqual({
            status: 401,
            json: { error: 'Authorization header with a valid Bearer key is required' },
        });

        const tooLow = await call('POST', '/raffle/enter', { auth: aliceKey, body: { amount: 1 } });
        expect(tooLow.status).toBe(402);
        expect(tooLow.json).toMatchObject({ error: 'InsufficientFee' });
        expect(await call('GET', '/wallet/alice/balance')).toEqual({
            status: 200,
            json: { playerId: 'alice', balance: 15_000 },
        });

        expect(await call('GET', '/raffle/players/0')).toEqual({ status: 200, json: { index: 0, playerId: 'alice' } });
        expect((await call('GET', '/raffle/players/3')).status).toBe(404);
        for (const index of ['%20', '0x0', '0e0', '-0', '1.0']) {
            expect(await call('GET', `/raffle/players/${index}`)).toEqual({
                status: 400,
                json: { error: 'index must be a non-negative integer' },
            });
        }
        expect(await call('GET', '/raffle/upkeep')).toEqual({ status: 200, json: { upkeepNeeded: false } });

        now += 30_000;
        expect(await call('GET', '/raffle/upkeep')).toEqual({ status: 200, json: { upkeepNeeded: true } });
        expect((await call('POST', '/raffle/upkeep')).status).toBe(401);

        const performed = await call('POST', '/raffle/upkeep', { auth: OPERATOR });
        expect(performed.status).toBe(200);
        const token = raffle.getPendingRequestToken();
        expect(performed.json).toEqual({ requestId: token });

        const closed = await call('POST', '/raffle/enter', { auth: aliceKey });
        expect(closed.status).toBe(409);
        expect(closed.json).toMatchObject({ error: 'RoundNotOpen', details: { phase: 'CALCULATING' } });
        expect(await call('GET', '/wallet/alice/balance')).toEqual({
            status: 200,
            json: { playerId: 'alice', balance: 15_000 },
        });

        if (!token) throw new Error('expected a pending draw request');
        await coordinator.fulfillRandomWords(token, [9n]);

        expect(await call('GET', '/wallet/alice/balance')).toEqual({
            status: 200,
            json: { playerId: 'alice', balance: 25_000 },
        });
        const state = await call('GET', '/raffle/state');
        expect(state.json).toMatchObject({
            phase: 'OPEN',
            numberOfPlayers: 0,
            balance: 0,
            recentWinner: 'alice',
            pendingRequestToken: null,
        });
    });

    it('reports operator remediation errors with their codes', async () => {
        expect(await call('POST', '/raffle/abandon', { auth: OPERATOR })).toMatchObject({
            status: 409,
            json: { error: 'RoundNotCalculating' },
        });
        expect(await call('POST', '/raffle/reclaim', { auth: OPERATOR, body: { playerId: 'alice' } })).toMatchObject({
            status: 409,
            json: { error: 'NothingToReclaim' },
        });
        expect(await call('POST', '/raffle/reclaim', { auth: OPERATOR, body: {} })).toEqual({
            status: 400,
            json: { error: 'playerId is required' },
        });
        expect(await call('GET', '/raffle/unclaimed/alice')).toEqual({
            status: 200,
            json: { playerId: 'alice', amount: 0 },
        });
    });
});
