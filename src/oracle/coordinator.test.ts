import { afterEach, describe, expect, it, vi } from 'vitest';
import { deriveRandomWord } from '../crypto';
import { InvalidRequestError, LocalVrfCoordinator, UnknownRequestError } from './coordinator';
import type { RandomWordsRequest } from './types';

const key = Buffer.from('test-secret', 'utf8');

const request: RandomWordsRequest = {
    keyHash: '0xlane',
    subscriptionId: 1,
    requestConfirmations: 3,
    callbackGasLimit: 500_000,
    numWords: 2,
};

function consumer() {
    const calls: Array<{ token: string; words: readonly bigint[] }> = [];
    return {
        calls,
        rawFulfillRandomWords: vi.fn(async (token: string, words: readonly bigint[]) => {
            calls.push({ token, words });
        }),
    };
}

describe('LocalVrfCoordinator', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('issues a distinct token per accepted request', () => {
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 0, autoFulfill: false });
        const c = consumer();
        const first = coordinator.submitRequest(request, c);
        const second = coordinator.submitRequest(request, c);

        expect(first).toMatch(/^[0-9a-f]{32}$/);
        expect(second).not.toBe(first);
        expect(coordinator.requestsCounter).toBe(2);
        expect(coordinator.pendingCount).toBe(2);
    });

    it('rejects requests below the confirmation minimum or with no words', () => {
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 0, autoFulfill: false });
        const c = consumer();
        expect(() => coordinator.submitRequest({ ...request, requestConfirmations: 2 }, c)).toThrow(InvalidRequestError);
        expect(() => coordinator.submitRequest({ ...request, numWords: 0 }, c)).toThrow(InvalidRequestError);
        expect(coordinator.requestsCounter).toBe(0);
    });

    it('delivers the derived words once', async () => {
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 0, autoFulfill: false });
        const c = consumer();
        const token = coordinator.submitRequest(request, c);

        await coordinator.fulfillRandomWords(token);

        expect(c.calls).toEqual([
            { token, words: [deriveRandomWord(key, token, 0), deriveRandomWord(key, token, 1)] },
        ]);
        expect(coordinator.isPending(token)).toBe(false);
        await expect(coordinator.fulfillRandomWords(token)).rejects.toBeInstanceOf(UnknownRequestError);
        expect(c.rawFulfillRandomWords).toHaveBeenCalledTimes(1);
    });

    it('delivers overridden words as given', async () => {
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 0, autoFulfill: false });
        const c = consumer();
        const token = coordinator.submitRequest(request, c);

        await coordinator.fulfillRandomWords(token, [42n]);
        expect(c.calls).toEqual([{ token, words: [42n] }]);
    });

    it('answers automatically after the requested confirmations', async () => {
        vi.useFakeTimers();
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 1_000 });
        const c = consumer();
        const token = coordinator.submitRequest(request, c);

        await vi.advanceTimersByTimeAsync(2_999);
        expect(c.rawFulfillRandomWords).not.toHaveBeenCalled();

        await vi.advanceTimersByTimeAsync(1);
        expect(c.rawFulfillRandomWords).toHaveBeenCalledTimes(1);
        expect(coordinator.isPending(token)).toBe(false);
    });

    it('keeps requests pending after stop()', async () => {
        vi.useFakeTimers();
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 1_000 });
        const c = consumer();
        const token = coordinator.submitRequest(request, c);

        coordinator.stop();
        await vi.advanceTimersByTimeAsync(10_000);

        expect(c.rawFulfillRandomWords).not.toHaveBeenCalled();
        expect(coordinator.isPending(token)).toBe(true);
    });

    it('surfaces a consumer rejection to the caller', async () => {
        const coordinator = new LocalVrfCoordinator({ key, blockTimeMs: 0, autoFulfill: false });
        const token = coordinator.submitRequest(request, {
            rawFulfillRandomWords: () => Promise.reject(new Error('consumer refused')),
        });

        await expect(coordinator.fulfillRandomWords(token)).rejects.toThrow('consumer refused');
        expect(coordinator.isPending(token)).toBe(false);
    });
});
