import { cryptoRandomId, deriveRandomWord } from '../crypto';
import { logger } from '../logger';
import type { RandomnessConsumer, RandomnessOracle, RandomWordsRequest } from './types';

export const MIN_REQUEST_CONFIRMATIONS = 3;
export const MAX_NUM_WORDS = 500;

export class UnknownRequestError extends Error {
    constructor(readonly token: string) {
        super(`unknown or already fulfilled request ${token}`);
        this.name = 'UnknownRequestError';
    }
}

export class InvalidRequestError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidRequestError';
    }
}

type PendingRequest = {
    request: RandomWordsRequest;
    consumer: RandomnessConsumer;
    timer?: NodeJS.Timeout;
};

export type LocalVrfCoordinatorOptions = {
    key: Buffer; // Key the random words are derived from
    blockTimeMs: number; // Simulated time per confirmation
    autoFulfill?: boolean; // When false, requests wait for fulfillRandomWords()
};

/**
 * In-process stand-in for a verifiable randomness coordinator.
 *
 * Each accepted request gets a random hex token. Words are HMAC-SHA256 of the
 * token and word index under `key`. In auto mode a request is answered after
 * `requestConfirmations * blockTimeMs`.
 */
export class LocalVrfCoordinator implements RandomnessOracle {
    private readonly pending = new Map<string, PendingRequest>();
    private readonly autoFulfill: boolean;
    private requestCount = 0;

    constructor(private readonly options: LocalVrfCoordinatorOptions) {
        this.autoFulfill = options.autoFulfill ?? true;
    }

    get requestsCounter(): number {
        return this.requestCount;
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    isPending(token: string): boolean {
        return this.pending.has(token);
    }

    submitRequest(request: RandomWordsRequest, consumer: RandomnessConsumer): string {
        if (request.requestConfirmations < MIN_REQUEST_CONFIRMATIONS) {
            throw new InvalidRequestError(
                `requestConfirmations ${request.requestConfirmations} below minimum ${MIN_REQUEST_CONFIRMATIONS}`
            );
        }
        if (!Number.isInteger(request.numWords) || request.numWords < 1 || request.numWords > MAX_NUM_WORDS) {
            throw new InvalidRequestError(`numWords must be in [1, ${MAX_NUM_WORDS}]`);
        }
        if (request.callbackGasLimit <= 0) {
            throw new InvalidRequestError('callbackGasLimit must be positive');
        }

        const token = cryptoRandomId();
        const entry: PendingRequest = { request, consumer };
        if (this.autoFulfill) {
            const delay = request.requestConfirmations * this.options.blockTimeMs;
            entry.timer = setTimeout(() => void this.deliver(token), delay);
            entry.timer.unref();
        }
        this.pending.set(token, entry);
        this.requestCount++;
        logger.info('vrf_request_accepted', {
            token,
            numWords: request.numWords,
            confirmations: request.requestConfirmations,
        });
        return token;
    }

    /**
     * Answers a pending request. Without `words`, the derived words are used.
     * Resolves once the consumer's callback has settled, and rejects with the
     * consumer's error if it rejected.
     */
    async fulfillRandomWords(token: string, words?: readonly bigint[]): Promise<void> {
        const entry = this.pending.get(token);
        if (!entry) {
            throw new UnknownRequestError(token);
        }
        this.pending.delete(token);
        if (entry.timer) clearTimeout(entry.timer);

        const randomWords = words ?? this.deriveWords(token, entry.request.numWords);
        await entry.consumer.rawFulfillRandomWords(token, randomWords);
    }

    /**
     * Cancels every scheduled fulfillment. Pending requests stay pending.
     */
    stop(): void {
        for (const entry of this.pending.values()) {
            if (entry.timer) clearTimeout(entry.timer);
            entry.timer = undefined;
        }
    }

    private deriveWords(token: string, numWords: number): bigint[] {
        const out: bigint[] = [];
        for (let i = 0; i < numWords; i++) out.push(deriveRandomWord(this.options.key, token, i));
        return out;
    }

    private async deliver(token: string): Promise<void> {
        try {
            await this.fulfillRandomWords(token);
            logger.info('vrf_request_fulfilled', { token });
        } catch (err) {
            logger.error('vrf_fulfillment_failed', { token, err: String(err) });
        }
    }
}
