import { EventEmitter } from 'eventemitter3';
import { Mutex } from '../lock';
import { logger } from '../logger';
import type { RandomnessConsumer, RandomnessOracle } from '../oracle/types';
import type { Treasury } from '../wallet/treasury';
import { evaluateUpkeep } from './eligibility';
import {
    InsufficientFeeError,
    InvalidFulfillmentError,
    NoEntrantsError,
    NothingToReclaimError,
    OracleRequestFailedError,
    PayoutFailedError,
    PlayerIndexOutOfRangeError,
    RoundNotCalculatingError,
    RoundNotOpenError,
    UnknownOrStaleRequestError,
    UpkeepNotNeededError,
} from './errors';
import { createRound, PlayerRegistry } from './state';
import type { RaffleEvents, RafflePhase, RaffleSettings, RaffleSnapshot, Round, UpkeepCheck } from './types';

export const REQUEST_CONFIRMATIONS = 3;
export const NUM_WORDS = 1;

export type RaffleOptions = {
    settings: RaffleSettings;
    oracle: RandomnessOracle;
    treasury: Treasury;
    clock?: () => number;
};

export type DrawResult = {
    winner: string;
    winningIndex: number;
    amount: number;
};

/**
 * The live raffle: one round, its entrants and its pool.
 *
 * Every mutating operation runs under a single lock, so a phase change, the
 * matching entrant clear and the pool movement are never observed apart.
 * Prize transfers run after the lock is released. Queries read without
 * taking the lock.
 */
export class Raffle extends EventEmitter<RaffleEvents> implements RandomnessConsumer {
    private readonly settings: RaffleSettings;
    private readonly oracle: RandomnessOracle;
    private readonly treasury: Treasury;
    private readonly clock: () => number;
    private readonly round: Round;
    private readonly registry = new PlayerRegistry();
    private readonly lock = new Mutex();

    constructor({ settings, oracle, treasury, clock }: RaffleOptions) {
        super();
        this.settings = settings;
        this.oracle = oracle;
        this.treasury = treasury;
        this.clock = clock ?? Date.now;
        this.round = createRound(this.clock());
    }

    /**
     * Admits `identity` into the current round and credits `feePaid` to the pool.
     */
    enter(identity: string, feePaid: number): Promise<void> {
        return this.lock.runExclusive(() => {
            if (!Number.isSafeInteger(feePaid) || feePaid < this.settings.entranceFee) {
                throw new InsufficientFeeError(feePaid, this.settings.entranceFee);
            }
            if (this.round.phase !== 'OPEN') {
                throw new RoundNotOpenError(this.round.phase);
            }
            this.registry.add({ identity, feePaid });
            this.treasury.deposit(feePaid);
            logger.info('entered_round', { identity, feePaid, numPlayers: this.registry.size });
            this.notify('EnteredRound', () => this.emit('EnteredRound', identity));
        });
    }

    /**
     * Whether a draw is due at `now`. Side-effect free.
     */
    checkUpkeep(now: number = this.clock()): boolean {
        return this.evaluate(now).upkeepNeeded;
    }

    /**
     * Moves the round into CALCULATING and submits the randomness request.
     * @returns The oracle's correlation token.
     */
    performUpkeep(now: number = this.clock()): Promise<string> {
        return this.lock.runExclusive(async () => {
            const check = this.evaluate(now);
            if (!check.upkeepNeeded) {
                throw new UpkeepNotNeededError(this.treasury.balance, this.registry.size, this.round.phase);
            }

            // Close the round before the oracle is contacted so nothing can enter meanwhile.
            this.round.phase = 'CALCULATING';

            let token: string;
            try {
                token = await this.oracle.submitRequest(
                    {
                        keyHash: this.settings.keyHash,
                        subscriptionId: this.settings.subscriptionId,
                        requestConfirmations: REQUEST_CONFIRMATIONS,
                        callbackGasLimit: this.settings.callbackGasLimit,
                        numWords: NUM_WORDS,
                    },
                    this
                );
            } catch (err) {
                logger.error('draw_request_failed', { err: String(err), numPlayers: this.registry.size });
                throw new OracleRequestFailedError(err);
            }

            this.round.pendingRequestToken = token;
            logger.info('draw_requested', {
                token,
                numPlayers: this.registry.size,
                balance: this.treasury.balance,
            });
            this.notify('DrawRequested', () => this.emit('DrawRequested', token));
            return token;
        });
    }

    /**
     * Oracle callback entry point.
     */
    rawFulfillRandomWords(token: string, randomWords: readonly bigint[]): Promise<DrawResult> {
        return this.fulfill(token, randomWords);
    }

    /**
     * Resolves the pending draw: picks `randomWords[0] mod entrants`, moves the
     * pool into a hold for the winner and resets the round, then transfers the
     * prize once the lock is released.
     *
     * If the transfer fails the prize stays in the winner's unclaimed escrow
     * and `PayoutFailed` is thrown.
     */
    async fulfill(token: string, randomWords: readonly bigint[]): Promise<DrawResult> {
        const draw = await this.lock.runExclusive(() => {
            const pending = this.round.pendingRequestToken;
            if (this.round.phase !== 'CALCULATING' || pending === undefined || token !== pending) {
                logger.warn('stale_fulfillment_rejected', { token, pending: pending ?? null });
                throw new UnknownOrStaleRequestError(token);
            }
            const [randomWord] = randomWords;
            if (randomWord === undefined || randomWord < 0n) {
                throw new InvalidFulfillmentError(token);
            }

            const numPlayers = this.registry.size;
            const winningIndex = numPlayers > 0 ? Number(randomWord % BigInt(numPlayers)) : -1;
            const winner = this.registry.at(winningIndex);
            if (!winner) {
                throw new NoEntrantsError();
            }
            const amount = this.treasury.balance;
            const held = this.treasury.hold(winner.identity, amount);
            if (!held.ok) {
                throw new PayoutFailedError(winner.identity, amount, held.reason);
            }

            this.round.recentWinner = winner.identity;
            this.round.phase = 'OPEN';
            delete this.round.pendingRequestToken;
            this.registry.clear();
            this.round.lastDrawTimestamp = this.clock();

            logger.info('winner_picked', { token, winner: winner.identity, winningIndex, numPlayers, amount });
            this.notify('WinnerPicked', () => this.emit('WinnerPicked', winner.identity));
            return { winner: winner.identity, winningIndex, amount };
        });

        const payout = await this.treasury.payout(draw.winner, draw.amount);
        if (!payout.ok) {
            logger.error('payout_failed', { winner: draw.winner, amount: draw.amount, reason: payout.reason });
            this.notify('PayoutFailed', () => this.emit('PayoutFailed', draw.winner, draw.amount));
            throw new PayoutFailedError(draw.winner, draw.amount, payout.reason);
        }

        logger.info('prize_paid', { winner: draw.winner, amount: draw.amount });
        return draw;
    }

    /**
     * Retries the transfer of a prize left unclaimed by a failed payout.
     * @returns The amount transferred.
     */
    async retryPayout(identity: string): Promise<number> {
        const amount = await this.lock.runExclusive(() => {
            const escrowed = this.treasury.holdEscrow(identity);
            if (escrowed === 0) {
                throw new NothingToReclaimError(identity);
            }
            return escrowed;
        });

        const result = await this.treasury.payout(identity, amount);
        if (!result.ok) {
            throw new PayoutFailedError(identity, amount, result.reason);
        }
        logger.info('unclaimed_prize_paid', { identity, amount });
        return amount;
    }

    /**
     * Gives up on the outstanding draw request and reopens the round with its
     * entrants and pool intact. A later fulfillment for the abandoned token is
     * rejected as stale.
     * @returns The abandoned token, if the request had been accepted by the oracle.
     */
    abandonDraw(): Promise<string | null> {
        return this.lock.runExclusive(() => {
            if (this.round.phase !== 'CALCULATING') {
                throw new RoundNotCalculatingError(this.round.phase);
            }
            const token = this.round.pendingRequestToken ?? null;
            this.round.phase = 'OPEN';
            delete this.round.pendingRequestToken;
            logger.warn('draw_abandoned', { token, numPlayers: this.registry.size });
            return token;
        });
    }

    getEntranceFee(): number {
        return this.settings.entranceFee;
    }

    getRaffleState(): RafflePhase {
        return this.round.phase;
    }

    getPlayer(index: number): string {
        const entrant = this.registry.at(index);
        if (!entrant) {
            throw new PlayerIndexOutOfRangeError(index, this.registry.size);
        }
        return entrant.identity;
    }

    getRecentWinner(): string | undefined {
        return this.round.recentWinner;
    }

    getNumberOfPlayers(): number {
        return this.registry.size;
    }

    getLastTimeStamp(): number {
        return this.round.lastDrawTimestamp;
    }

    getInterval(): number {
        return this.settings.intervalMs;
    }

    getRequestConfirmations(): number {
        return REQUEST_CONFIRMATIONS;
    }

    getNumWords(): number {
        return NUM_WORDS;
    }

    getBalance(): number {
        return this.treasury.balance;
    }

    getPendingRequestToken(): string | undefined {
        return this.round.pendingRequestToken;
    }

    getUnclaimed(identity: string): number {
        return this.treasury.getUnclaimed(identity);
    }

    snapshot(): RaffleSnapshot {
        return {
            phase: this.round.phase,
            entranceFee: this.settings.entranceFee,
            interval: this.settings.intervalMs,
            lastTimeStamp: this.round.lastDrawTimestamp,
            numberOfPlayers: this.registry.size,
            balance: this.treasury.balance,
            recentWinner: this.round.recentWinner ?? null,
            pendingRequestToken: this.round.pendingRequestToken ?? null,
            requestConfirmations: REQUEST_CONFIRMATIONS,
            numWords: NUM_WORDS,
        };
    }

    private evaluate(now: number): UpkeepCheck {
        return evaluateUpkeep({
            round: this.round,
            now,
            intervalMs: this.settings.intervalMs,
            balance: this.treasury.balance,
            numPlayers: this.registry.size,
        });
    }

    // A throwing listener must not undo or mask a committed state change.
    private notify(event: keyof RaffleEvents, fire: () => boolean): void {
        try {
            fire();
        } catch (err) {
            logger.error('event_listener_failed', { event, err: String(err) });
        }
    }
}
