import type { RafflePhase } from './types';

export type RaffleErrorCode =
    | 'InsufficientFee'
    | 'RoundNotOpen'
    | 'RoundNotCalculating'
    | 'UpkeepNotNeeded'
    | 'UnknownOrStaleRequest'
    | 'InvalidFulfillment'
    | 'NoEntrants'
    | 'PayoutFailed'
    | 'NothingToReclaim'
    | 'OracleRequestFailed'
    | 'PlayerIndexOutOfRange';

/**
 * Base class for every failure the raffle reports. `code` is stable and is
 * what HTTP clients receive; `details` carries diagnostic context.
 */
export class RaffleError extends Error {
    constructor(
        readonly code: RaffleErrorCode,
        message: string,
        readonly details?: Record<string, unknown>
    ) {
        super(message);
        this.name = code;
    }
}

export class InsufficientFeeError extends RaffleError {
    constructor(readonly feePaid: number, readonly entranceFee: number) {
        super('InsufficientFee', `entry requires at least ${entranceFee}, got ${feePaid}`, { feePaid, entranceFee });
    }
}

export class RoundNotOpenError extends RaffleError {
    constructor(readonly phase: RafflePhase) {
        super('RoundNotOpen', 'the round is not open for entries', { phase });
    }
}

export class RoundNotCalculatingError extends RaffleError {
    constructor(readonly phase: RafflePhase) {
        super('RoundNotCalculating', 'no draw is in progress', { phase });
    }
}

export class UpkeepNotNeededError extends RaffleError {
    constructor(readonly balance: number, readonly numPlayers: number, readonly phase: RafflePhase) {
        super('UpkeepNotNeeded', 'draw conditions are not met', { balance, numPlayers, phase });
    }
}

export class UnknownOrStaleRequestError extends RaffleError {
    constructor(readonly token: string) {
        super('UnknownOrStaleRequest', `no pending draw request matches token ${token}`, { token });
    }
}

export class InvalidFulfillmentError extends RaffleError {
    constructor(readonly token: string) {
        super('InvalidFulfillment', 'fulfillment carried no random words', { token });
    }
}

export class NoEntrantsError extends RaffleError {
    constructor() {
        super('NoEntrants', 'cannot pick a winner from an empty round');
    }
}

export class PayoutFailedError extends RaffleError {
    constructor(readonly identity: string, readonly amount: number, cause?: unknown) {
        super('PayoutFailed', `transfer of ${amount} to ${identity} failed`, {
            identity,
            amount,
            ...(cause !== undefined ? { cause: String(cause) } : {}),
        });
    }
}

export class NothingToReclaimError extends RaffleError {
    constructor(readonly identity: string) {
        super('NothingToReclaim', `no unclaimed prize for ${identity}`, { identity });
    }
}

export class OracleRequestFailedError extends RaffleError {
    constructor(cause: unknown) {
        super('OracleRequestFailed', 'randomness request could not be submitted', { cause: String(cause) });
    }
}

export class PlayerIndexOutOfRangeError extends RaffleError {
    constructor(readonly index: number, readonly numPlayers: number) {
        super('PlayerIndexOutOfRange', `no entrant at index ${index}`, { index, numPlayers });
    }
}
