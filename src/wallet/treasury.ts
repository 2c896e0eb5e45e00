import { logger } from '../logger';

/**
 * Moves funds out of the treasury to a player. Throwing or rejecting means
 * nothing was transferred.
 */
export type TransferFn = (identity: string, amount: number) => void | Promise<void>;

export type PayoutResult = { ok: true } | { ok: false; reason: string };

/**
 * Holds the pooled entry fees of the current round, prizes on their way to a
 * winner, and prizes whose transfer failed and are waiting to be reclaimed.
 *
 * Moving funds is split in two: `hold` and `holdEscrow` reserve an amount
 * synchronously, `payout` then transfers it. A failed transfer leaves the
 * amount in the winner's unclaimed escrow.
 */
export class Treasury {
    private pool = 0;
    private readonly held = new Map<string, number>();
    private readonly unclaimed = new Map<string, number>();

    constructor(private readonly transfer: TransferFn) {}

    get balance(): number {
        return this.pool;
    }

    deposit(amount: number): void {
        this.pool += amount;
    }

    /**
     * Moves `amount` out of the pool into a hold for `identity`.
     */
    hold(identity: string, amount: number): PayoutResult {
        if (!Number.isSafeInteger(amount) || amount <= 0 || amount > this.pool) {
            return { ok: false, reason: `invalid payout amount ${amount} (pool ${this.pool})` };
        }
        this.pool -= amount;
        this.adjust(this.held, identity, amount);
        return { ok: true };
    }

    /**
     * Moves everything escrowed for `identity` into a hold.
     * @returns The amount held, 0 when nothing was escrowed.
     */
    holdEscrow(identity: string): number {
        const amount = this.getUnclaimed(identity);
        if (amount <= 0) return 0;
        this.unclaimed.delete(identity);
        this.adjust(this.held, identity, amount);
        return amount;
    }

    /**
     * Transfers `amount` previously held for `identity`, all or nothing.
     * On failure the amount moves into the identity's unclaimed escrow.
     */
    async payout(identity: string, amount: number): Promise<PayoutResult> {
        if (!Number.isSafeInteger(amount) || amount <= 0 || amount > this.getHeld(identity)) {
            return { ok: false, reason: `no hold of ${amount} for ${identity}` };
        }
        try {
            await this.transfer(identity, amount);
        } catch (err) {
            logger.error('treasury_transfer_failed', { identity, amount, err: String(err) });
            this.adjust(this.held, identity, -amount);
            this.adjust(this.unclaimed, identity, amount);
            return { ok: false, reason: String(err) };
        }
        this.adjust(this.held, identity, -amount);
        return { ok: true };
    }

    getHeld(identity: string): number {
        return this.held.get(identity) ?? 0;
    }

    getUnclaimed(identity: string): number {
        return this.unclaimed.get(identity) ?? 0;
    }

    private adjust(ledger: Map<string, number>, identity: string, delta: number): void {
        const next = (ledger.get(identity) ?? 0) + delta;
        if (next === 0) ledger.delete(identity);
        else ledger.set(identity, next);
    }
}
