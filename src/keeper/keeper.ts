import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../logger';
import { RaffleError } from '../raffle/errors';

/**
 * The part of the raffle a keeper drives.
 */
export interface Upkeepable {
    checkUpkeep(now?: number): boolean;
    performUpkeep(now?: number): Promise<string>;
}

export type PollOutcome =
    | { kind: 'idle' }
    | { kind: 'requested'; requestId: string }
    | { kind: 'rejected'; code: string };

/**
 * Polls the raffle on a cron schedule and requests a draw whenever one is due.
 */
export class Keeper {
    private task: ScheduledTask | null = null;
    private running = false;

    constructor(
        private readonly target: Upkeepable,
        private readonly schedule: string
    ) {
        if (!cron.validate(schedule)) {
            throw new Error(`Invalid keeper schedule: ${schedule}`);
        }
    }

    get started(): boolean {
        return this.task !== null;
    }

    /**
     * One keeper cycle. A draw that is no longer due by the time it is
     * performed comes back as `rejected`; other failures propagate.
     */
    async pollOnce(now?: number): Promise<PollOutcome> {
        if (!this.target.checkUpkeep(now)) return { kind: 'idle' };
        try {
            const requestId = await this.target.performUpkeep(now);
            logger.info('keeper_upkeep_performed', { requestId });
            return { kind: 'requested', requestId };
        } catch (err) {
            if (err instanceof RaffleError) {
                logger.warn('keeper_upkeep_rejected', { code: err.code, details: err.details });
                return { kind: 'rejected', code: err.code };
            }
            throw err;
        }
    }

    start(): void {
        if (this.task) return;
        this.task = cron.schedule(this.schedule, () => void this.tick());
        logger.info('keeper_started', { schedule: this.schedule });
    }

    stop(): void {
        if (!this.task) return;
        this.task.stop();
        this.task = null;
        logger.info('keeper_stopped');
    }

    private async tick(): Promise<void> {
        // Skip a tick while the previous one is still waiting on the raffle lock.
        if (this.running) return;
        this.running = true;
        try {
            await this.pollOnce();
        } catch (err) {
            logger.error('keeper_poll_failed', { err: String(err) });
        } finally {
            this.running = false;
        }
    }
}
