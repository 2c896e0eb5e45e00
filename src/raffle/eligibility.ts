import type { Round, UpkeepCheck } from './types';

export type EligibilityInput = {
    round: Round;
    now: number;
    intervalMs: number;
    balance: number;
    numPlayers: number;
};

/**
 * Decides whether a draw should be requested. Every condition is evaluated;
 * a draw is due only when all of them hold.
 */
export function evaluateUpkeep({ round, now, intervalMs, balance, numPlayers }: EligibilityInput): UpkeepCheck {
    const timePassed = now - round.lastDrawTimestamp >= intervalMs;
    const isOpen = round.phase === 'OPEN';
    const hasBalance = balance > 0;
    const hasPlayers = numPlayers > 0;
    return {
        timePassed,
        isOpen,
        hasBalance,
        hasPlayers,
        upkeepNeeded: timePassed && isOpen && hasBalance && hasPlayers,
    };
}
