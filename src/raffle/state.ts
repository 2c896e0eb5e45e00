import type { Entrant, Round } from './types';

/**
 * Ordered, append-only list of the current round's entrants.
 * Insertion order defines the index space used for winner selection.
 */
export class PlayerRegistry {
    private entrants: Entrant[] = [];

    get size(): number {
        return this.entrants.length;
    }

    add(entrant: Entrant): void {
        this.entrants.push(entrant);
    }

    /**
     * Retrieves the entrant at a position.
     * @returns The entrant, or undefined if the index is outside the sequence.
     */
    at(index: number): Entrant | undefined {
        if (!Number.isInteger(index) || index < 0) return undefined;
        return this.entrants[index];
    }

    /**
     * Empties the sequence. Called once per round, after the winning index was read.
     */
    clear(): void {
        this.entrants = [];
    }
}

/**
 * Creates the round record for a freshly started raffle.
 * @param startedAt The ms epoch the first interval is measured from.
 */
export function createRound(startedAt: number): Round {
    return { phase: 'OPEN', lastDrawTimestamp: startedAt };
}
