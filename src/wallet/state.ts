/**
 * Manages the in-memory ledger for player balances.
 */

// For simplicity, balances are stored in a key-value map in memory.
// In a real application, this should be a persistent database.
export class WalletLedger {
    private readonly balances = new Map<string, number>();

    /**
     * Gets the balance for a given player.
     * @param playerId The ID of the player.
     * @returns The player's current balance, or 0 if they have no record.
     */
    getBalance(playerId: string): number {
        return this.balances.get(playerId) ?? 0;
    }

    /**
     * Adds a specified amount to a player's balance.
     * @returns The new balance.
     */
    addToBalance(playerId: string, amount: number): number {
        const newBalance = this.getBalance(playerId) + amount;
        this.balances.set(playerId, newBalance);
        return newBalance;
    }

    /**
     * Subtracts a specified amount from a player's balance.
     * Refuses to go below zero.
     * @returns The new balance, or undefined if the player cannot cover the amount.
     */
    subtractFromBalance(playerId: string, amount: number): number | undefined {
        const currentBalance = this.getBalance(playerId);
        if (currentBalance < amount) return undefined;
        const newBalance = currentBalance - amount;
        this.balances.set(playerId, newBalance);
        return newBalance;
    }
}
