/**
 * Manages registered players and the secret keys they authenticate with.
 * NOTE: This is a simple in-memory store. In a real application, use a
 * persistent database and hash the secret keys.
 */
export class PlayerDirectory {
    private readonly playersByKey = new Map<string, string>(); // key -> playerId
    private readonly keysByPlayerId = new Map<string, string>(); // playerId -> key

    /**
     * Creates a new player with a secret key.
     * @param playerId The unique ID for the player.
     * @param key The secret key for the player.
     */
    createPlayer(playerId: string, key: string): void {
        this.playersByKey.set(key, playerId);
        this.keysByPlayerId.set(playerId, key);
    }

    /**
     * Finds a player by their secret key.
     * @returns The playerId, or undefined if not found.
     */
    getPlayerIdByKey(key: string): string | undefined {
        return this.playersByKey.get(key);
    }

    playerExists(playerId: string): boolean {
        return this.keysByPlayerId.has(playerId);
    }

    /**
     * Resolves the player behind an `Authorization: Bearer <key>` header.
     */
    authenticate(authHeader: string | undefined): string | undefined {
        if (!authHeader || !authHeader.startsWith('Bearer ')) return undefined;
        const key = authHeader.slice('Bearer '.length).trim();
        return key ? this.getPlayerIdByKey(key) : undefined;
    }
}
