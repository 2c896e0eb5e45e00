import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { cryptoRandomId } from '../crypto';
import { logger } from '../logger';
import type { PlayerDirectory } from './state';

const RegisterBody = z.object({
    playerId: z.string().trim().min(1).max(64),
});

export function playerRoutes(players: PlayerDirectory): Router {
    const router = Router();

    /**
     * @route POST /player/register
     * Registers a new player and returns a secret key for them.
     * The key should be stored securely by the client.
     */
    router.post('/register', (req: Request, res: Response) => {
        const parsed = RegisterBody.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'playerId is required and must be a non-empty string' });
            return;
        }
        const { playerId } = parsed.data;

        if (players.playerExists(playerId)) {
            res.status(409).json({ error: 'Player with this ID already exists' });
            return;
        }

        const key = `sk_` + cryptoRandomId();
        players.createPlayer(playerId, key);
        logger.info('player_registered', { playerId });

        // Return the key to the user. This is the ONLY time it's sent.
        res.status(201).json({ playerId, key });
    });

    return router;
}
