import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { WalletLedger } from './state';

const MintBody = z.object({
    playerId: z.string().trim().min(1),
    amount: z.number().int().positive().max(Number.MAX_SAFE_INTEGER),
});

export function walletRoutes(wallets: WalletLedger): Router {
    const router = Router();

    /**
     * @route GET /wallet/:playerId/balance
     * Retrieves the current balance for a given player.
     */
    router.get('/:playerId/balance', (req: Request, res: Response) => {
        const { playerId } = req.params;
        res.status(200).json({ playerId, balance: wallets.getBalance(playerId) });
    });

    /**
     * @route POST /wallet/mint
     * Mints a specified amount of currency for a player.
     * Development funding only.
     */
    router.post('/mint', (req: Request, res: Response) => {
        const parsed = MintBody.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'playerId must be a string and amount a positive integer' });
            return;
        }
        const { playerId, amount } = parsed.data;
        const newBalance = wallets.addToBalance(playerId, amount);
        res.status(200).json({ playerId, newBalance });
    });

    return router;
}
