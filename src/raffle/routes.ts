import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../logger';
import type { PlayerDirectory } from '../player/state';
import type { WalletLedger } from '../wallet/state';
import { RaffleError, type RaffleErrorCode } from './errors';
import type { Raffle } from './raffle';

const STATUS_BY_CODE: Record<RaffleErrorCode, number> = {
    InsufficientFee: 402,
    RoundNotOpen: 409,
    RoundNotCalculating: 409,
    UpkeepNotNeeded: 409,
    UnknownOrStaleRequest: 409,
    InvalidFulfillment: 409,
    NoEntrants: 409,
    NothingToReclaim: 409,
    PlayerIndexOutOfRange: 404,
    PayoutFailed: 502,
    OracleRequestFailed: 503,
};

const EnterBody = z.object({
    amount: z.number().int().positive().max(Number.MAX_SAFE_INTEGER).optional(),
});

const PlayerIndexParam = z
    .string()
    .regex(/^\d+$/)
    .transform(Number);

const ReclaimBody = z.object({
    playerId: z.string().trim().min(1),
});

export type RaffleRouteDeps = {
    raffle: Raffle;
    wallets: WalletLedger;
    players: PlayerDirectory;
    operatorToken: string;
};

function sendError(res: Response, err: unknown): void {
    if (err instanceof RaffleError) {
        res.status(STATUS_BY_CODE[err.code]).json({ error: err.code, message: err.message, details: err.details });
        return;
    }
    logger.error('raffle_route_failed', { err: String(err) });
    res.status(500).json({ error: 'InternalError', message: 'unexpected failure' });
}

export function raffleRoutes({ raffle, wallets, players, operatorToken }: RaffleRouteDeps): Router {
    const router = Router();

    // Operator-only routes need `Authorization: Bearer <OPERATOR_TOKEN>`; they are off when no token is configured.
    function requireOperator(req: Request, res: Response, next: NextFunction): void {
        if (!operatorToken) {
            res.status(403).json({ error: 'operator routes are disabled' });
            return;
        }
        if (req.headers.authorization !== `Bearer ${operatorToken}`) {
            res.status(401).json({ error: 'operator token required' });
            return;
        }
        next();
    }

    /**
     * @route GET /raffle/state
     * Everything the query surface exposes, in one response.
     */
    router.get('/state', (_req: Request, res: Response) => {
        res.status(200).json(raffle.snapshot());
    });

    /**
     * @route GET /raffle/players/:index
     * The entrant at a position in the current round.
     */
    router.get('/players/:index', (req: Request, res: Response) => {
        const parsed = PlayerIndexParam.safeParse(req.params.index);
        if (!parsed.success) {
            res.status(400).json({ error: 'index must be a non-negative integer' });
            return;
        }
        const index = parsed.data;
        try {
            res.status(200).json({ index, playerId: raffle.getPlayer(index) });
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route GET /raffle/unclaimed/:playerId
     * Prize held in escrow for a player after a failed payout.
     */
    router.get('/unclaimed/:playerId', (req: Request, res: Response) => {
        const { playerId } = req.params;
        res.status(200).json({ playerId, amount: raffle.getUnclaimed(playerId) });
    });

    /**
     * @route POST /raffle/enter
     * Pays the entrance fee (or `amount`, if larger) from the caller's wallet and enters the round.
     * Requires authentication via a secret key provided as a Bearer token.
     */
    router.post('/enter', async (req: Request, res: Response) => {
        const playerId = players.authenticate(req.headers.authorization);
        if (!playerId) {
            res.status(401).json({ error: 'Authorization header with a valid Bearer key is required' });
            return;
        }
        const parsed = EnterBody.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({ error: 'amount must be a positive integer' });
            return;
        }
        const amount = parsed.data.amount ?? raffle.getEntranceFee();

        if (wallets.subtractFromBalance(playerId, amount) === undefined) {
            res.status(402).json({ error: 'Insufficient funds for entrance fee' });
            return;
        }
        try {
            await raffle.enter(playerId, amount);
        } catch (err) {
            wallets.addToBalance(playerId, amount);
            sendError(res, err);
            return;
        }
        res.status(200).json({ playerId, feePaid: amount, numberOfPlayers: raffle.getNumberOfPlayers() });
    });

    /**
     * @route GET /raffle/upkeep
     * Keeper polling endpoint.
     */
    router.get('/upkeep', (_req: Request, res: Response) => {
        res.status(200).json({ upkeepNeeded: raffle.checkUpkeep() });
    });

    /**
     * @route POST /raffle/upkeep
     * Requests a draw when one is due.
     */
    router.post('/upkeep', requireOperator, async (_req: Request, res: Response) => {
        try {
            const requestId = await raffle.performUpkeep();
            res.status(200).json({ requestId });
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route POST /raffle/reclaim
     * Retries a failed prize transfer for `playerId`.
     */
    router.post('/reclaim', requireOperator, async (req: Request, res: Response) => {
        const parsed = ReclaimBody.safeParse(req.body);
        if (!parsed.success) {
            res.status(400).json({ error: 'playerId is required' });
            return;
        }
        try {
            const amount = await raffle.retryPayout(parsed.data.playerId);
            res.status(200).json({ playerId: parsed.data.playerId, amount });
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route POST /raffle/abandon
     * Reopens a round whose draw request never completed.
     */
    router.post('/abandon', requireOperator, async (_req: Request, res: Response) => {
        try {
            const abandoned = await raffle.abandonDraw();
            res.status(200).json({ abandoned, phase: raffle.getRaffleState() });
        } catch (err) {
            sendError(res, err);
        }
    });

    return router;
}
