import express, { type Express } from 'express';
import type { PlayerDirectory } from './player/state';
import { playerRoutes } from './player/routes';
import type { Raffle } from './raffle/raffle';
import { raffleRoutes } from './raffle/routes';
import type { WalletLedger } from './wallet/state';
import { walletRoutes } from './wallet/routes';

export type AppContext = {
    raffle: Raffle;
    wallets: WalletLedger;
    players: PlayerDirectory;
    operatorToken: string;
};

/**
 * Builds the HTTP application around an already wired raffle.
 */
export function createApp(ctx: AppContext): Express {
    const app = express();
    // Middleware to parse JSON bodies.
    app.use(express.json({ limit: '16kb' }));

    // A simple health check endpoint.
    app.get('/health', (_req, res) => {
        res.status(200).json({ ok: true });
    });

    // Mount the raffle routes under the /raffle path.
    app.use('/raffle', raffleRoutes(ctx));

    // Mount the wallet routes under the /wallet path (development funding)
    app.use('/wallet', walletRoutes(ctx.wallets));

    // Mount the player registration routes.
    app.use('/player', playerRoutes(ctx.players));

    return app;
}
