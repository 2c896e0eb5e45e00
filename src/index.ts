import { createApp } from './app';
import { config, oracleKey } from './config';
import { Keeper } from './keeper/keeper';
import { logger } from './logger';
import { LocalVrfCoordinator } from './oracle/coordinator';
import { PlayerDirectory } from './player/state';
import { Raffle } from './raffle/raffle';
import { WalletLedger } from './wallet/state';
import { Treasury } from './wallet/treasury';

process.on('unhandledRejection', err => {
    logger.error('unhandled_rejection', { err: String(err) });
});

process.on('uncaughtException', err => {
    logger.error('uncaught_exception', { err: String(err) });
});

/**
 * Main application entry point.
 */
async function main() {
    const wallets = new WalletLedger();
    const players = new PlayerDirectory();
    const treasury = new Treasury((playerId, amount) => {
        wallets.addToBalance(playerId, amount);
    });
    const oracle = new LocalVrfCoordinator({ key: oracleKey, blockTimeMs: config.blockTimeMs });
    const raffle = new Raffle({
        settings: {
            entranceFee: config.entranceFee,
            intervalMs: config.drawIntervalMs,
            keyHash: config.keyHash,
            subscriptionId: config.subscriptionId,
            callbackGasLimit: config.callbackGasLimit,
        },
        oracle,
        treasury,
    });

    const app = createApp({ raffle, wallets, players, operatorToken: config.operatorToken });

    const keeper = new Keeper(raffle, config.keeperCron);
    if (config.keeperEnabled) {
        keeper.start();
    } else {
        logger.info('keeper_disabled');
    }

    const server = app.listen(config.port, () => {
        logger.info('server_listening', {
            port: config.port,
            entranceFee: config.entranceFee,
            intervalMs: config.drawIntervalMs,
        });
    });

    const shutdown = (signal: string) => {
        logger.info('shutting_down', { signal });
        keeper.stop();
        oracle.stop();
        server.close(() => process.exit(0));
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
    logger.error('startup_failed', { err: String(err) });
    process.exit(1);
});
