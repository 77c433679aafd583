/**
 * Server Entry Point
 *
 * Loads settings from the environment, checks the library folders and
 * backend connectivity, then starts the webhook server.
 */

// Load environment variables from .env file (development only)
import 'dotenv/config';

import { createServer } from 'http';
import { assertLibraryPaths, ConfigError, loadSettings } from './config/settings';
import { testAllConnections } from './integrations/registry';
import { createApp, createContext, type AppContext } from './app';
import logger from './utils/logger';

let context: AppContext | null = null;

async function start(): Promise<void> {
    const settings = loadSettings();
    logger.setLevel(settings.logLevel);
    logger.startup('Standin', {
        port: settings.port,
        interval: `${settings.monitor.intervalMs / 1000}s`,
        titles: settings.titleUpdates,
        playMode: settings.episodes.playMode,
    });

    assertLibraryPaths(settings);

    context = createContext(settings);

    // Connectivity is informational; a backend that is down now may be up by the first webhook
    const results = await testAllConnections(context.services);
    for (const [id, result] of Object.entries(results)) {
        if (result.success) {
            logger.info(`[Startup] Connected: service=${id} version=${result.version ?? 'unknown'}`);
        } else {
            logger.warn(`[Startup] Connection failed: service=${id} error="${result.error ?? 'unknown'}"`);
        }
    }

    const httpServer = createServer(createApp(context));
    httpServer.listen(settings.port, () => {
        logger.info(`[Server] Listening on port ${settings.port}`);
        logger.info('[Server] Ready ✓');
    });
}

start().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        for (const issue of error.issues) {
            logger.error(`[Startup] Invalid configuration: ${issue}`);
        }
    } else {
        logger.error(`[Startup] Failed to start server: error="${error instanceof Error ? error.message : String(error)}"`);
    }
    process.exit(1);
});

// Graceful shutdown
function shutdown(signal: string): void {
    logger.info(`${signal} received, shutting down gracefully`);
    const pending = context ? context.shutdown() : Promise.resolve();
    pending
        .catch((error: unknown) => {
            logger.error(`[Server] Shutdown failed: error="${error instanceof Error ? error.message : String(error)}"`);
        })
        .finally(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
