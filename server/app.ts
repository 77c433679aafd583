/**
 * Application wiring
 *
 * Builds the service graph from settings and the Express app on top of
 * it. Kept apart from index.ts so tests can build an app without
 * binding a port.
 *
 * @module server/app
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import type { Settings } from './config/settings';
import {
    backendResolver,
    createServiceRegistry,
    radarrFor,
    type ServiceRegistry,
    sonarrFor,
} from './integrations/registry';
import { createStatusRouter } from './routes/status';
import { createWebhookRouter } from './routes/webhooks';
import { AcquisitionService } from './services/acquisition';
import { LibraryEventService } from './services/libraryEvents';
import { MonitoringEngine } from './services/monitoring';
import { QualityRouter } from './services/monitoring/qualityRouter';
import { PlaceholderManager } from './services/placeholders';
import { TitleUpdater } from './services/titleUpdater';
import logger from './utils/logger';

export interface AppContext {
    settings: Settings;
    services: ServiceRegistry;
    router: QualityRouter;
    engine: MonitoringEngine;
    placeholders: PlaceholderManager;
    titles: TitleUpdater;
    acquisition: AcquisitionService;
    libraryEvents: LibraryEventService;
    /** Stop polling, cancel timers, wait for in-flight title renames. */
    shutdown(): Promise<void>;
}

export function createContext(settings: Settings, services: ServiceRegistry = createServiceRegistry(settings)): AppContext {
    const router = new QualityRouter(settings);
    const placeholders = new PlaceholderManager(settings.placeholders);

    const engine: MonitoringEngine = new MonitoringEngine({
        ...settings.monitor,
        resolveBackend: backendResolver(services),
        onCleanup: unit => libraryEvents.cleanupUnit(unit),
    });

    const titles = new TitleUpdater({
        mode: settings.titleUpdates,
        catalog: services.plex,
        router,
    });
    const detachTitles = titles.attach(engine);

    const acquisition = new AcquisitionService({
        engine,
        router,
        movieBackend: tier => radarrFor(services, tier),
        seriesBackend: tier => sonarrFor(services, tier),
        episodes: settings.episodes,
    });

    const libraryEvents: LibraryEventService = new LibraryEventService({
        engine,
        router,
        placeholders,
        catalog: services.plex,
        titles,
        seriesBackend: tier => sonarrFor(services, tier),
        includeSpecials: settings.episodes.includeSpecials,
    });

    return {
        settings,
        services,
        router,
        engine,
        placeholders,
        titles,
        acquisition,
        libraryEvents,
        async shutdown() {
            detachTitles();
            engine.shutdown();
            await titles.idle();
        },
    };
}

export function createApp(context: AppContext): Express {
    const app = express();

    app.use(helmet());
    app.use(express.json({ limit: '1mb' }));

    app.use('/', createStatusRouter(context.engine));
    app.use('/webhook', createWebhookRouter(context));

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: 'Not found' });
    });

    // Malformed JSON and anything thrown outside a route's own handling
    app.use((err: Error & { status?: number; type?: string }, _req: Request, res: Response, _next: NextFunction) => {
        const status = err.type === 'entity.parse.failed' ? 400 : err.status ?? 500;
        if (status >= 500) {
            logger.error(`[Server] Unhandled error: error="${err.message}"`);
        }
        res.status(status).json({ status: 'error', message: status >= 500 ? 'Internal server error' : err.message });
    });

    return app;
}
