/**
 * Webhook Router
 *
 * Single entry point for every event source:
 *   POST /webhook  Radarr, Sonarr and Tautulli payloads
 *
 * The router:
 * 1. Validates and normalizes the payload
 * 2. Picks the quality tier from the file path and source port
 * 3. Delegates to the acquisition or library-event service
 * 4. Maps failures to JSON errors (400 bad payload, 502 upstream, 500 other)
 */
import { Router, type Request, type Response } from 'express';
import logger from '../../utils/logger';
import { AdapterError } from '../../integrations/errors';
import type { AcquisitionService } from '../../services/acquisition';
import { PlaybackEventError } from '../../services/acquisition';
import type { LibraryEventService } from '../../services/libraryEvents';
import type { QualityRouter } from '../../services/monitoring/qualityRouter';
import { parseWebhook, WebhookPayloadError } from './payloads';

export interface WebhookRouterDeps {
    acquisition: AcquisitionService;
    libraryEvents: LibraryEventService;
    router: QualityRouter;
}

function statusFor(error: unknown): number {
    if (error instanceof WebhookPayloadError || error instanceof PlaybackEventError) return 400;
    if (error instanceof AdapterError) return 502;
    return 500;
}

export function createWebhookRouter(deps: WebhookRouterDeps): Router {
    const router = Router();

    /**
     * POST /webhook
     */
    router.post('/', async (req: Request, res: Response): Promise<void> => {
        const sourcePort = req.socket.remotePort ?? null;

        try {
            const parsed = parseWebhook(req.body);
            logger.info(`[Webhook] Received: event=${parsed.eventType} kind=${parsed.kind} port=${sourcePort ?? 'unknown'}`);

            switch (parsed.kind) {
                case 'test':
                    res.json({ status: 'success', message: 'Test event received' });
                    return;

                case 'ignored':
                    res.json({ status: 'success', message: `Event ${parsed.eventType} ignored` });
                    return;

                case 'playback': {
                    const outcome = await deps.acquisition.handlePlayback({ ...parsed.event, sourcePort });
                    res.json({ status: 'success', ...outcome });
                    return;
                }

                case 'movie': {
                    const tier = deps.router.detectTier('movie', { filePath: parsed.filePath, sourcePort });
                    const outcome = await deps.libraryEvents.handleMovieEvent(parsed.event, tier);
                    res.json({ status: 'success', tier, ...outcome });
                    return;
                }

                case 'series': {
                    const tier = deps.router.detectTier('episode', { filePath: parsed.filePath, sourcePort });
                    const outcome = await deps.libraryEvents.handleSeriesEvent(parsed.event, tier);
                    res.json({ status: 'success', tier, ...outcome });
                    return;
                }
            }
        } catch (error) {
            const status = statusFor(error);
            const message = error instanceof Error ? error.message : String(error);
            if (status === 500) {
                logger.error(`[Webhook] Handler failed: error="${message}"`);
            } else {
                logger.warn(`[Webhook] Rejected: status=${status} error="${message}"`);
            }
            res.status(status).json({ status: 'error', message });
        }
    });

    return router;
}
