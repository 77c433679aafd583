/**
 * Status Routes
 *
 *   GET /health               liveness plus registry size
 *   GET /monitoring           every tracked unit
 *   GET /monitoring/:key      one unit by key (e.g. tmdb:42)
 */
import { Router, type Request, type Response } from 'express';
import type { MonitoringEngine } from '../services/monitoring';
import { formatStatus } from '../services/monitoring/status';
import type { UnitSnapshot } from '../services/monitoring/types';

function present(unit: UnitSnapshot) {
    return {
        key: unit.key,
        kind: unit.kind,
        title: unit.displayTitle,
        tier: unit.qualityTier,
        state: unit.state,
        status: formatStatus(unit),
        progress: unit.progress,
        retrying: unit.retrying,
        attempts: unit.attemptCount,
        startedAt: new Date(unit.startedAt).toISOString(),
        lastTransitionAt: new Date(unit.lastTransitionAt).toISOString(),
    };
}

export function createStatusRouter(engine: MonitoringEngine): Router {
    const router = Router();

    router.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            monitored: engine.registry.size,
            polling: engine.poller.isRunning,
        });
    });

    router.get('/monitoring', (_req: Request, res: Response) => {
        res.json({ units: Array.from(engine.registry.all(), present) });
    });

    router.get('/monitoring/:key', (req: Request, res: Response) => {
        const unit = engine.registry.get(req.params.key);
        if (!unit) {
            res.status(404).json({ error: 'Unit not monitored' });
            return;
        }
        res.json(present(unit));
    });

    return router;
}
