// src/app.ts

import express from 'express';
import cors from 'cors';
import { Settings } from './config/settings';
import { ConfigSourceManager } from './ingest/configSource';
import { createConfigRoutes } from './routes/configRoutes';
import { createSimulationRoutes } from './routes/simulationRoutes';
import { CapacityPlannerError } from './errors';
import { logger } from './utils/logger';

export interface AppDependencies {
    settings: Settings;
    configSource: ConfigSourceManager;
}

// Infinity (utilisation at zero capacity, months to clear) would otherwise serialise as null
function finiteNumberReplacer(_key: string, value: unknown): unknown {
    if (typeof value === 'number' && !Number.isFinite(value)) {
        return String(value);
    }
    return value;
}

function isBodyParseError(err: Error): boolean {
    return err instanceof SyntaxError && 'body' in err;
}

/**
 * Express application setup
 *
 * Stateless apart from the configuration source:
 * - configSource: uploaded / on-disk / default specialty table
 * - every simulation runs fresh from its request
 */
export function createApp({ settings, configSource }: AppDependencies): express.Express {
    const app = express();

    // Middleware
    app.use(cors({ origin: settings.corsOrigin }));
    app.use(express.json());
    app.set('json replacer', finiteNumberReplacer);

    // Routes
    app.use('/configs', createConfigRoutes(configSource, settings.uploadLimitBytes));
    app.use('/simulations', createSimulationRoutes(configSource));

    // Health check
    app.get('/health', (_req, res) => {
        const active = configSource.getActive();
        res.json({
            status: 'healthy',
            specialties: active.configs.length,
            source: active.source
        });
    });

    // Error handling
    app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
        if (err instanceof CapacityPlannerError) {
            logger.warn(`${err.code}: ${err.message}`);
            res.status(err.status).json({ error: err.message, code: err.code, details: err.details });
            return;
        }

        if (isBodyParseError(err)) {
            res.status(400).json({ error: 'Malformed JSON body', code: 'INVALID_REQUEST' });
            return;
        }

        logger.error(`Error: ${err.message}`);
        res.status(500).json({ error: err.message, code: 'INTERNAL_ERROR' });
    });

    return app;
}
