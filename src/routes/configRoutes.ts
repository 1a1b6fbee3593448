// src/routes/configRoutes.ts

import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ConfigSourceManager, ActiveConfiguration } from '../ingest/configSource';
import { getDefaultConfigs, findDefaultConfig } from '../data/specialtyRegistry';

function describeConfiguration(active: ActiveConfiguration) {
    return {
        source: active.source,
        label: active.label,
        loadedAt: active.loadedAt.toISOString(),
        specialtyCount: active.configs.length,
        warnings: active.warnings,
        configs: active.configs
    };
}

/**
 * Configuration routes - HTTP mapping only
 * Parsing and source priority delegated to ingest/
 */
export function createConfigRoutes(configSource: ConfigSourceManager, uploadLimitBytes: number): Router {
    const router = Router();
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: uploadLimitBytes }
    });

    /**
     * Active configuration and where it came from
     * GET /configs
     */
    router.get('/', (_req: Request, res: Response) => {
        res.json(describeConfiguration(configSource.getActive()));
    });

    /**
     * Bundled default table
     * GET /configs/defaults
     */
    router.get('/defaults', (_req: Request, res: Response) => {
        res.json({ configs: getDefaultConfigs() });
    });

    /**
     * One default specialty
     * GET /configs/defaults/:name
     */
    router.get('/defaults/:name', (req: Request, res: Response) => {
        const config = findDefaultConfig(req.params.name);
        if (!config) {
            res.status(404).json({ error: 'Specialty not found', code: 'NOT_FOUND' });
            return;
        }

        res.json({ config });
    });

    /**
     * Upload a parameter CSV and make it the active configuration
     * POST /configs/upload (multipart, field "file")
     */
    router.post('/upload', upload.single('file'), (req: Request, res: Response) => {
        if (!req.file) {
            res.status(400).json({ error: 'Missing file', code: 'MISSING_FILE' });
            return;
        }

        const active = configSource.setUploaded(req.file.buffer, req.file.originalname);
        res.json(describeConfiguration(active));
    });

    /**
     * Drop the uploaded configuration
     * DELETE /configs/upload
     */
    router.delete('/upload', (_req: Request, res: Response) => {
        const cleared = configSource.clearUploaded();
        res.json({ cleared, active: describeConfiguration(configSource.getActive()) });
    });

    router.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') {
            res.status(413).json({
                error: `File too large (max ${uploadLimitBytes} bytes)`,
                code: 'FILE_TOO_LARGE'
            });
            return;
        }
        next(err);
    });

    return router;
}
