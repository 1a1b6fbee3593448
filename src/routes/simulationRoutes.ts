// src/routes/simulationRoutes.ts

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { SimulationReport } from '../models/Report';
import { ConfigSourceManager } from '../ingest/configSource';
import { assembleReport } from '../engine/reportAssembler';
import { formatIssues, specialtyConfigShape } from '../engine/configValidator';
import { buildHospitalOverview } from '../engine/hospitalOverview';
import { detailFileName, executiveFileName, toDetailCsv, toExecutiveCsv } from '../export/reportCsv';
import { HORIZON_DEFAULT_DAYS, HORIZON_MAX_DAYS, HORIZON_MIN_DAYS } from '../config/settings';
import { logger } from '../utils/logger';

const simulationBodySchema = z.object({
    horizonDays: z.number().int().min(HORIZON_MIN_DAYS).max(HORIZON_MAX_DAYS).default(HORIZON_DEFAULT_DAYS),
    configs: z.array(specialtyConfigShape).optional(),
    strict: z.boolean().default(false)
});

interface PreparedRun {
    configs: SpecialtyConfig[];
    report: SimulationReport;
}

/**
 * Simulation routes - HTTP mapping only
 * Projection, simulation and export delegated to engine/ and export/
 */
export function createSimulationRoutes(configSource: ConfigSourceManager): Router {
    const router = Router();

    /**
     * Validate the body and run the engine
     *
     * @returns null after answering 400 when the body is malformed
     */
    function prepareRun(req: Request, res: Response): PreparedRun | null {
        const parsed = simulationBodySchema.safeParse(req.body ?? {});
        if (!parsed.success) {
            res.status(400).json({
                error: 'Invalid simulation request',
                code: 'INVALID_REQUEST',
                details: formatIssues(parsed.error)
            });
            return null;
        }

        const { horizonDays, strict } = parsed.data;
        const configs = parsed.data.configs ?? configSource.getActive().configs;

        const report = assembleReport({ configs, horizonDays }, { onInvalid: strict ? 'abort' : 'skip' });
        if (report.rejected.length > 0) {
            logger.warn(`Skipped ${report.rejected.length} invalid specialty configuration(s)`);
        }

        return { configs, report };
    }

    /**
     * Run a projection
     * POST /simulations
     * Body: { horizonDays?, configs?, strict? }
     */
    router.post('/', (req: Request, res: Response) => {
        const run = prepareRun(req, res);
        if (!run) {
            return;
        }

        const { report } = run;
        logger.info(`Simulated ${report.summary.length} specialties over ${report.horizonDays} days`);

        res.json({ ...report, overview: buildHospitalOverview(report.summary) });
    });

    /**
     * Run a projection and download one table as CSV
     * POST /simulations/export/:table (table: summary | detail)
     */
    router.post('/export/:table', (req: Request, res: Response) => {
        const { table } = req.params;
        if (table !== 'summary' && table !== 'detail') {
            res.status(404).json({ error: `Unknown table "${table}"`, code: 'NOT_FOUND' });
            return;
        }

        const run = prepareRun(req, res);
        if (!run) {
            return;
        }

        const { configs, report } = run;
        const csv = table === 'summary'
            ? toExecutiveCsv(report.summary, configs)
            : toDetailCsv(report.detail);
        const fileName = table === 'summary'
            ? executiveFileName(report.horizonDays)
            : detailFileName(report.horizonDays);

        res.setHeader('Content-Type', 'text/csv; charset=utf-8');
        res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
        res.send(csv);
    });

    return router;
}
