// src/engine/reportAssembler.ts

import { SimulationRequest } from '../models/SpecialtyConfig';
import { SimulationReport } from '../models/Report';
import { InvalidConfigError, InvalidRequestError } from '../errors';
import { validateConfigs } from './configValidator';
import { projectSummary } from './summaryProjector';
import { simulateDays } from './dailySimulator';

export interface AssembleOptions {
    /**
     * 'skip' leaves invalid configs out and lists them in `rejected`;
     * 'abort' throws InvalidConfigError before any projection runs.
     */
    onInvalid?: 'skip' | 'abort';
}

/**
 * Run the projector and simulator for every specialty in a request
 *
 * Validation happens first, for the whole request. Specialties are
 * independent, so each is mapped on its own; both output tables keep
 * request order (detail: specialty, then day ascending).
 *
 * A horizon of 0 or less, or no configs, gives empty tables.
 */
export function assembleReport(request: SimulationRequest, options: AssembleOptions = {}): SimulationReport {
    const { horizonDays } = request;
    if (!Number.isInteger(horizonDays)) {
        throw new InvalidRequestError(`horizonDays must be an integer, got ${horizonDays}`);
    }

    const { accepted, rejected } = validateConfigs(request.configs);
    if (rejected.length > 0 && options.onInvalid === 'abort') {
        throw new InvalidConfigError(rejected);
    }

    if (horizonDays <= 0) {
        return { horizonDays, summary: [], detail: [], rejected };
    }

    const summary = accepted.map(config => projectSummary(config, horizonDays));
    const detail = accepted.flatMap(config => simulateDays(config, horizonDays));

    return { horizonDays, summary, detail, rejected };
}
