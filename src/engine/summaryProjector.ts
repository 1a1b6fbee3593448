// src/engine/summaryProjector.ts

import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { Clearance, SummaryRecord } from '../models/Report';
import { roundHalfAwayFromZero } from '../utils/rounding';
import { dailyCapacity, netDailyFlow } from './capacity';
import { classifyStatus } from './statusClassifier';

const DAYS_PER_MONTH = 30;

interface ClearanceProjection {
    clearance: Clearance;
    timeToClear: string;
    monthsToClear: number;
}

/**
 * How long the current net flow needs to empty the backlog
 *
 * A flat or growing flow never clears; an empty backlog has nothing to clear.
 */
function projectClearance(initialBacklog: number, netDaily: number): ClearanceProjection {
    if (initialBacklog === 0) {
        return { clearance: Clearance.NOT_APPLICABLE, timeToClear: 'N/A', monthsToClear: Infinity };
    }

    if (netDaily >= 0) {
        return { clearance: Clearance.UNSUSTAINABLE, timeToClear: '∞ (Impossible)', monthsToClear: Infinity };
    }

    const daysToClear = initialBacklog / Math.abs(netDaily);
    const monthsToClear = daysToClear / DAYS_PER_MONTH;

    return {
        clearance: Clearance.CLEARABLE,
        timeToClear: `${roundHalfAwayFromZero(monthsToClear)} months`,
        monthsToClear
    };
}

/**
 * Arrivals as a percentage of capacity
 *
 * Zero capacity has no meaningful ratio; reported as Infinity.
 */
function projectUtilisation(dailyArrivals: number, capacity: number): number {
    if (capacity === 0) {
        return Infinity;
    }
    return roundHalfAwayFromZero((dailyArrivals / capacity) * 100);
}

/**
 * Closed-form end-of-horizon projection for one specialty
 *
 * Pure function - same input always produces same output
 *
 * Linear extrapolation of the net daily flow, clamped at zero only at the
 * end of the horizon. It does not clamp treatment day by day, so it can
 * disagree with simulateDays() once capacity outruns the backlog.
 *
 * @param config Validated specialty parameters
 * @param horizonDays Days to project; 0 leaves the backlog unchanged
 */
export function projectSummary(config: SpecialtyConfig, horizonDays: number): SummaryRecord {
    const capacity = dailyCapacity(config);
    const netDaily = netDailyFlow(config);

    const rawFinalBacklog = Math.max(0, config.initialBacklog + netDaily * horizonDays);

    // Wait scales with backlog; without a reference backlog there is nothing to scale
    const rawFinalWait = rawFinalBacklog > 0 && config.initialBacklog > 0
        ? config.initialWait * (rawFinalBacklog / config.initialBacklog)
        : 0;

    const finalBacklog = roundHalfAwayFromZero(rawFinalBacklog);
    const finalWait = roundHalfAwayFromZero(rawFinalWait);

    return {
        specialty: config.name,
        doctors: config.doctors,
        nonDoctors: config.nonDoctors,
        dailyCapacity: capacity,
        dailyArrivals: config.dailyArrivals,
        netDaily,
        initialBacklog: config.initialBacklog,
        finalBacklog,
        backlogChange: finalBacklog - config.initialBacklog,
        initialWait: config.initialWait,
        finalWait,
        waitChange: finalWait - config.initialWait,
        ...projectClearance(config.initialBacklog, netDaily),
        utilisationPercent: projectUtilisation(config.dailyArrivals, capacity),
        status: classifyStatus(rawFinalBacklog, config.initialBacklog)
    };
}
