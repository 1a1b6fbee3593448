// src/engine/dailySimulator.ts

import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { DailyRecord } from '../models/Report';
import { roundHalfAwayFromZero } from '../utils/rounding';
import { dailyCapacity } from './capacity';

/**
 * Wait estimate from the backlog before the day's treatment
 *
 * A specialty that started empty has no reference wait to scale, so its
 * wait is backlog / capacity. That quantity is in days while the other
 * branch is in weeks; the mixed unit is kept as-is for report compatibility.
 * With zero capacity that branch has no value and reports 0.
 */
function estimateWait(config: SpecialtyConfig, capacity: number, currentBacklog: number): number {
    if (config.initialBacklog === 0 && currentBacklog > 0) {
        if (capacity === 0) {
            return 0;
        }
        return currentBacklog / capacity;
    }

    if (currentBacklog > 0 && config.initialBacklog > 0) {
        return config.initialWait * (currentBacklog / config.initialBacklog);
    }

    return 0;
}

/**
 * Day-by-day backlog trajectory for one specialty
 *
 * Pure function - no side effects, specialties are independent
 *
 * Per day, in order:
 * 1. Estimate wait from the pre-treatment backlog
 * 2. Treat min(capacity, backlog) patients
 * 3. Add the day's arrivals
 *
 * Invariant: backlog >= 0 on every day (treatment never exceeds backlog)
 *
 * @param config Validated specialty parameters
 * @param horizonDays Days to simulate; 0 or less yields an empty trajectory
 * @returns One record per day, day ascending
 */
export function simulateDays(config: SpecialtyConfig, horizonDays: number): DailyRecord[] {
    const records: DailyRecord[] = [];
    const capacity = dailyCapacity(config);

    let currentBacklog = config.initialBacklog;

    for (let day = 1; day <= horizonDays; day++) {
        const currentWait = estimateWait(config, capacity, currentBacklog);

        const patientsTreated = Math.min(capacity, currentBacklog);
        currentBacklog = currentBacklog - patientsTreated + config.dailyArrivals;

        records.push({
            specialty: config.name,
            day,
            backlog: roundHalfAwayFromZero(currentBacklog),
            wait: roundHalfAwayFromZero(currentWait),
            patientsTreated
        });
    }

    return records;
}
