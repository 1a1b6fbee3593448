// src/engine/capacity.ts

import { SpecialtyConfig } from '../models/SpecialtyConfig';

/**
 * Maximum patients a specialty can treat per day
 *
 * Pure function. Zero is valid (all rates zero) and callers must guard it.
 */
export function dailyCapacity(config: SpecialtyConfig): number {
    return config.doctors * config.doctorRate + config.nonDoctors * config.nonDoctorRate;
}

/**
 * Arrivals minus capacity; positive means the backlog grows
 */
export function netDailyFlow(config: SpecialtyConfig): number {
    return config.dailyArrivals - dailyCapacity(config);
}
