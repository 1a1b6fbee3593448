// src/engine/hospitalOverview.ts

import { Clearance, SpecialtyStatus, SummaryRecord } from '../models/Report';
import { roundHalfAwayFromZero } from '../utils/rounding';

const RANKING_SIZE = 10;

export interface BacklogMovement {
    specialty: string;
    backlogChange: number;
    waitChange: number;
    status: SpecialtyStatus;
}

/**
 * Hospital-wide view across every specialty's summary
 */
export interface HospitalOverview {
    specialtyCount: number;
    criticalCount: number;
    unsustainableCount: number;
    totalBacklogChange: number;
    averageUtilisation: number | null;   // null when no specialty has finite utilisation
    totalDailyCapacity: number;
    totalDailyArrivals: number;
    hospitalNetDaily: number;            // Positive: hospital-wide deficit
    statusCounts: Record<SpecialtyStatus, number>;
    mostDeteriorating: BacklogMovement[];
    mostImproved: BacklogMovement[];
    interventionRequired: BacklogMovement[];
    highPerforming: BacklogMovement[];
}

function toMovement(record: SummaryRecord): BacklogMovement {
    return {
        specialty: record.specialty,
        backlogChange: record.backlogChange,
        waitChange: record.waitChange,
        status: record.status
    };
}

function sum(values: number[]): number {
    return values.reduce((total, value) => total + value, 0);
}

/**
 * Aggregate a summary table into hospital-wide figures and rankings
 *
 * Pure function. Rankings are stable: ties keep summary order.
 */
export function buildHospitalOverview(summary: readonly SummaryRecord[]): HospitalOverview {
    const statusCounts: Record<SpecialtyStatus, number> = {
        [SpecialtyStatus.EXCELLENT]: 0,
        [SpecialtyStatus.IMPROVING]: 0,
        [SpecialtyStatus.CRITICAL]: 0,
        [SpecialtyStatus.ALERT]: 0
    };
    for (const record of summary) {
        statusCounts[record.status]++;
    }

    const finiteUtilisation = summary
        .map(record => record.utilisationPercent)
        .filter(value => Number.isFinite(value));
    const averageUtilisation = finiteUtilisation.length > 0
        ? roundHalfAwayFromZero(sum(finiteUtilisation) / finiteUtilisation.length)
        : null;

    const totalDailyCapacity = sum(summary.map(record => record.dailyCapacity));
    const totalDailyArrivals = sum(summary.map(record => record.dailyArrivals));

    const byChangeDescending = [...summary].sort((a, b) => b.backlogChange - a.backlogChange);
    const byChangeAscending = [...summary].sort((a, b) => a.backlogChange - b.backlogChange);

    return {
        specialtyCount: summary.length,
        criticalCount: statusCounts[SpecialtyStatus.CRITICAL],
        unsustainableCount: summary.filter(record => record.clearance === Clearance.UNSUSTAINABLE).length,
        totalBacklogChange: sum(summary.map(record => record.backlogChange)),
        averageUtilisation,
        totalDailyCapacity,
        totalDailyArrivals,
        hospitalNetDaily: totalDailyArrivals - totalDailyCapacity,
        statusCounts,
        mostDeteriorating: byChangeDescending.slice(0, RANKING_SIZE).map(toMovement),
        mostImproved: byChangeAscending.slice(0, RANKING_SIZE).map(toMovement),
        interventionRequired: summary
            .filter(record => record.status === SpecialtyStatus.CRITICAL)
            .map(toMovement),
        highPerforming: summary
            .filter(record => record.status === SpecialtyStatus.EXCELLENT)
            .map(toMovement)
    };
}
