// src/export/reportCsv.ts

import { stringify } from 'csv-stringify/sync';
import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { DailyRecord, SpecialtyStatus, SummaryRecord } from '../models/Report';
import { roundHalfAwayFromZero } from '../utils/rounding';

export const EXECUTIVE_COLUMNS = [
    'Specialty',
    'Doctor Rate',
    'Non-Doctor Rate',
    'Initial Backlog',
    'Final Backlog',
    'Backlog Change',
    'Time to Clear',
    'Initial Wait (weeks)',
    'Final Wait (weeks)',
    'Wait Change (weeks)',
    'Daily Capacity',
    'Daily Arrivals',
    'Net Daily Change',
    'System Status'
] as const;

export const DETAIL_COLUMNS = [
    'Specialty',
    'Day',
    'Backlog',
    'Wait Time (weeks)',
    'Patients Treated'
] as const;

const STATUS_GLYPHS: Record<SpecialtyStatus, string> = {
    [SpecialtyStatus.EXCELLENT]: '🟢',
    [SpecialtyStatus.IMPROVING]: '🟡',
    [SpecialtyStatus.CRITICAL]: '🔴',
    [SpecialtyStatus.ALERT]: '🟠'
};

export function formatStatus(status: SpecialtyStatus): string {
    return `${STATUS_GLYPHS[status]} ${status}`;
}

/**
 * Signed whole number: +10, -5, +0
 */
export function formatSigned(value: number): string {
    const rounded = roundHalfAwayFromZero(value);
    return rounded >= 0 ? `+${rounded}` : String(rounded);
}

function formatRate(rate: number | undefined): string {
    return rate === undefined ? '' : `${rate}/day`;
}

/**
 * Executive summary table, one row per specialty
 *
 * Rates are not part of the summary record, so they are looked up by
 * specialty name in the configs the report was built from.
 */
export function toExecutiveCsv(summary: readonly SummaryRecord[], configs: readonly SpecialtyConfig[]): string {
    const configsByName = new Map<string, SpecialtyConfig>();
    for (const config of configs) {
        if (!configsByName.has(config.name)) {
            configsByName.set(config.name, config);
        }
    }

    const rows = summary.map(record => {
        const config = configsByName.get(record.specialty);
        return [
            record.specialty,
            formatRate(config?.doctorRate),
            formatRate(config?.nonDoctorRate),
            record.initialBacklog,
            record.finalBacklog,
            formatSigned(record.backlogChange),
            record.timeToClear,
            record.initialWait,
            record.finalWait,
            formatSigned(record.waitChange),
            roundHalfAwayFromZero(record.dailyCapacity),
            record.dailyArrivals,
            formatSigned(record.netDaily),
            formatStatus(record.status)
        ];
    });

    return stringify([[...EXECUTIVE_COLUMNS], ...rows]);
}

/**
 * Per-day trajectory table, in report order
 */
export function toDetailCsv(detail: readonly DailyRecord[]): string {
    const rows = detail.map(record => [
        record.specialty,
        record.day,
        record.backlog,
        record.wait,
        record.patientsTreated
    ]);

    return stringify([[...DETAIL_COLUMNS], ...rows]);
}

export function executiveFileName(horizonDays: number): string {
    return `hospital_executive_summary_${horizonDays}days.csv`;
}

export function detailFileName(horizonDays: number): string {
    return `hospital_detailed_simulation_${horizonDays}days.csv`;
}
