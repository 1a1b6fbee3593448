// src/ingest/columnAliases.ts

import { SpecialtyConfig } from '../models/SpecialtyConfig';

export type ConfigField = keyof SpecialtyConfig;

/**
 * Accepted CSV headers for each config field, in preference order
 *
 * Header matching is exact (case included); the first listed header
 * present in the file wins.
 */
export const COLUMN_ALIASES: Readonly<Record<ConfigField, readonly string[]>> = {
    name: ['Specialty', 'specialty', 'SPECIALTY'],
    doctors: ['Doctors', 'doctors', 'DOCTORS'],
    nonDoctors: ['Non_Doctors', 'non_doctors', 'NON_DOCTORS', 'Staff'],
    doctorRate: ['Doctor_Rate', 'doctor_rate', 'DOCTOR_RATE'],
    nonDoctorRate: ['Non_Doctor_Rate', 'non_doctor_rate', 'NON_DOCTOR_RATE', 'Staff_Rate'],
    initialBacklog: ['Initial_Backlog', 'initial_backlog', 'INITIAL_BACKLOG', 'Backlog'],
    initialWait: ['Initial_Wait', 'initial_wait', 'INITIAL_WAIT'],
    dailyArrivals: ['Daily_Arrivals', 'daily_arrivals', 'DAILY_ARRIVALS', 'Arrivals']
};

export const CONFIG_FIELDS: readonly ConfigField[] = [
    'name',
    'doctors',
    'nonDoctors',
    'doctorRate',
    'nonDoctorRate',
    'initialBacklog',
    'initialWait',
    'dailyArrivals'
];

export type ColumnResolution =
    | { ok: true; columns: Record<ConfigField, number> }
    | { ok: false; missing: ConfigField[] };

/**
 * Map each config field to a column index in the given header row
 */
export function resolveColumns(header: readonly string[]): ColumnResolution {
    const found = new Map<ConfigField, number>();
    const missing: ConfigField[] = [];

    for (const field of CONFIG_FIELDS) {
        const alias = COLUMN_ALIASES[field].find(candidate => header.includes(candidate));
        if (alias === undefined) {
            missing.push(field);
        } else {
            found.set(field, header.indexOf(alias));
        }
    }

    if (missing.length > 0) {
        return { ok: false, missing };
    }

    const columnOf = (field: ConfigField): number => found.get(field) ?? -1;
    return {
        ok: true,
        columns: {
            name: columnOf('name'),
            doctors: columnOf('doctors'),
            nonDoctors: columnOf('nonDoctors'),
            doctorRate: columnOf('doctorRate'),
            nonDoctorRate: columnOf('nonDoctorRate'),
            initialBacklog: columnOf('initialBacklog'),
            initialWait: columnOf('initialWait'),
            dailyArrivals: columnOf('dailyArrivals')
        }
    };
}
