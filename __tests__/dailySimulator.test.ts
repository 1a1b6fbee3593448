import { describe, it, expect } from 'vitest';
import { simulateDays } from '../src/engine/dailySimulator';
import { projectSummary } from '../src/engine/summaryProjector';
import { dailyCapacity } from '../src/engine/capacity';
import { getDefaultConfigs } from '../src/data/specialtyRegistry';
import { SpecialtyConfig } from '../src/models/SpecialtyConfig';
import { dermatology, icu, unstaffedRates } from './fixtures';

describe('simulateDays', () => {
    it('emits one record per day, day ascending', () => {
        const days = simulateDays(dermatology, 180);

        expect(days).toHaveLength(180);
        expect(days.map(record => record.day)).toEqual(Array.from({ length: 180 }, (_, i) => i + 1));
        expect(days.every(record => record.specialty === 'Dermatology')).toBe(true);
    });

    it('treats, then adds arrivals, each day', () => {
        const [day1, day2] = simulateDays(dermatology, 2);

        expect(day1).toEqual({ specialty: 'Dermatology', day: 1, backlog: 1110, wait: 65, patientsTreated: 132 });
        // wait from 1110 before treatment: 65 * 1110 / 1100 = 65.59
        expect(day2).toEqual({ specialty: 'Dermatology', day: 2, backlog: 1120, wait: 66, patientsTreated: 132 });
    });

    it('matches the closed form while the backlog never runs out', () => {
        const days = simulateDays(dermatology, 180);

        expect(days[179].backlog).toBe(2900);
        expect(projectSummary(dermatology, 180).finalBacklog).toBe(2900);
    });

    describe('when capacity outruns the backlog', () => {
        const days = simulateDays(icu, 180);

        it('shrinks by the net flow until the backlog drops below capacity', () => {
            expect(days[0]).toEqual({ specialty: 'ICU', day: 1, backlog: 865, wait: 2, patientsTreated: 160 });
            expect(days[142]).toEqual({ specialty: 'ICU', day: 143, backlog: 155, wait: 0, patientsTreated: 160 });
        });

        it('then treats only what is waiting', () => {
            expect(days[143]).toEqual({ specialty: 'ICU', day: 144, backlog: 155, wait: 0, patientsTreated: 155 });
            expect(days[179].backlog).toBe(155);
        });

        it('ends above the closed-form projection', () => {
            expect(projectSummary(icu, 180).finalBacklog).toBe(0);
            expect(days[179].backlog).toBe(155);
        });
    });

    describe('starting from an empty backlog', () => {
        const startsEmpty: SpecialtyConfig = {
            name: 'New Clinic',
            doctors: 1,
            nonDoctors: 1,
            doctorRate: 10,
            nonDoctorRate: 10,
            initialBacklog: 0,
            initialWait: 0,
            dailyArrivals: 30
        };

        it('reports no wait and no treatment on the first day', () => {
            const [day1] = simulateDays(startsEmpty, 1);

            expect(day1).toEqual({ specialty: 'New Clinic', day: 1, backlog: 30, wait: 0, patientsTreated: 0 });
        });

        it('estimates the wait as backlog over daily capacity, in days', () => {
            const days = simulateDays(startsEmpty, 3);

            // 30 / 20 = 1.5, then 40 / 20 = 2
            expect(days[1]).toEqual({ specialty: 'New Clinic', day: 2, backlog: 40, wait: 2, patientsTreated: 20 });
            expect(days[2]).toEqual({ specialty: 'New Clinic', day: 3, backlog: 50, wait: 2, patientsTreated: 20 });
        });
    });

    describe('zero capacity', () => {
        it('reports zero wait instead of dividing by zero', () => {
            const days = simulateDays({ ...unstaffedRates, initialBacklog: 0, initialWait: 0 }, 3);

            expect(days.map(record => record.backlog)).toEqual([5, 10, 15]);
            expect(days.map(record => record.wait)).toEqual([0, 0, 0]);
            expect(days.map(record => record.patientsTreated)).toEqual([0, 0, 0]);
        });

        it('keeps scaling the wait from a non-empty start', () => {
            const days = simulateDays({ ...unstaffedRates, initialBacklog: 100, initialWait: 8, dailyArrivals: 4 }, 2);

            // 8 * 104 / 100 = 8.32
            expect(days.map(record => record.backlog)).toEqual([104, 108]);
            expect(days.map(record => record.wait)).toEqual([8, 8]);
        });
    });

    it('keeps fractional treatment and rounds the backlog', () => {
        const fractional: SpecialtyConfig = {
            name: 'Fractional',
            doctors: 1,
            nonDoctors: 1,
            doctorRate: 1.5,
            nonDoctorRate: 0,
            initialBacklog: 10,
            initialWait: 4,
            dailyArrivals: 1
        };

        const days = simulateDays(fractional, 2);

        // 10 - 1.5 + 1 = 9.5, then 9.5 - 1.5 + 1 = 9
        expect(days.map(record => record.patientsTreated)).toEqual([1.5, 1.5]);
        expect(days.map(record => record.backlog)).toEqual([10, 9]);
    });

    it('returns an empty trajectory for a zero or negative horizon', () => {
        expect(simulateDays(icu, 0)).toEqual([]);
        expect(simulateDays(icu, -5)).toEqual([]);
    });

    it('keeps backlog non-negative and treatment within limits for every default specialty', () => {
        for (const config of getDefaultConfigs()) {
            const capacity = dailyCapacity(config);
            let backlogBefore = config.initialBacklog;

            for (const record of simulateDays(config, 365)) {
                expect(record.backlog).toBeGreaterThanOrEqual(0);
                expect(record.wait).toBeGreaterThanOrEqual(0);
                expect(record.patientsTreated).toBeLessThanOrEqual(capacity);
                expect(record.patientsTreated).toBeLessThanOrEqual(backlogBefore);
                backlogBefore = record.backlog;
            }
        }
    });

    it('returns identical output for identical input', () => {
        expect(simulateDays(dermatology, 30)).toStrictEqual(simulateDays(dermatology, 30));
    });
});
