import { describe, it, expect } from 'vitest';
import { buildHospitalOverview } from '../src/engine/hospitalOverview';
import { projectSummary } from '../src/engine/summaryProjector';
import { SpecialtyStatus } from '../src/models/Report';
import { balanced, dermatology, icu, unstaffedRates } from './fixtures';

describe('buildHospitalOverview', () => {
    // Changes: +1800, -870, 0, +900
    const summary = [dermatology, icu, balanced, unstaffedRates].map(config => projectSummary(config, 180));
    const overview = buildHospitalOverview(summary);

    it('counts statuses', () => {
        expect(overview.specialtyCount).toBe(4);
        expect(overview.criticalCount).toBe(2);
        expect(overview.statusCounts).toEqual({
            [SpecialtyStatus.EXCELLENT]: 1,
            [SpecialtyStatus.IMPROVING]: 0,
            [SpecialtyStatus.CRITICAL]: 2,
            [SpecialtyStatus.ALERT]: 1
        });
    });

    it('counts specialties that can never clear their backlog', () => {
        expect(overview.unsustainableCount).toBe(3);
    });

    it('sums backlog change and daily flows', () => {
        expect(overview.totalBacklogChange).toBe(1830);
        expect(overview.totalDailyCapacity).toBe(317);
        expect(overview.totalDailyArrivals).toBe(327);
        expect(overview.hospitalNetDaily).toBe(10);
    });

    it('averages only finite utilisation', () => {
        // (108 + 97 + 100) / 3 = 101.67; zero-capacity specialty left out
        expect(overview.averageUtilisation).toBe(102);
    });

    it('ranks specialties by backlog change', () => {
        expect(overview.mostDeteriorating.map(item => item.specialty)).toEqual([
            'Dermatology', 'Unstaffed', 'Balanced Clinic', 'ICU'
        ]);
        expect(overview.mostImproved.map(item => item.specialty)).toEqual([
            'ICU', 'Balanced Clinic', 'Unstaffed', 'Dermatology'
        ]);
    });

    it('lists critical and excellent specialties for follow-up', () => {
        expect(overview.interventionRequired.map(item => item.specialty)).toEqual(['Dermatology', 'Unstaffed']);
        expect(overview.highPerforming).toEqual([
            { specialty: 'ICU', backlogChange: -870, waitChange: -2, status: SpecialtyStatus.EXCELLENT }
        ]);
    });

    it('keeps only the top ten in each ranking, ties in summary order', () => {
        const many = Array.from({ length: 12 }, (_, i) => projectSummary({ ...icu, name: `Unit ${i + 1}` }, 30));
        const ranked = buildHospitalOverview(many);

        expect(ranked.mostDeteriorating).toHaveLength(10);
        expect(ranked.mostDeteriorating[0].specialty).toBe('Unit 1');
        expect(ranked.mostImproved[9].specialty).toBe('Unit 10');
    });

    it('handles an empty summary', () => {
        const empty = buildHospitalOverview([]);

        expect(empty.specialtyCount).toBe(0);
        expect(empty.averageUtilisation).toBeNull();
        expect(empty.totalBacklogChange).toBe(0);
        expect(empty.mostDeteriorating).toEqual([]);
    });

    it('has no average when every specialty has zero capacity', () => {
        expect(buildHospitalOverview([projectSummary(unstaffedRates, 30)]).averageUtilisation).toBeNull();
    });
});
