import { describe, it, expect } from 'vitest';
import {
    detailFileName,
    executiveFileName,
    formatSigned,
    formatStatus,
    toDetailCsv,
    toExecutiveCsv
} from '../src/export/reportCsv';
import { projectSummary } from '../src/engine/summaryProjector';
import { assembleReport } from '../src/engine/reportAssembler';
import { simulateDays } from '../src/engine/dailySimulator';
import { SpecialtyStatus } from '../src/models/Report';
import { dermatology, icu } from './fixtures';

const EXECUTIVE_HEADER = 'Specialty,Doctor Rate,Non-Doctor Rate,Initial Backlog,Final Backlog,Backlog Change,Time to Clear,Initial Wait (weeks),Final Wait (weeks),Wait Change (weeks),Daily Capacity,Daily Arrivals,Net Daily Change,System Status';

describe('formatSigned', () => {
    it('always shows a sign', () => {
        expect(formatSigned(1800)).toBe('+1800');
        expect(formatSigned(-870)).toBe('-870');
        expect(formatSigned(0)).toBe('+0');
    });

    it('rounds to a whole number first', () => {
        expect(formatSigned(2.5)).toBe('+3');
        expect(formatSigned(-2.5)).toBe('-3');
        expect(formatSigned(-0.2)).toBe('+0');
    });
});

describe('formatStatus', () => {
    it('prefixes each status with its glyph', () => {
        expect(formatStatus(SpecialtyStatus.EXCELLENT)).toBe('🟢 Excellent');
        expect(formatStatus(SpecialtyStatus.IMPROVING)).toBe('🟡 Improving');
        expect(formatStatus(SpecialtyStatus.CRITICAL)).toBe('🔴 Critical');
        expect(formatStatus(SpecialtyStatus.ALERT)).toBe('🟠 Alert');
    });
});

describe('toExecutiveCsv', () => {
    it('writes one formatted row per specialty', () => {
        const summary = [dermatology, icu].map(config => projectSummary(config, 180));

        expect(toExecutiveCsv(summary, [dermatology, icu])).toBe([
            EXECUTIVE_HEADER,
            'Dermatology,18/day,12/day,1100,2900,+1800,∞ (Impossible),65,171,+106,132,142,+10,🔴 Critical',
            'ICU,8/day,4/day,870,0,-870,6 months,2,0,-2,160,155,-5,🟢 Excellent',
            ''
        ].join('\n'));
    });

    it('quotes specialty names containing commas', () => {
        const config = { ...icu, name: 'Ear, Nose & Throat' };
        const csv = toExecutiveCsv([projectSummary(config, 180)], [config]);

        expect(csv.split('\n')[1]).toBe('"Ear, Nose & Throat",8/day,4/day,870,0,-870,6 months,2,0,-2,160,155,-5,🟢 Excellent');
    });

    it('leaves rates blank when the config is not supplied', () => {
        const csv = toExecutiveCsv([projectSummary(icu, 180)], []);

        expect(csv.split('\n')[1]).toBe('ICU,,,870,0,-870,6 months,2,0,-2,160,155,-5,🟢 Excellent');
    });

    it('writes only the header for an empty summary', () => {
        expect(toExecutiveCsv([], [])).toBe(`${EXECUTIVE_HEADER}\n`);
    });
});

describe('toDetailCsv', () => {
    it('writes one row per specialty per day', () => {
        expect(toDetailCsv(simulateDays(dermatology, 2))).toBe([
            'Specialty,Day,Backlog,Wait Time (weeks),Patients Treated',
            'Dermatology,1,1110,65,132',
            'Dermatology,2,1120,66,132',
            ''
        ].join('\n'));
    });
});

describe('export file names', () => {
    it('include the horizon', () => {
        expect(executiveFileName(180)).toBe('hospital_executive_summary_180days.csv');
        expect(detailFileName(90)).toBe('hospital_detailed_simulation_90days.csv');
    });
});

describe('toExecutiveCsv with an assembled report', () => {
    it('finds the rates of a specialty whose name carries padding', () => {
        const configs = [{ ...icu, name: 'ICU ' }];
        const report = assembleReport({ configs, horizonDays: 30 });

        const row = toExecutiveCsv(report.summary, configs).split('\n')[1].split(',');

        expect(row.slice(1, 6)).toEqual(['8/day', '4/day', '870', '720', '-150']);
    });
});
