// src/simulation/runCapacitySimulation.ts

import { DailyRecord, SpecialtyStatus, SummaryRecord } from '../models/Report';
import { getDefaultConfigs } from '../data/specialtyRegistry';
import { assembleReport } from '../engine/reportAssembler';
import { buildHospitalOverview } from '../engine/hospitalOverview';
import { formatSigned, formatStatus } from '../export/reportCsv';
import { HORIZON_DEFAULT_DAYS } from '../config/settings';
import { logger } from '../utils/logger';

/**
 * Full capacity projection over the bundled specialty table
 *
 * Demonstrates:
 * - Closed-form summary per specialty
 * - Day-by-day trajectory and where it departs from the summary
 * - Hospital-wide overview and recommendation lists
 * - Trajectory invariants (non-negative backlog, treatment within capacity)
 */

// Logging helpers
function logSection(title: string): void {
    console.log('\n' + '='.repeat(80));
    console.log(title);
    console.log('='.repeat(80) + '\n');
}

function logSummaryRow(record: SummaryRecord): void {
    console.log(`  ${formatStatus(record.status)}  ${record.specialty}`);
    console.log(`    Backlog: ${record.initialBacklog} → ${record.finalBacklog} (${formatSigned(record.backlogChange)})`);
    console.log(`    Wait: ${record.initialWait}w → ${record.finalWait}w, Time to clear: ${record.timeToClear}`);
}

function logTrajectory(days: DailyRecord[], every: number): void {
    for (const record of days) {
        if (record.day === 1 || record.day % every === 0) {
            console.log(`    Day ${String(record.day).padStart(3)}: backlog ${record.backlog}, wait ${record.wait}, treated ${record.patientsTreated}`);
        }
    }
}

function runSimulation(horizonDays: number): void {
    logSection('SPECIALTY CAPACITY PROJECTION - START');

    const configs = getDefaultConfigs();
    logger.info(`Loaded ${configs.length} specialties, horizon ${horizonDays} days`);

    const report = assembleReport({ configs, horizonDays });
    const overview = buildHospitalOverview(report.summary);

    // ========== STEP 1: Summary per specialty ==========
    logSection('STEP 1: Closed-form Summary');
    report.summary.forEach(logSummaryRow);

    // ========== STEP 2: Hospital overview ==========
    logSection('STEP 2: Hospital Overview');
    logger.info(`Critical specialties: ${overview.criticalCount} of ${overview.specialtyCount}`);
    logger.info(`Unsustainable specialties: ${overview.unsustainableCount} of ${overview.specialtyCount}`);
    logger.info(`Total backlog change: ${formatSigned(overview.totalBacklogChange)}`);
    logger.info(`Average utilisation: ${overview.averageUtilisation ?? 'n/a'}%`);
    logger.info(`Hospital net daily: ${formatSigned(overview.hospitalNetDaily)} patients/day`);
    for (const status of Object.values(SpecialtyStatus)) {
        logger.info(`  ${formatStatus(status)}: ${overview.statusCounts[status]}`);
    }

    // ========== STEP 3: Recommendations ==========
    logSection('STEP 3: Recommendations');
    logger.info('Immediate intervention required:');
    overview.interventionRequired.forEach(item => {
        logger.info(`  • ${item.specialty}: ${formatSigned(item.backlogChange)} patients, ${formatSigned(item.waitChange)} weeks wait`);
    });
    logger.info('High-performing units:');
    overview.highPerforming.forEach(item => {
        logger.info(`  • ${item.specialty}: ${formatSigned(item.backlogChange)} patients, ${formatSigned(item.waitChange)} weeks wait`);
    });

    // ========== STEP 4: Trajectory of the worst specialty ==========
    const worst = overview.mostDeteriorating[0];
    if (worst) {
        logSection(`STEP 4: Daily Trajectory - ${worst.specialty}`);
        logTrajectory(report.detail.filter(record => record.specialty === worst.specialty), 30);
    }

    // ========== STEP 5: Closed form vs. daily model ==========
    logSection('STEP 5: Closed-form vs. Daily Final Backlog');
    for (const record of report.summary) {
        const days = report.detail.filter(day => day.specialty === record.specialty);
        const last = days[days.length - 1];
        if (last && last.backlog !== record.finalBacklog) {
            logger.info(`  ${record.specialty}: summary ${record.finalBacklog}, daily ${last.backlog}`);
        }
    }

    // ========== STEP 6: Invariants ==========
    logSection('STEP 6: Verifying Invariants');
    const capacityByName = new Map(report.summary.map(record => [record.specialty, record.dailyCapacity]));
    const negativeBacklog = report.detail.filter(day => day.backlog < 0).length;
    const overCapacity = report.detail.filter(day => day.patientsTreated > (capacityByName.get(day.specialty) ?? 0)).length;
    logger.info(`  ${negativeBacklog === 0 ? '✓' : '✗'} Backlog never negative (${negativeBacklog} violations)`);
    logger.info(`  ${overCapacity === 0 ? '✓' : '✗'} Treatment within capacity (${overCapacity} violations)`);

    logSection('SIMULATION COMPLETE');
}

// Run simulation
runSimulation(HORIZON_DEFAULT_DAYS);
