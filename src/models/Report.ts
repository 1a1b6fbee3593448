// src/models/Report.ts

/**
 * Projected trend of a specialty's backlog
 *
 * Declaration order is the severity reading order used in reports
 */
export enum SpecialtyStatus {
    EXCELLENT = 'Excellent',   // Backlog more than halved
    IMPROVING = 'Improving',   // Backlog shrinking
    CRITICAL = 'Critical',     // Backlog grows past 150%
    ALERT = 'Alert'            // Flat or moderate growth
}

/**
 * Whether the current net daily flow can ever clear the backlog
 */
export enum Clearance {
    CLEARABLE = 'CLEARABLE',
    UNSUSTAINABLE = 'UNSUSTAINABLE',     // Backlog waiting, never shrinks
    NOT_APPLICABLE = 'NOT_APPLICABLE'    // Nothing waiting
}

/**
 * Closed-form end-of-horizon projection for one specialty
 *
 * Integer display fields (finalBacklog, finalWait, changes, utilisation)
 * are rounded half away from zero. dailyCapacity and netDaily stay raw.
 * monthsToClear and utilisationPercent may be Infinity.
 */
export interface SummaryRecord {
    specialty: string;
    doctors: number;
    nonDoctors: number;
    dailyCapacity: number;
    dailyArrivals: number;
    netDaily: number;
    initialBacklog: number;
    finalBacklog: number;
    backlogChange: number;
    initialWait: number;
    finalWait: number;
    waitChange: number;
    clearance: Clearance;
    timeToClear: string;
    monthsToClear: number;
    utilisationPercent: number;
    status: SpecialtyStatus;
}

/**
 * State of one specialty at the end of one simulated day
 */
export interface DailyRecord {
    specialty: string;
    day: number;                // 1-based
    backlog: number;            // After treatment and arrivals
    wait: number;               // From the backlog before treatment
    patientsTreated: number;    // Never above daily capacity or pre-treatment backlog
}

/**
 * A config that failed boundary validation and was left out of the run
 */
export interface RejectedConfig {
    index: number;              // Position in the request
    name: string | null;
    issues: string[];
}

/**
 * Engine output: both tables in request order, plus what was rejected
 */
export interface SimulationReport {
    horizonDays: number;
    summary: SummaryRecord[];
    detail: DailyRecord[];
    rejected: RejectedConfig[];
}
