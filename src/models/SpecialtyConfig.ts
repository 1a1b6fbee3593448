// src/models/SpecialtyConfig.ts

/**
 * Staffing and demand parameters for one hospital specialty
 *
 * Data only, no methods. Range checks handled by engine/configValidator.
 *
 * Invariant: name is unique within a simulation request
 * Invariant: doctors >= 1, nonDoctors >= 1, dailyArrivals >= 1 (integers)
 * Invariant: doctorRate >= 0, nonDoctorRate >= 0
 */
export interface SpecialtyConfig {
    name: string;
    doctors: number;
    nonDoctors: number;
    doctorRate: number;         // Patients treatable per doctor per day
    nonDoctorRate: number;      // Patients treatable per non-doctor staff member per day
    initialBacklog: number;     // Patients currently waiting
    initialWait: number;        // Current median wait, in weeks
    dailyArrivals: number;      // New patients per day
}

/**
 * One projection run: an ordered set of specialties over a horizon
 *
 * Configs are typed but not yet range-checked; the report assembler
 * validates each one before any projection work starts.
 */
export interface SimulationRequest {
    configs: readonly SpecialtyConfig[];
    horizonDays: number;
}
