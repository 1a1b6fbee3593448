// src/errors.ts

import { RejectedConfig } from './models/Report';

/**
 * Base class for failures the HTTP layer maps to a status and code
 */
export class CapacityPlannerError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: unknown;

    constructor(message: string, code: string, status: number, details?: unknown) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
        this.details = details;
    }
}

/**
 * One or more specialty configs violate a range or uniqueness constraint
 *
 * Raised only when the caller asks for the whole request to abort;
 * otherwise rejected configs are reported alongside the results.
 */
export class InvalidConfigError extends CapacityPlannerError {
    readonly rejected: RejectedConfig[];

    constructor(rejected: RejectedConfig[]) {
        super(
            `${rejected.length} specialty configuration(s) failed validation`,
            'INVALID_CONFIG',
            422,
            rejected
        );
        this.rejected = rejected;
    }
}

/**
 * The request envelope itself is malformed (e.g. fractional horizon)
 */
export class InvalidRequestError extends CapacityPlannerError {
    constructor(message: string, details?: unknown) {
        super(message, 'INVALID_REQUEST', 400, details);
    }
}

/**
 * Uploaded or on-disk parameter file cannot be turned into configs
 */
export class CsvFormatError extends CapacityPlannerError {
    constructor(message: string, details?: unknown) {
        super(message, 'INVALID_CSV', 400, details);
    }
}
