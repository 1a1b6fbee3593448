// src/engine/statusClassifier.ts

import { SpecialtyStatus } from '../models/Report';

const EXCELLENT_RATIO = 0.5;
const CRITICAL_RATIO = 1.5;

/**
 * Classify a specialty's projected backlog trend
 *
 * Pure, total function. Rules are evaluated in order and the first match
 * wins; the ranges touch at their boundaries so the order matters:
 * 1. final < 0.5 x initial  -> EXCELLENT
 * 2. final < initial        -> IMPROVING
 * 3. final > 1.5 x initial  -> CRITICAL
 * 4. anything else          -> ALERT
 *
 * With an initial backlog of 0, a final backlog of 0 falls through to ALERT.
 */
export function classifyStatus(finalBacklog: number, initialBacklog: number): SpecialtyStatus {
    if (finalBacklog < initialBacklog * EXCELLENT_RATIO) {
        return SpecialtyStatus.EXCELLENT;
    }
    if (finalBacklog < initialBacklog) {
        return SpecialtyStatus.IMPROVING;
    }
    if (finalBacklog > initialBacklog * CRITICAL_RATIO) {
        return SpecialtyStatus.CRITICAL;
    }
    return SpecialtyStatus.ALERT;
}
