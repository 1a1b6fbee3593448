// src/engine/configValidator.ts

import { z } from 'zod';
import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { RejectedConfig } from '../models/Report';
import { InvalidConfigError } from '../errors';

/**
 * Structural shape of a config: right fields, right types, no ranges
 *
 * Used by the HTTP layer so that range failures surface per record
 * from the engine instead of failing the whole request.
 */
export const specialtyConfigShape = z.object({
    name: z.string(),
    doctors: z.number(),
    nonDoctors: z.number(),
    doctorRate: z.number(),
    nonDoctorRate: z.number(),
    initialBacklog: z.number(),
    initialWait: z.number(),
    dailyArrivals: z.number()
});

/**
 * Full range constraints for a specialty config
 */
export const specialtyConfigSchema = z.object({
    // Name is the join key across tables; checked, never rewritten
    name: z.string().refine(name => name.trim().length > 0, 'Specialty name is required'),
    doctors: z.number().int().min(1),
    nonDoctors: z.number().int().min(1),
    doctorRate: z.number().finite().min(0),
    nonDoctorRate: z.number().finite().min(0),
    initialBacklog: z.number().int().min(0),
    initialWait: z.number().int().min(0),
    dailyArrivals: z.number().int().min(1)
});

export interface ValidationOutcome {
    accepted: SpecialtyConfig[];
    rejected: RejectedConfig[];
}

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

function readName(candidate: unknown): string | null {
    if (typeof candidate === 'object' && candidate !== null && 'name' in candidate) {
        const { name } = candidate;
        return typeof name === 'string' ? name : null;
    }
    return null;
}

/**
 * Split configs into valid ones and per-record rejections
 *
 * Pure function. Order of accepted configs follows the input order.
 * The first config with a given name wins; later duplicates are rejected.
 */
export function validateConfigs(configs: readonly unknown[]): ValidationOutcome {
    const accepted: SpecialtyConfig[] = [];
    const rejected: RejectedConfig[] = [];
    const seenNames = new Set<string>();

    configs.forEach((candidate, index) => {
        const result = specialtyConfigSchema.safeParse(candidate);

        if (!result.success) {
            rejected.push({ index, name: readName(candidate), issues: formatIssues(result.error) });
            return;
        }

        const config = result.data;
        if (seenNames.has(config.name)) {
            rejected.push({
                index,
                name: config.name,
                issues: [`name: Duplicate specialty name "${config.name}"`]
            });
            return;
        }

        seenNames.add(config.name);
        accepted.push(config);
    });

    return { accepted, rejected };
}

/**
 * Validate a single config, throwing InvalidConfigError on any violation
 */
export function assertValidConfig(candidate: unknown): SpecialtyConfig {
    const result = specialtyConfigSchema.safeParse(candidate);
    if (!result.success) {
        throw new InvalidConfigError([
            { index: 0, name: readName(candidate), issues: formatIssues(result.error) }
        ]);
    }
    return result.data;
}
