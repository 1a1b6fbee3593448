// src/data/specialtyRegistry.ts

import { z } from 'zod';
import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { specialtyConfigSchema } from '../engine/configValidator';
import defaultSpecialties from './defaultSpecialties.json';

/**
 * Bundled seed table used when no parameter file is available
 *
 * Validated once at load; a bad entry fails fast at startup.
 */
const DEFAULT_CONFIGS: readonly SpecialtyConfig[] = z.array(specialtyConfigSchema).parse(defaultSpecialties);

/**
 * Default specialty configs, in seed-file order
 *
 * @returns Fresh copies; callers may modify them freely
 */
export function getDefaultConfigs(): SpecialtyConfig[] {
    return DEFAULT_CONFIGS.map(config => ({ ...config }));
}

export function findDefaultConfig(name: string): SpecialtyConfig | null {
    const match = DEFAULT_CONFIGS.find(config => config.name === name);
    return match ? { ...match } : null;
}
