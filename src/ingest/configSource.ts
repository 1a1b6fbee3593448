// src/ingest/configSource.ts

import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { getDefaultConfigs } from '../data/specialtyRegistry';
import { CapacityPlannerError } from '../errors';
import { logger } from '../utils/logger';
import { loadSpecialtyCsvFile, parseSpecialtyCsv } from './csvConfigLoader';

export enum ConfigSource {
    UPLOAD = 'upload',     // Manually uploaded parameter file
    CSV = 'csv',           // Parameter file found on disk
    DEFAULT = 'default'    // Bundled seed table
}

export interface ActiveConfiguration {
    source: ConfigSource;
    label: string;
    configs: SpecialtyConfig[];
    loadedAt: Date;
    warnings: string[];
}

/**
 * Decides which specialty table feeds a simulation
 *
 * Priority: uploaded file > parameter file on disk > bundled defaults.
 * The disk file is re-read on every lookup so edits are picked up
 * without a restart. A broken disk file falls back to the defaults.
 */
export class ConfigSourceManager {
    private uploaded: ActiveConfiguration | null;
    private csvPath: string;

    constructor(csvPath: string) {
        this.csvPath = csvPath;
        this.uploaded = null;
    }

    getActive(): ActiveConfiguration {
        if (this.uploaded) {
            return this.uploaded;
        }

        return this.loadFromDisk() ?? {
            source: ConfigSource.DEFAULT,
            label: 'Default Configuration',
            configs: getDefaultConfigs(),
            loadedAt: new Date(),
            warnings: []
        };
    }

    /**
     * Make an uploaded parameter file the active configuration
     *
     * Throws CsvFormatError and keeps the previous configuration when
     * the file cannot be parsed.
     */
    setUploaded(fileBuffer: Buffer, filename: string): ActiveConfiguration {
        const result = parseSpecialtyCsv(fileBuffer);

        this.uploaded = {
            source: ConfigSource.UPLOAD,
            label: `Manual Upload: ${filename}`,
            configs: result.configs,
            loadedAt: new Date(),
            warnings: result.warnings
        };

        logger.info(`Loaded ${result.configs.length} specialties from upload ${filename}`);
        return this.uploaded;
    }

    clearUploaded(): boolean {
        const hadUpload = this.uploaded !== null;
        this.uploaded = null;
        return hadUpload;
    }

    private loadFromDisk(): ActiveConfiguration | null {
        try {
            const file = loadSpecialtyCsvFile(this.csvPath);
            if (!file) {
                return null;
            }

            return {
                source: ConfigSource.CSV,
                label: `CSV File: ${file.path} (modified ${file.lastModified.toISOString()})`,
                configs: file.configs,
                loadedAt: new Date(),
                warnings: file.warnings
            };
        } catch (err) {
            if (err instanceof CapacityPlannerError) {
                logger.warn(`Ignoring ${this.csvPath}: ${err.message}`);
                return null;
            }
            throw err;
        }
    }
}
