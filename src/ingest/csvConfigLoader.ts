// src/ingest/csvConfigLoader.ts

import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { SpecialtyConfig } from '../models/SpecialtyConfig';
import { CsvFormatError } from '../errors';
import { ConfigField, resolveColumns } from './columnAliases';

type NumericField = Exclude<ConfigField, 'name'>;

// Staff counts, backlog, wait and arrivals are whole numbers; fractions are truncated
const INTEGER_FIELDS: ReadonlySet<NumericField> = new Set<NumericField>([
    'doctors',
    'nonDoctors',
    'initialBacklog',
    'initialWait',
    'dailyArrivals'
]);

const csvRowsSchema = z.array(z.array(z.string()));

export interface CsvConfigResult {
    configs: SpecialtyConfig[];
    warnings: string[];
}

export interface CsvConfigFile extends CsvConfigResult {
    path: string;
    lastModified: Date;
}

function readRows(input: Buffer | string): string[][] {
    let raw: unknown;
    try {
        raw = parse(input, {
            bom: true,
            skip_empty_lines: true,
            trim: true,
            relax_column_count: true
        });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new CsvFormatError(`Error reading CSV: ${message}`);
    }
    return csvRowsSchema.parse(raw);
}

function readNumber(cell: string | undefined, integer: boolean): number | null {
    if (cell === undefined || cell === '') {
        return null;
    }
    const value = Number(cell);
    if (!Number.isFinite(value)) {
        return null;
    }
    return integer ? Math.trunc(value) : value;
}

/**
 * Build one config from a data row
 *
 * @returns The config, or the list of unparsable cells
 */
function parseRow(
    row: readonly string[],
    columns: Record<ConfigField, number>,
    name: string
): SpecialtyConfig | string[] {
    const invalid: string[] = [];

    const read = (field: NumericField): number => {
        const cell = row[columns[field]];
        const value = readNumber(cell, INTEGER_FIELDS.has(field));
        if (value === null) {
            invalid.push(`${field}="${cell ?? ''}"`);
            return 0;
        }
        return value;
    };

    const config: SpecialtyConfig = {
        name,
        doctors: read('doctors'),
        nonDoctors: read('nonDoctors'),
        doctorRate: read('doctorRate'),
        nonDoctorRate: read('nonDoctorRate'),
        initialBacklog: read('initialBacklog'),
        initialWait: read('initialWait'),
        dailyArrivals: read('dailyArrivals')
    };

    return invalid.length > 0 ? invalid : config;
}

/**
 * Parse a specialty parameter table
 *
 * Headers go through the alias table; every field needs a column.
 * Rows without a specialty name are ignored, rows with unparsable numbers
 * are skipped with a warning. A repeated specialty keeps its first
 * position and takes the later row's values.
 *
 * Values are not range-checked here; the engine does that per record.
 */
export function parseSpecialtyCsv(input: Buffer | string): CsvConfigResult {
    const rows = readRows(input);
    if (rows.length === 0) {
        throw new CsvFormatError('CSV is empty');
    }

    const [header, ...body] = rows;
    const resolution = resolveColumns(header);
    if (!resolution.ok) {
        throw new CsvFormatError(`Missing columns: ${resolution.missing.join(', ')}`, {
            missing: resolution.missing
        });
    }

    const { columns } = resolution;
    const byName = new Map<string, SpecialtyConfig>();
    const warnings: string[] = [];

    body.forEach((row, i) => {
        const rowNumber = i + 1;
        const name = (row[columns.name] ?? '').trim();
        if (name === '' || name.toLowerCase() === 'nan') {
            return;
        }

        const parsed = parseRow(row, columns, name);
        if (Array.isArray(parsed)) {
            warnings.push(`Row ${rowNumber} (${name}) skipped: not a number: ${parsed.join(', ')}`);
            return;
        }

        if (byName.has(name)) {
            warnings.push(`Row ${rowNumber} (${name}) replaces an earlier row with the same specialty`);
        }
        byName.set(name, parsed);
    });

    if (byName.size === 0) {
        throw new CsvFormatError('No valid data found', { warnings });
    }

    return { configs: [...byName.values()], warnings };
}

/**
 * Read and parse a parameter file from disk
 *
 * @returns null when the file does not exist
 */
export function loadSpecialtyCsvFile(path: string): CsvConfigFile | null {
    if (!fs.existsSync(path)) {
        return null;
    }

    const stat = fs.statSync(path);
    const result = parseSpecialtyCsv(fs.readFileSync(path));

    return { ...result, path, lastModified: stat.mtime };
}
