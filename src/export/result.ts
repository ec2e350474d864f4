import type { SchemaValidator } from '../contracts/schema-validator.js';
import { ALL_LEVELS, levelCounts, levelFromInt, levelLabel } from '../scoring/level.js';
import type { Level } from '../scoring/level.js';
import type { EvaluateResult } from '../scoring/engine.js';
import { createVitals } from '../vitals/model.js';
import type { Vitals } from '../vitals/types.js';

/** One scored observation, with the wire names used in JSON and CSV. */
export interface TriageRecord {
    hr: number;
    rr: number;
    sbp: number;
    dbp: number;
    temp: number;
    spo2: number;
    gcs: number;
    resource_count: number;
    acuity: number;
    level: Level;
    level_label: string;
    timestamp?: string;
    id?: string;
}

export interface RecordMeta {
    timestamp?: Date | string;
    id?: string;
}

export function toTriageRecord(
    v: Vitals,
    resourceCount: number,
    evaluation: EvaluateResult,
    meta: RecordMeta = {},
): TriageRecord {
    const record: TriageRecord = {
        hr: v.hr,
        rr: v.rr,
        sbp: v.sbp,
        dbp: v.dbp,
        temp: v.temp,
        spo2: v.spo2,
        gcs: v.gcs,
        resource_count: resourceCount,
        acuity: evaluation.acuity,
        level: evaluation.level,
        level_label: levelLabel(evaluation.level),
    };
    if (meta.timestamp !== undefined) {
        record.timestamp = meta.timestamp instanceof Date ? meta.timestamp.toISOString() : meta.timestamp;
    }
    if (meta.id !== undefined) {
        record.id = meta.id;
    }
    return record;
}

export function recordToJson(record: TriageRecord): string {
    return JSON.stringify(record);
}

export const CSV_HEADER = [
    'hr',
    'rr',
    'sbp',
    'dbp',
    'temp',
    'spo2',
    'gcs',
    'resource_count',
    'acuity',
    'level',
    'level_label',
    'timestamp',
    'id',
] as const;

function csvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function csvLine(fields: readonly string[]): string {
    return fields.map(csvField).join(',');
}

export function recordToCsvRow(record: TriageRecord): string {
    return csvLine([
        String(record.hr),
        String(record.rr),
        String(record.sbp),
        String(record.dbp),
        String(record.temp),
        String(record.spo2),
        String(record.gcs),
        String(record.resource_count),
        String(record.acuity),
        String(record.level),
        record.level_label,
        record.timestamp ?? '',
        record.id ?? '',
    ]);
}

/** Header plus one row per record, each line terminated by `\n`. */
export function recordsToCsv(records: readonly TriageRecord[]): string {
    const lines = [csvLine(CSV_HEADER), ...records.map(recordToCsvRow)];
    return lines.map((line) => `${line}\n`).join('');
}

export interface TriageBatch {
    results: TriageRecord[];
    generated: string;
    source?: string;
}

export function createBatch(results: TriageRecord[], source?: string, generated: Date = new Date()): TriageBatch {
    const batch: TriageBatch = { results, generated: generated.toISOString() };
    if (source !== undefined) {
        batch.source = source;
    }
    return batch;
}

export function batchToJson(batch: TriageBatch): string {
    return JSON.stringify(batch, null, 2);
}

export interface LevelReportRow {
    level: Level;
    level_label: string;
    count: number;
    pct: number;
    mean_acuity: number;
    min_acuity: number;
    max_acuity: number;
}

/** One row per level 1..5; empty levels report zeros. */
export function levelReport(records: readonly TriageRecord[]): LevelReportRow[] {
    const total = records.length;
    return ALL_LEVELS.map((level) => {
        const scores = records.filter((r) => r.level === level).map((r) => r.acuity);
        const count = scores.length;
        return {
            level,
            level_label: levelLabel(level),
            count,
            pct: total > 0 ? (count / total) * 100 : 0,
            mean_acuity: count > 0 ? scores.reduce((a, b) => a + b, 0) / count : 0,
            min_acuity: count > 0 ? scores.reduce((a, b) => (b < a ? b : a), scores[0]) : 0,
            max_acuity: count > 0 ? scores.reduce((a, b) => (b > a ? b : a), scores[0]) : 0,
        };
    });
}

export const LEVEL_REPORT_HEADER = [
    'level',
    'level_label',
    'count',
    'pct',
    'mean_acuity',
    'min_acuity',
    'max_acuity',
] as const;

export function levelReportToCsv(records: readonly TriageRecord[]): string {
    const rows = levelReport(records).map((row) =>
        csvLine([
            String(row.level),
            row.level_label,
            String(row.count),
            row.pct.toFixed(2),
            row.mean_acuity.toFixed(4),
            row.min_acuity.toFixed(4),
            row.max_acuity.toFixed(4),
        ]),
    );
    return [csvLine(LEVEL_REPORT_HEADER), ...rows].map((line) => `${line}\n`).join('');
}

export interface BatchSummary {
    n: number;
    mean_acuity: number;
    min_acuity: number;
    max_acuity: number;
    level_dist: Record<Level, number>;
}

export function computeSummary(records: readonly TriageRecord[]): BatchSummary {
    const level_dist = levelCounts(records.map((r) => r.level));
    if (records.length === 0) {
        return { n: 0, mean_acuity: 0, min_acuity: 0, max_acuity: 0, level_dist };
    }
    const scores = records.map((r) => r.acuity);
    return {
        n: records.length,
        mean_acuity: scores.reduce((a, b) => a + b, 0) / scores.length,
        min_acuity: scores.reduce((a, b) => (b < a ? b : a), scores[0]),
        max_acuity: scores.reduce((a, b) => (b > a ? b : a), scores[0]),
        level_dist,
    };
}

export function recordToVitals(record: TriageRecord): Vitals {
    return createVitals({
        hr: record.hr,
        rr: record.rr,
        sbp: record.sbp,
        dbp: record.dbp,
        temp: record.temp,
        spo2: record.spo2,
        gcs: record.gcs,
    });
}

function numberField(data: Record<string, unknown>, key: string): number {
    const value = data[key];
    return typeof value === 'number' ? value : 0;
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
    const value = data[key];
    return typeof value === 'string' ? value : undefined;
}

function isRecordObject(data: unknown): data is Record<string, unknown> {
    return typeof data === 'object' && data !== null && !Array.isArray(data);
}

/**
 * Parses one exported record and checks it against the triage-result contract.
 * Throws on malformed JSON or a contract violation.
 */
export function parseTriageRecord(text: string, validator: SchemaValidator): TriageRecord {
    let data: unknown;
    try {
        data = JSON.parse(text);
    } catch (err) {
        throw new Error(`Triage record is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = validator.validateTriageResult(data);
    if (!result.valid || !isRecordObject(data)) {
        throw new Error(`Triage record failed validation: ${result.errors ?? 'not an object'}`);
    }

    const level = levelFromInt(numberField(data, 'level'));
    if (level === null) {
        throw new Error('Triage record failed validation: level out of range');
    }

    return toTriageRecord(
        createVitals({
            hr: numberField(data, 'hr'),
            rr: numberField(data, 'rr'),
            sbp: numberField(data, 'sbp'),
            dbp: numberField(data, 'dbp'),
            temp: numberField(data, 'temp'),
            spo2: numberField(data, 'spo2'),
            gcs: numberField(data, 'gcs'),
        }),
        numberField(data, 'resource_count'),
        { acuity: numberField(data, 'acuity'), level },
        { timestamp: stringField(data, 'timestamp'), id: stringField(data, 'id') },
    );
}
