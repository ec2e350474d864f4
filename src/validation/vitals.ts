import { presentCount } from '../vitals/model.js';
import { CRITICAL_BOUNDS } from '../vitals/ranges.js';
import { VITAL_KEYS } from '../vitals/types.js';
import type { VitalKey, Vitals } from '../vitals/types.js';

/**
 * Field status after validation. `missing` is the 0 sentinel; `clamped` only
 * appears in reports produced by {@link sanitizeVitals}.
 */
export type VitalStatus = 'ok' | 'clamped' | 'invalid' | 'missing';

export interface VitalsReport {
    valid: boolean;
    fields: Record<VitalKey, VitalStatus>;
    clamped: Vitals;
}

export const VITAL_BOUNDS = CRITICAL_BOUNDS;

function statusOf(key: VitalKey, value: number): VitalStatus {
    if (value === 0) {
        return 'missing';
    }
    const [low, high] = VITAL_BOUNDS[key];
    return value < low || value > high ? 'invalid' : 'ok';
}

function clampValue(key: VitalKey, value: number): number {
    if (value === 0) {
        return value;
    }
    const [low, high] = VITAL_BOUNDS[key];
    if (value < low) return low;
    if (value > high) return high;
    return value;
}

/** Copy of `v` with every recorded value forced into bounds; missing values stay 0. */
export function clampVitals(v: Vitals): Vitals {
    return {
        hr: clampValue('hr', v.hr),
        rr: clampValue('rr', v.rr),
        sbp: clampValue('sbp', v.sbp),
        dbp: clampValue('dbp', v.dbp),
        temp: clampValue('temp', v.temp),
        spo2: clampValue('spo2', v.spo2),
        gcs: clampValue('gcs', v.gcs),
    };
}

/** Checks every field against VITAL_BOUNDS. Does not modify `v`. */
export function validateVitals(v: Vitals): VitalsReport {
    const fields: Record<VitalKey, VitalStatus> = {
        hr: statusOf('hr', v.hr),
        rr: statusOf('rr', v.rr),
        sbp: statusOf('sbp', v.sbp),
        dbp: statusOf('dbp', v.dbp),
        temp: statusOf('temp', v.temp),
        spo2: statusOf('spo2', v.spo2),
        gcs: statusOf('gcs', v.gcs),
    };
    const valid = VITAL_KEYS.every((key) => fields[key] !== 'invalid');

    return { valid, fields, clamped: clampVitals(v) };
}

export function vitalsValid(v: Vitals): boolean {
    return validateVitals(v).valid;
}

export interface SanitizedVitals {
    vitals: Vitals;
    changed: boolean;
    report: VitalsReport;
}

/** Clamps invalid fields and reports them as `clamped`. */
export function sanitizeVitals(v: Vitals): SanitizedVitals {
    const report = validateVitals(v);
    if (report.valid) {
        return { vitals: v, changed: false, report };
    }

    const fields = { ...report.fields };
    for (const key of VITAL_KEYS) {
        if (fields[key] === 'invalid') {
            fields[key] = 'clamped';
        }
    }

    return {
        vitals: report.clamped,
        changed: true,
        report: { valid: true, fields, clamped: report.clamped },
    };
}

export function atLeastOneVital(v: Vitals): boolean {
    return presentCount(v) > 0;
}

/** Clamps into [0, maxResources]; 0 when maxResources <= 0. */
export function clampResourceCount(count: number, maxResources: number): number {
    if (maxResources <= 0 || count < 0) {
        return 0;
    }
    return count > maxResources ? maxResources : count;
}

export function vitalsAndResourcesValid(v: Vitals, resourceCount: number, maxResources: number): boolean {
    if (!vitalsValid(v)) {
        return false;
    }
    if (maxResources <= 0) {
        return resourceCount === 0;
    }
    return resourceCount >= 0 && resourceCount <= maxResources;
}
