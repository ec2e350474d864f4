import { VITAL_KEYS } from './types.js';
import type { VitalKey, VitalValues, Vitals } from './types.js';

export function createVitals(values: Partial<Vitals> = {}): Vitals {
    return {
        hr: values.hr ?? 0,
        rr: values.rr ?? 0,
        sbp: values.sbp ?? 0,
        dbp: values.dbp ?? 0,
        temp: values.temp ?? 0,
        spo2: values.spo2 ?? 0,
        gcs: values.gcs ?? 0,
    };
}

export function zeroVitals(): Vitals {
    return createVitals();
}

/**
 * Whether a raw value counts as measured. Integer vitals need a strictly
 * positive value; temperature only has to differ from 0, so a negative
 * temperature is treated as present.
 */
export function isPresent(key: VitalKey, value: number): boolean {
    if (key === 'temp') {
        return value !== 0;
    }
    return value > 0;
}

/**
 * Normalised distance from the reference midpoint:
 * `min(1, |value - mid| / halfWidth)`, or 0 when the half-width is not positive.
 * Does not treat 0 as missing; callers apply {@link isPresent} first.
 */
export function deviation(value: number, mid: number, halfWidth: number): number {
    if (halfWidth <= 0) {
        return 0;
    }
    const d = Math.abs(value - mid) / halfWidth;
    return d > 1 ? 1 : d;
}

export function presentCount(v: Vitals): number {
    return VITAL_KEYS.filter((key) => isPresent(key, v[key])).length;
}

export function vitalsToValues(v: Vitals): VitalValues {
    return [v.hr, v.rr, v.sbp, v.dbp, v.temp, v.spo2, v.gcs];
}

export function vitalsFromValues(values: VitalValues): Vitals {
    const [hr, rr, sbp, dbp, temp, spo2, gcs] = values;
    return { hr, rr, sbp, dbp, temp, spo2, gcs };
}
