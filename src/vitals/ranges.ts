import { deviation, isPresent } from './model.js';
import { VITAL_KEYS } from './types.js';
import type { ReferenceRange, ReferenceRanges, VitalKey, VitalValues, VitalWeights } from './types.js';

function freezeRanges(ranges: Record<VitalKey, ReferenceRange>): ReferenceRanges {
    for (const key of VITAL_KEYS) {
        Object.freeze(ranges[key]);
    }
    return Object.freeze(ranges);
}

/**
 * Adult emergency department reference ranges.
 *
 * | Vital | Mid  | Half-width |
 * |-------|------|------------|
 * | hr    | 80   | 40         |
 * | rr    | 16   | 10         |
 * | sbp   | 120  | 40         |
 * | dbp   | 80   | 30         |
 * | temp  | 37.0 | 2.0        |
 * | spo2  | 98   | 8          |
 * | gcs   | 15   | 6          |
 */
export const DEFAULT_RANGES: ReferenceRanges = freezeRanges({
    hr: { mid: 80, halfWidth: 40 },
    rr: { mid: 16, halfWidth: 10 },
    sbp: { mid: 120, halfWidth: 40 },
    dbp: { mid: 80, halfWidth: 30 },
    temp: { mid: 37.0, halfWidth: 2.0 },
    spo2: { mid: 98, halfWidth: 8 },
    gcs: { mid: 15, halfWidth: 6 },
});

/** Illustrative paediatric ranges; calibrate against local protocol before use. */
export const PEDIATRIC_RANGES: ReferenceRanges = freezeRanges({
    hr: { mid: 100, halfWidth: 50 },
    rr: { mid: 24, halfWidth: 14 },
    sbp: { mid: 90, halfWidth: 30 },
    dbp: { mid: 60, halfWidth: 25 },
    temp: { mid: 37.0, halfWidth: 2.0 },
    spo2: { mid: 98, halfWidth: 8 },
    gcs: { mid: 15, halfWidth: 6 },
});

function copyRanges(ranges: ReferenceRanges): Record<VitalKey, ReferenceRange> {
    return {
        hr: { ...ranges.hr },
        rr: { ...ranges.rr },
        sbp: { ...ranges.sbp },
        dbp: { ...ranges.dbp },
        temp: { ...ranges.temp },
        spo2: { ...ranges.spo2 },
        gcs: { ...ranges.gcs },
    };
}

export function cloneRanges(ranges: ReferenceRanges): ReferenceRanges {
    return freezeRanges(copyRanges(ranges));
}

/** Range at a position of VITAL_KEYS; undefined for an index outside 0..6. */
export function rangeAt(ranges: ReferenceRanges, index: number): ReferenceRange | undefined {
    const key = VITAL_KEYS[index];
    return key === undefined ? undefined : ranges[key];
}

export function withRange(ranges: ReferenceRanges, key: VitalKey, range: ReferenceRange): ReferenceRanges {
    const next = copyRanges(ranges);
    next[key] = { ...range };
    return freezeRanges(next);
}

/** Copies `base`, replacing only the vitals whose override has a positive half-width. */
export function mergeRanges(base: ReferenceRanges, overrides: Partial<ReferenceRanges>): ReferenceRanges {
    const next = copyRanges(base);
    for (const key of VITAL_KEYS) {
        const override = overrides[key];
        if (override !== undefined && override.halfWidth > 0) {
            next[key] = { ...override };
        }
    }
    return freezeRanges(next);
}

export function scaleHalfWidths(ranges: ReferenceRanges, factor: number): ReferenceRanges {
    if (factor <= 0) {
        return cloneRanges(ranges);
    }
    const next = copyRanges(ranges);
    for (const key of VITAL_KEYS) {
        next[key] = { mid: next[key].mid, halfWidth: next[key].halfWidth * factor };
    }
    return freezeRanges(next);
}

export function rangesValid(ranges: ReferenceRanges): boolean {
    return VITAL_KEYS.every((key) => {
        const { mid, halfWidth } = ranges[key];
        return Number.isFinite(mid) && Number.isFinite(halfWidth) && halfWidth >= 0;
    });
}

/** Maps x from [low, high] onto [0, 1], clamping outside values. 0 when low >= high. */
export function normalizeLinear(x: number, low: number, high: number): number {
    if (low >= high || x <= low) {
        return 0;
    }
    if (x >= high) {
        return 1;
    }
    return (x - low) / (high - low);
}

/** Clamps x into [low, high]; returns low when the interval is inverted. */
export function clampToRange(x: number, low: number, high: number): number {
    if (low > high || x < low) {
        return low;
    }
    return x > high ? high : x;
}

export function inRange(x: number, low: number, high: number): boolean {
    return low <= high && x >= low && x <= high;
}

/** Absolute physiological bounds used to flag implausible input. */
export const CRITICAL_BOUNDS: Readonly<Record<VitalKey, readonly [number, number]>> = {
    hr: [20, 300],
    rr: [0, 60],
    sbp: [40, 300],
    dbp: [20, 200],
    temp: [30, 45],
    spo2: [0, 100],
    gcs: [3, 15],
};

export function isWithinCriticalBounds(key: VitalKey, value: number): boolean {
    const [low, high] = CRITICAL_BOUNDS[key];
    return inRange(value, low, high);
}

export interface WeightedDeviation {
    sum: number;
    weightSum: number;
}

/**
 * Sum of weight * deviation over present vitals with a positive weight and a
 * positive half-width, plus the sum of those weights.
 */
export function weightedDeviationSum(
    ranges: ReferenceRanges,
    values: VitalValues,
    weights: VitalWeights,
): WeightedDeviation {
    let sum = 0;
    let weightSum = 0;

    VITAL_KEYS.forEach((key, i) => {
        const weight = weights[key];
        const value = values[i];
        const { mid, halfWidth } = ranges[key];
        if (weight <= 0 || !isPresent(key, value) || halfWidth <= 0) {
            return;
        }
        sum += weight * deviation(value, mid, halfWidth);
        weightSum += weight;
    });

    return { sum, weightSum };
}
