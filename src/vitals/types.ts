/**
 * One set of vital signs. Units: hr (bpm), rr (/min), sbp/dbp (mmHg),
 * temp (Celsius), spo2 (%), gcs (3-15). A value of 0 means "not measured".
 */
export interface Vitals {
    readonly hr: number;
    readonly rr: number;
    readonly sbp: number;
    readonly dbp: number;
    readonly temp: number;
    readonly spo2: number;
    readonly gcs: number;
}

/**
 * Fixed scoring order. Weight vectors, reference ranges and value tuples are
 * all indexed by position in this list.
 */
export const VITAL_KEYS = ['hr', 'rr', 'sbp', 'dbp', 'temp', 'spo2', 'gcs'] as const;

export type VitalKey = (typeof VITAL_KEYS)[number];

export const VITAL_INDEX = {
    hr: 0,
    rr: 1,
    sbp: 2,
    dbp: 3,
    temp: 4,
    spo2: 5,
    gcs: 6,
} as const satisfies Record<VitalKey, number>;

export const NUM_VITALS = VITAL_KEYS.length;

/** Values in VITAL_KEYS order. */
export type VitalValues = readonly [number, number, number, number, number, number, number];

/** Midpoint and half-width of the normal band for one vital. */
export interface ReferenceRange {
    readonly mid: number;
    readonly halfWidth: number;
}

export type ReferenceRanges = Readonly<Record<VitalKey, ReferenceRange>>;

/** Per-vital weights, each expected in [0, 1]. */
export type VitalWeights = Readonly<Record<VitalKey, number>>;
