import { paramsValid } from '../validation/params.js';
import { NUM_VITALS, VITAL_KEYS } from '../vitals/types.js';
import type { VitalKey, VitalWeights } from '../vitals/types.js';
import type { PresetName } from '../config/env.js';
import type { Level, Thresholds } from './level.js';

/**
 * Everything one scoring run needs besides the reference ranges.
 *
 * | Field          | Valid range                              |
 * |----------------|------------------------------------------|
 * | vitalWeights   | each in [0, 1]                           |
 * | maxResources   | >= 0                                     |
 * | resourceWeight | >= 0                                     |
 * | t1..t4         | 1 >= t1 > t2 > t3 > t4 > 0               |
 *
 * Construction never validates; call {@link validateParams} before handing a
 * hand-built set to an engine.
 */
export interface Params extends Thresholds {
    readonly vitalWeights: VitalWeights;
    readonly maxResources: number;
    readonly resourceWeight: number;
}

function freezeParams(p: Params): Params {
    return Object.freeze({ ...p, vitalWeights: Object.freeze({ ...p.vitalWeights }) });
}

const DEFAULT_WEIGHTS: VitalWeights = Object.freeze({
    hr: 0.18,
    rr: 0.22,
    sbp: 0.16,
    dbp: 0.1,
    temp: 0.08,
    spo2: 0.16,
    gcs: 0.1,
});

export const DEFAULT_PARAMS: Params = freezeParams({
    vitalWeights: DEFAULT_WEIGHTS,
    maxResources: 6,
    resourceWeight: 0.25,
    t1: 0.85,
    t2: 0.6,
    t3: 0.35,
    t4: 0.15,
});

/** Lower cut points: more patients land in the urgent levels. */
export const STRICT_PARAMS: Params = freezeParams({
    ...DEFAULT_PARAMS,
    t1: 0.8,
    t2: 0.55,
    t3: 0.3,
    t4: 0.12,
});

/** Higher cut points: fewer patients land in the urgent levels. */
export const LENIENT_PARAMS: Params = freezeParams({
    ...DEFAULT_PARAMS,
    t1: 0.9,
    t2: 0.68,
    t3: 0.42,
    t4: 0.18,
});

/** Equal 0.2-wide bands for balanced research cohorts. */
export const RESEARCH_PARAMS: Params = freezeParams({
    ...DEFAULT_PARAMS,
    t1: 0.8,
    t2: 0.6,
    t3: 0.4,
    t4: 0.2,
});

export const PRESETS: Readonly<Record<PresetName, Params>> = Object.freeze({
    default: DEFAULT_PARAMS,
    strict: STRICT_PARAMS,
    lenient: LENIENT_PARAMS,
    research: RESEARCH_PARAMS,
});

export function presetParams(name: PresetName): Params {
    return PRESETS[name];
}

export function validateParams(p: Params): boolean {
    if (p.maxResources < 0 || !Number.isFinite(p.resourceWeight) || p.resourceWeight < 0) {
        return false;
    }
    for (const key of VITAL_KEYS) {
        const w = p.vitalWeights[key];
        if (!Number.isFinite(w) || w < 0 || w > 1) {
            return false;
        }
    }
    return p.t1 > p.t2 && p.t2 > p.t3 && p.t3 > p.t4 && p.t4 > 0 && p.t1 <= 1;
}

/** Same rule set as {@link validateParams}, run through the standalone validator. */
export function validateParamsExternal(p: Params): boolean {
    return paramsValid(p);
}

export function weightSum(p: Params): number {
    return VITAL_KEYS.reduce((sum, key) => sum + p.vitalWeights[key], 0);
}

/** Normalisation denominator shared by every score computed with `p`. */
export function divisor(p: Params): number {
    return weightSum(p) + p.resourceWeight;
}

export function cloneParams(p: Params): Params {
    return freezeParams(p);
}

export function thresholdsOf(p: Thresholds): [number, number, number, number] {
    return [p.t1, p.t2, p.t3, p.t4];
}

/** Score band `[low, high]` of a level. Level 1 tops out at 1, level 5 starts at 0. */
export function thresholdForLevel(p: Thresholds, level: Level): [number, number] {
    switch (level) {
        case 1:
            return [p.t1, 1];
        case 2:
            return [p.t2, p.t1];
        case 3:
            return [p.t3, p.t2];
        case 4:
            return [p.t4, p.t3];
        case 5:
            return [0, p.t4];
    }
}

/**
 * Continuous level for display or smoothing, interpolated inside each band.
 * Discrete classification always goes through fromScore.
 */
export function scoreToLevelContinuous(p: Thresholds, score: number): number {
    if (score >= p.t1) {
        return 1 + ((1 - score) / (1 - p.t1)) * 0.5;
    }
    if (score >= p.t2) {
        return 1.5 + ((p.t1 - score) / (p.t1 - p.t2)) * 0.5;
    }
    if (score >= p.t3) {
        return 2 + ((p.t2 - score) / (p.t2 - p.t3)) * 0.5;
    }
    if (score >= p.t4) {
        return 2.5 + ((p.t3 - score) / (p.t3 - p.t4)) * 0.5;
    }
    return 3 + ((p.t4 - score) / p.t4) * 2;
}

export function paramsEqual(p: Params, q: Params): boolean {
    return (
        p.maxResources === q.maxResources &&
        p.resourceWeight === q.resourceWeight &&
        p.t1 === q.t1 &&
        p.t2 === q.t2 &&
        p.t3 === q.t3 &&
        p.t4 === q.t4 &&
        VITAL_KEYS.every((key) => p.vitalWeights[key] === q.vitalWeights[key])
    );
}

/** True when every threshold of `p` is below the matching one of `q`. */
export function isStricterThan(p: Thresholds, q: Thresholds): boolean {
    return p.t1 < q.t1 && p.t2 < q.t2 && p.t3 < q.t3 && p.t4 < q.t4;
}

/**
 * Mutable, unchecked working copy of a parameter set, for calibration and
 * threshold search. Nothing here validates; `build()` returns a frozen
 * snapshot that may well be invalid.
 */
export class ParamsBuilder {
    private weights: Record<VitalKey, number>;
    private maxResources: number;
    private resourceWeight: number;
    private thresholds: [number, number, number, number];

    constructor(base: Params = DEFAULT_PARAMS) {
        this.weights = { ...base.vitalWeights };
        this.maxResources = base.maxResources;
        this.resourceWeight = base.resourceWeight;
        this.thresholds = thresholdsOf(base);
    }

    setThresholds(t1: number, t2: number, t3: number, t4: number): this {
        this.thresholds = [t1, t2, t3, t4];
        return this;
    }

    /** Ignored unless exactly four values are given. */
    setAllThresholds(values: readonly number[]): this {
        if (values.length === 4) {
            const [t1, t2, t3, t4] = values;
            this.thresholds = [t1, t2, t3, t4];
        }
        return this;
    }

    /** Accepts a vital key or its VITAL_KEYS index; an unknown index is ignored. */
    setVitalWeight(vital: VitalKey | number, weight: number): this {
        const key = typeof vital === 'number' ? VITAL_KEYS[vital] : vital;
        if (key !== undefined) {
            this.weights[key] = weight;
        }
        return this;
    }

    copyWeightsFrom(source: Params): this {
        this.weights = { ...source.vitalWeights };
        return this;
    }

    setMaxResources(maxResources: number): this {
        this.maxResources = maxResources;
        return this;
    }

    setResourceWeight(resourceWeight: number): this {
        this.resourceWeight = resourceWeight;
        return this;
    }

    /** Multiplies every weight by `factor`, then rescales so the largest is 1. */
    scaleWeights(factor: number): this {
        if (factor <= 0) {
            return this;
        }
        let max = 0;
        for (const key of VITAL_KEYS) {
            this.weights[key] *= factor;
            max = Math.max(max, this.weights[key]);
        }
        if (max > 0) {
            for (const key of VITAL_KEYS) {
                this.weights[key] /= max;
            }
        }
        return this;
    }

    /** Rescales the weights to sum to 1. */
    normalizeWeights(): this {
        const sum = VITAL_KEYS.reduce((acc, key) => acc + this.weights[key], 0);
        if (sum <= 0) {
            return this;
        }
        for (const key of VITAL_KEYS) {
            this.weights[key] /= sum;
        }
        return this;
    }

    uniformWeights(): this {
        for (const key of VITAL_KEYS) {
            this.weights[key] = 1 / NUM_VITALS;
        }
        return this;
    }

    /** Places T4..T1 at evenly spaced points in log-space strictly between min and max. */
    geometricThresholds(min: number, max: number): this {
        if (min <= 0 || max <= min || max > 1) {
            return this;
        }
        const logMin = Math.log(min);
        const step = (Math.log(max) - logMin) / 5;
        this.thresholds = [
            Math.min(1, Math.exp(logMin + 4 * step)),
            Math.exp(logMin + 3 * step),
            Math.exp(logMin + 2 * step),
            Math.exp(logMin + step),
        ];
        return this;
    }

    build(): Params {
        const [t1, t2, t3, t4] = this.thresholds;
        return freezeParams({
            vitalWeights: { ...this.weights },
            maxResources: this.maxResources,
            resourceWeight: this.resourceWeight,
            t1,
            t2,
            t3,
            t4,
        });
    }
}
