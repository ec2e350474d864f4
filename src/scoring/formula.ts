import { deviation, isPresent } from '../vitals/model.js';
import { DEFAULT_RANGES } from '../vitals/ranges.js';
import { VITAL_KEYS } from '../vitals/types.js';
import type { ReferenceRanges, Vitals, VitalWeights } from '../vitals/types.js';
import { divisor } from './params.js';
import type { Params } from './params.js';

/**
 * Weighted mean deviation over the vitals that are present and have a
 * positive half-width, in [0, 1]. The mean is taken over the weights of
 * those vitals only, so unmeasured vitals do not pull the score towards normal.
 */
export function vitalComponent(v: Vitals, weights: VitalWeights, ranges: ReferenceRanges): number {
    let sum = 0;
    let presentWeight = 0;

    for (const key of VITAL_KEYS) {
        const value = v[key];
        const { mid, halfWidth } = ranges[key];
        if (!isPresent(key, value) || halfWidth <= 0) {
            continue;
        }
        sum += weights[key] * deviation(value, mid, halfWidth);
        presentWeight += weights[key];
    }

    if (presentWeight <= 0) {
        return 0;
    }
    const component = sum / presentWeight;
    return component > 1 ? 1 : component;
}

/** `weight * min(1, count / maxResources)`; 0 when any of the three is not positive. */
export function resourceComponent(resourceCount: number, maxResources: number, weight: number): number {
    if (maxResources <= 0 || weight <= 0 || resourceCount <= 0) {
        return 0;
    }
    const ratio = resourceCount / maxResources;
    return weight * (ratio > 1 ? 1 : ratio);
}

export function rawScore(vital: number, resource: number): number {
    return vital + resource;
}

/** `raw / divisor` clamped to [0, 1]; an overflow saturates at 1, NaN and a non-positive divisor give 0. */
export function normalizeScore(raw: number, div: number): number {
    if (div <= 0) {
        return 0;
    }
    const s = raw / div;
    if (s > 1) {
        return 1;
    }
    if (Number.isNaN(s) || s < 0) {
        return 0;
    }
    return s;
}

export interface ScoreBreakdown {
    vitalComponent: number;
    resourceComponent: number;
    raw: number;
    divisor: number;
    acuity: number;
}

/**
 * Every intermediate of the acuity formula. The vital component is normalised
 * by the weights of present vitals, but the final score divides by the full
 * weight sum plus the resource weight, so sparse observations cannot reach
 * extreme scores on their own.
 */
export function scoreBreakdown(
    v: Vitals,
    resourceCount: number,
    params: Params,
    ranges: ReferenceRanges = DEFAULT_RANGES,
): ScoreBreakdown {
    const vital = vitalComponent(v, params.vitalWeights, ranges);
    const resource = resourceComponent(resourceCount, params.maxResources, params.resourceWeight);
    const raw = rawScore(vital, resource);
    const div = divisor(params);

    return {
        vitalComponent: vital,
        resourceComponent: resource,
        raw,
        divisor: div,
        acuity: normalizeScore(raw, div),
    };
}

export function acuity(
    v: Vitals,
    resourceCount: number,
    params: Params,
    ranges: ReferenceRanges = DEFAULT_RANGES,
): number {
    return scoreBreakdown(v, resourceCount, params, ranges).acuity;
}
