import { logger } from '../config/logger.js';
import type { Population, PresetName } from '../config/env.js';
import { clampResourceCount } from '../validation/vitals.js';
import { cloneRanges, DEFAULT_RANGES, PEDIATRIC_RANGES } from '../vitals/ranges.js';
import type { ReferenceRanges, Vitals } from '../vitals/types.js';
import { acuity, scoreBreakdown } from './formula.js';
import type { ScoreBreakdown } from './formula.js';
import { fromScore } from './level.js';
import type { Level } from './level.js';
import { cloneParams, presetParams } from './params.js';
import type { Params } from './params.js';

export interface EvaluateResult {
    acuity: number;
    level: Level;
}

/**
 * Scores vitals and resource counts against one fixed parameter set.
 *
 * The engine keeps frozen copies of its parameters and ranges, so every call
 * is a pure function of its arguments and an engine can be shared freely.
 *
 * | Method                    | Returns                      |
 * |---------------------------|------------------------------|
 * | acuity                    | score in [0, 1]              |
 * | level                     | Level 1..5                   |
 * | evaluate                  | { acuity, level }            |
 * | evaluateWithRanges        | same, with per-call ranges   |
 * | evaluateWithResourceClamp | same, count clamped first    |
 * | evaluateBatch             | index-aligned results        |
 * | batchAcuity / batchLevel  | index-aligned scores/levels  |
 */
export class ScoringEngine {
    private readonly p: Params;
    private readonly r: ReferenceRanges;

    constructor(params: Params, ranges: ReferenceRanges = DEFAULT_RANGES) {
        this.p = cloneParams(params);
        this.r = cloneRanges(ranges);
    }

    /** Copy of the engine's parameters. */
    get params(): Params {
        return cloneParams(this.p);
    }

    get ranges(): ReferenceRanges {
        return cloneRanges(this.r);
    }

    withParams(params: Params): ScoringEngine {
        return new ScoringEngine(params, this.r);
    }

    withRanges(ranges: ReferenceRanges): ScoringEngine {
        return new ScoringEngine(this.p, ranges);
    }

    acuity(v: Vitals, resourceCount: number): number {
        return acuity(v, resourceCount, this.p, this.r);
    }

    level(v: Vitals, resourceCount: number): Level {
        return fromScore(this.acuity(v, resourceCount), this.p);
    }

    evaluate(v: Vitals, resourceCount: number): EvaluateResult {
        const score = this.acuity(v, resourceCount);
        return { acuity: score, level: fromScore(score, this.p) };
    }

    /** Same formula with caller-supplied reference ranges, for calibration runs. */
    evaluateWithRanges(v: Vitals, resourceCount: number, ranges: ReferenceRanges): EvaluateResult {
        const score = acuity(v, resourceCount, this.p, ranges);
        return { acuity: score, level: fromScore(score, this.p) };
    }

    evaluateWithResourceClamp(v: Vitals, resourceCount: number): EvaluateResult {
        return this.evaluate(v, clampResourceCount(resourceCount, this.p.maxResources));
    }

    /**
     * Intermediate terms of the formula for one evaluation.
     */
    explain(v: Vitals, resourceCount: number): ScoreBreakdown {
        return scoreBreakdown(v, resourceCount, this.p, this.r);
    }

    /**
     * Evaluates each (vitals, resourceCount) pair independently.
     * Returns null when the two sequences differ in length.
     */
    evaluateBatch(vitals: readonly Vitals[], resourceCounts: readonly number[]): EvaluateResult[] | null {
        if (!this.sameLength(vitals, resourceCounts)) {
            return null;
        }
        return vitals.map((v, i) => this.evaluate(v, resourceCounts[i]));
    }

    batchAcuity(vitals: readonly Vitals[], resourceCounts: readonly number[]): number[] | null {
        if (!this.sameLength(vitals, resourceCounts)) {
            return null;
        }
        return vitals.map((v, i) => this.acuity(v, resourceCounts[i]));
    }

    batchLevel(vitals: readonly Vitals[], resourceCounts: readonly number[]): Level[] | null {
        if (!this.sameLength(vitals, resourceCounts)) {
            return null;
        }
        return vitals.map((v, i) => this.level(v, resourceCounts[i]));
    }

    private sameLength(vitals: readonly Vitals[], resourceCounts: readonly number[]): boolean {
        if (vitals.length !== resourceCounts.length) {
            logger.warn(
                { vitals: vitals.length, resourceCounts: resourceCounts.length },
                'Batch length mismatch, nothing evaluated',
            );
            return false;
        }
        return true;
    }
}

const POPULATION_RANGES: Readonly<Record<Population, ReferenceRanges>> = {
    adult: DEFAULT_RANGES,
    pediatric: PEDIATRIC_RANGES,
};

export function createEngine(preset: PresetName = 'default', population: Population = 'adult'): ScoringEngine {
    return new ScoringEngine(presetParams(preset), POPULATION_RANGES[population]);
}
