import { describe, it, expect } from 'vitest';
import {
    clampToRange,
    DEFAULT_RANGES,
    inRange,
    isWithinCriticalBounds,
    mergeRanges,
    normalizeLinear,
    PEDIATRIC_RANGES,
    rangeAt,
    rangesValid,
    scaleHalfWidths,
    weightedDeviationSum,
    withRange,
} from '../../../src/vitals/ranges.js';
import { DEFAULT_PARAMS, ParamsBuilder } from '../../../src/scoring/params.js';

describe('Reference ranges', () => {
    it('should ship frozen adult and pediatric tables', () => {
        expect(DEFAULT_RANGES.hr).toEqual({ mid: 80, halfWidth: 40 });
        expect(PEDIATRIC_RANGES.hr).toEqual({ mid: 100, halfWidth: 50 });
        expect(Object.isFrozen(DEFAULT_RANGES)).toBe(true);
        expect(Object.isFrozen(DEFAULT_RANGES.hr)).toBe(true);
    });

    it('should look up a range by field index', () => {
        expect(rangeAt(DEFAULT_RANGES, 1)).toEqual({ mid: 16, halfWidth: 10 });
        expect(rangeAt(DEFAULT_RANGES, 7)).toBeUndefined();
        expect(rangeAt(DEFAULT_RANGES, -1)).toBeUndefined();
    });

    it('should replace one range without touching the source table', () => {
        const next = withRange(DEFAULT_RANGES, 'hr', { mid: 90, halfWidth: 30 });
        expect(next.hr).toEqual({ mid: 90, halfWidth: 30 });
        expect(next.rr).toEqual(DEFAULT_RANGES.rr);
        expect(DEFAULT_RANGES.hr.mid).toBe(80);
    });

    it('should merge only overrides with a positive half-width', () => {
        const merged = mergeRanges(DEFAULT_RANGES, {
            hr: { mid: 100, halfWidth: 0 },
            rr: { mid: 20, halfWidth: 5 },
        });
        expect(merged.hr).toEqual({ mid: 80, halfWidth: 40 });
        expect(merged.rr).toEqual({ mid: 20, halfWidth: 5 });
    });

    it('should scale half-widths and ignore a non-positive factor', () => {
        expect(scaleHalfWidths(DEFAULT_RANGES, 2).hr).toEqual({ mid: 80, halfWidth: 80 });
        expect(scaleHalfWidths(DEFAULT_RANGES, 0).hr).toEqual({ mid: 80, halfWidth: 40 });
    });

    it('should reject a table with a negative half-width', () => {
        expect(rangesValid(DEFAULT_RANGES)).toBe(true);
        expect(rangesValid(withRange(DEFAULT_RANGES, 'gcs', { mid: 15, halfWidth: -1 }))).toBe(false);
    });

    describe('interval helpers', () => {
        it('should normalise linearly and clamp outside the interval', () => {
            expect(normalizeLinear(5, 0, 10)).toBe(0.5);
            expect(normalizeLinear(-1, 0, 10)).toBe(0);
            expect(normalizeLinear(11, 0, 10)).toBe(1);
            expect(normalizeLinear(5, 10, 0)).toBe(0);
        });

        it('should clamp into an interval and fall back to low when inverted', () => {
            expect(clampToRange(15, 0, 10)).toBe(10);
            expect(clampToRange(-5, 0, 10)).toBe(0);
            expect(clampToRange(5, 10, 0)).toBe(10);
        });

        it('should report membership only for ordered intervals', () => {
            expect(inRange(5, 0, 10)).toBe(true);
            expect(inRange(5, 10, 0)).toBe(false);
        });

        it('should check critical bounds inclusively', () => {
            expect(isWithinCriticalBounds('hr', 20)).toBe(true);
            expect(isWithinCriticalBounds('hr', 19)).toBe(false);
            expect(isWithinCriticalBounds('spo2', 100)).toBe(true);
        });
    });

    describe('weightedDeviationSum', () => {
        it('should sum weight times deviation over present vitals', () => {
            const result = weightedDeviationSum(DEFAULT_RANGES, [120, 0, 0, 0, 0, 0, 0], DEFAULT_PARAMS.vitalWeights);
            expect(result).toEqual({ sum: 0.18, weightSum: 0.18 });
        });

        it('should skip vitals with a zero weight', () => {
            const weights = new ParamsBuilder().setVitalWeight('hr', 0).build().vitalWeights;
            expect(weightedDeviationSum(DEFAULT_RANGES, [120, 0, 0, 0, 0, 0, 0], weights)).toEqual({
                sum: 0,
                weightSum: 0,
            });
        });
    });
});
