import { describe, it, expect } from 'vitest';
import type { EvaluateResult } from '../../../src/scoring/engine.js';
import {
    acuityStats,
    countByLevel,
    filterByLevel,
    filterHighAcuity,
    filterLowAcuity,
    levelDistribution,
    maxAcuity,
    meanAcuity,
    minAcuity,
} from '../../../src/scoring/results.js';

const results: EvaluateResult[] = [
    { acuity: 0.9, level: 1 },
    { acuity: 0.7, level: 2 },
    { acuity: 0.4, level: 3 },
    { acuity: 0.2, level: 4 },
    { acuity: 0.1, level: 5 },
    { acuity: 0.5, level: 3 },
];

describe('Result helpers', () => {
    it('should count and filter by level', () => {
        expect(countByLevel(results, 3)).toBe(2);
        expect(filterByLevel(results, 3)).toEqual([
            { acuity: 0.4, level: 3 },
            { acuity: 0.5, level: 3 },
        ]);
    });

    it('should split high and low acuity results', () => {
        expect(filterHighAcuity(results).map((r) => r.level)).toEqual([1, 2]);
        expect(filterLowAcuity(results).map((r) => r.level)).toEqual([4, 5]);
    });

    it('should summarise acuity', () => {
        expect(minAcuity(results)).toBe(0.1);
        expect(maxAcuity(results)).toBe(0.9);
        expect(meanAcuity(results)).toBeCloseTo(2.8 / 6, 10);
        expect(acuityStats(results)).toEqual({
            n: 6,
            min: 0.1,
            max: 0.9,
            mean: meanAcuity(results),
        });
    });

    it('should report zeros for no results', () => {
        expect(acuityStats([])).toEqual({ n: 0, min: 0, max: 0, mean: 0 });
    });

    it('should build a level distribution with every level', () => {
        expect(levelDistribution(results)).toEqual({ 1: 1, 2: 1, 3: 2, 4: 1, 5: 1 });
    });
});
