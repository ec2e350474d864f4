import { isHighAcuity, isLowAcuity, levelCounts } from './level.js';
import type { Level } from './level.js';
import type { EvaluateResult } from './engine.js';

export interface AcuityStats {
    n: number;
    min: number;
    max: number;
    mean: number;
}

export function countByLevel(results: readonly EvaluateResult[], level: Level): number {
    return results.filter((r) => r.level === level).length;
}

export function meanAcuity(results: readonly EvaluateResult[]): number {
    if (results.length === 0) {
        return 0;
    }
    return results.reduce((sum, r) => sum + r.acuity, 0) / results.length;
}

export function minAcuity(results: readonly EvaluateResult[]): number {
    if (results.length === 0) {
        return 0;
    }
    return results.reduce((min, r) => (r.acuity < min ? r.acuity : min), results[0].acuity);
}

export function maxAcuity(results: readonly EvaluateResult[]): number {
    if (results.length === 0) {
        return 0;
    }
    return results.reduce((max, r) => (r.acuity > max ? r.acuity : max), results[0].acuity);
}

export function filterByLevel(results: readonly EvaluateResult[], level: Level): EvaluateResult[] {
    return results.filter((r) => r.level === level);
}

export function filterHighAcuity(results: readonly EvaluateResult[]): EvaluateResult[] {
    return results.filter((r) => isHighAcuity(r.level));
}

export function filterLowAcuity(results: readonly EvaluateResult[]): EvaluateResult[] {
    return results.filter((r) => isLowAcuity(r.level));
}

export function levelDistribution(results: readonly EvaluateResult[]): Record<Level, number> {
    return levelCounts(results.map((r) => r.level));
}

export function acuityStats(results: readonly EvaluateResult[]): AcuityStats {
    return {
        n: results.length,
        min: minAcuity(results),
        max: maxAcuity(results),
        mean: meanAcuity(results),
    };
}
