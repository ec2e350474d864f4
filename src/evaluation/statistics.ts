import { ALL_LEVELS, isLevel } from '../scoring/level.js';
import type { Level } from '../scoring/level.js';

// Descriptive statistics over score and level arrays. Empty or mismatched
// input yields 0 throughout.

export function sum(x: readonly number[]): number {
    return x.reduce((acc, v) => acc + v, 0);
}

export function mean(x: readonly number[]): number {
    return x.length === 0 ? 0 : sum(x) / x.length;
}

/** Sample variance (n - 1 divisor); 0 below two values. */
export function variance(x: readonly number[]): number {
    if (x.length < 2) {
        return 0;
    }
    const mu = mean(x);
    return x.reduce((acc, v) => acc + (v - mu) ** 2, 0) / (x.length - 1);
}

export function stdDev(x: readonly number[]): number {
    return Math.sqrt(variance(x));
}

export function standardError(x: readonly number[]): number {
    return x.length < 2 ? 0 : stdDev(x) / Math.sqrt(x.length);
}

/** Normal-approximation 95% interval for the mean; [0, 0] below two values. */
export function ci95(x: readonly number[]): [number, number] {
    if (x.length < 2) {
        return [0, 0];
    }
    const mu = mean(x);
    const margin = 1.96 * standardError(x);
    return [mu - margin, mu + margin];
}

function sorted(x: readonly number[]): number[] {
    return [...x].sort((a, b) => a - b);
}

export function median(x: readonly number[]): number {
    if (x.length === 0) {
        return 0;
    }
    const s = sorted(x);
    const mid = Math.floor(s.length / 2);
    return s.length % 2 === 1 ? s[mid] : (s[mid - 1] + s[mid]) / 2;
}

/** p-th percentile (0..100), linear interpolation between order statistics. */
export function percentile(x: readonly number[], p: number): number {
    if (x.length === 0 || p < 0 || p > 100) {
        return 0;
    }
    const s = sorted(x);
    const idx = (p / 100) * (s.length - 1);
    const lower = Math.floor(idx);
    if (lower >= s.length - 1) {
        return s[s.length - 1];
    }
    const w = idx - lower;
    return s[lower] * (1 - w) + s[lower + 1] * w;
}

export function min(x: readonly number[]): number {
    return x.length === 0 ? 0 : x.reduce((m, v) => (v < m ? v : m), x[0]);
}

export function max(x: readonly number[]): number {
    return x.length === 0 ? 0 : x.reduce((m, v) => (v > m ? v : m), x[0]);
}

export interface ScoreStats {
    n: number;
    mean: number;
    stdDev: number;
    se: number;
    ci95Low: number;
    ci95High: number;
    min: number;
    max: number;
    p25: number;
    p50: number;
    p75: number;
}

export function computeScoreStats(scores: readonly number[]): ScoreStats {
    const [ci95Low, ci95High] = ci95(scores);
    return {
        n: scores.length,
        mean: mean(scores),
        stdDev: stdDev(scores),
        se: standardError(scores),
        ci95Low,
        ci95High,
        min: min(scores),
        max: max(scores),
        p25: percentile(scores, 25),
        p50: percentile(scores, 50),
        p75: percentile(scores, 75),
    };
}

export interface LevelStats {
    counts: Record<Level, number>;
    proportions: Record<Level, number>;
    total: number;
}

/** Counts and proportions per level; values outside 1..5 are ignored. */
export function computeLevelStats(levels: readonly number[]): LevelStats {
    const counts: Record<Level, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    const proportions: Record<Level, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    let total = 0;
    for (const level of levels) {
        if (isLevel(level)) {
            counts[level]++;
            total++;
        }
    }
    if (total > 0) {
        for (const level of ALL_LEVELS) {
            proportions[level] = counts[level] / total;
        }
    }
    return { counts, proportions, total };
}

export function pearson(x: readonly number[], y: readonly number[]): number {
    if (x.length !== y.length || x.length < 2) {
        return 0;
    }
    const mx = mean(x);
    const my = mean(y);
    let sxy = 0;
    let sxx = 0;
    let syy = 0;
    x.forEach((xi, i) => {
        const dx = xi - mx;
        const dy = y[i] - my;
        sxy += dx * dy;
        sxx += dx * dx;
        syy += dy * dy;
    });
    if (sxx === 0 || syy === 0) {
        return 0;
    }
    return sxy / (Math.sqrt(sxx) * Math.sqrt(syy));
}

function pairwise(
    pred: readonly number[],
    ref: readonly number[],
    f: (p: number, r: number) => number,
): number {
    if (pred.length !== ref.length || pred.length === 0) {
        return 0;
    }
    return pred.reduce((acc, p, i) => acc + f(p, ref[i]), 0) / pred.length;
}

export function rmse(pred: readonly number[], ref: readonly number[]): number {
    return Math.sqrt(pairwise(pred, ref, (p, r) => (p - r) ** 2));
}

export function mae(pred: readonly number[], ref: readonly number[]): number {
    return pairwise(pred, ref, (p, r) => Math.abs(p - r));
}

/** Share of pairs with |pred - ref| <= tol. */
export function withinTolerance(pred: readonly number[], ref: readonly number[], tol: number): number {
    return pairwise(pred, ref, (p, r) => (Math.abs(p - r) <= tol ? 1 : 0));
}

export function exactAgreement(pred: readonly number[], ref: readonly number[]): number {
    return pairwise(pred, ref, (p, r) => (p === r ? 1 : 0));
}

/** Share of level pairs at most one level apart. */
export function withinOneLevel(pred: readonly number[], ref: readonly number[]): number {
    return withinTolerance(pred, ref, 1);
}
