/**
 * Agreement between predicted and reference triage levels.
 *
 * | Metric        | Formula                  |
 * |---------------|--------------------------|
 * | Sensitivity   | TP / (TP + FN)           |
 * | Specificity   | TN / (TN + FP)           |
 * | PPV           | TP / (TP + FP)           |
 * | NPV           | TN / (TN + FN)           |
 * | F1            | 2·PPV·Sens / (PPV + Sens)|
 * | Cohen's kappa | (p_o - p_e) / (1 - p_e)  |
 *
 * Every ratio with a zero denominator is reported as 0.
 */

const NUM_LEVELS = 5;

function ratio(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

function inLevelRange(level: number): boolean {
    return Number.isInteger(level) && level >= 1 && level <= NUM_LEVELS;
}

function emptyGrid(): number[][] {
    return Array.from({ length: NUM_LEVELS }, () => new Array<number>(NUM_LEVELS).fill(0));
}

/** 5x5 counts; rows are reference levels, columns predicted levels (index = level - 1). */
export class ConfusionMatrix {
    private constructor(
        private readonly grid: number[][],
        readonly total: number,
    ) { }

    /**
     * Pairs with a level outside 1..5 are skipped. Sequences of different
     * length yield an empty matrix.
     */
    static fromLevels(predicted: readonly number[], reference: readonly number[]): ConfusionMatrix {
        const grid = emptyGrid();
        let total = 0;
        if (predicted.length === reference.length) {
            predicted.forEach((p, k) => {
                const r = reference[k];
                if (!inLevelRange(p) || !inLevelRange(r)) {
                    return;
                }
                grid[r - 1][p - 1]++;
                total++;
            });
        }
        return new ConfusionMatrix(grid, total);
    }

    /** Count of samples with reference level `reference` and predicted level `predicted`. */
    count(reference: number, predicted: number): number {
        if (!inLevelRange(reference) || !inLevelRange(predicted)) {
            return 0;
        }
        return this.grid[reference - 1][predicted - 1];
    }

    tp(level: number): number {
        return this.count(level, level);
    }

    fp(level: number): number {
        if (!inLevelRange(level)) return 0;
        let fp = 0;
        for (let r = 1; r <= NUM_LEVELS; r++) {
            if (r !== level) fp += this.count(r, level);
        }
        return fp;
    }

    fn(level: number): number {
        if (!inLevelRange(level)) return 0;
        let fn = 0;
        for (let p = 1; p <= NUM_LEVELS; p++) {
            if (p !== level) fn += this.count(level, p);
        }
        return fn;
    }

    tn(level: number): number {
        if (!inLevelRange(level)) return 0;
        return this.total - this.tp(level) - this.fp(level) - this.fn(level);
    }

    sensitivity(level: number): number {
        return ratio(this.tp(level), this.tp(level) + this.fn(level));
    }

    specificity(level: number): number {
        return ratio(this.tn(level), this.tn(level) + this.fp(level));
    }

    ppv(level: number): number {
        return ratio(this.tp(level), this.tp(level) + this.fp(level));
    }

    npv(level: number): number {
        return ratio(this.tn(level), this.tn(level) + this.fn(level));
    }

    f1(level: number): number {
        const ppv = this.ppv(level);
        const sens = this.sensitivity(level);
        return ratio(2 * ppv * sens, ppv + sens);
    }

    /** One-vs-rest accuracy with `level` as the positive class. */
    accuracy(level: number): number {
        return ratio(this.tp(level) + this.tn(level), this.total);
    }

    macroSensitivity(): number {
        return this.macro((level) => this.sensitivity(level));
    }

    macroSpecificity(): number {
        return this.macro((level) => this.specificity(level));
    }

    macroF1(): number {
        return this.macro((level) => this.f1(level));
    }

    overallAccuracy(): number {
        let diagonal = 0;
        for (let level = 1; level <= NUM_LEVELS; level++) {
            diagonal += this.tp(level);
        }
        return ratio(diagonal, this.total);
    }

    cohenKappa(): number {
        if (this.total === 0) {
            return 0;
        }
        const t = this.total;
        let expected = 0;
        for (let level = 1; level <= NUM_LEVELS; level++) {
            const referenceTotal = this.tp(level) + this.fn(level);
            const predictedTotal = this.tp(level) + this.fp(level);
            expected += (referenceTotal * predictedTotal) / (t * t);
        }
        if (expected >= 1) {
            return 0;
        }
        return (this.overallAccuracy() - expected) / (1 - expected);
    }

    /** Copy of the raw counts. */
    toArray(): number[][] {
        return this.grid.map((row) => [...row]);
    }

    private macro(measure: (level: number) => number): number {
        let sum = 0;
        for (let level = 1; level <= NUM_LEVELS; level++) {
            sum += measure(level);
        }
        return sum / NUM_LEVELS;
    }
}

/** 2x2 counts with a chosen set of levels (e.g. 1 and 2) as the positive class. */
export class BinaryConfusionMatrix {
    constructor(
        readonly tp: number,
        readonly fp: number,
        readonly fn: number,
        readonly tn: number,
    ) { }

    static fromLevels(
        predicted: readonly number[],
        reference: readonly number[],
        positive: readonly number[],
    ): BinaryConfusionMatrix {
        if (predicted.length !== reference.length) {
            return new BinaryConfusionMatrix(0, 0, 0, 0);
        }
        const positives = new Set(positive);
        let tp = 0;
        let fp = 0;
        let fn = 0;
        let tn = 0;
        predicted.forEach((p, k) => {
            const r = reference[k];
            if (!inLevelRange(p) || !inLevelRange(r)) {
                return;
            }
            const predictedPositive = positives.has(p);
            const referencePositive = positives.has(r);
            if (referencePositive && predictedPositive) tp++;
            else if (predictedPositive) fp++;
            else if (referencePositive) fn++;
            else tn++;
        });
        return new BinaryConfusionMatrix(tp, fp, fn, tn);
    }

    get total(): number {
        return this.tp + this.fp + this.fn + this.tn;
    }

    sensitivity(): number {
        return ratio(this.tp, this.tp + this.fn);
    }

    specificity(): number {
        return ratio(this.tn, this.tn + this.fp);
    }

    ppv(): number {
        return ratio(this.tp, this.tp + this.fp);
    }

    npv(): number {
        return ratio(this.tn, this.tn + this.fn);
    }

    f1(): number {
        const sens = this.sensitivity();
        const ppv = this.ppv();
        return ratio(2 * sens * ppv, sens + ppv);
    }

    accuracy(): number {
        return ratio(this.tp + this.tn, this.total);
    }
}

/**
 * Area under the ROC curve from continuous scores and 0/1 outcomes, by the
 * rank (Mann-Whitney) formulation. Tied scores count half. Returns 0.5 when
 * either class is empty and 0 for empty or mismatched input.
 */
export function auc(scores: readonly number[], outcomes: readonly number[]): number {
    if (scores.length !== outcomes.length || scores.length === 0) {
        return 0;
    }
    const pairs = scores
        .map((score, i) => ({ score, positive: outcomes[i] === 1 }))
        .sort((a, b) => a.score - b.score);

    const positives = pairs.filter((p) => p.positive).length;
    const negatives = pairs.length - positives;
    if (positives === 0 || negatives === 0) {
        return 0.5;
    }

    let credit = 0;
    let negativesBelow = 0;
    let i = 0;
    while (i < pairs.length) {
        let j = i;
        let groupPositives = 0;
        let groupNegatives = 0;
        while (j < pairs.length && pairs[j].score === pairs[i].score) {
            if (pairs[j].positive) groupPositives++;
            else groupNegatives++;
            j++;
        }
        credit += groupPositives * (negativesBelow + groupNegatives / 2);
        negativesBelow += groupNegatives;
        i = j;
    }

    return credit / (positives * negatives);
}

/** Mean absolute difference between scores (clamped to [0, 1]) and 0/1 outcomes. */
export function calibrationError(scores: readonly number[], outcomes: readonly number[]): number {
    if (scores.length !== outcomes.length || scores.length === 0) {
        return 0;
    }
    let sum = 0;
    scores.forEach((score, i) => {
        const observed = outcomes[i] === 1 ? 1 : 0;
        const s = Math.min(1, Math.max(0, score));
        sum += Math.abs(s - observed);
    });
    return sum / scores.length;
}

function kappaWeight(p: number, r: number): number {
    return Math.max(0, 1 - Math.abs(p - r) / 4);
}

/**
 * Linearly weighted kappa, weight(p, r) = max(0, 1 - |p - r| / 4). Levels
 * outside 1..5 count as 3 in the observed agreement and are left out of the
 * marginals.
 */
export function weightedKappa(predicted: readonly number[], reference: readonly number[]): number {
    if (predicted.length !== reference.length || predicted.length === 0) {
        return 0;
    }
    const n = predicted.length;
    const orMiddle = (level: number): number => (inLevelRange(level) ? level : 3);

    let observed = 0;
    const predictedCounts = new Array<number>(NUM_LEVELS + 1).fill(0);
    const referenceCounts = new Array<number>(NUM_LEVELS + 1).fill(0);
    predicted.forEach((p, i) => {
        const r = reference[i];
        observed += kappaWeight(orMiddle(p), orMiddle(r));
        if (inLevelRange(p)) predictedCounts[p]++;
        if (inLevelRange(r)) referenceCounts[r]++;
    });
    observed /= n;

    let expected = 0;
    for (let i = 1; i <= NUM_LEVELS; i++) {
        for (let j = 1; j <= NUM_LEVELS; j++) {
            expected += (predictedCounts[i] / n) * (referenceCounts[j] / n) * kappaWeight(i, j);
        }
    }
    if (expected >= 1) {
        return 0;
    }
    return (observed - expected) / (1 - expected);
}
