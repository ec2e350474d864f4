/**
 * Five-level triage classification. Level 1 is the most urgent.
 *
 * | Level | Label         | Typical wait (min) |
 * |-------|---------------|--------------------|
 * | 1     | Resuscitation | 0                  |
 * | 2     | Emergent      | 15                 |
 * | 3     | Urgent        | 60                 |
 * | 4     | Less urgent   | 120                |
 * | 5     | Non-urgent    | 240                |
 *
 * Wait times and actions are guidance only; institutional protocol overrides.
 */
export const Level = {
    Resuscitation: 1,
    Emergent: 2,
    Urgent: 3,
    LessUrgent: 4,
    NonUrgent: 5,
} as const;

export type Level = (typeof Level)[keyof typeof Level];

export const ALL_LEVELS: readonly Level[] = [1, 2, 3, 4, 5];

/** Score cut points, T1 > T2 > T3 > T4 for a valid parameter set. */
export interface Thresholds {
    readonly t1: number;
    readonly t2: number;
    readonly t3: number;
    readonly t4: number;
}

interface LevelInfo {
    label: string;
    shortCode: string;
    waitMinutes: number;
    description: string;
    actions: readonly string[];
}

const LEVEL_INFO: Readonly<Record<Level, LevelInfo>> = {
    1: {
        label: 'Resuscitation',
        shortCode: 'R',
        waitMinutes: 0,
        description: 'Requires immediate life-saving intervention; do not delay.',
        actions: ['Immediate assessment', 'Life-saving interventions as indicated', 'Continuous monitoring'],
    },
    2: {
        label: 'Emergent',
        shortCode: 'E',
        waitMinutes: 15,
        description: 'High risk; should be seen within 15 minutes.',
        actions: ['Rapid assessment', 'Stabilisation', 'Re-evaluate within 15 min'],
    },
    3: {
        label: 'Urgent',
        shortCode: 'U',
        waitMinutes: 60,
        description: 'Urgent but stable; target within 60 minutes.',
        actions: ['Assessment within 60 min', 'Routine monitoring', 'Re-evaluate as needed'],
    },
    4: {
        label: 'Less urgent',
        shortCode: 'L',
        waitMinutes: 120,
        description: 'Less urgent; target within 120 minutes.',
        actions: ['Assessment within 120 min', 'Routine care', 'Re-evaluate if condition changes'],
    },
    5: {
        label: 'Non-urgent',
        shortCode: 'N',
        waitMinutes: 240,
        description: 'Non-urgent; target within 240 minutes.',
        actions: ['Assessment within 240 min', 'Routine care', 'May use fast-track if available'],
    },
};

/**
 * Maps a normalised score onto a level. Each band is closed at its lower
 * threshold, so a score equal to a threshold takes the more urgent level.
 */
export function fromScore(score: number, thresholds: Thresholds): Level {
    if (score >= thresholds.t1) {
        return Level.Resuscitation;
    }
    if (score >= thresholds.t2) {
        return Level.Emergent;
    }
    if (score >= thresholds.t3) {
        return Level.Urgent;
    }
    if (score >= thresholds.t4) {
        return Level.LessUrgent;
    }
    return Level.NonUrgent;
}

export function isLevel(value: number): value is Level {
    return Number.isInteger(value) && value >= 1 && value <= 5;
}

export function levelFromInt(value: number): Level | null {
    return isLevel(value) ? value : null;
}

export function levelLabel(level: Level): string {
    return LEVEL_INFO[level].label;
}

export function levelDescription(level: Level): string {
    return LEVEL_INFO[level].description;
}

export function shortCode(level: Level): string {
    return LEVEL_INFO[level].shortCode;
}

export function waitTimeMinutes(level: Level): number {
    return LEVEL_INFO[level].waitMinutes;
}

export function recommendedActions(level: Level): string[] {
    return [...LEVEL_INFO[level].actions];
}

/** Accepts "1".."5", labels (case-insensitive) and short codes. */
export function parseLevel(text: string): Level | null {
    const needle = text.trim().toLowerCase();
    for (const level of ALL_LEVELS) {
        const info = LEVEL_INFO[level];
        if (
            needle === String(level) ||
            needle === info.label.toLowerCase() ||
            needle === info.shortCode.toLowerCase()
        ) {
            return level;
        }
    }
    return null;
}

export function isHighAcuity(level: Level): boolean {
    return level === Level.Resuscitation || level === Level.Emergent;
}

export function isLowAcuity(level: Level): boolean {
    return level === Level.LessUrgent || level === Level.NonUrgent;
}

/** -1 when `a` is more acute than `b`, 1 when less acute, 0 when equal. */
export function compareLevels(a: Level, b: Level): -1 | 0 | 1 {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function moreAcuteThan(a: Level, b: Level): boolean {
    return a < b;
}

export function lessAcuteThan(a: Level, b: Level): boolean {
    return a > b;
}

export function levelDistance(a: Level, b: Level): number {
    return Math.abs(a - b);
}

/** Counts per level; keys 1..5 are always present. */
export function levelCounts(levels: readonly Level[]): Record<Level, number> {
    const counts: Record<Level, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    for (const level of levels) {
        counts[level]++;
    }
    return counts;
}

export function levelProportions(levels: readonly Level[]): Record<Level, number> {
    const counts = levelCounts(levels);
    const total = levels.length;
    const proportions: Record<Level, number> = { 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 };
    if (total > 0) {
        for (const level of ALL_LEVELS) {
            proportions[level] = counts[level] / total;
        }
    }
    return proportions;
}

export function countHighAcuity(levels: readonly Level[]): number {
    return levels.filter(isHighAcuity).length;
}

export function countLowAcuity(levels: readonly Level[]): number {
    return levels.filter(isLowAcuity).length;
}
