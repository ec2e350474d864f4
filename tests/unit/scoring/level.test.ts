import { describe, it, expect } from 'vitest';
import {
    compareLevels,
    countHighAcuity,
    countLowAcuity,
    fromScore,
    isHighAcuity,
    isLowAcuity,
    Level,
    lessAcuteThan,
    levelCounts,
    levelDescription,
    levelDistance,
    levelFromInt,
    levelLabel,
    levelProportions,
    moreAcuteThan,
    parseLevel,
    recommendedActions,
    shortCode,
    waitTimeMinutes,
} from '../../../src/scoring/level.js';
import { DEFAULT_PARAMS } from '../../../src/scoring/params.js';

describe('Level', () => {
    describe('fromScore', () => {
        it('should classify 0.72 as Emergent with default thresholds', () => {
            expect(fromScore(0.72, DEFAULT_PARAMS)).toBe(Level.Emergent);
        });

        it('should give a score equal to a threshold the more urgent level', () => {
            expect(fromScore(0.85, DEFAULT_PARAMS)).toBe(1);
            expect(fromScore(0.6, DEFAULT_PARAMS)).toBe(2);
            expect(fromScore(0.35, DEFAULT_PARAMS)).toBe(3);
            expect(fromScore(0.15, DEFAULT_PARAMS)).toBe(4);
        });

        it('should cover the whole unit interval', () => {
            expect(fromScore(1, DEFAULT_PARAMS)).toBe(1);
            expect(fromScore(0.1499, DEFAULT_PARAMS)).toBe(5);
            expect(fromScore(0, DEFAULT_PARAMS)).toBe(5);
        });

        it('should never become more urgent as the score decreases', () => {
            let previous = fromScore(1, DEFAULT_PARAMS);
            for (let s = 1; s >= 0; s -= 0.01) {
                const level = fromScore(s, DEFAULT_PARAMS);
                expect(level).toBeGreaterThanOrEqual(previous);
                previous = level;
            }
        });
    });

    describe('labels and guidance', () => {
        it('should label every level', () => {
            expect(levelLabel(1)).toBe('Resuscitation');
            expect(levelLabel(2)).toBe('Emergent');
            expect(levelLabel(3)).toBe('Urgent');
            expect(levelLabel(4)).toBe('Less urgent');
            expect(levelLabel(5)).toBe('Non-urgent');
        });

        it('should expose short codes and target waits', () => {
            expect(shortCode(4)).toBe('L');
            expect(waitTimeMinutes(1)).toBe(0);
            expect(waitTimeMinutes(5)).toBe(240);
            expect(levelDescription(2)).toBe('High risk; should be seen within 15 minutes.');
        });

        it('should return a fresh copy of recommended actions', () => {
            const actions = recommendedActions(3);
            actions.push('extra');
            expect(recommendedActions(3)).toHaveLength(3);
        });
    });

    describe('parseLevel', () => {
        it('should accept digits, labels and short codes', () => {
            expect(parseLevel('5')).toBe(5);
            expect(parseLevel(' Emergent ')).toBe(2);
            expect(parseLevel('less urgent')).toBe(4);
            expect(parseLevel('u')).toBe(3);
        });

        it('should return null for anything else', () => {
            expect(parseLevel('6')).toBeNull();
            expect(parseLevel('critical')).toBeNull();
            expect(parseLevel('')).toBeNull();
        });
    });

    it('should accept only integers 1..5 as levels', () => {
        expect(levelFromInt(3)).toBe(3);
        expect(levelFromInt(0)).toBeNull();
        expect(levelFromInt(2.5)).toBeNull();
        expect(levelFromInt(6)).toBeNull();
    });

    it('should order levels by acuity', () => {
        expect(compareLevels(1, 2)).toBe(-1);
        expect(compareLevels(4, 4)).toBe(0);
        expect(compareLevels(5, 3)).toBe(1);
        expect(moreAcuteThan(1, 3)).toBe(true);
        expect(lessAcuteThan(1, 3)).toBe(false);
        expect(levelDistance(1, 5)).toBe(4);
    });

    it('should group levels 1-2 as high and 4-5 as low acuity', () => {
        expect(isHighAcuity(2)).toBe(true);
        expect(isHighAcuity(3)).toBe(false);
        expect(isLowAcuity(3)).toBe(false);
        expect(isLowAcuity(4)).toBe(true);
        expect(countHighAcuity([1, 2, 3, 4, 5])).toBe(2);
        expect(countLowAcuity([1, 2, 3, 4, 5])).toBe(2);
    });

    it('should count and proportion levels with every key present', () => {
        expect(levelCounts([1, 1, 3])).toEqual({ 1: 2, 2: 0, 3: 1, 4: 0, 5: 0 });
        expect(levelProportions([1, 1, 3, 5])).toEqual({ 1: 0.5, 2: 0, 3: 0.25, 4: 0, 5: 0.25 });
        expect(levelProportions([])).toEqual({ 1: 0, 2: 0, 3: 0, 4: 0, 5: 0 });
    });
});
