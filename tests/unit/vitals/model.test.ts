import { describe, it, expect } from 'vitest';
import {
    createVitals,
    deviation,
    isPresent,
    presentCount,
    vitalsFromValues,
    vitalsToValues,
    zeroVitals,
} from '../../../src/vitals/model.js';

describe('Vitals model', () => {
    describe('createVitals', () => {
        it('should default unspecified vitals to 0', () => {
            expect(createVitals({ hr: 90 })).toEqual({
                hr: 90,
                rr: 0,
                sbp: 0,
                dbp: 0,
                temp: 0,
                spo2: 0,
                gcs: 0,
            });
        });

        it('should produce an all-missing record from zeroVitals', () => {
            expect(presentCount(zeroVitals())).toBe(0);
        });
    });

    describe('isPresent', () => {
        it('should treat 0 as missing for every vital', () => {
            expect(isPresent('hr', 0)).toBe(false);
            expect(isPresent('temp', 0)).toBe(false);
        });

        it('should treat negative integer vitals as missing', () => {
            expect(isPresent('hr', -5)).toBe(false);
            expect(isPresent('gcs', -1)).toBe(false);
        });

        it('should treat a negative temperature as present', () => {
            expect(isPresent('temp', -1)).toBe(true);
        });
    });

    describe('deviation', () => {
        it('should be 0 at the midpoint', () => {
            expect(deviation(80, 80, 40)).toBe(0);
        });

        it('should be 1 at the edge of the range and saturate beyond it', () => {
            expect(deviation(120, 80, 40)).toBe(1);
            expect(deviation(40, 80, 40)).toBe(1);
            expect(deviation(200, 80, 40)).toBe(1);
        });

        it('should be symmetric around the midpoint', () => {
            expect(deviation(70, 80, 40)).toBe(0.25);
            expect(deviation(90, 80, 40)).toBe(0.25);
        });

        it('should be 0 for a non-positive half-width', () => {
            expect(deviation(150, 80, 0)).toBe(0);
            expect(deviation(150, 80, -10)).toBe(0);
        });
    });

    it('should count present vitals including a negative temperature', () => {
        expect(presentCount(createVitals({ hr: 90, temp: -1, rr: -3 }))).toBe(2);
    });

    it('should convert between records and value tuples in field order', () => {
        const v = createVitals({ hr: 1, rr: 2, sbp: 3, dbp: 4, temp: 5, spo2: 6, gcs: 7 });
        expect(vitalsToValues(v)).toEqual([1, 2, 3, 4, 5, 6, 7]);
        expect(vitalsFromValues([1, 2, 3, 4, 5, 6, 7])).toEqual(v);
    });
});
