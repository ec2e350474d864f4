import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import { fileURLToPath } from 'url';
import { SchemaValidator } from '../../../src/contracts/schema-validator.js';
import { Metrics } from '../../../src/metrics/counter.js';
import { BatchScorer, extractObservations, levelPairs } from '../../../src/pipeline/batch-scorer.js';
import { createEngine } from '../../../src/scoring/engine.js';

const contractsDir = fileURLToPath(new URL('../../../contracts', import.meta.url));
const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('BatchScorer', () => {
    let validator: SchemaValidator;
    let metrics: Metrics;

    beforeAll(() => {
        validator = new SchemaValidator(contractsDir);
        validator.loadSchemas();
    });

    beforeEach(() => {
        metrics = new Metrics();
        vi.restoreAllMocks();
    });

    function scorer(clamp = true): BatchScorer {
        return new BatchScorer(validator, createEngine(), metrics, { clamp });
    }

    describe('Scoring', () => {
        it('should score a valid observation and keep its id and timestamp', () => {
            const records = scorer().scoreObservations([
                {
                    id: 'p-1',
                    timestamp: '2026-03-01T10:00:00Z',
                    hr: 120,
                    rr: 24,
                    sbp: 90,
                    spo2: 92,
                    resource_count: 3,
                },
            ]);

            expect(records).toHaveLength(1);
            expect(records[0].id).toBe('p-1');
            expect(records[0].timestamp).toBe('2026-03-01T10:00:00Z');
            expect(records[0].level).toBe(2);
            expect(records[0].level_label).toBe('Emergent');
            expect(records[0].acuity).toBeCloseTo(0.7622, 4);
            expect(metrics.getCounters()).toEqual({
                received: 1,
                validated: 1,
                clamped: 0,
                scored: 1,
                dropped_invalid: 0,
            });
        });

        it('should assign a uuid and the current time when missing', () => {
            const before = Date.now();
            const [record] = scorer().scoreObservations([{ hr: 90, resource_count: 1 }]);
            expect(record.id).toMatch(UUID_PATTERN);
            expect(Date.parse(record.timestamp ?? '')).toBeGreaterThanOrEqual(before - 1000);
        });

        it('should keep input order when items are dropped', () => {
            const records = scorer().scoreObservations([
                { id: 'a', hr: 90, resource_count: 1 },
                { id: 'bad', hr: 'fast', resource_count: 1 },
                { id: 'b', spo2: 88, resource_count: 2 },
            ]);
            expect(records.map((r) => r.id)).toEqual(['a', 'b']);
        });

        it('should score an empty input as no records', () => {
            expect(scorer().scoreObservations([])).toEqual([]);
            expect(metrics.getCounters().scored).toBe(0);
        });
    });

    describe('Validation', () => {
        it('should drop items failing the observation contract', () => {
            const records = scorer().scoreObservations([{ hr: 90 }, 'not an object', null]);
            expect(records).toEqual([]);
            expect(metrics.getCounters()).toEqual({
                received: 3,
                validated: 0,
                clamped: 0,
                scored: 0,
                dropped_invalid: 3,
            });
        });

        it('should validate each item through the observation contract', () => {
            const spy = vi.spyOn(validator, 'validateObservation');
            scorer().scoreObservations([{ resource_count: 1 }, { resource_count: 2 }]);
            expect(spy).toHaveBeenCalledTimes(2);
            expect(spy).toHaveBeenCalledWith({ resource_count: 1 });
        });
    });

    describe('Clamping', () => {
        it('should clamp out-of-bounds vitals and resource counts when enabled', () => {
            const [record] = scorer(true).scoreObservations([{ id: 'c', hr: 350, resource_count: 10 }]);
            expect(record.hr).toBe(300);
            expect(record.resource_count).toBe(6);
            expect(record.level).toBe(1);
            expect(metrics.getCounters().clamped).toBe(1);
        });

        it('should clamp a GCS above 15 instead of dropping it', () => {
            const records = scorer(true).scoreObservations([
                { id: 's', spo2: 120, resource_count: 1 },
                { id: 'g', gcs: 16, resource_count: 1 },
            ]);
            expect(records.map((r) => `${r.id}:${r.spo2}:${r.gcs}`)).toEqual(['s:100:0', 'g:0:15']);
            expect(metrics.getCounters()).toMatchObject({ validated: 2, clamped: 2, dropped_invalid: 0, scored: 2 });
        });

        it('should leave in-bounds observations unclamped', () => {
            scorer(true).scoreObservations([{ hr: 100, resource_count: 6 }]);
            expect(metrics.getCounters().clamped).toBe(0);
        });

        it('should drop out-of-bounds vitals when clamping is disabled', () => {
            const records = scorer(false).scoreObservations([
                { id: 'x', hr: 350, resource_count: 1 },
                { id: 'y', hr: 100, resource_count: 1 },
            ]);
            expect(records.map((r) => r.id)).toEqual(['y']);
            expect(metrics.getCounters()).toMatchObject({ validated: 2, dropped_invalid: 1, scored: 1 });
        });
    });

    describe('Reference levels', () => {
        it('should pair predicted levels with reference levels where given', () => {
            const scored = scorer().score([
                { id: 'r1', hr: 120, rr: 24, sbp: 90, spo2: 92, resource_count: 3, reference_level: 2 },
                { id: 'r2', resource_count: 0 },
                { id: 'r3', resource_count: 0, reference_level: 4 },
            ]);
            expect(scored.map((s) => s.referenceLevel)).toEqual([2, undefined, 4]);
            expect(levelPairs(scored)).toEqual({ predicted: [2, 5], reference: [2, 4] });
        });
    });
});

describe('extractObservations', () => {
    it('should accept a bare array or an observations envelope', () => {
        expect(extractObservations([{ resource_count: 1 }])).toEqual([{ resource_count: 1 }]);
        expect(extractObservations({ observations: [] })).toEqual([]);
    });

    it('should return null for anything else', () => {
        expect(extractObservations({ items: [] })).toBeNull();
        expect(extractObservations('[]')).toBeNull();
        expect(extractObservations(null)).toBeNull();
    });
});
