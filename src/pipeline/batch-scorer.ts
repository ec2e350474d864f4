import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger.js';
import type { SchemaValidator } from '../contracts/schema-validator.js';
import type { Metrics } from '../metrics/counter.js';
import type { ScoringEngine } from '../scoring/engine.js';
import { levelFromInt } from '../scoring/level.js';
import type { Level } from '../scoring/level.js';
import { toTriageRecord } from '../export/result.js';
import type { TriageRecord } from '../export/result.js';
import { clampResourceCount, sanitizeVitals, validateVitals } from '../validation/vitals.js';
import { createVitals } from '../vitals/model.js';
import type { Vitals } from '../vitals/types.js';

export interface BatchScorerConfig {
    clamp: boolean;
}

export interface ScoredObservation {
    record: TriageRecord;
    referenceLevel?: Level;
}

/** Predicted and clinician-assigned levels for every scored item that carried a reference. */
export interface LevelPairs {
    predicted: Level[];
    reference: Level[];
}

interface Observation {
    vitals: Vitals;
    resourceCount: number;
    id: string;
    timestamp: string;
    referenceLevel?: Level;
}

function field(data: object, key: string): unknown {
    return key in data ? Reflect.get(data, key) : undefined;
}

function numberOr(value: unknown, fallback: number): number {
    return typeof value === 'number' ? value : fallback;
}

/** Keeps the scored items that carried a reference level. */
export function levelPairs(scored: readonly ScoredObservation[]): LevelPairs {
    const pairs: LevelPairs = { predicted: [], reference: [] };
    for (const item of scored) {
        if (item.referenceLevel !== undefined) {
            pairs.predicted.push(item.record.level);
            pairs.reference.push(item.referenceLevel);
        }
    }
    return pairs;
}

/** Accepts a bare array or an `{ observations: [...] }` envelope; null otherwise. */
export function extractObservations(data: unknown): unknown[] | null {
    if (Array.isArray(data)) {
        return data;
    }
    if (typeof data === 'object' && data !== null) {
        const observations = field(data, 'observations');
        if (Array.isArray(observations)) {
            return observations;
        }
    }
    return null;
}

export class BatchScorer {
    constructor(
        private validator: SchemaValidator,
        private engine: ScoringEngine,
        private metrics: Metrics,
        private config: BatchScorerConfig,
    ) { }

    /**
     * Validates, optionally clamps and scores each observation. Items that fail
     * the observation contract, or carry out-of-bounds vitals with clamping
     * off, are dropped and counted.
     */
    scoreObservations(input: readonly unknown[]): TriageRecord[] {
        return this.score(input).map((item) => item.record);
    }

    score(input: readonly unknown[]): ScoredObservation[] {
        const accepted: Observation[] = [];
        for (const item of input) {
            const observation = this.accept(item);
            if (observation) {
                accepted.push(observation);
            }
        }

        const results = this.engine.evaluateBatch(
            accepted.map((o) => o.vitals),
            accepted.map((o) => o.resourceCount),
        );
        if (results === null) {
            return [];
        }
        this.metrics.incrementScored(results.length);

        return accepted.map((o, i) => {
            const scored: ScoredObservation = {
                record: toTriageRecord(o.vitals, o.resourceCount, results[i], { id: o.id, timestamp: o.timestamp }),
            };
            if (o.referenceLevel !== undefined) {
                scored.referenceLevel = o.referenceLevel;
            }
            return scored;
        });
    }

    private accept(data: unknown): Observation | null {
        this.metrics.incrementReceived();

        const validationResult = this.validator.validateObservation(data);
        if (!validationResult.valid || typeof data !== 'object' || data === null) {
            logger.warn({ errors: validationResult.errors, data }, 'Schema validation failed');
            this.metrics.incrementDroppedInvalid();
            return null;
        }

        this.metrics.incrementValidated();

        const rawId = field(data, 'id');
        const id = typeof rawId === 'string' ? rawId : uuidv4();
        const rawTimestamp = field(data, 'timestamp');
        const timestamp = typeof rawTimestamp === 'string' ? rawTimestamp : new Date().toISOString();

        let vitals = createVitals({
            hr: numberOr(field(data, 'hr'), 0),
            rr: numberOr(field(data, 'rr'), 0),
            sbp: numberOr(field(data, 'sbp'), 0),
            dbp: numberOr(field(data, 'dbp'), 0),
            temp: numberOr(field(data, 'temp'), 0),
            spo2: numberOr(field(data, 'spo2'), 0),
            gcs: numberOr(field(data, 'gcs'), 0),
        });
        let resourceCount = numberOr(field(data, 'resource_count'), 0);
        const maxResources = this.engine.params.maxResources;

        if (this.config.clamp) {
            const sanitized = sanitizeVitals(vitals);
            const clampedCount = clampResourceCount(resourceCount, maxResources);
            if (sanitized.changed || clampedCount !== resourceCount) {
                logger.info(
                    { id, fields: sanitized.report.fields, resourceCount, clampedCount },
                    'Observation clamped into bounds',
                );
                this.metrics.incrementClamped();
            }
            vitals = sanitized.vitals;
            resourceCount = clampedCount;
        } else {
            const report = validateVitals(vitals);
            if (!report.valid) {
                logger.warn({ id, fields: report.fields }, 'Vitals out of bounds, observation dropped');
                this.metrics.incrementDroppedInvalid();
                return null;
            }
        }

        const observation: Observation = { vitals, resourceCount, id, timestamp };
        const reference = levelFromInt(numberOr(field(data, 'reference_level'), 0));
        if (reference !== null) {
            observation.referenceLevel = reference;
        }
        return observation;
    }
}
