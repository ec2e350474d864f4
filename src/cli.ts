#!/usr/bin/env node
import { readFile, writeFile } from 'fs/promises';
import { loadConfig } from './config/env.js';
import { logger } from './config/logger.js';
import { SchemaValidator } from './contracts/schema-validator.js';
import { ConfusionMatrix, weightedKappa } from './evaluation/agreement.js';
import { computeLevelStats, computeScoreStats } from './evaluation/statistics.js';
import { batchToJson, createBatch, recordsToCsv } from './export/result.js';
import { Metrics } from './metrics/counter.js';
import { BatchScorer, extractObservations, levelPairs } from './pipeline/batch-scorer.js';
import { createEngine } from './scoring/engine.js';
import { ParamsBuilder, presetParams } from './scoring/params.js';
import { paramsReport } from './validation/params.js';

async function main() {
    const config = loadConfig();
    logger.info({ config }, 'Configuration loaded');

    const inputPath = process.argv[2];
    if (!inputPath) {
        throw new Error('Usage: acuity-triage <observations.json>');
    }

    const validator = new SchemaValidator(config.contracts.path);
    validator.loadSchemas();
    if (!validator.loaded) {
        throw new Error(`No contracts loaded from ${config.contracts.path}`);
    }

    const params = new ParamsBuilder(presetParams(config.scoring.preset))
        .setMaxResources(config.scoring.maxResources)
        .build();
    const report = paramsReport(params);
    if (!report.valid) {
        throw new Error(`Invalid parameter set: ${JSON.stringify(report)}`);
    }
    const engine = createEngine(config.scoring.preset, config.scoring.population).withParams(params);

    const input: unknown = JSON.parse(await readFile(inputPath, 'utf-8'));
    const observations = extractObservations(input);
    if (observations === null) {
        throw new Error(`${inputPath}: expected an array of observations or { "observations": [...] }`);
    }

    const metrics = new Metrics();
    const scorer = new BatchScorer(validator, engine, metrics, { clamp: config.input.clamp });
    const scored = scorer.score(observations);
    const records = scored.map((item) => item.record);

    const output =
        config.output.format === 'csv' ? recordsToCsv(records) : `${batchToJson(createBatch(records, inputPath))}\n`;
    if (config.output.path) {
        await writeFile(config.output.path, output, 'utf-8');
        logger.info({ path: config.output.path, format: config.output.format }, 'Results written');
    } else {
        process.stdout.write(output);
    }

    logger.info({ counters: metrics.getCounters() }, 'Run counters');
    logger.info({ stats: computeScoreStats(records.map((r) => r.acuity)) }, 'Score statistics');
    logger.info({ levels: computeLevelStats(records.map((r) => r.level)) }, 'Level distribution');

    const pairs = levelPairs(scored);
    if (pairs.predicted.length > 0) {
        const matrix = ConfusionMatrix.fromLevels(pairs.predicted, pairs.reference);
        logger.info(
            {
                n: matrix.total,
                accuracy: matrix.overallAccuracy(),
                kappa: matrix.cohenKappa(),
                weightedKappa: weightedKappa(pairs.predicted, pairs.reference),
                macroSensitivity: matrix.macroSensitivity(),
            },
            'Agreement with reference levels',
        );
    }
}

main().catch((err) => {
    logger.error({ error: err }, 'Fatal error');
    process.exit(1);
});
