export * from './vitals/types.js';
export * from './vitals/model.js';
export * from './vitals/ranges.js';
export * from './scoring/level.js';
export * from './scoring/params.js';
export * from './scoring/formula.js';
export * from './scoring/engine.js';
export * from './scoring/results.js';
export * from './validation/vitals.js';
export * from './validation/params.js';
export * from './evaluation/agreement.js';
export * as stats from './evaluation/statistics.js';
export * from './export/result.js';
export * from './contracts/schema-validator.js';
export * from './metrics/counter.js';
export * from './pipeline/batch-scorer.js';
export { loadConfig } from './config/env.js';
export type { AppConfig, OutputFormat, Population, PresetName } from './config/env.js';
