import { config } from 'dotenv';

// Load .env file if present
config();

export type PresetName = 'default' | 'strict' | 'lenient' | 'research';
export type Population = 'adult' | 'pediatric';
export type OutputFormat = 'json' | 'csv';

export const PRESET_NAMES: readonly PresetName[] = ['default', 'strict', 'lenient', 'research'];
export const POPULATIONS: readonly Population[] = ['adult', 'pediatric'];
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'csv'];

export interface AppConfig {
    scoring: {
        preset: PresetName;
        population: Population;
        maxResources: number;
    };
    input: {
        clamp: boolean;
    };
    contracts: {
        path: string;
    };
    output: {
        format: OutputFormat;
        path: string | undefined;
    };
    log: {
        level: string;
    };
}

function getEnv(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

function getEnvNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid number for environment variable ${key}: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) return defaultValue;
    switch (value.toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw new Error(`Invalid boolean for environment variable ${key}: ${value}`);
    }
}

function getEnvChoice<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
    const value = process.env[key];
    if (!value) return defaultValue;
    const match = choices.find((choice) => choice === value.toLowerCase());
    if (match === undefined) {
        throw new Error(
            `Invalid value for environment variable ${key}: ${value} (expected one of ${choices.join(', ')})`,
        );
    }
    return match;
}

export function loadConfig(): AppConfig {
    return {
        scoring: {
            preset: getEnvChoice('TRIAGE_PRESET', PRESET_NAMES, 'default'),
            population: getEnvChoice('TRIAGE_POPULATION', POPULATIONS, 'adult'),
            maxResources: getEnvNumber('TRIAGE_MAX_RESOURCES', 6),
        },
        input: {
            clamp: getEnvBoolean('TRIAGE_CLAMP_INPUTS', true),
        },
        contracts: {
            path: getEnv('CONTRACTS_PATH', './contracts'),
        },
        output: {
            format: getEnvChoice('OUTPUT_FORMAT', OUTPUT_FORMATS, 'json'),
            path: process.env.OUTPUT_PATH || undefined,
        },
        log: {
            level: getEnv('LOG_LEVEL', 'info'),
        },
    };
}
