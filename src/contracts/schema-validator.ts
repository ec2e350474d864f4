import Ajv2020Lib from 'ajv/dist/2020.js';
import addFormatsLib from 'ajv-formats';
import type { SchemaObject } from 'ajv';

const Ajv2020 = Ajv2020Lib.default;
const addFormats = addFormatsLib.default;
import { readFileSync, existsSync, readdirSync } from 'fs';
import { join } from 'path';
import { logger } from '../config/logger.js';

export const OBSERVATION_SCHEMA_ID = 'https://acuity-triage.example.com/schemas/observation.json';
export const TRIAGE_RESULT_SCHEMA_ID = 'https://acuity-triage.example.com/schemas/triage-result.json';

export interface ValidationResult {
    valid: boolean;
    errors?: string;
}

function hasSchemaId(schema: unknown): schema is SchemaObject & { $id: string } {
    return typeof schema === 'object' && schema !== null && '$id' in schema && typeof schema.$id === 'string';
}

export class SchemaValidator {
    private ajv: InstanceType<typeof Ajv2020>;
    private schemasLoaded = false;

    constructor(private contractsPath: string) {
        this.ajv = new Ajv2020({
            validateSchema: false,
            strict: false,
            allErrors: true,
        });
        addFormats(this.ajv);
    }

    get loaded(): boolean {
        return this.schemasLoaded;
    }

    /**
     * Load all JSON schemas from the contracts directory
     */
    loadSchemas(): void {
        if (!existsSync(this.contractsPath)) {
            logger.error({ path: this.contractsPath }, 'Contracts directory not found');
            return;
        }

        const files = this.getAllJsonFiles(this.contractsPath);
        logger.info({ count: files.length, path: this.contractsPath }, 'Loading schemas');

        files.forEach((file) => {
            try {
                const schema: unknown = JSON.parse(readFileSync(file, 'utf-8'));

                if (hasSchemaId(schema)) {
                    this.ajv.addSchema(schema);
                    logger.debug({ $id: schema.$id, file }, 'Schema loaded');
                } else {
                    logger.warn({ file }, 'Schema missing $id, skipped');
                }
            } catch (err) {
                logger.error({ file, error: err }, 'Failed to load schema');
            }
        });

        this.schemasLoaded = true;
        logger.info('All schemas loaded successfully');
    }

    /**
     * Recursively get all JSON files from a directory
     */
    private getAllJsonFiles(dir: string): string[] {
        const files: string[] = [];

        try {
            const entries = readdirSync(dir, { withFileTypes: true });

            for (const entry of entries) {
                const fullPath = join(dir, entry.name);

                if (entry.isDirectory()) {
                    files.push(...this.getAllJsonFiles(fullPath));
                } else if (entry.isFile() && entry.name.endsWith('.json')) {
                    files.push(fullPath);
                }
            }
        } catch (err) {
            logger.error({ dir, error: err }, 'Failed to read directory');
        }

        return files.sort();
    }

    /**
     * Validate data against a schema by its $id
     */
    validate(id: string, data: unknown): ValidationResult {
        if (!this.schemasLoaded) {
            logger.warn('Schemas not loaded, validation will fail');
            return {
                valid: false,
                errors: 'Schemas not loaded',
            };
        }

        const validateFn = this.ajv.getSchema(id);

        if (!validateFn) {
            logger.error({ schemaId: id }, 'Schema not found');
            return {
                valid: false,
                errors: `Schema not found: ${id}`,
            };
        }

        if (!validateFn(data)) {
            return {
                valid: false,
                errors: this.ajv.errorsText(validateFn.errors),
            };
        }

        return { valid: true };
    }

    /**
     * Validate one input observation
     */
    validateObservation(data: unknown): ValidationResult {
        return this.validate(OBSERVATION_SCHEMA_ID, data);
    }

    /**
     * Validate one exported triage record
     */
    validateTriageResult(data: unknown): ValidationResult {
        return this.validate(TRIAGE_RESULT_SCHEMA_ID, data);
    }
}
