import { VITAL_KEYS } from '../vitals/types.js';
import type { VitalWeights } from '../vitals/types.js';

/**
 * Shape of a parameter set as seen by validation. Kept separate from the
 * scoring module's Params so this module does not import the engine.
 */
export interface ParamsLike {
    readonly vitalWeights: VitalWeights;
    readonly maxResources: number;
    readonly resourceWeight: number;
    readonly t1: number;
    readonly t2: number;
    readonly t3: number;
    readonly t4: number;
}

export interface ParamsReport {
    valid: boolean;
    weightsOk: boolean;
    thresholdsOk: boolean;
    maxResourcesOk: boolean;
    resourceWeightOk: boolean;
}

export function paramsReport(p: ParamsLike): ParamsReport {
    const weightsOk = VITAL_KEYS.every((key) => {
        const w = p.vitalWeights[key];
        return Number.isFinite(w) && w >= 0 && w <= 1;
    });
    const maxResourcesOk = p.maxResources >= 0;
    const resourceWeightOk = Number.isFinite(p.resourceWeight) && p.resourceWeight >= 0;
    const thresholdsOk = p.t1 > p.t2 && p.t2 > p.t3 && p.t3 > p.t4 && p.t4 > 0 && p.t1 <= 1;

    return {
        valid: weightsOk && maxResourcesOk && resourceWeightOk && thresholdsOk,
        weightsOk,
        thresholdsOk,
        maxResourcesOk,
        resourceWeightOk,
    };
}

export function paramsValid(p: ParamsLike): boolean {
    return paramsReport(p).valid;
}
