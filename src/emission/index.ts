/**
 * Emission Controller Module
 */

export type {
    EmissionConfig,
    EmissionState,
    EmissionWindow,
    EmissionWindowName,
    EmissionSnapshot,
    MintReceipt,
    RateAdjustment,
    RateAdjustmentAction,
} from './types';
export { DEFAULT_EMISSION_CONFIG, EMISSION_WINDOWS, WINDOW_SECONDS } from './config';
export { EmissionController, createEmissionState, materializeWindows } from './emissionController';
