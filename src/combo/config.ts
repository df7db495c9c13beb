/**
 * Combo Tracker - Configuration
 */

import { SECONDS_PER_DAY } from '../config/constants';
import { ComboConfig } from './types';

export type { ComboConfig } from './types';

export const DEFAULT_COMBO_CONFIG: ComboConfig = {
    // 24h between trades keeps the chain alive
    windowSeconds: SECONDS_PER_DAY,

    // +0.5x per consecutive trade
    stepBps: 5_000n,

    // 3x ceiling
    maxMultiplierBps: 30_000n,
};

export function createComboConfig(overrides: Partial<ComboConfig>): ComboConfig {
    return {
        ...DEFAULT_COMBO_CONFIG,
        ...overrides,
    };
}
