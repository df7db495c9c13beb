/**
 * Emission Controller - Configuration
 */

import { SECONDS_PER_DAY, SECONDS_PER_MONTH, SECONDS_PER_WEEK, tokens } from '../config/constants';
import { EmissionConfig, EmissionWindowName } from './types';

export type { EmissionConfig } from './types';

export const WINDOW_SECONDS: Readonly<Record<EmissionWindowName, number>> = {
    daily: SECONDS_PER_DAY,
    weekly: SECONDS_PER_WEEK,
    monthly: SECONDS_PER_MONTH,
};

export const EMISSION_WINDOWS: readonly EmissionWindowName[] = ['daily', 'weekly', 'monthly'];

export const DEFAULT_EMISSION_CONFIG: EmissionConfig = {
    dailyLimit: tokens(100_000),
    weeklyLimit: tokens(500_000),
    monthlyLimit: tokens(1_500_000),

    maxSupply: tokens(1_000_000_000),
    initialSupply: 0n,

    baseRatePerDay: tokens(50_000),
    minRatePerDay: tokens(10_000),
    maxRatePerDay: tokens(100_000),

    // 20% 7d price range counts as high volatility, 5% as calm
    highVolatilityBps: 2_000n,
    lowVolatilityBps: 500n,

    // at most -20% per adjustment, +2% in calm markets
    maxVolatilityReductionBps: 2_000n,
    lowVolatilityIncreaseBps: 200n,

    adjustmentIntervalSeconds: SECONDS_PER_DAY,
};
