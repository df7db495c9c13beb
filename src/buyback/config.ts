/**
 * Buyback Engine - Configuration
 */

import { SECONDS_PER_DAY, SECONDS_PER_WEEK, tokens } from '../config/constants';
import { BuybackConfig, BuybackState, PriceHistoryConfig } from './types';

export type { BuybackConfig, PriceHistoryConfig } from './types';

export const DEFAULT_PRICE_HISTORY_CONFIG: PriceHistoryConfig = {
    shortWindowSeconds: 30 * SECONDS_PER_DAY,
    longWindowSeconds: 90 * SECONDS_PER_DAY,
    minShortSamples: 7,
    minLongSamples: 14,
    // 90 days of 30-minute samples
    capacity: 4_320,
};

export const DEFAULT_BUYBACK_CONFIG: BuybackConfig = {
    minBuybackAmount: tokens(1_000),

    uptrendDeviationFactor: 2n,
    uptrendMaxBonusBps: 2_000n,
    downtrendDeviationFactor: 4n,
    downtrendMaxBonusBps: 4_000n,

    pauseThresholdBps: 12_000n,

    allocation: {
        discountBelowBps: 9_000n,
        premiumAboveBps: 11_000n,
        discountAllocationBps: 4_000n,
        neutralAllocationBps: 2_000n,
        premiumAllocationBps: 1_000n,
    },
    initialAllocationBps: 2_000n,
    allocationCooldownSeconds: SECONDS_PER_WEEK,

    burnShareBps: 5_000n,

    history: DEFAULT_PRICE_HISTORY_CONFIG,
};

export function createBuybackState(config: BuybackConfig): BuybackState {
    return {
        allocationBps: config.initialAllocationBps,
        lastAllocationTime: null,
        totalRevenue: 0n,
        totalBoughtBack: 0n,
        totalBurned: 0n,
        totalToRewardPool: 0n,
        totalToTreasury: 0n,
        executions: 0,
    };
}
