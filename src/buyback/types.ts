/**
 * Buyback Engine - Type Definitions
 */

export interface PriceSample {
    readonly timestamp: number;
    /** Quote-currency base units per whole token */
    readonly price: bigint;
}

export interface PriceHistoryConfig {
    /** Short trailing window (seconds) */
    shortWindowSeconds: number;

    /** Long trailing window, also the retention horizon (seconds) */
    longWindowSeconds: number;

    /** Samples required inside each window before averages are trusted */
    minShortSamples: number;
    minLongSamples: number;

    /** Hard cap on retained samples */
    capacity: number;
}

export type AllocationBand = 'discount' | 'neutral' | 'premium';

export interface AllocationBandConfig {
    /** price/avg90 below this (bps) is the discount band */
    discountBelowBps: bigint;

    /** price/avg90 above this (bps) is the premium band */
    premiumAboveBps: bigint;

    discountAllocationBps: bigint;
    neutralAllocationBps: bigint;
    premiumAllocationBps: bigint;
}

export interface BuybackConfig {
    /** Buyback amount at multiplier 1x */
    minBuybackAmount: bigint;

    /** Deviation multipliers and caps on the resulting bonus (bps) */
    uptrendDeviationFactor: bigint;
    uptrendMaxBonusBps: bigint;
    downtrendDeviationFactor: bigint;
    downtrendMaxBonusBps: bigint;

    /** Buybacks pause while price exceeds avg90 by this ratio (bps) */
    pauseThresholdBps: bigint;

    allocation: AllocationBandConfig;
    initialAllocationBps: bigint;
    allocationCooldownSeconds: number;

    /** Share of each buyback that is burned; the rest goes to the reward pool */
    burnShareBps: bigint;

    history: PriceHistoryConfig;
}

export interface TrailingAverages {
    avg30: bigint;
    avg90: bigint;
    shortSamples: number;
    longSamples: number;
}

export interface BuybackQuote {
    currentPrice: bigint;
    avg30: bigint;
    avg90: bigint;
    shortTermDeviationBps: bigint;
    isLongTermUptrend: boolean;
    multiplierBps: bigint;
    paused: boolean;
    amount: bigint;
    timestamp: number;
}

export interface AllocationUpdate {
    band: AllocationBand;
    priceRatioBps: bigint;
    previousAllocationBps: bigint;
    allocationBps: bigint;
    treasuryBps: bigint;
    timestamp: number;
}

export interface RevenueSplit {
    revenue: bigint;
    quote: BuybackQuote;
    allocationBps: bigint;
    buybackAmount: bigint;
    burnAmount: bigint;
    rewardPoolAmount: bigint;
    treasuryAmount: bigint;
    timestamp: number;
}

export interface BuybackState {
    readonly allocationBps: bigint;
    readonly lastAllocationTime: number | null;
    readonly totalRevenue: bigint;
    readonly totalBoughtBack: bigint;
    readonly totalBurned: bigint;
    readonly totalToRewardPool: bigint;
    readonly totalToTreasury: bigint;
    readonly executions: number;
}

export interface BuybackSnapshot extends BuybackState {
    treasuryBps: bigint;
    nextAllocationTime: number | null;
    sampleCount: number;
    latestSample: PriceSample | null;
}
