/**
 * Emission Controller - Type Definitions
 */

export type EmissionWindowName = 'daily' | 'weekly' | 'monthly';

export interface EmissionWindow {
    /** Minted since `startTime` */
    readonly minted: bigint;
    readonly startTime: number;
}

export interface EmissionState {
    readonly baseRatePerDay: bigint;
    readonly totalSupply: bigint;
    readonly totalMinted: bigint;
    readonly totalBurned: bigint;
    readonly windows: Readonly<Record<EmissionWindowName, EmissionWindow>>;
    readonly lastAdjustmentTime: number | null;
    readonly lastScheduledMintTime: number;
}

export interface EmissionConfig {
    dailyLimit: bigint;
    weeklyLimit: bigint;
    monthlyLimit: bigint;

    /** Hard supply ceiling */
    maxSupply: bigint;

    /** Supply at genesis */
    initialSupply: bigint;

    /** Base emission rate at genesis and its bounds (units per day) */
    baseRatePerDay: bigint;
    minRatePerDay: bigint;
    maxRatePerDay: bigint;

    /** 7-day volatility above this reduces the rate (bps) */
    highVolatilityBps: bigint;

    /** 7-day volatility below this increases the rate (bps) */
    lowVolatilityBps: bigint;

    /** Largest single reduction (bps of the current rate) */
    maxVolatilityReductionBps: bigint;

    /** Fixed increase in calm markets (bps of the current rate) */
    lowVolatilityIncreaseBps: bigint;

    /** Minimum seconds between two rate adjustments */
    adjustmentIntervalSeconds: number;
}

export type RateAdjustmentAction = 'reduced' | 'increased' | 'unchanged';

export interface RateAdjustment {
    volatility7dBps: bigint;
    action: RateAdjustmentAction;
    /** Requested change before clamping (bps of the previous rate) */
    changeBps: bigint;
    previousRate: bigint;
    newRate: bigint;
    clamped: boolean;
    timestamp: number;
}

export interface MintReceipt {
    amount: bigint;
    totalSupply: bigint;
    windows: Record<EmissionWindowName, bigint>;
    timestamp: number;
}

export interface EmissionSnapshot {
    baseRatePerDay: bigint;
    totalSupply: bigint;
    totalMinted: bigint;
    totalBurned: bigint;
    /** Materialized as of the snapshot time */
    minted: Record<EmissionWindowName, bigint>;
    remaining: Record<EmissionWindowName, bigint>;
    remainingSupply: bigint;
    scheduledDue: bigint;
    lastAdjustmentTime: number | null;
    nextAdjustmentTime: number | null;
}
