/**
 * Reward Engine - Type Definitions
 */

import { ComboConfig, ComboPhase, ComboState } from '../combo/types';
import { LoyaltyConfig } from '../loyalty/types';
import { ReferralConfig, ReferralEarnings, ReferralOutcome } from '../referral/types';

export type ActivityType = 'trading' | 'staking' | 'referral';

export const ACTIVITY_TYPES: readonly ActivityType[] = ['trading', 'staking', 'referral'];

/**
 * Per-account reward state. Replaced as a whole on every commit.
 */
export interface RewardAccount {
    readonly address: string;

    /** Loyalty anchor, write-once */
    readonly firstActivityTime: number | null;

    readonly pendingRewards: bigint;
    readonly claimedRewards: bigint;
    readonly lastClaimTime: number | null;

    readonly combo: ComboState;

    /** Immutable once set */
    readonly referrer: string | null;

    /** Earnings as a referrer */
    readonly referral: ReferralEarnings;

    readonly tradingVolume: bigint;
    readonly tradeCount: number;
}

export interface RewardConfig {
    /** Base reward rate per activity type (bps of the activity amount) */
    baseRates: Record<ActivityType, bigint>;

    /** Ceiling on the stacked multiplier (bps) */
    maxTotalMultiplierBps: bigint;

    /** Minimum seconds between two claims */
    claimCooldownSeconds: number;
}

export interface RewardEngineConfig {
    rewards: RewardConfig;
    combo: ComboConfig;
    loyalty: LoyaltyConfig;
    referral: ReferralConfig;
}

/**
 * Full reward computation trace for one activity.
 */
export interface RewardBreakdown {
    account: string;
    activityType: ActivityType;
    activityAmount: bigint;

    baseRateBps: bigint;
    baseReward: bigint;

    tierName: string;
    tierBonusBps: bigint;

    /** Combo multiplier applied to this activity (10000 for non-trading) */
    comboMultiplierBps: bigint;
    comboBonusBps: bigint;

    loyaltyBonusBps: bigint;

    /** 10000 + tier + combo + loyalty, before the cap */
    uncappedMultiplierBps: bigint;
    totalMultiplierBps: bigint;
    capped: boolean;

    rewardAmount: bigint;

    referral: ReferralOutcome | null;

    timestamp: number;
}

export interface TradingStats {
    account: string;
    tradingVolume: bigint;
    tradeCount: number;
    comboStreak: number;
    comboMultiplierBps: bigint;
    comboPhase: ComboPhase;
    /** Multiplier as stored, possibly stale */
    storedComboMultiplierBps: bigint;
}

export interface ClaimReceipt {
    account: string;
    amount: bigint;
    claimedRewards: bigint;
    timestamp: number;
}

/**
 * What the reward engine needs from staking.
 */
export interface StakeSource {
    getStakedAmount(account: string): bigint;
}
