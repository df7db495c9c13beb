/**
 * Economy Core - Type Definitions
 */

import { AllocationUpdate, PriceSample, RevenueSplit } from '../buyback/types';
import { EconomyConfig } from '../config/economy';
import { Clock } from '../core/clock';
import { MintReceipt, RateAdjustment } from '../emission/types';
import { PriceOracle, RewardNotifier, TokenLedger } from '../integrations/types';
import { LoyaltyStatus } from '../loyalty/types';
import { ReferralEarnings, ReferralOutcome } from '../referral/types';
import { ClaimReceipt, RewardBreakdown, TradingStats } from '../rewards/types';
import { MergeResult, StakePosition, StakingInfo, UnstakeResult } from '../staking/types';
import { TierMatch } from '../tiers/types';

/**
 * Accounts the core moves tokens between on its own behalf.
 */
export interface SystemAddresses {
    /** Holds staked tokens */
    stakingVault: string;

    /** Pays claimed rewards, receives the non-burned buyback share */
    rewardPool: string;

    /** Holds revenue and bought-back tokens before they are distributed */
    treasury: string;
}

export interface EconomyCoreOptions {
    ledger: TokenLedger;
    oracle: PriceOracle;
    addresses: SystemAddresses;
    config?: EconomyConfig;
    clock?: Clock;
    notifier?: RewardNotifier;
    /** Start of the emission windows and schedule; defaults to clock.now() */
    genesisTime?: number;
    /** Stake position id source */
    nextPositionId?: () => string;
}

export interface AccountSnapshot {
    account: string;
    pendingRewards: bigint;
    claimedRewards: bigint;
    lastClaimTime: number | null;
    nextClaimTime: number | null;
    referrer: string | null;
    referral: ReferralEarnings;
    tier: TierMatch;
    loyalty: LoyaltyStatus;
    trading: TradingStats;
    staking: StakingInfo;
    votingPower: bigint;
    timestamp: number;
}

export interface EconomyEventMap {
    rewardAccrued: RewardBreakdown;
    referralSkipped: { account: string } & ReferralOutcome;
    rewardPaid: ClaimReceipt;
    staked: StakePosition;
    unstaked: UnstakeResult;
    stakesMerged: MergeResult;
    emissionMinted: MintReceipt & { to: string; scheduled: boolean };
    emissionRateAdjusted: RateAdjustment;
    priceRecorded: PriceSample;
    buybackExecuted: RevenueSplit;
    allocationUpdated: AllocationUpdate;
}

export type EconomyEventName = keyof EconomyEventMap;
