/**
 * Economy Configuration
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * One object carrying every module's settings. Hosts set it once at startup;
 * nothing reads configuration per call.
 *
 * Overrides merge per module. Nested buyback groups (history, allocation bands)
 * merge field by field as well.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { DEFAULT_BUYBACK_CONFIG } from '../buyback/config';
import { AllocationBandConfig, BuybackConfig, PriceHistoryConfig } from '../buyback/types';
import { DEFAULT_COMBO_CONFIG } from '../combo/config';
import { ComboConfig } from '../combo/types';
import { EconomyError } from '../core/errors';
import { DEFAULT_EMISSION_CONFIG } from '../emission/config';
import { EmissionConfig } from '../emission/types';
import { DEFAULT_LOYALTY_CONFIG } from '../loyalty/config';
import { LoyaltyConfig } from '../loyalty/types';
import { DEFAULT_REFERRAL_CONFIG } from '../referral/config';
import { ReferralConfig } from '../referral/types';
import { DEFAULT_REWARD_CONFIG } from '../rewards/config';
import { ACTIVITY_TYPES, RewardConfig } from '../rewards/types';
import { DEFAULT_STAKING_CONFIG } from '../staking/config';
import { StakingConfig } from '../staking/types';
import { DEFAULT_TIER_CONFIG } from '../tiers/config';
import { validateTiers } from '../tiers/tierTable';
import { TierConfig } from '../tiers/types';
import { BASIS_POINTS, SECONDS_PER_HOUR, SECONDS_PER_WEEK } from './constants';

export type AverageSource = 'history' | 'oracle';

export interface OracleConfig {
    /** Oldest acceptable oracle price (seconds) */
    maxPriceAgeSeconds: number;

    /**
     * Where buyback averages come from: the core's own recorded samples, or
     * the oracle's trailing averages.
     */
    averageSource: AverageSource;

    /** Window for the price-range volatility fed to emission adjustments */
    volatilityWindowSeconds: number;
}

export interface EconomyConfig {
    tiers: TierConfig;
    combo: ComboConfig;
    loyalty: LoyaltyConfig;
    referral: ReferralConfig;
    rewards: RewardConfig;
    staking: StakingConfig;
    emission: EmissionConfig;
    buyback: BuybackConfig;
    oracle: OracleConfig;
}

export type BuybackOverrides = Partial<Omit<BuybackConfig, 'history' | 'allocation'>> & {
    history?: Partial<PriceHistoryConfig>;
    allocation?: Partial<AllocationBandConfig>;
};

export interface EconomyConfigOverrides {
    tiers?: TierConfig;
    combo?: Partial<ComboConfig>;
    loyalty?: Partial<LoyaltyConfig>;
    referral?: Partial<ReferralConfig>;
    rewards?: Partial<RewardConfig>;
    staking?: Partial<StakingConfig>;
    emission?: Partial<EmissionConfig>;
    buyback?: BuybackOverrides;
    oracle?: Partial<OracleConfig>;
}

export const DEFAULT_ORACLE_CONFIG: OracleConfig = {
    maxPriceAgeSeconds: SECONDS_PER_HOUR,
    averageSource: 'history',
    volatilityWindowSeconds: SECONDS_PER_WEEK,
};

export const DEFAULT_ECONOMY_CONFIG: EconomyConfig = {
    tiers: DEFAULT_TIER_CONFIG,
    combo: DEFAULT_COMBO_CONFIG,
    loyalty: DEFAULT_LOYALTY_CONFIG,
    referral: DEFAULT_REFERRAL_CONFIG,
    rewards: DEFAULT_REWARD_CONFIG,
    staking: DEFAULT_STAKING_CONFIG,
    emission: DEFAULT_EMISSION_CONFIG,
    buyback: DEFAULT_BUYBACK_CONFIG,
    oracle: DEFAULT_ORACLE_CONFIG,
};

export function createEconomyConfig(overrides: EconomyConfigOverrides = {}): EconomyConfig {
    const base = DEFAULT_ECONOMY_CONFIG;
    const buyback = overrides.buyback ?? {};

    return {
        tiers: overrides.tiers ?? base.tiers,
        combo: { ...base.combo, ...overrides.combo },
        loyalty: { ...base.loyalty, ...overrides.loyalty },
        referral: { ...base.referral, ...overrides.referral },
        rewards: {
            ...base.rewards,
            ...overrides.rewards,
            baseRates: { ...base.rewards.baseRates, ...overrides.rewards?.baseRates },
        },
        staking: { ...base.staking, ...overrides.staking },
        emission: { ...base.emission, ...overrides.emission },
        buyback: {
            ...base.buyback,
            ...buyback,
            history: { ...base.buyback.history, ...buyback.history },
            allocation: { ...base.buyback.allocation, ...buyback.allocation },
        },
        oracle: { ...base.oracle, ...overrides.oracle },
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════════

function invalid(field: string, detail: string): never {
    throw new EconomyError('InvalidConfiguration', `${field}: ${detail}`, { field });
}

function requireBps(field: string, value: bigint, upper: bigint = BASIS_POINTS): void {
    if (value < 0n || value > upper) invalid(field, `must be within [0, ${upper}] bps`);
}

function requirePositiveSeconds(field: string, value: number): void {
    if (!Number.isInteger(value) || value <= 0) invalid(field, 'must be a positive whole number of seconds');
}

/**
 * Reject settings under which an invariant could not hold.
 */
export function validateEconomyConfig(config: EconomyConfig): EconomyConfig {
    const { combo, loyalty, referral, rewards, staking, emission, buyback, oracle } = config;

    validateTiers(config.tiers.tiers);

    requirePositiveSeconds('combo.windowSeconds', combo.windowSeconds);
    if (combo.stepBps < 0n) invalid('combo.stepBps', 'must not be negative');
    if (combo.maxMultiplierBps < BASIS_POINTS) invalid('combo.maxMultiplierBps', 'must be at least 10000');

    requirePositiveSeconds('loyalty.secondsPerYear', loyalty.secondsPerYear);
    if (loyalty.bonusPerYearBps < 0n || loyalty.maxLoyaltyBps < 0n) {
        invalid('loyalty', 'bonuses must not be negative');
    }

    requireBps('referral.rateBps', referral.rateBps);
    if (referral.maxReferralReward < 0n) invalid('referral.maxReferralReward', 'must not be negative');
    if (!Number.isInteger(referral.cooldownSeconds) || referral.cooldownSeconds < 0) {
        invalid('referral.cooldownSeconds', 'must be a whole number of seconds');
    }

    for (const type of ACTIVITY_TYPES) {
        requireBps(`rewards.baseRates.${type}`, rewards.baseRates[type]);
    }
    if (rewards.maxTotalMultiplierBps < BASIS_POINTS) {
        invalid('rewards.maxTotalMultiplierBps', 'must be at least 10000');
    }
    if (!Number.isInteger(rewards.claimCooldownSeconds) || rewards.claimCooldownSeconds < 0) {
        invalid('rewards.claimCooldownSeconds', 'must be a whole number of seconds');
    }

    requirePositiveSeconds('staking.minLockSeconds', staking.minLockSeconds);
    requirePositiveSeconds('staking.maxLockSeconds', staking.maxLockSeconds);
    if (staking.minLockSeconds > staking.maxLockSeconds) invalid('staking', 'minLockSeconds exceeds maxLockSeconds');

    if (emission.dailyLimit <= 0n) invalid('emission.dailyLimit', 'must be positive');
    if (emission.weeklyLimit < emission.dailyLimit) invalid('emission.weeklyLimit', 'must be at least the daily limit');
    if (emission.monthlyLimit < emission.weeklyLimit) {
        invalid('emission.monthlyLimit', 'must be at least the weekly limit');
    }
    if (emission.initialSupply < 0n || emission.initialSupply > emission.maxSupply) {
        invalid('emission.initialSupply', 'must be within [0, maxSupply]');
    }
    if (emission.minRatePerDay < 0n || emission.minRatePerDay > emission.maxRatePerDay) {
        invalid('emission.minRatePerDay', 'must be within [0, maxRatePerDay]');
    }
    if (emission.lowVolatilityBps > emission.highVolatilityBps) {
        invalid('emission.lowVolatilityBps', 'must not exceed highVolatilityBps');
    }
    requireBps('emission.maxVolatilityReductionBps', emission.maxVolatilityReductionBps);
    if (emission.lowVolatilityIncreaseBps < 0n) invalid('emission.lowVolatilityIncreaseBps', 'must not be negative');
    requirePositiveSeconds('emission.adjustmentIntervalSeconds', emission.adjustmentIntervalSeconds);

    if (buyback.minBuybackAmount <= 0n) invalid('buyback.minBuybackAmount', 'must be positive');
    if (buyback.pauseThresholdBps < BASIS_POINTS) invalid('buyback.pauseThresholdBps', 'must be at least 10000');
    const bands = buyback.allocation;
    if (bands.discountBelowBps > bands.premiumAboveBps) {
        invalid('buyback.allocation', 'discount bound exceeds premium bound');
    }
    requireBps('buyback.allocation.discountAllocationBps', bands.discountAllocationBps);
    requireBps('buyback.allocation.neutralAllocationBps', bands.neutralAllocationBps);
    requireBps('buyback.allocation.premiumAllocationBps', bands.premiumAllocationBps);
    requireBps('buyback.initialAllocationBps', buyback.initialAllocationBps);
    requireBps('buyback.burnShareBps', buyback.burnShareBps);
    requirePositiveSeconds('buyback.allocationCooldownSeconds', buyback.allocationCooldownSeconds);

    const history = buyback.history;
    requirePositiveSeconds('buyback.history.shortWindowSeconds', history.shortWindowSeconds);
    if (history.longWindowSeconds < history.shortWindowSeconds) {
        invalid('buyback.history.longWindowSeconds', 'must be at least the short window');
    }
    if (!Number.isInteger(history.capacity) || history.capacity < history.minLongSamples) {
        invalid('buyback.history.capacity', 'must hold at least minLongSamples samples');
    }

    requirePositiveSeconds('oracle.maxPriceAgeSeconds', oracle.maxPriceAgeSeconds);
    requirePositiveSeconds('oracle.volatilityWindowSeconds', oracle.volatilityWindowSeconds);

    return config;
}
