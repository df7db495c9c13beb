/**
 * Environment overrides for the economy configuration.
 *
 * Every IKIGAI_* variable is optional. Basis points and seconds are integers;
 * token amounts are whole or fractional token strings ("10000", "2.5").
 */

import dotenv from 'dotenv';
import { BuybackConfig } from '../buyback/types';
import { ComboConfig } from '../combo/types';
import { EconomyError } from '../core/errors';
import { EmissionConfig } from '../emission/types';
import { LoyaltyConfig } from '../loyalty/types';
import { ReferralConfig } from '../referral/types';
import { RewardConfig } from '../rewards/types';
import { StakingConfig } from '../staking/types';
import { parseUnits } from '../utils/format';
import logger from '../utils/logger';
import {
    EconomyConfig,
    EconomyConfigOverrides,
    OracleConfig,
    createEconomyConfig,
    validateEconomyConfig,
} from './economy';

type Env = Record<string, string | undefined>;

function raw(env: Env, key: string): string | undefined {
    const value = env[key];
    if (value === undefined || value.trim() === '') return undefined;
    return value.trim();
}

function badValue(key: string, value: string, expected: string): never {
    throw new EconomyError('InvalidConfiguration', `${key}=${value} is not ${expected}`, { key, value });
}

function readBps(env: Env, key: string): bigint | undefined {
    const value = raw(env, key);
    if (value === undefined) return undefined;
    if (!/^\d+$/.test(value)) badValue(key, value, 'a non-negative integer');
    return BigInt(value);
}

function readSeconds(env: Env, key: string): number | undefined {
    const value = raw(env, key);
    if (value === undefined) return undefined;
    const parsed = Number(value);
    if (!/^\d+$/.test(value) || !Number.isSafeInteger(parsed)) badValue(key, value, 'a whole number of seconds');
    return parsed;
}

function readTokens(env: Env, key: string): bigint | undefined {
    const value = raw(env, key);
    if (value === undefined) return undefined;
    try {
        return parseUnits(value);
    } catch {
        return badValue(key, value, 'a token amount');
    }
}

function readAverageSource(env: Env, key: string): OracleConfig['averageSource'] | undefined {
    const value = raw(env, key);
    if (value === undefined) return undefined;
    if (value !== 'history' && value !== 'oracle') badValue(key, value, "'history' or 'oracle'");
    return value;
}

function put<T extends object, K extends keyof T>(target: T, key: K, value: T[K]): void {
    if (value !== undefined) {
        target[key] = value;
    }
}

/**
 * Overrides present in `env`, without defaults filled in.
 */
export function readEconomyOverrides(env: Env): EconomyConfigOverrides {
    const combo: Partial<ComboConfig> = {};
    put(combo, 'windowSeconds', readSeconds(env, 'IKIGAI_COMBO_WINDOW_SECONDS'));
    put(combo, 'stepBps', readBps(env, 'IKIGAI_COMBO_STEP_BPS'));
    put(combo, 'maxMultiplierBps', readBps(env, 'IKIGAI_MAX_COMBO_MULTIPLIER_BPS'));

    const loyalty: Partial<LoyaltyConfig> = {};
    put(loyalty, 'bonusPerYearBps', readBps(env, 'IKIGAI_BONUS_PER_YEAR_BPS'));
    put(loyalty, 'maxLoyaltyBps', readBps(env, 'IKIGAI_MAX_LOYALTY_BPS'));

    const referral: Partial<ReferralConfig> = {};
    put(referral, 'rateBps', readBps(env, 'IKIGAI_REFERRAL_RATE_BPS'));
    put(referral, 'maxReferralReward', readTokens(env, 'IKIGAI_MAX_REFERRAL_REWARD'));
    put(referral, 'cooldownSeconds', readSeconds(env, 'IKIGAI_REFERRAL_COOLDOWN_SECONDS'));

    const rewards: Partial<RewardConfig> = {};
    put(rewards, 'maxTotalMultiplierBps', readBps(env, 'IKIGAI_MAX_TOTAL_MULTIPLIER_BPS'));
    put(rewards, 'claimCooldownSeconds', readSeconds(env, 'IKIGAI_CLAIM_COOLDOWN_SECONDS'));

    const staking: Partial<StakingConfig> = {};
    put(staking, 'minLockSeconds', readSeconds(env, 'IKIGAI_MIN_LOCK_SECONDS'));
    put(staking, 'maxLockSeconds', readSeconds(env, 'IKIGAI_MAX_LOCK_SECONDS'));

    const emission: Partial<EmissionConfig> = {};
    put(emission, 'dailyLimit', readTokens(env, 'IKIGAI_DAILY_EMISSION_LIMIT'));
    put(emission, 'weeklyLimit', readTokens(env, 'IKIGAI_WEEKLY_EMISSION_LIMIT'));
    put(emission, 'monthlyLimit', readTokens(env, 'IKIGAI_MONTHLY_EMISSION_LIMIT'));
    put(emission, 'maxSupply', readTokens(env, 'IKIGAI_MAX_SUPPLY'));
    put(emission, 'initialSupply', readTokens(env, 'IKIGAI_INITIAL_SUPPLY'));
    put(emission, 'baseRatePerDay', readTokens(env, 'IKIGAI_BASE_EMISSION_RATE'));
    put(emission, 'highVolatilityBps', readBps(env, 'IKIGAI_HIGH_VOLATILITY_BPS'));
    put(emission, 'lowVolatilityBps', readBps(env, 'IKIGAI_LOW_VOLATILITY_BPS'));
    put(emission, 'adjustmentIntervalSeconds', readSeconds(env, 'IKIGAI_ADJUSTMENT_INTERVAL_SECONDS'));

    const buyback: Partial<BuybackConfig> = {};
    put(buyback, 'minBuybackAmount', readTokens(env, 'IKIGAI_MIN_BUYBACK_AMOUNT'));
    put(buyback, 'pauseThresholdBps', readBps(env, 'IKIGAI_BUYBACK_PAUSE_THRESHOLD_BPS'));
    put(buyback, 'allocationCooldownSeconds', readSeconds(env, 'IKIGAI_ALLOCATION_COOLDOWN_SECONDS'));
    put(buyback, 'burnShareBps', readBps(env, 'IKIGAI_BURN_SHARE_BPS'));

    const oracle: Partial<OracleConfig> = {};
    put(oracle, 'maxPriceAgeSeconds', readSeconds(env, 'IKIGAI_ORACLE_MAX_AGE_SECONDS'));
    put(oracle, 'averageSource', readAverageSource(env, 'IKIGAI_AVERAGE_SOURCE'));

    return { combo, loyalty, referral, rewards, staking, emission, buyback, oracle };
}

/**
 * Build the economy configuration from defaults plus IKIGAI_* variables.
 * Without an explicit `env`, `.env` is loaded into process.env first.
 */
export function loadEconomyConfigFromEnv(env?: Env): EconomyConfig {
    let source: Env;
    if (env === undefined) {
        dotenv.config();
        source = process.env;
    } else {
        source = env;
    }

    const overrides = readEconomyOverrides(source);
    const applied = Object.keys(source).filter(key => key.startsWith('IKIGAI_') && raw(source, key) !== undefined);
    if (applied.length > 0) {
        logger.info(`[CONFIG] applying ${applied.length} IKIGAI_* override(s): ${applied.sort().join(', ')}`);
    }

    return validateEconomyConfig(createEconomyConfig(overrides));
}
