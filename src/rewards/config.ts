/**
 * Reward Engine - Configuration
 */

import { DEFAULT_COMBO_CONFIG } from '../combo/config';
import { SECONDS_PER_DAY } from '../config/constants';
import { DEFAULT_LOYALTY_CONFIG } from '../loyalty/config';
import { DEFAULT_REFERRAL_CONFIG } from '../referral/config';
import { RewardConfig, RewardEngineConfig } from './types';

export type { RewardConfig, RewardEngineConfig } from './types';

export const DEFAULT_REWARD_CONFIG: RewardConfig = {
    baseRates: {
        trading: 300n, // 3%
        staking: 100n, // 1%
        referral: 200n, // 2%
    },

    // 5x ceiling on tier + combo + loyalty stacking
    maxTotalMultiplierBps: 50_000n,

    claimCooldownSeconds: SECONDS_PER_DAY,
};

export const DEFAULT_REWARD_ENGINE_CONFIG: RewardEngineConfig = {
    rewards: DEFAULT_REWARD_CONFIG,
    combo: DEFAULT_COMBO_CONFIG,
    loyalty: DEFAULT_LOYALTY_CONFIG,
    referral: DEFAULT_REFERRAL_CONFIG,
};
