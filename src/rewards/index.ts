/**
 * Reward Engine Module
 *
 * USAGE:
 *   const engine = new RewardEngine(tierTable, stakingLedger, config);
 *   const breakdown = engine.computeReward(account, 'trading', amount, now);
 *   const receipt = engine.claim(account, now);
 */

export type {
    ActivityType,
    RewardAccount,
    RewardConfig,
    RewardEngineConfig,
    RewardBreakdown,
    TradingStats,
    ClaimReceipt,
    StakeSource,
} from './types';
export { ACTIVITY_TYPES } from './types';
export { DEFAULT_REWARD_CONFIG, DEFAULT_REWARD_ENGINE_CONFIG } from './config';
export { RewardEngine, createRewardAccount } from './rewardEngine';
