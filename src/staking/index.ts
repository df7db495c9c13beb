/**
 * Staking Ledger Module
 *
 * Stake positions, lock enforcement, weighted-average merges and governance
 * voting power.
 */

export type { StakePosition, StakingConfig, StakingInfo, UnstakeResult, MergeResult } from './types';
export { DEFAULT_STAKING_CONFIG } from './config';
export { StakingLedger, remainingLockDays, isUnlocked } from './stakingLedger';
