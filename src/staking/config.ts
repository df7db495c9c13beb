/**
 * Staking Ledger - Configuration
 */

import { SECONDS_PER_DAY } from '../config/constants';
import { StakingConfig } from './types';

export type { StakingConfig } from './types';

export const DEFAULT_STAKING_CONFIG: StakingConfig = {
    minLockSeconds: 7 * SECONDS_PER_DAY,
    maxLockSeconds: 365 * SECONDS_PER_DAY,

    // +0.1% voting weight per remaining lock day, up to +50%
    votingBonusPerLockDayBps: 10n,
    maxVotingBonusBps: 5_000n,
};
