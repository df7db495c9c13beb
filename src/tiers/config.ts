/**
 * Tier Table - Configuration
 */

import { tokens } from '../config/constants';
import { TierConfig, TierDefinition } from './types';

export type { TierConfig } from './types';

/**
 * Returned when the stake is below every explicit threshold.
 */
export const BASE_TIER: TierDefinition = {
    name: 'none',
    minStake: 0n,
    bonusBps: 0n,
};

export const DEFAULT_TIER_CONFIG: TierConfig = {
    tiers: [
        { name: 'bronze', minStake: tokens(1_000), bonusBps: 500n },
        { name: 'silver', minStake: tokens(5_000), bonusBps: 1_000n },
        { name: 'gold', minStake: tokens(10_000), bonusBps: 2_500n },
        { name: 'platinum', minStake: tokens(50_000), bonusBps: 4_000n },
    ],
};
