/**
 * Tier Table - Type Definitions
 */

export interface TierDefinition {
    /** Display name (bronze, silver, ...) */
    name: string;

    /** Minimum staked amount (base units) to qualify */
    minStake: bigint;

    /** Reward bonus added on top of the 1x base (bps) */
    bonusBps: bigint;
}

export interface TierMatch extends TierDefinition {
    /** 0 for the base tier, 1 for the lowest explicit tier, ... */
    level: number;
}

export interface TierConfig {
    tiers: readonly TierDefinition[];
}
