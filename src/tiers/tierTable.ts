/**
 * Tier Table
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Maps a staked amount to a bonus tier. The match is the tier with the highest
 * threshold the stake meets or exceeds; below every threshold the base tier
 * (0 bps) applies. Tiers are few, so lookup is a linear scan.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { EconomyError } from '../core/errors';
import { BASE_TIER, DEFAULT_TIER_CONFIG } from './config';
import { TierConfig, TierDefinition, TierMatch } from './types';

export class TierTable {
    /** Sorted by threshold, highest first */
    private readonly tiers: readonly TierDefinition[];

    constructor(config: TierConfig = DEFAULT_TIER_CONFIG) {
        validateTiers(config.tiers);
        this.tiers = [...config.tiers].sort((a, b) => (a.minStake > b.minStake ? -1 : a.minStake < b.minStake ? 1 : 0));
    }

    lookup(stakedAmount: bigint): TierMatch {
        for (let i = 0; i < this.tiers.length; i++) {
            const tier = this.tiers[i];
            if (stakedAmount >= tier.minStake) {
                return { ...tier, level: this.tiers.length - i };
            }
        }
        return { ...BASE_TIER, level: 0 };
    }

    bonusBps(stakedAmount: bigint): bigint {
        return this.lookup(stakedAmount).bonusBps;
    }

    /** Lowest threshold first */
    listTiers(): TierDefinition[] {
        return [...this.tiers].reverse();
    }
}

export function validateTiers(tiers: readonly TierDefinition[]): void {
    const seen = new Set<bigint>();
    for (const tier of tiers) {
        if (tier.minStake < 0n || tier.bonusBps < 0n) {
            throw new EconomyError('InvalidConfiguration', `tier ${tier.name} has a negative threshold or bonus`, {
                tier: tier.name,
            });
        }
        if (seen.has(tier.minStake)) {
            throw new EconomyError('InvalidConfiguration', `duplicate tier threshold ${tier.minStake}`, {
                tier: tier.name,
            });
        }
        seen.add(tier.minStake);
    }
}
