/**
 * Tier Table Module
 *
 * Stake amount → reward bonus bracket.
 */

export type { TierDefinition, TierMatch, TierConfig } from './types';
export { BASE_TIER, DEFAULT_TIER_CONFIG } from './config';
export { TierTable, validateTiers } from './tierTable';
