export type { LoyaltyConfig, LoyaltyStatus } from './types';
export { DEFAULT_LOYALTY_CONFIG } from './config';
export { recordFirstActivity, loyaltyYears, loyaltyBonusBps, getLoyaltyStatus } from './tracker';
