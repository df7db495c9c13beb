/**
 * Loyalty Ledger - Configuration
 */

import { SECONDS_PER_YEAR } from '../config/constants';
import { LoyaltyConfig } from './types';

export type { LoyaltyConfig } from './types';

export const DEFAULT_LOYALTY_CONFIG: LoyaltyConfig = {
    // +5% per full year in the protocol
    bonusPerYearBps: 500n,

    // capped at +25%
    maxLoyaltyBps: 2_500n,

    secondsPerYear: SECONDS_PER_YEAR,
};
