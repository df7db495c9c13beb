/**
 * Referral - Configuration
 *
 * The lifetime cap and the per-referrer cooldown are both mandatory; they are
 * the defence against Sybil micro-transaction farming.
 */

import { SECONDS_PER_HOUR, tokens } from '../config/constants';
import { ReferralConfig, ReferralEarnings } from './types';

export type { ReferralConfig } from './types';

export const DEFAULT_REFERRAL_CONFIG: ReferralConfig = {
    // 5% of the referee's activity amount
    rateBps: 500n,

    // 10k tokens lifetime per referrer
    maxReferralReward: tokens(10_000),

    // at most one credit per hour per referrer
    cooldownSeconds: SECONDS_PER_HOUR,
};

export const EMPTY_REFERRAL_EARNINGS: ReferralEarnings = {
    earned: 0n,
    lastCreditTime: null,
    refereeCount: 0,
};
