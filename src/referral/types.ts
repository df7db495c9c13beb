/**
 * Referral - Type Definitions
 */

/**
 * Referrer-side bookkeeping, stored on the referrer's account.
 */
export interface ReferralEarnings {
    /** Lifetime referral rewards credited */
    readonly earned: bigint;

    /** Last time a referral credit landed, null before the first */
    readonly lastCreditTime: number | null;

    /** Accounts that named this account as referrer */
    readonly refereeCount: number;
}

export interface ReferralConfig {
    /** Share of the referee's activity amount credited to the referrer (bps) */
    rateBps: bigint;

    /** Lifetime cap per referrer (base units) */
    maxReferralReward: bigint;

    /** Minimum seconds between two credits to the same referrer */
    cooldownSeconds: number;
}

/** InvalidAmount: the activity was too small to yield a non-zero credit */
export type ReferralSkipReason = 'MaxReferralRewardReached' | 'ReferralCooldown' | 'InvalidAmount';

export type ReferralDecision =
    | { status: 'credit'; amount: bigint; capped: boolean }
    | { status: 'skipped'; reason: ReferralSkipReason; amount: 0n };

export interface ReferralOutcome {
    referrer: string;
    decision: ReferralDecision;
}
