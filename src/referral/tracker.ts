/**
 * Referral Tracker
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * - A referrer is set once and never changes.
 * - No self-referral, no two-account cycle (A→B while B→A).
 * - Credits are rate-limited per referrer and capped per referrer lifetime.
 *
 * evaluateReferralCredit() is a pure check: a credit that would breach the cap
 * or the cooldown comes back as `skipped` so the referee's own reward still
 * goes through. assertReferralCredit() is the throwing variant.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { EconomyError } from '../core/errors';
import { checkedAdd, min, mulBps, subClamp } from '../math/fixedPoint';
import { DEFAULT_REFERRAL_CONFIG } from './config';
import { ReferralConfig, ReferralDecision, ReferralEarnings } from './types';

/**
 * @param accountReferrer - referrer already stored on `account`, if any
 * @param referrerOfReferrer - referrer stored on `referrer`, if any
 */
export function validateReferrer(
    account: string,
    referrer: string,
    accountReferrer: string | null,
    referrerOfReferrer: string | null
): void {
    if (accountReferrer !== null) {
        throw new EconomyError('ReferrerAlreadySet', `${account} already has referrer ${accountReferrer}`, {
            account,
            referrer: accountReferrer,
        });
    }
    if (referrer === account) {
        throw new EconomyError('InvalidReferrer', 'self-referral is not allowed', { account });
    }
    if (referrerOfReferrer === account) {
        throw new EconomyError('InvalidReferrer', `${referrer} is already referred by ${account}`, {
            account,
            referrer,
        });
    }
}

export function evaluateReferralCredit(
    earnings: ReferralEarnings,
    activityAmount: bigint,
    now: number,
    config: ReferralConfig = DEFAULT_REFERRAL_CONFIG
): ReferralDecision {
    const remaining = subClamp(config.maxReferralReward, earnings.earned);
    if (remaining === 0n) {
        return { status: 'skipped', reason: 'MaxReferralRewardReached', amount: 0n };
    }

    if (earnings.lastCreditTime !== null && now - earnings.lastCreditTime < config.cooldownSeconds) {
        return { status: 'skipped', reason: 'ReferralCooldown', amount: 0n };
    }

    const raw = mulBps(activityAmount, config.rateBps);
    if (raw === 0n) {
        return { status: 'skipped', reason: 'InvalidAmount', amount: 0n };
    }

    const amount = min(raw, remaining);
    return { status: 'credit', amount, capped: amount < raw };
}

export function assertReferralCredit(
    earnings: ReferralEarnings,
    activityAmount: bigint,
    now: number,
    config: ReferralConfig = DEFAULT_REFERRAL_CONFIG
): bigint {
    const decision = evaluateReferralCredit(earnings, activityAmount, now, config);
    if (decision.status === 'skipped') {
        throw new EconomyError(decision.reason, 'referral credit not allowed', {
            earned: earnings.earned,
            lastCreditTime: earnings.lastCreditTime,
        });
    }
    return decision.amount;
}

export function applyReferralCredit(earnings: ReferralEarnings, amount: bigint, now: number): ReferralEarnings {
    return {
        ...earnings,
        earned: checkedAdd(earnings.earned, amount),
        lastCreditTime: now,
    };
}
