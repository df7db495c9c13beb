/**
 * Reward Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Composes tier, combo and loyalty bonuses into a capped multiplier and pays
 * the resulting reward into the account's pending balance.
 *
 *   baseReward         = amount * baseRate[type] / 10000
 *   totalMultiplierBps = clamp(10000 + tier + combo + loyalty, 0, MAX_TOTAL)
 *   reward             = baseReward * totalMultiplierBps / 10000
 *
 * Only trading reads and advances the combo; staking and referral activity
 * get a combo bonus of 0 and leave the chain untouched.
 *
 * If the account has a referrer, the referrer is credited
 * amount * REFERRAL_RATE / 10000, subject to its lifetime cap and cooldown.
 *
 * All updated accounts are computed first and written together at the end.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { COLD_COMBO, comboPhase, materializeCombo, registerTrade } from '../combo/tracker';
import { BASIS_POINTS } from '../config/constants';
import { EconomyError } from '../core/errors';
import { loyaltyBonusBps, recordFirstActivity } from '../loyalty/tracker';
import { checkedAdd, clamp, mulBps, sum } from '../math/fixedPoint';
import { EMPTY_REFERRAL_EARNINGS } from '../referral/config';
import { applyReferralCredit, evaluateReferralCredit, validateReferrer } from '../referral/tracker';
import { ReferralOutcome } from '../referral/types';
import { TierTable } from '../tiers/tierTable';
import { formatMultiplier, formatUnits } from '../utils/format';
import logger from '../utils/logger';
import { DEFAULT_REWARD_ENGINE_CONFIG } from './config';
import {
    ActivityType,
    ClaimReceipt,
    RewardAccount,
    RewardBreakdown,
    RewardEngineConfig,
    StakeSource,
    TradingStats,
} from './types';

export function createRewardAccount(address: string): RewardAccount {
    return {
        address,
        firstActivityTime: null,
        pendingRewards: 0n,
        claimedRewards: 0n,
        lastClaimTime: null,
        combo: COLD_COMBO,
        referrer: null,
        referral: EMPTY_REFERRAL_EARNINGS,
        tradingVolume: 0n,
        tradeCount: 0,
    };
}

interface RewardPlan {
    breakdown: RewardBreakdown;
    updates: RewardAccount[];
}

export class RewardEngine {
    private readonly accounts = new Map<string, RewardAccount>();

    constructor(
        private readonly tiers: TierTable,
        private readonly stakes: StakeSource,
        private readonly config: RewardEngineConfig = DEFAULT_REWARD_ENGINE_CONFIG
    ) {}

    // ═══════════════════════════════════════════════════════════════════════════
    // REWARDS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Reward an activity without committing anything.
     */
    quoteReward(account: string, activityType: ActivityType, activityAmount: bigint, now: number): RewardBreakdown {
        return this.planReward(account, activityType, activityAmount, now).breakdown;
    }

    /**
     * Reward an activity and commit: pending rewards, combo (trading only),
     * trading stats, loyalty anchor and the referrer's credit.
     */
    computeReward(account: string, activityType: ActivityType, activityAmount: bigint, now: number): RewardBreakdown {
        const plan = this.planReward(account, activityType, activityAmount, now);
        this.commit(plan.updates);

        const b = plan.breakdown;
        logger.debug(
            `[REWARD] ${account} ${activityType} amount=${formatUnits(activityAmount)} ` +
            `multiplier=${formatMultiplier(b.totalMultiplierBps)}${b.capped ? ' (capped)' : ''} ` +
            `reward=${formatUnits(b.rewardAmount)}`
        );
        if (b.referral && b.referral.decision.status === 'skipped') {
            logger.warn(`[REFERRAL] credit to ${b.referral.referrer} skipped: ${b.referral.decision.reason}`);
        }

        return b;
    }

    /**
     * Anchor loyalty for non-reward activity (e.g. a first stake).
     */
    touchActivity(account: string, now: number): void {
        const current = this.getAccount(account);
        if (current.firstActivityTime !== null) return;
        this.commit([{ ...current, firstActivityTime: recordFirstActivity(current.firstActivityTime, now) }]);
    }

    private planReward(account: string, activityType: ActivityType, activityAmount: bigint, now: number): RewardPlan {
        if (activityAmount <= 0n) {
            throw new EconomyError('InvalidAmount', 'activity amount must be positive', { account, activityType });
        }

        const { rewards, combo: comboConfig, loyalty, referral: referralConfig } = this.config;
        const current = this.getAccount(account);

        const baseRateBps = rewards.baseRates[activityType];
        const baseReward = mulBps(activityAmount, baseRateBps);

        const tier = this.tiers.lookup(this.stakes.getStakedAmount(account));

        let combo = current.combo;
        let comboMultiplierBps = BASIS_POINTS;
        let comboBonus = 0n;
        if (activityType === 'trading') {
            const trade = registerTrade(current.combo, now, comboConfig);
            combo = trade.next;
            comboMultiplierBps = trade.appliedMultiplierBps;
            comboBonus = trade.appliedBonusBps;
        }

        const loyaltyBonus = loyaltyBonusBps(current.firstActivityTime, now, loyalty);

        const uncappedMultiplierBps = sum([BASIS_POINTS, tier.bonusBps, comboBonus, loyaltyBonus]);
        const totalMultiplierBps = clamp(uncappedMultiplierBps, 0n, rewards.maxTotalMultiplierBps);
        const rewardAmount = mulBps(baseReward, totalMultiplierBps);

        const updated: RewardAccount = {
            ...current,
            firstActivityTime: recordFirstActivity(current.firstActivityTime, now),
            pendingRewards: checkedAdd(current.pendingRewards, rewardAmount),
            combo,
            tradingVolume: activityType === 'trading'
                ? checkedAdd(current.tradingVolume, activityAmount)
                : current.tradingVolume,
            tradeCount: activityType === 'trading' ? current.tradeCount + 1 : current.tradeCount,
        };
        const updates: RewardAccount[] = [updated];

        let referral: ReferralOutcome | null = null;
        if (current.referrer !== null) {
            const referrerAccount = this.getAccount(current.referrer);
            const decision = evaluateReferralCredit(referrerAccount.referral, activityAmount, now, referralConfig);
            referral = { referrer: current.referrer, decision };

            if (decision.status === 'credit') {
                updates.push({
                    ...referrerAccount,
                    pendingRewards: checkedAdd(referrerAccount.pendingRewards, decision.amount),
                    referral: applyReferralCredit(referrerAccount.referral, decision.amount, now),
                });
            }
        }

        return {
            breakdown: {
                account,
                activityType,
                activityAmount,
                baseRateBps,
                baseReward,
                tierName: tier.name,
                tierBonusBps: tier.bonusBps,
                comboMultiplierBps,
                comboBonusBps: comboBonus,
                loyaltyBonusBps: loyaltyBonus,
                uncappedMultiplierBps,
                totalMultiplierBps,
                capped: uncappedMultiplierBps > totalMultiplierBps,
                rewardAmount,
                referral,
                timestamp: now,
            },
            updates,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REFERRALS
    // ═══════════════════════════════════════════════════════════════════════════

    setReferrer(account: string, referrer: string): void {
        const current = this.getAccount(account);
        const referrerAccount = this.getAccount(referrer);

        validateReferrer(account, referrer, current.referrer, referrerAccount.referrer);

        this.commit([
            { ...current, referrer },
            {
                ...referrerAccount,
                referral: { ...referrerAccount.referral, refereeCount: referrerAccount.referral.refereeCount + 1 },
            },
        ]);

        logger.info(`[REFERRAL] ${account} referred by ${referrer}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CLAIMS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Validate a claim and return the amount it would pay.
     */
    previewClaim(account: string, now: number): bigint {
        const current = this.getAccount(account);
        const cooldown = this.config.rewards.claimCooldownSeconds;

        if (current.lastClaimTime !== null && now - current.lastClaimTime < cooldown) {
            throw new EconomyError('ClaimTooSoon', `next claim allowed at ${current.lastClaimTime + cooldown}`, {
                account,
                lastClaimTime: current.lastClaimTime,
                nextClaimTime: current.lastClaimTime + cooldown,
            });
        }
        if (current.pendingRewards === 0n) {
            throw new EconomyError('NothingToClaim', 'no pending rewards', { account });
        }

        return current.pendingRewards;
    }

    /**
     * Move pending rewards to claimed.
     */
    claim(account: string, now: number): ClaimReceipt {
        const amount = this.previewClaim(account, now);
        const current = this.getAccount(account);

        const updated: RewardAccount = {
            ...current,
            pendingRewards: 0n,
            claimedRewards: checkedAdd(current.claimedRewards, amount),
            lastClaimTime: now,
        };
        this.commit([updated]);

        logger.info(`[CLAIM] ${account} claimed ${formatUnits(amount)}`);

        return { account, amount, claimedRewards: updated.claimedRewards, timestamp: now };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getAccount(account: string): RewardAccount {
        return this.accounts.get(account) ?? createRewardAccount(account);
    }

    hasAccount(account: string): boolean {
        return this.accounts.has(account);
    }

    getTradingStats(account: string, now: number): TradingStats {
        const current = this.getAccount(account);
        const materialized = materializeCombo(current.combo, now, this.config.combo);

        return {
            account,
            tradingVolume: current.tradingVolume,
            tradeCount: current.tradeCount,
            comboStreak: materialized.streak,
            comboMultiplierBps: materialized.multiplierBps,
            comboPhase: comboPhase(current.combo, now, this.config.combo),
            storedComboMultiplierBps: current.combo.multiplierBps,
        };
    }

    getTotalPending(): bigint {
        return sum([...this.accounts.values()].map(a => a.pendingRewards));
    }

    getTotalClaimed(): bigint {
        return sum([...this.accounts.values()].map(a => a.claimedRewards));
    }

    private commit(updates: readonly RewardAccount[]): void {
        for (const account of updates) {
            this.accounts.set(account.address, account);
        }
    }
}
