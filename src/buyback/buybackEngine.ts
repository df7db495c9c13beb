/**
 * Buyback Engine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Decides how much protocol revenue goes to buying back the token, from the
 * current price against its 30-day and 90-day trailing averages.
 *
 * QUOTE:
 *   deviation  = price < avg30 ? (avg30 - price) * 10000 / avg30 : 0
 *   uptrend    = avg90 < avg30
 *   multiplier = 10000 + min(deviation * 2, 2000)   uptrend
 *              = 10000 + min(deviation * 4, 4000)   otherwise
 *   amount     = MIN_BUYBACK * multiplier / 10000,  or 0 while price > 1.2 * avg90
 *
 * ALLOCATION (at most once per cooldown), by price / avg90:
 *   < 90%  → 40% buyback     90-110% → 20%     > 110% → 10%
 *
 * Bought-back tokens are split between burn and the reward pool.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BASIS_POINTS } from '../config/constants';
import { EconomyError } from '../core/errors';
import { checkedAdd, checkedMul, checkedSub, min, mulBps, mulDiv } from '../math/fixedPoint';
import { formatBps, formatUnits } from '../utils/format';
import logger from '../utils/logger';
import { DEFAULT_BUYBACK_CONFIG, createBuybackState } from './config';
import { PriceHistory } from './priceHistory';
import {
    AllocationBand,
    AllocationUpdate,
    BuybackConfig,
    BuybackQuote,
    BuybackSnapshot,
    BuybackState,
    PriceSample,
    RevenueSplit,
    TrailingAverages,
} from './types';

export class BuybackEngine {
    private readonly history: PriceHistory;
    private state: BuybackState;

    constructor(private readonly config: BuybackConfig = DEFAULT_BUYBACK_CONFIG) {
        this.history = new PriceHistory(config.history);
        this.state = createBuybackState(config);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRICE HISTORY
    // ═══════════════════════════════════════════════════════════════════════════

    recordPrice(sample: PriceSample): void {
        this.history.record(sample);
        logger.debug(`[BUYBACK] price sample ${sample.price} at ${sample.timestamp} (${this.history.size} retained)`);
    }

    /**
     * 30-day and 90-day averages, refusing to answer on thin history.
     */
    trailingAverages(now: number): TrailingAverages {
        const { shortWindowSeconds, longWindowSeconds, minShortSamples, minLongSamples } = this.config.history;
        const shortSamples = this.history.countInWindow(shortWindowSeconds, now);
        const longSamples = this.history.countInWindow(longWindowSeconds, now);

        if (shortSamples < minShortSamples || longSamples < minLongSamples) {
            throw new EconomyError(
                'InsufficientPriceHistory',
                `need ${minShortSamples}/${minLongSamples} samples, have ${shortSamples}/${longSamples}`,
                { shortSamples, longSamples, minShortSamples, minLongSamples }
            );
        }

        return {
            avg30: this.history.average(shortWindowSeconds, now),
            avg90: this.history.average(longWindowSeconds, now),
            shortSamples,
            longSamples,
        };
    }

    volatilityBps(windowSeconds: number, now: number): bigint {
        return this.history.volatilityBps(windowSeconds, now);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // QUOTE
    // ═══════════════════════════════════════════════════════════════════════════

    computeBuybackAmount(
        currentPrice: bigint,
        now: number,
        averages: TrailingAverages = this.trailingAverages(now)
    ): BuybackQuote {
        if (currentPrice <= 0n) {
            throw new EconomyError('InvalidPriceSample', 'current price must be positive', { currentPrice });
        }
        const { avg30, avg90 } = averages;

        const shortTermDeviationBps = currentPrice < avg30
            ? mulDiv(avg30 - currentPrice, BASIS_POINTS, avg30)
            : 0n;
        const isLongTermUptrend = avg90 < avg30;

        const bonusBps = isLongTermUptrend
            ? min(shortTermDeviationBps * this.config.uptrendDeviationFactor, this.config.uptrendMaxBonusBps)
            : min(shortTermDeviationBps * this.config.downtrendDeviationFactor, this.config.downtrendMaxBonusBps);
        const multiplierBps = BASIS_POINTS + bonusBps;

        const paused = checkedMul(currentPrice, BASIS_POINTS) > checkedMul(avg90, this.config.pauseThresholdBps);
        const amount = paused ? 0n : mulBps(this.config.minBuybackAmount, multiplierBps);

        return {
            currentPrice,
            avg30,
            avg90,
            shortTermDeviationBps,
            isLongTermUptrend,
            multiplierBps,
            paused,
            amount,
            timestamp: now,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // ALLOCATION
    // ═══════════════════════════════════════════════════════════════════════════

    bandFor(priceRatioBps: bigint): { band: AllocationBand; allocationBps: bigint } {
        const bands = this.config.allocation;
        if (priceRatioBps < bands.discountBelowBps) {
            return { band: 'discount', allocationBps: bands.discountAllocationBps };
        }
        if (priceRatioBps > bands.premiumAboveBps) {
            return { band: 'premium', allocationBps: bands.premiumAllocationBps };
        }
        return { band: 'neutral', allocationBps: bands.neutralAllocationBps };
    }

    previewAllocation(
        currentPrice: bigint,
        now: number,
        averages?: TrailingAverages
    ): AllocationUpdate {
        const last = this.state.lastAllocationTime;
        const cooldown = this.config.allocationCooldownSeconds;
        if (last !== null && now - last < cooldown) {
            throw new EconomyError('AllocationTooSoon', `next allocation update allowed at ${last + cooldown}`, {
                lastAllocationTime: last,
                nextAllocationTime: last + cooldown,
            });
        }
        if (currentPrice <= 0n) {
            throw new EconomyError('InvalidPriceSample', 'current price must be positive', { currentPrice });
        }

        const { avg90 } = averages ?? this.trailingAverages(now);
        const priceRatioBps = mulDiv(currentPrice, BASIS_POINTS, avg90);
        const { band, allocationBps } = this.bandFor(priceRatioBps);

        return {
            band,
            priceRatioBps,
            previousAllocationBps: this.state.allocationBps,
            allocationBps,
            treasuryBps: BASIS_POINTS - allocationBps,
            timestamp: now,
        };
    }

    updateAllocation(currentPrice: bigint, now: number, averages?: TrailingAverages): AllocationUpdate {
        const update = this.previewAllocation(currentPrice, now, averages);
        this.state = { ...this.state, allocationBps: update.allocationBps, lastAllocationTime: now };

        logger.info(
            `[BUYBACK] allocation ${formatBps(update.previousAllocationBps)} → ${formatBps(update.allocationBps)} ` +
            `(${update.band}, price at ${formatBps(update.priceRatioBps)} of avg90)`
        );
        return update;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REVENUE SPLIT
    // ═══════════════════════════════════════════════════════════════════════════

    planRevenueSplit(
        revenue: bigint,
        currentPrice: bigint,
        now: number,
        averages?: TrailingAverages
    ): RevenueSplit {
        if (revenue <= 0n) {
            throw new EconomyError('InvalidAmount', 'revenue must be positive', { revenue });
        }

        const quote = this.computeBuybackAmount(currentPrice, now, averages ?? this.trailingAverages(now));
        const allocationBps = this.state.allocationBps;
        const buybackAmount = min(quote.amount, mulBps(revenue, allocationBps));
        const burnAmount = mulBps(buybackAmount, this.config.burnShareBps);

        return {
            revenue,
            quote,
            allocationBps,
            buybackAmount,
            burnAmount,
            rewardPoolAmount: checkedSub(buybackAmount, burnAmount),
            treasuryAmount: checkedSub(revenue, buybackAmount),
            timestamp: now,
        };
    }

    /**
     * Commit an executed split to the lifetime totals.
     */
    recordExecution(split: RevenueSplit): BuybackState {
        const s = this.state;
        this.state = {
            ...s,
            totalRevenue: checkedAdd(s.totalRevenue, split.revenue),
            totalBoughtBack: checkedAdd(s.totalBoughtBack, split.buybackAmount),
            totalBurned: checkedAdd(s.totalBurned, split.burnAmount),
            totalToRewardPool: checkedAdd(s.totalToRewardPool, split.rewardPoolAmount),
            totalToTreasury: checkedAdd(s.totalToTreasury, split.treasuryAmount),
            executions: s.executions + 1,
        };

        logger.info(
            `[BUYBACK] revenue ${formatUnits(split.revenue)}: bought back ${formatUnits(split.buybackAmount)} ` +
            `(burn ${formatUnits(split.burnAmount)}, reward pool ${formatUnits(split.rewardPoolAmount)})` +
            `${split.quote.paused ? ' [paused]' : ''}`
        );
        return this.state;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getState(): BuybackState {
        return this.state;
    }

    getSnapshot(): BuybackSnapshot {
        const last = this.state.lastAllocationTime;
        return {
            ...this.state,
            treasuryBps: BASIS_POINTS - this.state.allocationBps,
            nextAllocationTime: last === null ? null : last + this.config.allocationCooldownSeconds,
            sampleCount: this.history.size,
            latestSample: this.history.latest() ?? null,
        };
    }
}
