/**
 * Emission Controller
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Time-windowed mint budget plus a volatility-adaptive base emission rate.
 *
 * WINDOWS (lazy):
 *   Before every mint, each daily/weekly/monthly window whose length has elapsed
 *   since its start is reset to zero and restarted at `now`. No timers.
 *
 * MINT:
 *   every window: minted + amount <= limit   else ExceedsEmissionCap
 *   totalSupply + amount <= maxSupply        else ExceedsMaxSupply
 *
 * RATE ADJUSTMENT (once per adjustment interval, AdjustmentTooSoon otherwise):
 *   volatility > high  → rate -= rate * min(volatility - high, maxReduction) / 10000
 *   volatility < low   → rate += rate * lowVolatilityIncrease / 10000
 *   result clamped to [minRate, maxRate]
 *
 * SCHEDULED:
 *   due = min(baseRate * elapsed / 1 day, smallest window headroom, supply headroom)
 *   lastScheduledMintTime moves forward by the time `due` pays for
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SECONDS_PER_DAY } from '../config/constants';
import { EconomyError } from '../core/errors';
import { checkedAdd, checkedMul, checkedSub, clamp, min, mulBps, mulDiv, subClamp } from '../math/fixedPoint';
import { formatBps, formatUnits } from '../utils/format';
import logger from '../utils/logger';
import { DEFAULT_EMISSION_CONFIG, EMISSION_WINDOWS, WINDOW_SECONDS } from './config';
import {
    EmissionConfig,
    EmissionSnapshot,
    EmissionState,
    EmissionWindow,
    EmissionWindowName,
    MintReceipt,
    RateAdjustment,
    RateAdjustmentAction,
} from './types';

export function createEmissionState(config: EmissionConfig, genesisTime: number): EmissionState {
    const fresh: EmissionWindow = { minted: 0n, startTime: genesisTime };
    return {
        baseRatePerDay: clamp(config.baseRatePerDay, config.minRatePerDay, config.maxRatePerDay),
        totalSupply: config.initialSupply,
        totalMinted: 0n,
        totalBurned: 0n,
        windows: { daily: fresh, weekly: fresh, monthly: fresh },
        lastAdjustmentTime: null,
        lastScheduledMintTime: genesisTime,
    };
}

/**
 * Window counters as of `now`.
 */
export function materializeWindows(state: EmissionState, now: number): EmissionState {
    let changed = false;
    const windows: Record<EmissionWindowName, EmissionWindow> = { ...state.windows };

    for (const name of EMISSION_WINDOWS) {
        if (now - windows[name].startTime >= WINDOW_SECONDS[name]) {
            windows[name] = { minted: 0n, startTime: now };
            changed = true;
        }
    }

    return changed ? { ...state, windows } : state;
}

function limitOf(config: EmissionConfig, name: EmissionWindowName): bigint {
    switch (name) {
        case 'daily':
            return config.dailyLimit;
        case 'weekly':
            return config.weeklyLimit;
        case 'monthly':
            return config.monthlyLimit;
    }
}

function ceilDiv(numerator: bigint, denominator: bigint): bigint {
    return (numerator + denominator - 1n) / denominator;
}

export class EmissionController {
    private state: EmissionState;

    constructor(
        private readonly config: EmissionConfig = DEFAULT_EMISSION_CONFIG,
        genesisTime: number = 0
    ) {
        this.state = createEmissionState(config, genesisTime);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MINTING
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Validate a mint and return the state it would produce.
     */
    assertCanMint(amount: bigint, now: number): EmissionState {
        if (amount <= 0n) {
            throw new EconomyError('InvalidAmount', 'mint amount must be positive', { amount });
        }

        const current = materializeWindows(this.state, now);

        for (const name of EMISSION_WINDOWS) {
            const limit = limitOf(this.config, name);
            const projected = checkedAdd(current.windows[name].minted, amount);
            if (projected > limit) {
                throw new EconomyError('ExceedsEmissionCap', `${name} emission cap exceeded`, {
                    window: name,
                    minted: current.windows[name].minted,
                    requested: amount,
                    limit,
                });
            }
        }

        const projectedSupply = checkedAdd(current.totalSupply, amount);
        if (projectedSupply > this.config.maxSupply) {
            throw new EconomyError('ExceedsMaxSupply', 'max supply exceeded', {
                totalSupply: current.totalSupply,
                requested: amount,
                maxSupply: this.config.maxSupply,
            });
        }

        const windows: Record<EmissionWindowName, EmissionWindow> = { ...current.windows };
        for (const name of EMISSION_WINDOWS) {
            windows[name] = { ...windows[name], minted: windows[name].minted + amount };
        }

        return {
            ...current,
            windows,
            totalSupply: projectedSupply,
            totalMinted: checkedAdd(current.totalMinted, amount),
        };
    }

    tryMint(amount: bigint, now: number): MintReceipt {
        this.state = this.assertCanMint(amount, now);

        logger.info(
            `[MINT] ${formatUnits(amount)} minted, supply ${formatUnits(this.state.totalSupply)}, ` +
            `daily ${formatUnits(this.state.windows.daily.minted)}/${formatUnits(this.config.dailyLimit)}`
        );

        return {
            amount,
            totalSupply: this.state.totalSupply,
            windows: {
                daily: this.state.windows.daily.minted,
                weekly: this.state.windows.weekly.minted,
                monthly: this.state.windows.monthly.minted,
            },
            timestamp: now,
        };
    }

    /**
     * Emission accrued at the base rate since the last scheduled mint.
     */
    scheduledEmissionAccrued(now: number): bigint {
        const elapsed = Math.max(0, now - this.state.lastScheduledMintTime);
        return mulDiv(this.state.baseRatePerDay, BigInt(elapsed), BigInt(SECONDS_PER_DAY));
    }

    /**
     * Largest amount every window and the supply ceiling still admit at `now`.
     */
    mintBudget(now: number): bigint {
        const current = materializeWindows(this.state, now);
        let budget = subClamp(this.config.maxSupply, current.totalSupply);
        for (const name of EMISSION_WINDOWS) {
            budget = min(budget, subClamp(limitOf(this.config, name), current.windows[name].minted));
        }
        return budget;
    }

    /**
     * Accrued emission capped by the mint budget. Whatever the cap holds back
     * stays accrued for later scheduled mints.
     */
    scheduledEmissionDue(now: number): bigint {
        return min(this.scheduledEmissionAccrued(now), this.mintBudget(now));
    }

    /**
     * Validate a scheduled mint; returns the amount due.
     */
    assertCanMintScheduled(now: number): bigint {
        const due = this.scheduledEmissionDue(now);
        // nothing admitted: report the cap (or the empty accrual) that blocks it
        this.assertCanMint(due > 0n ? due : this.scheduledEmissionAccrued(now), now);
        return due;
    }

    mintScheduled(now: number): MintReceipt {
        const accrued = this.scheduledEmissionAccrued(now);
        const due = this.assertCanMintScheduled(now);
        const receipt = this.tryMint(due, now);

        // advance only by the time the minted amount pays for, rounded up
        const rate = this.state.baseRatePerDay;
        const paidSeconds =
            due === accrued
                ? now - this.state.lastScheduledMintTime
                : Number(ceilDiv(checkedMul(due, BigInt(SECONDS_PER_DAY)), rate));
        this.state = { ...this.state, lastScheduledMintTime: this.state.lastScheduledMintTime + paidSeconds };

        if (due < accrued) {
            logger.warn(
                `[EMISSION] scheduled mint capped at ${formatUnits(due)} of ${formatUnits(accrued)} accrued`
            );
        }
        return receipt;
    }

    /**
     * Tokens removed from supply (buyback burns).
     */
    assertCanBurn(amount: bigint): void {
        if (amount <= 0n || amount > this.state.totalSupply) {
            throw new EconomyError('InvalidAmount', 'burn amount must be positive and within supply', {
                amount,
                totalSupply: this.state.totalSupply,
            });
        }
    }

    recordBurn(amount: bigint): void {
        this.assertCanBurn(amount);
        this.state = {
            ...this.state,
            totalSupply: checkedSub(this.state.totalSupply, amount),
            totalBurned: checkedAdd(this.state.totalBurned, amount),
        };
        logger.info(`[BURN] ${formatUnits(amount)} burned, supply ${formatUnits(this.state.totalSupply)}`);
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // RATE ADJUSTMENT
    // ═══════════════════════════════════════════════════════════════════════════

    adjustEmissionRate(volatility7dBps: bigint, now: number): RateAdjustment {
        const last = this.state.lastAdjustmentTime;
        if (last !== null && now - last < this.config.adjustmentIntervalSeconds) {
            throw new EconomyError(
                'AdjustmentTooSoon',
                `next adjustment allowed at ${last + this.config.adjustmentIntervalSeconds}`,
                { lastAdjustmentTime: last, nextAdjustmentTime: last + this.config.adjustmentIntervalSeconds }
            );
        }
        if (volatility7dBps < 0n) {
            throw new EconomyError('InvalidAmount', 'volatility cannot be negative', { volatility7dBps });
        }

        const previousRate = this.state.baseRatePerDay;
        let action: RateAdjustmentAction = 'unchanged';
        let changeBps = 0n;
        let target = previousRate;

        if (volatility7dBps > this.config.highVolatilityBps) {
            action = 'reduced';
            changeBps = min(volatility7dBps - this.config.highVolatilityBps, this.config.maxVolatilityReductionBps);
            target = subClamp(previousRate, mulBps(previousRate, changeBps));
        } else if (volatility7dBps < this.config.lowVolatilityBps) {
            action = 'increased';
            changeBps = this.config.lowVolatilityIncreaseBps;
            target = checkedAdd(previousRate, mulBps(previousRate, changeBps));
        }

        const newRate = clamp(target, this.config.minRatePerDay, this.config.maxRatePerDay);
        this.state = { ...this.state, baseRatePerDay: newRate, lastAdjustmentTime: now };

        logger.info(
            `[EMISSION] volatility ${formatBps(volatility7dBps)} → rate ${action} ` +
            `${formatUnits(previousRate)} → ${formatUnits(newRate)}/day`
        );

        return {
            volatility7dBps,
            action,
            changeBps,
            previousRate,
            newRate,
            clamped: newRate !== target,
            timestamp: now,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getState(): EmissionState {
        return this.state;
    }

    getSnapshot(now: number): EmissionSnapshot {
        const current = materializeWindows(this.state, now);
        const minted = {
            daily: current.windows.daily.minted,
            weekly: current.windows.weekly.minted,
            monthly: current.windows.monthly.minted,
        };
        const last = current.lastAdjustmentTime;

        return {
            baseRatePerDay: current.baseRatePerDay,
            totalSupply: current.totalSupply,
            totalMinted: current.totalMinted,
            totalBurned: current.totalBurned,
            minted,
            remaining: {
                daily: subClamp(this.config.dailyLimit, minted.daily),
                weekly: subClamp(this.config.weeklyLimit, minted.weekly),
                monthly: subClamp(this.config.monthlyLimit, minted.monthly),
            },
            remainingSupply: subClamp(this.config.maxSupply, current.totalSupply),
            scheduledDue: this.scheduledEmissionDue(now),
            lastAdjustmentTime: last,
            nextAdjustmentTime: last === null ? null : last + this.config.adjustmentIntervalSeconds,
        };
    }
}
