/**
 * Loyalty Ledger
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Time-in-protocol bonus, independent of balance.
 *
 * - firstActivityTime is written once, on the first qualifying activity.
 * - The bonus is computed on demand and never stored.
 * - Years are counted with integer division: partial years contribute nothing,
 *   so an account one day short of its anniversary gets no credit for that year.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { min } from '../math/fixedPoint';
import { DEFAULT_LOYALTY_CONFIG } from './config';
import { LoyaltyConfig, LoyaltyStatus } from './types';

/**
 * Write-once anchor: keeps an existing value, otherwise `now`.
 */
export function recordFirstActivity(firstActivityTime: number | null, now: number): number {
    return firstActivityTime ?? now;
}

export function loyaltyYears(
    firstActivityTime: number | null,
    now: number,
    config: LoyaltyConfig = DEFAULT_LOYALTY_CONFIG
): number {
    if (firstActivityTime === null || now <= firstActivityTime) return 0;
    return Math.floor((now - firstActivityTime) / config.secondsPerYear);
}

export function loyaltyBonusBps(
    firstActivityTime: number | null,
    now: number,
    config: LoyaltyConfig = DEFAULT_LOYALTY_CONFIG
): bigint {
    const years = BigInt(loyaltyYears(firstActivityTime, now, config));
    return min(years * config.bonusPerYearBps, config.maxLoyaltyBps);
}

export function getLoyaltyStatus(
    firstActivityTime: number | null,
    now: number,
    config: LoyaltyConfig = DEFAULT_LOYALTY_CONFIG
): LoyaltyStatus {
    const yearsElapsed = loyaltyYears(firstActivityTime, now, config);
    const bonusBps = loyaltyBonusBps(firstActivityTime, now, config);

    let secondsToNextYear: number | null = null;
    if (firstActivityTime !== null && bonusBps < config.maxLoyaltyBps) {
        const nextAnniversary = firstActivityTime + (yearsElapsed + 1) * config.secondsPerYear;
        secondsToNextYear = nextAnniversary - now;
    }

    return { firstActivityTime, yearsElapsed, bonusBps, secondsToNextYear };
}
