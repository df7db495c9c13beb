/**
 * Loyalty Ledger - Type Definitions
 */

export interface LoyaltyConfig {
    /** Bonus earned per full year since first activity (bps) */
    bonusPerYearBps: bigint;

    /** Loyalty bonus ceiling (bps) */
    maxLoyaltyBps: bigint;

    /** Length of a loyalty year (seconds) */
    secondsPerYear: number;
}

export interface LoyaltyStatus {
    firstActivityTime: number | null;
    yearsElapsed: number;
    bonusBps: bigint;
    /** Seconds until the next full year is credited, null once at the cap or before first activity */
    secondsToNextYear: number | null;
}
