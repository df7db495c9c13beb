/**
 * Combo Tracker - Type Definitions
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * A transient per-account reward booster that grows with rapid consecutive
 * trades and resets lazily after inactivity.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type ComboPhase = 'cold' | 'warm';

export interface ComboState {
    /** Stored multiplier (10000 = 1x). Stale until the next trade materializes it. */
    readonly multiplierBps: bigint;

    /** Timestamp of the last qualifying trade, null before the first */
    readonly lastActionTime: number | null;

    /** Consecutive trades in the current combo chain */
    readonly streak: number;
}

export interface ComboConfig {
    /** Max seconds between trades to keep the chain alive (inclusive) */
    windowSeconds: number;

    /** Multiplier increase per qualifying trade (bps) */
    stepBps: bigint;

    /** Multiplier ceiling (bps) */
    maxMultiplierBps: bigint;
}

export interface ComboTradeResult {
    /** Multiplier this trade's reward uses (materialized before advancing) */
    appliedMultiplierBps: bigint;

    /** Bonus portion of the applied multiplier (applied - 10000) */
    appliedBonusBps: bigint;

    /** State after the trade registers */
    next: ComboState;

    /** True when an expired chain was reset by this trade */
    wasReset: boolean;
}
