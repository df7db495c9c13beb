// Shared constants for the IKIGAI economy core

/** 10,000 bps = 100% */
export const BASIS_POINTS = 10_000n;

/** Token base units per whole token (18 decimals) */
export const TOKEN_DECIMALS = 18;
export const TOKEN_UNIT = 10n ** 18n;

/** Upper bound of every integer quantity (EVM word) */
export const UINT256_MAX = 2n ** 256n - 1n;

// ═══════════════════════════════════════════════════════════════════════════════
// TIME (seconds)
// ═══════════════════════════════════════════════════════════════════════════════

export const SECONDS_PER_HOUR = 60 * 60;
export const SECONDS_PER_DAY = 24 * SECONDS_PER_HOUR;
export const SECONDS_PER_WEEK = 7 * SECONDS_PER_DAY;
export const SECONDS_PER_MONTH = 30 * SECONDS_PER_DAY;
export const SECONDS_PER_YEAR = 365 * SECONDS_PER_DAY;

/**
 * Whole tokens → base units.
 */
export function tokens(amount: number | bigint): bigint {
    return BigInt(amount) * TOKEN_UNIT;
}
