import BigNumber from 'bignumber.js';
import { TOKEN_DECIMALS } from '../config/constants';

/**
 * Base units → human-readable token amount, for logs and snapshots only.
 */
export const formatUnits = (
    amount: bigint,
    decimals: number = TOKEN_DECIMALS,
    dp: number = 4
): string => {
    return new BigNumber(amount.toString()).shiftedBy(-decimals).toFixed(dp, BigNumber.ROUND_DOWN);
};

/** 2500n → "25.00%" */
export const formatBps = (bps: bigint): string => {
    return `${new BigNumber(bps.toString()).dividedBy(100).toFixed(2)}%`;
};

/** 25000n → "2.50x" */
export const formatMultiplier = (bps: bigint): string => {
    return `${new BigNumber(bps.toString()).dividedBy(10_000).toFixed(2)}x`;
};

/**
 * Whole or fractional token string → base units. Throws on malformed input or
 * more fractional digits than the token has.
 */
export const parseUnits = (value: string, decimals: number = TOKEN_DECIMALS): bigint => {
    const parsed = new BigNumber(value);
    if (!parsed.isFinite() || parsed.isNegative()) {
        throw new Error(`invalid token amount: ${value}`);
    }
    const scaled = parsed.shiftedBy(decimals);
    if (!scaled.isInteger()) {
        throw new Error(`too many decimals in ${value}`);
    }
    return BigInt(scaled.toFixed(0));
};
