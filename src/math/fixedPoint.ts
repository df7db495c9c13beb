/**
 * Fixed-Point Math
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Basis-point arithmetic on unsigned integers. All economic caps rest on these
 * helpers, so every result is range-checked against UINT256_MAX and negative
 * values are rejected instead of wrapping.
 *
 * Division always comes last in a formula chain and truncates toward zero.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BASIS_POINTS, UINT256_MAX } from '../config/constants';
import { EconomyError } from '../core/errors';

export function assertUint(value: bigint, label: string = 'value'): bigint {
    if (value < 0n || value > UINT256_MAX) {
        throw new EconomyError('ArithmeticOverflow', `${label} out of uint256 range`, { value });
    }
    return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
    assertUint(a, 'lhs');
    assertUint(b, 'rhs');
    return assertUint(a + b, 'sum');
}

/**
 * Underflow is reported as ArithmeticOverflow (same failure class).
 */
export function checkedSub(a: bigint, b: bigint): bigint {
    assertUint(a, 'lhs');
    assertUint(b, 'rhs');
    return assertUint(a - b, 'difference');
}

export function checkedMul(a: bigint, b: bigint): bigint {
    assertUint(a, 'lhs');
    assertUint(b, 'rhs');
    return assertUint(a * b, 'product');
}

/**
 * a * b / denominator, truncating.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
    if (denominator <= 0n) {
        throw new EconomyError('ArithmeticOverflow', 'division by zero', { a, b, denominator });
    }
    return checkedMul(a, b) / denominator;
}

/** value * bps / 10000 */
export function mulBps(value: bigint, bps: bigint): bigint {
    return mulDiv(value, bps, BASIS_POINTS);
}

/** value * 10000 / bps */
export function divBps(value: bigint, bps: bigint): bigint {
    return mulDiv(value, BASIS_POINTS, bps);
}

export function min(a: bigint, b: bigint): bigint {
    return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
    return a > b ? a : b;
}

export function clamp(value: bigint, lo: bigint, hi: bigint): bigint {
    if (lo > hi) {
        throw new EconomyError('InvalidConfiguration', 'clamp bounds inverted', { lo, hi });
    }
    return min(max(value, lo), hi);
}

/** max(a - b, 0) */
export function subClamp(a: bigint, b: bigint): bigint {
    return a > b ? a - b : 0n;
}

export function sum(values: readonly bigint[]): bigint {
    return values.reduce((acc, v) => checkedAdd(acc, v), 0n);
}
