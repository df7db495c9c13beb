/**
 * Oracle reads. Every failure mode collapses into PriceUnavailable so callers
 * never compute on a price they cannot trust.
 */

import { EconomyError, describeError } from '../core/errors';
import logger from '../utils/logger';
import { OraclePrice, PriceOracle } from './types';

export async function readFreshPrice(oracle: PriceOracle, now: number, maxAgeSeconds: number): Promise<OraclePrice> {
    let quote: OraclePrice;
    try {
        quote = await oracle.getCurrentPrice();
    } catch (err) {
        logger.warn(`[ORACLE] getCurrentPrice failed: ${describeError(err)}`);
        throw new EconomyError('PriceUnavailable', 'oracle call failed', { cause: describeError(err) });
    }

    if (quote.price <= 0n) {
        throw new EconomyError('PriceUnavailable', 'oracle returned a non-positive price', { price: quote.price });
    }
    if (quote.timestamp > now) {
        throw new EconomyError('PriceUnavailable', 'oracle timestamp is in the future', {
            timestamp: quote.timestamp,
            now,
        });
    }
    if (now - quote.timestamp > maxAgeSeconds) {
        throw new EconomyError('PriceUnavailable', `oracle price is ${now - quote.timestamp}s old`, {
            timestamp: quote.timestamp,
            now,
            maxAgeSeconds,
        });
    }

    return quote;
}

export async function readTrailingAverage(oracle: PriceOracle, windowDays: number): Promise<bigint> {
    let average: bigint;
    try {
        average = await oracle.getTrailingAverage(windowDays);
    } catch (err) {
        logger.warn(`[ORACLE] getTrailingAverage(${windowDays}) failed: ${describeError(err)}`);
        throw new EconomyError('PriceUnavailable', `oracle ${windowDays}d average unavailable`, {
            windowDays,
            cause: describeError(err),
        });
    }

    if (average <= 0n) {
        throw new EconomyError('PriceUnavailable', `oracle ${windowDays}d average is non-positive`, {
            windowDays,
            average,
        });
    }
    return average;
}
