/**
 * Price History
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Bounded series of oracle price samples backing the trailing averages.
 *
 * Samples must arrive in non-decreasing timestamp order with a positive price.
 * A sample is dropped once it is more than `longWindowSeconds` older than the
 * newest one, or when the series exceeds `capacity`.
 *
 * A window of W seconds as of `now` holds samples with now - W <= t <= now.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BASIS_POINTS } from '../config/constants';
import { EconomyError } from '../core/errors';
import { max, min, mulDiv, sum } from '../math/fixedPoint';
import { DEFAULT_PRICE_HISTORY_CONFIG } from './config';
import { PriceHistoryConfig, PriceSample } from './types';

export class PriceHistory {
    private samples: PriceSample[] = [];

    constructor(private readonly config: PriceHistoryConfig = DEFAULT_PRICE_HISTORY_CONFIG) {}

    validateSample(sample: PriceSample): void {
        if (sample.price <= 0n) {
            throw new EconomyError('InvalidPriceSample', 'price must be positive', {
                price: sample.price,
                timestamp: sample.timestamp,
            });
        }
        const newest = this.latest();
        if (!Number.isInteger(sample.timestamp) || (newest && sample.timestamp < newest.timestamp)) {
            throw new EconomyError('InvalidPriceSample', 'sample is older than the newest recorded sample', {
                timestamp: sample.timestamp,
                newest: newest?.timestamp ?? null,
            });
        }
    }

    record(sample: PriceSample): void {
        this.validateSample(sample);
        this.samples.push(sample);

        const horizon = sample.timestamp - this.config.longWindowSeconds;
        const firstKept = this.samples.findIndex(s => s.timestamp >= horizon);
        if (firstKept > 0) {
            this.samples.splice(0, firstKept);
        }
        if (this.samples.length > this.config.capacity) {
            this.samples.splice(0, this.samples.length - this.config.capacity);
        }
    }

    window(windowSeconds: number, now: number): PriceSample[] {
        return this.samples.filter(s => s.timestamp <= now && now - s.timestamp <= windowSeconds);
    }

    countInWindow(windowSeconds: number, now: number): number {
        return this.window(windowSeconds, now).length;
    }

    /**
     * Arithmetic mean over the window, truncating.
     */
    average(windowSeconds: number, now: number): bigint {
        const inWindow = this.window(windowSeconds, now);
        if (inWindow.length === 0) {
            throw new EconomyError('InsufficientPriceHistory', `no samples in the last ${windowSeconds}s`, {
                windowSeconds,
            });
        }
        return sum(inWindow.map(s => s.price)) / BigInt(inWindow.length);
    }

    /**
     * Price range over the window relative to its average:
     * (max - min) * 10000 / average.
     */
    volatilityBps(windowSeconds: number, now: number): bigint {
        const inWindow = this.window(windowSeconds, now);
        if (inWindow.length < 2) {
            throw new EconomyError('InsufficientPriceHistory', 'volatility needs at least two samples', {
                windowSeconds,
                samples: inWindow.length,
            });
        }

        const prices = inWindow.map(s => s.price);
        const high = prices.reduce(max);
        const low = prices.reduce(min);
        const average = sum(prices) / BigInt(prices.length);

        return mulDiv(high - low, BASIS_POINTS, average);
    }

    latest(): PriceSample | undefined {
        return this.samples[this.samples.length - 1];
    }

    get size(): number {
        return this.samples.length;
    }

    toArray(): PriceSample[] {
        return [...this.samples];
    }
}
