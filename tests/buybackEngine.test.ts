/**
 * Buyback Engine Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Trend-aware buyback sizing, the price-based allocation bands, the revenue
 * split and the price history that backs the trailing averages.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SECONDS_PER_DAY, SECONDS_PER_WEEK, tokens } from '../src/config/constants';
import { BuybackEngine } from '../src/buyback/buybackEngine';
import { DEFAULT_PRICE_HISTORY_CONFIG } from '../src/buyback/config';
import { PriceHistory } from '../src/buyback/priceHistory';
import { TrailingAverages } from '../src/buyback/types';

const DAY = SECONDS_PER_DAY;

function averages(avg30: bigint, avg90: bigint): TrailingAverages {
    return { avg30, avg90, shortSamples: 30, longSamples: 90 };
}

describe('BuybackEngine', () => {
    // ═══════════════════════════════════════════════════════════════════════════
    // QUOTES
    // ═══════════════════════════════════════════════════════════════════════════

    describe('computeBuybackAmount', () => {
        const engine = new BuybackEngine();

        it('buys the minimum when price is at or above the short average', () => {
            const quote = engine.computeBuybackAmount(110n, 0, averages(100n, 100n));

            expect(quote.shortTermDeviationBps).toBe(0n);
            expect(quote.multiplierBps).toBe(10_000n);
            expect(quote.amount).toBe(tokens(1_000));
            expect(quote.paused).toBe(false);
        });

        it('scales dips harder outside an uptrend', () => {
            const quote = engine.computeBuybackAmount(90n, 0, averages(100n, 100n));

            expect(quote.isLongTermUptrend).toBe(false);
            expect(quote.shortTermDeviationBps).toBe(1_000n);
            expect(quote.multiplierBps).toBe(14_000n);
            expect(quote.amount).toBe(tokens(1_400));
        });

        it('caps the downtrend bonus', () => {
            expect(engine.computeBuybackAmount(50n, 0, averages(100n, 100n)).multiplierBps).toBe(14_000n);
        });

        it('scales dips gently in an uptrend', () => {
            const quote = engine.computeBuybackAmount(95n, 0, averages(100n, 80n));

            expect(quote.isLongTermUptrend).toBe(true);
            expect(quote.multiplierBps).toBe(11_000n);
            expect(quote.amount).toBe(tokens(1_100));
        });

        it('pauses above 120% of the long average', () => {
            const atThreshold = engine.computeBuybackAmount(96n, 0, averages(100n, 80n));
            expect(atThreshold.paused).toBe(false);
            expect(atThreshold.amount).toBe(tokens(1_080));

            const above = engine.computeBuybackAmount(97n, 0, averages(100n, 80n));
            expect(above.paused).toBe(true);
            expect(above.multiplierBps).toBe(10_600n);
            expect(above.amount).toBe(0n);
        });

        it('never buys while paused', () => {
            for (let price = 121n; price <= 200n; price++) {
                expect(engine.computeBuybackAmount(price, 0, averages(150n, 100n)).amount).toBe(0n);
            }
        });

        it('rejects a non-positive price', () => {
            expect(() => engine.computeBuybackAmount(0n, 0, averages(100n, 100n))).toThrow('[InvalidPriceSample]');
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // TRAILING AVERAGES
    // ═══════════════════════════════════════════════════════════════════════════

    describe('trailingAverages', () => {
        it('averages each window from recorded samples', () => {
            const engine = new BuybackEngine();
            for (let day = 0; day < 14; day++) {
                engine.recordPrice({ timestamp: day * DAY, price: 80n });
            }
            for (let day = 50; day < 57; day++) {
                engine.recordPrice({ timestamp: day * DAY, price: 120n });
            }

            expect(engine.trailingAverages(56 * DAY)).toEqual({
                avg30: 120n,
                avg90: 93n,
                shortSamples: 7,
                longSamples: 21,
            });
        });

        it('refuses thin history', () => {
            const engine = new BuybackEngine();
            for (let day = 0; day < 13; day++) {
                engine.recordPrice({ timestamp: day * DAY, price: 100n });
            }

            expect(() => engine.trailingAverages(12 * DAY)).toThrow('[InsufficientPriceHistory]');
            expect(() => engine.computeBuybackAmount(100n, 12 * DAY)).toThrow('[InsufficientPriceHistory]');

            engine.recordPrice({ timestamp: 13 * DAY, price: 100n });
            expect(engine.computeBuybackAmount(100n, 13 * DAY).amount).toBe(tokens(1_000));
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // ALLOCATION
    // ═══════════════════════════════════════════════════════════════════════════

    describe('allocation', () => {
        it('picks the band from price against the long average', () => {
            const engine = new BuybackEngine();
            const avg = averages(100n, 100n);

            expect(engine.previewAllocation(89n, 0, avg).allocationBps).toBe(4_000n);
            expect(engine.previewAllocation(90n, 0, avg).band).toBe('neutral');
            expect(engine.previewAllocation(110n, 0, avg).allocationBps).toBe(2_000n);
            expect(engine.previewAllocation(111n, 0, avg).allocationBps).toBe(1_000n);
        });

        it('applies at most once per cooldown', () => {
            const engine = new BuybackEngine();
            const avg = averages(100n, 100n);

            const update = engine.updateAllocation(89n, 5, avg);
            expect(update).toEqual({
                band: 'discount',
                priceRatioBps: 8_900n,
                previousAllocationBps: 2_000n,
                allocationBps: 4_000n,
                treasuryBps: 6_000n,
                timestamp: 5,
            });

            expect(() => engine.updateAllocation(111n, 5 + SECONDS_PER_WEEK - 1, avg)).toThrow('[AllocationTooSoon]');
            expect(engine.getState().allocationBps).toBe(4_000n);

            const snapshot = engine.getSnapshot();
            expect(snapshot.treasuryBps).toBe(6_000n);
            expect(snapshot.nextAllocationTime).toBe(5 + SECONDS_PER_WEEK);

            expect(engine.updateAllocation(111n, 5 + SECONDS_PER_WEEK, avg).allocationBps).toBe(1_000n);
        });
    });

    // ═══════════════════════════════════════════════════════════════════════════
    // REVENUE SPLIT
    // ═══════════════════════════════════════════════════════════════════════════

    describe('planRevenueSplit', () => {
        const avg = averages(100n, 100n);

        it('limits the buyback to the quoted amount', () => {
            const split = new BuybackEngine().planRevenueSplit(tokens(10_000), 100n, 0, avg);

            expect(split.buybackAmount).toBe(tokens(1_000));
            expect(split.burnAmount).toBe(tokens(500));
            expect(split.rewardPoolAmount).toBe(tokens(500));
            expect(split.treasuryAmount).toBe(tokens(9_000));
        });

        it('limits the buyback to the allocation share', () => {
            const split = new BuybackEngine().planRevenueSplit(tokens(1_000), 100n, 0, avg);

            expect(split.buybackAmount).toBe(tokens(200));
            expect(split.burnAmount).toBe(tokens(100));
            expect(split.rewardPoolAmount).toBe(tokens(100));
            expect(split.treasuryAmount).toBe(tokens(800));
        });

        it('routes everything to treasury while paused', () => {
            const split = new BuybackEngine().planRevenueSplit(tokens(1_000), 130n, 0, avg);

            expect(split.quote.paused).toBe(true);
            expect(split.buybackAmount).toBe(0n);
            expect(split.treasuryAmount).toBe(tokens(1_000));
        });

        it('rejects zero revenue', () => {
            expect(() => new BuybackEngine().planRevenueSplit(0n, 100n, 0, avg)).toThrow('[InvalidAmount]');
        });

        it('accumulates executed splits', () => {
            const engine = new BuybackEngine();
            engine.recordExecution(engine.planRevenueSplit(tokens(10_000), 100n, 0, avg));
            const state = engine.recordExecution(engine.planRevenueSplit(tokens(1_000), 100n, 0, avg));

            expect(state.totalRevenue).toBe(tokens(11_000));
            expect(state.totalBoughtBack).toBe(tokens(1_200));
            expect(state.totalBurned).toBe(tokens(600));
            expect(state.totalToRewardPool).toBe(tokens(600));
            expect(state.totalToTreasury).toBe(tokens(9_800));
            expect(state.executions).toBe(2);
        });
    });
});

describe('PriceHistory', () => {
    it('drops samples older than the long window', () => {
        const history = new PriceHistory();
        history.record({ timestamp: 0, price: 100n });
        history.record({ timestamp: 90 * DAY, price: 100n });
        expect(history.size).toBe(2);

        history.record({ timestamp: 90 * DAY + 1, price: 100n });
        expect(history.toArray().map(s => s.timestamp)).toEqual([90 * DAY, 90 * DAY + 1]);
    });

    it('enforces capacity', () => {
        const history = new PriceHistory({ ...DEFAULT_PRICE_HISTORY_CONFIG, capacity: 3 });
        for (let t = 0; t < 5; t++) {
            history.record({ timestamp: t, price: 100n });
        }
        expect(history.toArray().map(s => s.timestamp)).toEqual([2, 3, 4]);
    });

    it('rejects out-of-order and non-positive samples', () => {
        const history = new PriceHistory();
        history.record({ timestamp: 10, price: 100n });

        expect(() => history.record({ timestamp: 9, price: 100n })).toThrow('[InvalidPriceSample]');
        expect(() => history.record({ timestamp: 11, price: 0n })).toThrow('[InvalidPriceSample]');
        expect(history.size).toBe(1);
    });

    it('includes both window edges', () => {
        const history = new PriceHistory();
        history.record({ timestamp: 0, price: 100n });
        history.record({ timestamp: 100, price: 300n });

        expect(history.countInWindow(100, 100)).toBe(2);
        expect(history.countInWindow(99, 100)).toBe(1);
        expect(history.average(100, 100)).toBe(200n);
        expect(() => history.average(10, 50)).toThrow('[InsufficientPriceHistory]');
    });

    it('measures volatility as range over average', () => {
        const history = new PriceHistory();
        history.record({ timestamp: 0, price: 90n });
        history.record({ timestamp: 1, price: 110n });
        history.record({ timestamp: 2, price: 100n });

        expect(history.volatilityBps(SECONDS_PER_WEEK, 2)).toBe(2_000n);
        expect(() => history.volatilityBps(0, 2)).toThrow('[InsufficientPriceHistory]');
    });
});
