/**
 * Staking Ledger Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Locks, draw order on unstake, weighted-average merges and voting power.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SECONDS_PER_DAY } from '../src/config/constants';
import { isEconomyError } from '../src/core/errors';
import { StakingLedger, remainingLockDays } from '../src/staking/stakingLedger';

const DAY = SECONDS_PER_DAY;

function createLedger(): StakingLedger {
    let counter = 0;
    return new StakingLedger(undefined, () => `pos-${++counter}`);
}

describe('StakingLedger', () => {
    describe('stake', () => {
        it('opens a position with its own lock', () => {
            const ledger = createLedger();
            const position = ledger.stake('alice', 100n, 7 * DAY, 50);

            expect(position).toEqual({
                id: 'pos-1',
                owner: 'alice',
                amount: 100n,
                startTime: 50,
                lockExpiryTime: 50 + 7 * DAY,
            });
            expect(ledger.getStakedAmount('alice')).toBe(100n);
        });

        it('validates amount and lock range', () => {
            const ledger = createLedger();
            expect(() => ledger.stake('alice', 0n, 7 * DAY, 0)).toThrow('[InvalidAmount]');
            expect(() => ledger.stake('alice', 1n, 7 * DAY - 1, 0)).toThrow('[LockOutOfRange]');
            expect(() => ledger.stake('alice', 1n, 365 * DAY + 1, 0)).toThrow('[LockOutOfRange]');
            expect(() => ledger.stake('alice', 1n, 7.5 * DAY + 0.5, 0)).toThrow('[LockOutOfRange]');
            expect(ledger.getPositions('alice')).toEqual([]);
        });
    });

    describe('unstake', () => {
        function seeded(): StakingLedger {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 7 * DAY, 0);
            ledger.stake('alice', 200n, 30 * DAY, 0);
            return ledger;
        }

        it('checks the balance before the locks', () => {
            const ledger = seeded();
            expect(() => ledger.unstake('alice', 301n, 0)).toThrow('[InsufficientStake]');
            expect(() => ledger.unstake('alice', 0n, 0)).toThrow('[InvalidAmount]');
        });

        it('refuses to release locked stake', () => {
            const ledger = seeded();
            expect(() => ledger.unstake('alice', 1n, 7 * DAY - 1)).toThrow('[StakeLocked]');
            expect(() => ledger.unstake('alice', 150n, 7 * DAY)).toThrow('[StakeLocked]');
            expect(ledger.getStakedAmount('alice')).toBe(300n);
        });

        it('draws from the earliest-expiring unlocked position first', () => {
            const ledger = seeded();

            const partial = ledger.unstake('alice', 60n, 7 * DAY);
            expect(partial).toEqual({
                account: 'alice',
                released: 60n,
                remainingStaked: 240n,
                drawn: [{ positionId: 'pos-1', amount: 60n }],
            });
            expect(ledger.getPosition('alice', 'pos-1')?.amount).toBe(40n);

            const rest = ledger.unstake('alice', 240n, 30 * DAY);
            expect(rest.drawn).toEqual([
                { positionId: 'pos-1', amount: 40n },
                { positionId: 'pos-2', amount: 200n },
            ]);
            expect(ledger.getPositions('alice')).toEqual([]);
            expect(ledger.getStakedAmount('alice')).toBe(0n);
        });

        it('previews without mutating', () => {
            const ledger = seeded();
            expect(ledger.previewUnstake('alice', 100n, 7 * DAY).remainingStaked).toBe(200n);
            expect(ledger.getStakedAmount('alice')).toBe(300n);
        });

        it('never lets a balance go negative', () => {
            const ledger = createLedger();
            let now = 0;
            for (let i = 1; i <= 40; i++) {
                now += DAY;
                try {
                    if (i % 3 === 0) {
                        ledger.unstake('alice', BigInt(i * 7), now);
                    } else {
                        ledger.stake('alice', BigInt(i * 5), 7 * DAY, now);
                    }
                } catch (err) {
                    expect(isEconomyError(err)).toBe(true);
                }
                expect(ledger.getStakedAmount('alice')).toBeGreaterThanOrEqual(0n);
                for (const position of ledger.getPositions('alice')) {
                    expect(position.amount).toBeGreaterThan(0n);
                }
            }
        });
    });

    describe('mergeStakes', () => {
        it('weights the remaining lock by amount', () => {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 10 * DAY, 0);
            ledger.stake('alice', 300n, 30 * DAY, 0);

            const result = ledger.mergeStakes('alice', ['pos-1', 'pos-2'], 0);

            expect(result.weightedLockDays).toBe(25);
            expect(result.consumed).toEqual(['pos-1', 'pos-2']);
            expect(result.merged).toEqual({
                id: 'pos-3',
                owner: 'alice',
                amount: 400n,
                startTime: 0,
                lockExpiryTime: 25 * DAY,
            });
            expect(ledger.getPositions('alice')).toEqual([result.merged]);
        });

        it('truncates the weighted average', () => {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 7 * DAY, 0);
            ledger.stake('alice', 200n, 8 * DAY, 0);

            expect(ledger.mergeStakes('alice', ['pos-1', 'pos-2'], 0).weightedLockDays).toBe(7);
        });

        it('conserves amount and stays within the input locks', () => {
            const cases: Array<Array<[bigint, number]>> = [
                [[1n, 365], [1_000_000n, 7]],
                [[999n, 100], [1n, 200], [77n, 30]],
                [[5n, 10], [5n, 10]],
            ];

            for (const inputs of cases) {
                const ledger = createLedger();
                const ids = inputs.map(([amount, days]) => ledger.stake('alice', amount, days * DAY, 0).id);
                const lockDays = inputs.map(([, days]) => days);

                const { merged, weightedLockDays } = ledger.mergeStakes('alice', ids, 0);

                expect(merged.amount).toBe(inputs.reduce((acc, [amount]) => acc + amount, 0n));
                expect(weightedLockDays).toBeGreaterThanOrEqual(Math.min(...lockDays));
                expect(weightedLockDays).toBeLessThanOrEqual(Math.max(...lockDays));
                expect(remainingLockDays(merged, 0)).toBe(weightedLockDays);
            }
        });

        it('never releases an input before its own expiry when merged mid-day', () => {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 7 * DAY, 0);
            ledger.stake('alice', 100n, 7 * DAY, 0);
            const mergeTime = 6 * DAY + DAY / 2;

            const result = ledger.mergeStakes('alice', ['pos-1', 'pos-2'], mergeTime);

            expect(result.weightedLockDays).toBe(0);
            expect(result.merged).toEqual({
                id: 'pos-3',
                owner: 'alice',
                amount: 200n,
                startTime: 0,
                lockExpiryTime: 7 * DAY,
            });
            expect(() => ledger.unstake('alice', 1n, mergeTime)).toThrow('[StakeLocked]');
            expect(() => ledger.unstake('alice', 1n, 7 * DAY - 1)).toThrow('[StakeLocked]');
            expect(ledger.unstake('alice', 200n, 7 * DAY).remainingStaked).toBe(0n);
        });

        it('keeps the weighted expiry when it outlasts the earliest input', () => {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 10 * DAY, 0);
            ledger.stake('alice', 300n, 30 * DAY, DAY / 2);

            // remaining 8.96d and 29.46d truncate to 8 and 29; (800 + 8700) / 400 = 23
            const result = ledger.mergeStakes('alice', ['pos-1', 'pos-2'], DAY + 3_600);

            expect(result.weightedLockDays).toBe(23);
            expect(result.merged.lockExpiryTime).toBe(DAY + 3_600 + 23 * DAY);
            expect(result.merged.lockExpiryTime).toBeGreaterThan(10 * DAY);
        });

        it('rejects malformed merges', () => {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 10 * DAY, 0);
            ledger.stake('alice', 100n, 10 * DAY, 0);
            ledger.stake('bob', 100n, 10 * DAY, 0);

            expect(() => ledger.mergeStakes('alice', ['pos-1'], 0)).toThrow('[InvalidMerge]');
            expect(() => ledger.mergeStakes('alice', ['pos-1', 'pos-1'], 0)).toThrow('[InvalidMerge]');
            expect(() => ledger.mergeStakes('alice', ['pos-1', 'missing'], 0)).toThrow('[PositionNotFound]');
            expect(() => ledger.mergeStakes('alice', ['pos-1', 'pos-3'], 0)).toThrow('[PositionNotFound]');
            expect(ledger.getPositions('alice')).toHaveLength(2);
        });
    });

    describe('views', () => {
        it('computes voting power from the remaining lock', () => {
            const ledger = createLedger();
            ledger.stake('alice', 1_000n, 30 * DAY, 0);
            ledger.stake('alice', 1_000n, 365 * DAY, 0);

            // 1000 * (10000 + 300) / 10000 + 1000 * (10000 + 3650) / 10000
            expect(ledger.getVotingPower('alice', 0)).toBe(2_395n);
            expect(ledger.getVotingPower('alice', 30 * DAY)).toBe(2_335n);
            expect(ledger.getVotingPower('bob', 0)).toBe(0n);
        });

        it('summarises an account', () => {
            const ledger = createLedger();
            ledger.stake('alice', 100n, 7 * DAY, 10);
            ledger.stake('alice', 50n, 30 * DAY, 20);
            ledger.stake('bob', 25n, 7 * DAY, 0);

            const info = ledger.getStakingInfo('alice', 10 + 7 * DAY);
            expect(info.stakedAmount).toBe(150n);
            expect(info.stakeStartTime).toBe(10);
            expect(info.lockExpiryTime).toBe(20 + 30 * DAY);
            expect(info.unlockedAmount).toBe(100n);
            expect(ledger.getTotalStaked()).toBe(175n);

            expect(ledger.getStakingInfo('carol', 0)).toMatchObject({
                stakedAmount: 0n,
                stakeStartTime: null,
                lockExpiryTime: null,
            });
        });
    });
});
