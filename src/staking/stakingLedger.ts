/**
 * Staking Ledger
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Per-account stake positions with individual locks.
 *
 * MERGE:
 *   amount          = sum(inputs.amount)                       (exact)
 *   weightedLockDays = sum(amount * remainingLockDays) / total  (truncating)
 *   lockExpiryTime   = max(now + weightedLockDays * 1 day, earliest input expiry)
 *
 * Known weakness, kept for compatibility: a tiny position with a long lock
 * merged with a large position with a short lock pulls the result toward the
 * large one's lock, and vice versa. The weighting is by amount only.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BASIS_POINTS, SECONDS_PER_DAY } from '../config/constants';
import { EconomyError } from '../core/errors';
import { checkedAdd, checkedMul, checkedSub, min, mulBps, sum } from '../math/fixedPoint';
import { formatUnits } from '../utils/format';
import { generatePositionId } from '../utils/id';
import logger from '../utils/logger';
import { DEFAULT_STAKING_CONFIG } from './config';
import { MergeResult, StakePosition, StakingConfig, StakingInfo, UnstakeResult } from './types';

interface UnstakePlan {
    result: UnstakeResult;
    remainingPositions: StakePosition[];
}

export function remainingLockDays(position: StakePosition, now: number): number {
    const remaining = position.lockExpiryTime - now;
    return remaining > 0 ? Math.floor(remaining / SECONDS_PER_DAY) : 0;
}

export function isUnlocked(position: StakePosition, now: number): boolean {
    return now >= position.lockExpiryTime;
}

export class StakingLedger {
    private readonly positions = new Map<string, StakePosition[]>();

    constructor(
        private readonly config: StakingConfig = DEFAULT_STAKING_CONFIG,
        private readonly nextId: () => string = generatePositionId
    ) {}

    // ═══════════════════════════════════════════════════════════════════════════
    // STAKE
    // ═══════════════════════════════════════════════════════════════════════════

    validateStake(account: string, amount: bigint, lockDuration: number): void {
        if (amount <= 0n) {
            throw new EconomyError('InvalidAmount', 'stake amount must be positive', { account });
        }
        if (
            !Number.isInteger(lockDuration) ||
            lockDuration < this.config.minLockSeconds ||
            lockDuration > this.config.maxLockSeconds
        ) {
            throw new EconomyError(
                'LockOutOfRange',
                `lock ${lockDuration}s outside [${this.config.minLockSeconds}, ${this.config.maxLockSeconds}]`,
                { account, lockDuration }
            );
        }
        checkedAdd(this.getStakedAmount(account), amount);
    }

    stake(account: string, amount: bigint, lockDuration: number, now: number): StakePosition {
        this.validateStake(account, amount, lockDuration);

        const position: StakePosition = {
            id: this.nextId(),
            owner: account,
            amount,
            startTime: now,
            lockExpiryTime: now + lockDuration,
        };
        this.positions.set(account, [...this.getPositions(account), position]);

        logger.info(
            `[STAKING] ${account} staked ${formatUnits(amount)} until ${position.lockExpiryTime} (position ${position.id})`
        );
        return position;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // UNSTAKE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Validate an unstake and return what it would release.
     */
    previewUnstake(account: string, amount: bigint, now: number): UnstakeResult {
        return this.planUnstake(account, amount, now).result;
    }

    unstake(account: string, amount: bigint, now: number): UnstakeResult {
        const plan = this.planUnstake(account, amount, now);

        if (plan.remainingPositions.length === 0) {
            this.positions.delete(account);
        } else {
            this.positions.set(account, plan.remainingPositions);
        }

        logger.info(
            `[STAKING] ${account} unstaked ${formatUnits(amount)}, remaining ${formatUnits(plan.result.remainingStaked)}`
        );
        return plan.result;
    }

    private planUnstake(account: string, amount: bigint, now: number): UnstakePlan {
        if (amount <= 0n) {
            throw new EconomyError('InvalidAmount', 'unstake amount must be positive', { account });
        }

        const positions = this.getPositions(account);
        const stakedAmount = sum(positions.map(p => p.amount));
        if (amount > stakedAmount) {
            throw new EconomyError('InsufficientStake', `requested ${amount}, staked ${stakedAmount}`, {
                account,
                requested: amount,
                stakedAmount,
            });
        }

        const unlocked = positions
            .filter(p => isUnlocked(p, now))
            .sort((a, b) => a.lockExpiryTime - b.lockExpiryTime);
        const unlockedAmount = sum(unlocked.map(p => p.amount));
        if (amount > unlockedAmount) {
            const nextUnlock = Math.min(...positions.filter(p => !isUnlocked(p, now)).map(p => p.lockExpiryTime));
            throw new EconomyError('StakeLocked', `only ${unlockedAmount} unlocked, next unlock at ${nextUnlock}`, {
                account,
                requested: amount,
                unlockedAmount,
                nextUnlock,
            });
        }

        let outstanding = amount;
        const drawn: UnstakeResult['drawn'] = [];
        const reduced = new Map<string, bigint>();
        for (const position of unlocked) {
            if (outstanding === 0n) break;
            const take = min(position.amount, outstanding);
            drawn.push({ positionId: position.id, amount: take });
            reduced.set(position.id, checkedSub(position.amount, take));
            outstanding = checkedSub(outstanding, take);
        }

        const remainingPositions: StakePosition[] = [];
        for (const position of positions) {
            const left = reduced.get(position.id);
            if (left === undefined) {
                remainingPositions.push(position);
            } else if (left > 0n) {
                remainingPositions.push({ ...position, amount: left });
            }
        }

        return {
            result: {
                account,
                released: amount,
                remainingStaked: checkedSub(stakedAmount, amount),
                drawn,
            },
            remainingPositions,
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MERGE
    // ═══════════════════════════════════════════════════════════════════════════

    mergeStakes(account: string, positionIds: readonly string[], now: number): MergeResult {
        const unique = new Set(positionIds);
        if (positionIds.length < 2 || unique.size !== positionIds.length) {
            throw new EconomyError('InvalidMerge', 'merge needs at least two distinct positions', {
                account,
                positionIds: [...positionIds],
            });
        }

        const owned = this.getPositions(account);
        const inputs = positionIds.map(id => {
            const position = owned.find(p => p.id === id);
            if (!position) {
                throw new EconomyError('PositionNotFound', `position ${id} not owned by ${account}`, {
                    account,
                    positionId: id,
                });
            }
            return position;
        });

        const totalAmount = sum(inputs.map(p => p.amount));
        const weightedSum = sum(inputs.map(p => checkedMul(p.amount, BigInt(remainingLockDays(p, now)))));
        const maxLockDays = Math.floor(this.config.maxLockSeconds / SECONDS_PER_DAY);
        const weightedLockDays = Math.min(Number(weightedSum / totalAmount), maxLockDays);
        // whole-day truncation must not release any input early
        const earliestExpiry = Math.min(...inputs.map(p => p.lockExpiryTime));

        const merged: StakePosition = {
            id: this.nextId(),
            owner: account,
            amount: totalAmount,
            startTime: Math.min(...inputs.map(p => p.startTime)),
            lockExpiryTime: Math.max(now + weightedLockDays * SECONDS_PER_DAY, earliestExpiry),
        };

        this.positions.set(account, [...owned.filter(p => !unique.has(p.id)), merged]);

        logger.info(
            `[STAKING] ${account} merged ${inputs.length} positions into ${merged.id}: ` +
            `${formatUnits(totalAmount)} locked ${weightedLockDays}d`
        );

        return { merged, consumed: [...positionIds], weightedLockDays };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getPositions(account: string): StakePosition[] {
        return [...(this.positions.get(account) ?? [])];
    }

    getPosition(account: string, positionId: string): StakePosition | undefined {
        return this.positions.get(account)?.find(p => p.id === positionId);
    }

    getStakedAmount(account: string): bigint {
        return sum(this.getPositions(account).map(p => p.amount));
    }

    getTotalStaked(): bigint {
        return sum([...this.positions.values()].flat().map(p => p.amount));
    }

    getStakingInfo(account: string, now: number): StakingInfo {
        const positions = this.getPositions(account);
        const hasPositions = positions.length > 0;

        return {
            account,
            stakedAmount: sum(positions.map(p => p.amount)),
            stakeStartTime: hasPositions ? Math.min(...positions.map(p => p.startTime)) : null,
            lockExpiryTime: hasPositions ? Math.max(...positions.map(p => p.lockExpiryTime)) : null,
            unlockedAmount: sum(positions.filter(p => isUnlocked(p, now)).map(p => p.amount)),
            positions,
        };
    }

    /**
     * Governance weight: each position counts its amount plus a bonus for the
     * lock it still has to run.
     */
    getVotingPower(account: string, now: number): bigint {
        return sum(
            this.getPositions(account).map(position => {
                const lockBonus = min(
                    BigInt(remainingLockDays(position, now)) * this.config.votingBonusPerLockDayBps,
                    this.config.maxVotingBonusBps
                );
                return mulBps(position.amount, BASIS_POINTS + lockBonus);
            })
        );
    }
}
