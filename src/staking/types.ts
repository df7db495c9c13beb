/**
 * Staking Ledger - Type Definitions
 */

export interface StakePosition {
    readonly id: string;
    readonly owner: string;
    readonly amount: bigint;
    readonly startTime: number;
    readonly lockExpiryTime: number;
}

export interface StakingConfig {
    /** Shortest allowed lock (seconds) */
    minLockSeconds: number;

    /** Longest allowed lock (seconds) */
    maxLockSeconds: number;

    /** Voting power bonus per remaining lock day (bps) */
    votingBonusPerLockDayBps: bigint;

    /** Voting power bonus ceiling (bps) */
    maxVotingBonusBps: bigint;
}

export interface StakingInfo {
    account: string;
    stakedAmount: bigint;
    /** Earliest position start, null without positions */
    stakeStartTime: number | null;
    /** Latest position expiry, null without positions */
    lockExpiryTime: number | null;
    /** Amount in positions whose lock has expired */
    unlockedAmount: bigint;
    positions: StakePosition[];
}

export interface UnstakeResult {
    account: string;
    released: bigint;
    remainingStaked: bigint;
    /** Positions drawn from, with the amount taken from each */
    drawn: Array<{ positionId: string; amount: bigint }>;
}

export interface MergeResult {
    merged: StakePosition;
    consumed: string[];
    weightedLockDays: number;
}
