/**
 * Economy Core
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Host-facing entry point. Owns one instance of every engine plus the clock,
 * the token ledger, the price oracle and a keyed lock.
 *
 * SERIALIZATION:
 *   account:<id>  every operation on an account (and its referrer, when a
 *                 referral credit may land)
 *   emission      mints, burns, rate adjustments
 *   buyback       price samples, allocation, buyback execution
 *
 * ATOMICITY:
 *   validate in the engine → call the ledger → commit the engine state.
 *   A failed ledger call leaves the core untouched. A flow with two ledger
 *   calls reverses the first one when the second fails.
 *
 * The clock is read once per operation, after the locks are held.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { EventEmitter } from 'events';
import { BuybackEngine } from '../buyback/buybackEngine';
import { AllocationUpdate, BuybackSnapshot, PriceSample, RevenueSplit, TrailingAverages } from '../buyback/types';
import { SECONDS_PER_DAY } from '../config/constants';
import { EconomyConfig, DEFAULT_ECONOMY_CONFIG, validateEconomyConfig } from '../config/economy';
import { Clock, systemClock } from '../core/clock';
import { EconomyError, describeError } from '../core/errors';
import { KeyedLock } from '../core/keyedLock';
import { EmissionController } from '../emission/emissionController';
import { EmissionSnapshot, MintReceipt, RateAdjustment } from '../emission/types';
import { callLedger, readBalance } from '../integrations/ledger';
import { readFreshPrice, readTrailingAverage } from '../integrations/oracle';
import { PriceOracle, RewardNotifier, TokenLedger } from '../integrations/types';
import { getLoyaltyStatus } from '../loyalty/tracker';
import { RewardEngine } from '../rewards/rewardEngine';
import { ActivityType, ClaimReceipt, RewardBreakdown } from '../rewards/types';
import { StakingLedger } from '../staking/stakingLedger';
import { MergeResult, StakePosition, UnstakeResult } from '../staking/types';
import { TierTable } from '../tiers/tierTable';
import { formatUnits } from '../utils/format';
import { generateOperationId } from '../utils/id';
import logger from '../utils/logger';
import { AccountSnapshot, EconomyCoreOptions, EconomyEventMap, EconomyEventName, SystemAddresses } from './types';

const EMISSION_KEY = 'emission';
const BUYBACK_KEY = 'buyback';

export function accountKey(account: string): string {
    return `account:${account}`;
}

type LockedOutcome<T> = { retry: true } | { retry: false; value: T };

export class EconomyCore extends EventEmitter {
    readonly config: EconomyConfig;

    private readonly ledger: TokenLedger;
    private readonly oracle: PriceOracle;
    private readonly addresses: SystemAddresses;
    private readonly clock: Clock;
    private readonly notifier: RewardNotifier | undefined;
    private readonly locks = new KeyedLock();

    private readonly tiers: TierTable;
    private readonly staking: StakingLedger;
    private readonly rewards: RewardEngine;
    private readonly emission: EmissionController;
    private readonly buyback: BuybackEngine;

    constructor(options: EconomyCoreOptions) {
        super();
        this.config = validateEconomyConfig(options.config ?? DEFAULT_ECONOMY_CONFIG);
        this.ledger = options.ledger;
        this.oracle = options.oracle;
        this.addresses = options.addresses;
        this.clock = options.clock ?? systemClock;
        this.notifier = options.notifier;

        const { tiers, staking, rewards, combo, loyalty, referral, emission, buyback } = this.config;
        this.tiers = new TierTable(tiers);
        this.staking = options.nextPositionId
            ? new StakingLedger(staking, options.nextPositionId)
            : new StakingLedger(staking);
        this.rewards = new RewardEngine(this.tiers, this.staking, { rewards, combo, loyalty, referral });
        this.emission = new EmissionController(emission, options.genesisTime ?? this.clock.now());
        this.buyback = new BuybackEngine(buyback);

        logger.info(
            `[CORE] economy core ready: ${this.tiers.listTiers().length} tiers, ` +
            `emission ${formatUnits(this.emission.getState().baseRatePerDay)}/day, ` +
            `averages from ${this.config.oracle.averageSource}`
        );
    }

    /**
     * Typed subscription. Returns an unsubscribe function.
     */
    subscribe<K extends EconomyEventName>(event: K, listener: (payload: EconomyEventMap[K]) => void): () => void {
        this.on(event, listener);
        return () => {
            this.off(event, listener);
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // REWARDS
    // ═══════════════════════════════════════════════════════════════════════════

    async recordActivity(account: string, activityType: ActivityType, amount: bigint): Promise<RewardBreakdown> {
        return this.runForAccount(`recordActivity(${activityType})`, account, now => {
            const breakdown = this.rewards.computeReward(account, activityType, amount, now);

            this.publish('rewardAccrued', breakdown);
            if (breakdown.referral && breakdown.referral.decision.status === 'skipped') {
                this.publish('referralSkipped', { account, ...breakdown.referral });
            }
            return breakdown;
        });
    }

    async recordTrade(account: string, volume: bigint): Promise<RewardBreakdown> {
        return this.recordActivity(account, 'trading', volume);
    }

    /**
     * What `recordActivity` would pay right now, without committing.
     */
    quoteReward(account: string, activityType: ActivityType, amount: bigint): RewardBreakdown {
        return this.rewards.quoteReward(account, activityType, amount, this.clock.now());
    }

    async setReferrer(account: string, referrer: string): Promise<void> {
        await this.run('setReferrer', [accountKey(account), accountKey(referrer)], () => {
            this.rewards.setReferrer(account, referrer);
        });
    }

    async claimRewards(account: string): Promise<ClaimReceipt> {
        const receipt = await this.run('claimRewards', [accountKey(account)], async now => {
            const amount = this.rewards.previewClaim(account, now);
            const { rewardPool } = this.addresses;

            const poolBalance = await readBalance('reward pool balance', () => this.ledger.balanceOf(rewardPool));
            if (poolBalance < amount) {
                throw new EconomyError('LedgerCallFailed', `reward pool holds ${poolBalance}, claim needs ${amount}`, {
                    account,
                    amount,
                    poolBalance,
                });
            }

            await callLedger('reward transfer', () => this.ledger.transfer(rewardPool, account, amount), {
                account,
                amount,
            });
            return this.rewards.claim(account, now);
        });

        await this.notifyRewardPaid(receipt);
        this.publish('rewardPaid', receipt);
        return receipt;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STAKING
    // ═══════════════════════════════════════════════════════════════════════════

    async stake(account: string, amount: bigint, lockDuration: number): Promise<StakePosition> {
        return this.run('stake', [accountKey(account)], async now => {
            this.staking.validateStake(account, amount, lockDuration);

            await callLedger(
                'stake transfer',
                () => this.ledger.transfer(account, this.addresses.stakingVault, amount),
                { account, amount }
            );

            const position = this.staking.stake(account, amount, lockDuration, now);
            this.rewards.touchActivity(account, now);
            this.publish('staked', position);
            return position;
        });
    }

    async unstake(account: string, amount: bigint): Promise<UnstakeResult> {
        return this.run('unstake', [accountKey(account)], async now => {
            this.staking.previewUnstake(account, amount, now);

            await callLedger(
                'unstake transfer',
                () => this.ledger.transfer(this.addresses.stakingVault, account, amount),
                { account, amount }
            );

            const result = this.staking.unstake(account, amount, now);
            this.publish('unstaked', result);
            return result;
        });
    }

    async mergeStakes(account: string, positionIds: readonly string[]): Promise<MergeResult> {
        return this.run('mergeStakes', [accountKey(account)], now => {
            const result = this.staking.mergeStakes(account, positionIds, now);
            this.publish('stakesMerged', result);
            return result;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // EMISSION
    // ═══════════════════════════════════════════════════════════════════════════

    async mintEmission(to: string, amount: bigint): Promise<MintReceipt> {
        return this.run('mintEmission', [EMISSION_KEY], async now => {
            this.emission.assertCanMint(amount, now);
            await callLedger('emission mint', () => this.ledger.mint(to, amount), { to, amount });

            const receipt = this.emission.tryMint(amount, now);
            this.publish('emissionMinted', { ...receipt, to, scheduled: false });
            return receipt;
        });
    }

    /**
     * Mint whatever the base rate has accrued since the last scheduled mint.
     */
    async mintScheduledEmission(to: string): Promise<MintReceipt> {
        return this.run('mintScheduledEmission', [EMISSION_KEY], async now => {
            const due = this.emission.assertCanMintScheduled(now);
            await callLedger('scheduled emission mint', () => this.ledger.mint(to, due), { to, amount: due });

            const receipt = this.emission.mintScheduled(now);
            this.publish('emissionMinted', { ...receipt, to, scheduled: true });
            return receipt;
        });
    }

    /**
     * Without an explicit volatility, the recorded price range over the
     * configured window is used.
     */
    async adjustEmissionRate(volatility7dBps?: bigint): Promise<RateAdjustment> {
        const keys = volatility7dBps === undefined ? [EMISSION_KEY, BUYBACK_KEY] : [EMISSION_KEY];

        return this.run('adjustEmissionRate', keys, now => {
            const volatility = volatility7dBps
                ?? this.buyback.volatilityBps(this.config.oracle.volatilityWindowSeconds, now);

            const adjustment = this.emission.adjustEmissionRate(volatility, now);
            this.publish('emissionRateAdjusted', adjustment);
            return adjustment;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // BUYBACK
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Pull a fresh oracle price into the buyback history.
     */
    async recordOraclePrice(): Promise<PriceSample> {
        return this.run('recordOraclePrice', [BUYBACK_KEY], async now => {
            const quote = await readFreshPrice(this.oracle, now, this.config.oracle.maxPriceAgeSeconds);
            const sample: PriceSample = { timestamp: quote.timestamp, price: quote.price };

            this.buyback.recordPrice(sample);
            this.publish('priceRecorded', sample);
            return sample;
        });
    }

    /**
     * Split `revenue` (held by the treasury) into buyback and treasury shares;
     * the bought-back tokens are partly burned and partly sent to the reward
     * pool.
     */
    async executeBuyback(revenue: bigint): Promise<RevenueSplit> {
        return this.run('executeBuyback', [BUYBACK_KEY, EMISSION_KEY], async now => {
            const price = await readFreshPrice(this.oracle, now, this.config.oracle.maxPriceAgeSeconds);
            const averages = await this.resolveAverages(now);
            const split = this.buyback.planRevenueSplit(revenue, price.price, now, averages);

            if (split.burnAmount > 0n) {
                this.emission.assertCanBurn(split.burnAmount);
            }

            await this.settleBuyback(split);

            if (split.burnAmount > 0n) {
                this.emission.recordBurn(split.burnAmount);
            }
            this.buyback.recordExecution(split);
            this.publish('buybackExecuted', split);
            return split;
        });
    }

    async updateAllocation(): Promise<AllocationUpdate> {
        return this.run('updateAllocation', [BUYBACK_KEY], async now => {
            const price = await readFreshPrice(this.oracle, now, this.config.oracle.maxPriceAgeSeconds);
            const averages = await this.resolveAverages(now);

            const update = this.buyback.updateAllocation(price.price, now, averages);
            this.publish('allocationUpdated', update);
            return update;
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // VIEWS
    // ═══════════════════════════════════════════════════════════════════════════

    getAccountSnapshot(account: string): AccountSnapshot {
        const now = this.clock.now();
        const state = this.rewards.getAccount(account);
        const staking = this.staking.getStakingInfo(account, now);
        const cooldown = this.config.rewards.claimCooldownSeconds;

        return {
            account,
            pendingRewards: state.pendingRewards,
            claimedRewards: state.claimedRewards,
            lastClaimTime: state.lastClaimTime,
            nextClaimTime: state.lastClaimTime === null ? null : state.lastClaimTime + cooldown,
            referrer: state.referrer,
            referral: state.referral,
            tier: this.tiers.lookup(staking.stakedAmount),
            loyalty: getLoyaltyStatus(state.firstActivityTime, now, this.config.loyalty),
            trading: this.rewards.getTradingStats(account, now),
            staking,
            votingPower: this.staking.getVotingPower(account, now),
            timestamp: now,
        };
    }

    getVotingPower(account: string): bigint {
        return this.staking.getVotingPower(account, this.clock.now());
    }

    getEmissionSnapshot(): EmissionSnapshot {
        return this.emission.getSnapshot(this.clock.now());
    }

    getBuybackSnapshot(): BuybackSnapshot {
        return this.buyback.getSnapshot();
    }

    getTotalStaked(): bigint {
        return this.staking.getTotalStaked();
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INTERNALS
    // ═══════════════════════════════════════════════════════════════════════════

    private async run<T>(operation: string, keys: readonly string[], task: (now: number) => Promise<T> | T): Promise<T> {
        const opId = generateOperationId();
        return this.locks.runExclusive(keys, async () => {
            const now = this.clock.now();
            try {
                return await task(now);
            } catch (err) {
                logger.warn(`[CORE] ${operation} (${opId}) failed: ${describeError(err)}`);
                throw err;
            }
        });
    }

    /**
     * Lock an account together with its referrer. The referrer is read before
     * locking; if a concurrent setReferrer changed it in between, the locks are
     * dropped and taken again. A referrer is set at most once, so this retries
     * at most once.
     */
    private async runForAccount<T>(operation: string, account: string, task: (now: number) => T): Promise<T> {
        while (true) {
            const referrer = this.rewards.getAccount(account).referrer;
            const keys = referrer === null ? [accountKey(account)] : [accountKey(account), accountKey(referrer)];

            const outcome = await this.run<LockedOutcome<T>>(operation, keys, now => {
                if (this.rewards.getAccount(account).referrer !== referrer) {
                    return { retry: true };
                }
                return { retry: false, value: task(now) };
            });

            if (!outcome.retry) return outcome.value;
            logger.debug(`[CORE] ${operation} for ${account}: referrer changed while waiting, relocking`);
        }
    }

    private async resolveAverages(now: number): Promise<TrailingAverages> {
        if (this.config.oracle.averageSource === 'history') {
            return this.buyback.trailingAverages(now);
        }

        const { shortWindowSeconds, longWindowSeconds } = this.config.buyback.history;
        const [avg30, avg90] = await Promise.all([
            readTrailingAverage(this.oracle, Math.floor(shortWindowSeconds / SECONDS_PER_DAY)),
            readTrailingAverage(this.oracle, Math.floor(longWindowSeconds / SECONDS_PER_DAY)),
        ]);
        // sample counts only describe the local history
        return { avg30, avg90, shortSamples: 0, longSamples: 0 };
    }

    /**
     * Treasury → reward pool, then burn from the treasury. If the burn fails
     * the transfer is reversed.
     */
    private async settleBuyback(split: RevenueSplit): Promise<void> {
        const { treasury, rewardPool } = this.addresses;
        const { rewardPoolAmount, burnAmount } = split;

        if (rewardPoolAmount > 0n) {
            await callLedger(
                'buyback reward pool transfer',
                () => this.ledger.transfer(treasury, rewardPool, rewardPoolAmount),
                { amount: rewardPoolAmount }
            );
        }
        if (burnAmount === 0n) return;

        try {
            await callLedger('buyback burn', () => this.ledger.burn(treasury, burnAmount), { amount: burnAmount });
        } catch (err) {
            if (rewardPoolAmount > 0n) {
                await this.reverseRewardPoolTransfer(rewardPoolAmount, err);
            }
            throw err;
        }
    }

    private async reverseRewardPoolTransfer(amount: bigint, cause: unknown): Promise<void> {
        const { treasury, rewardPool } = this.addresses;
        try {
            await callLedger('buyback reversal', () => this.ledger.transfer(rewardPool, treasury, amount), { amount });
            logger.warn(`[BUYBACK] burn failed, returned ${formatUnits(amount)} from reward pool to treasury`);
        } catch (reversalError) {
            logger.error(
                `[BUYBACK] reversal of ${formatUnits(amount)} failed after burn failure; ledger needs reconciliation`
            );
            throw new EconomyError(
                'LedgerCallFailed',
                'buyback burn failed and the reward pool transfer could not be reversed',
                { amount, cause: describeError(cause), reversalError: describeError(reversalError) }
            );
        }
    }

    private async notifyRewardPaid(receipt: ClaimReceipt): Promise<void> {
        if (!this.notifier) return;
        try {
            await this.notifier.notifyRewardPaid({
                account: receipt.account,
                amount: receipt.amount,
                timestamp: receipt.timestamp,
            });
        } catch (err) {
            logger.warn(`[CLAIM] reward notification for ${receipt.account} failed: ${describeError(err)}`);
        }
    }

    private publish<K extends EconomyEventName>(event: K, payload: EconomyEventMap[K]): void {
        try {
            this.emit(event, payload);
        } catch (err) {
            logger.error(`[CORE] ${event} listener threw: ${describeError(err)}`);
        }
    }
}
