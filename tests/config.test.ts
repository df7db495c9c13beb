/**
 * Configuration Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Per-module override merging, validation of unsafe settings and the
 * IKIGAI_* environment mapping.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { SECONDS_PER_DAY, tokens } from '../src/config/constants';
import { DEFAULT_ECONOMY_CONFIG, createEconomyConfig, validateEconomyConfig } from '../src/config/economy';
import { loadEconomyConfigFromEnv, readEconomyOverrides } from '../src/config/env';
import { EconomyCore } from '../src/engine/economyCore';
import { InMemoryLedger } from './helpers/inMemoryLedger';
import { ScriptedOracle } from './helpers/scriptedOracle';

describe('createEconomyConfig', () => {
    it('returns the defaults without overrides', () => {
        expect(createEconomyConfig()).toEqual(DEFAULT_ECONOMY_CONFIG);
    });

    it('merges nested buyback groups field by field', () => {
        const config = createEconomyConfig({
            buyback: { history: { minShortSamples: 3 }, allocation: { premiumAllocationBps: 500n } },
        });

        expect(config.buyback.history.minShortSamples).toBe(3);
        expect(config.buyback.history.longWindowSeconds).toBe(90 * SECONDS_PER_DAY);
        expect(config.buyback.allocation.premiumAllocationBps).toBe(500n);
        expect(config.buyback.allocation.discountAllocationBps).toBe(4_000n);
        expect(config.buyback.minBuybackAmount).toBe(tokens(1_000));
    });

    it('keeps base rates when other reward settings change', () => {
        const config = createEconomyConfig({ rewards: { claimCooldownSeconds: 60 } });

        expect(config.rewards.claimCooldownSeconds).toBe(60);
        expect(config.rewards.baseRates.trading).toBe(300n);
    });
});

describe('validateEconomyConfig', () => {
    it('accepts the defaults', () => {
        expect(() => validateEconomyConfig(DEFAULT_ECONOMY_CONFIG)).not.toThrow();
    });

    it.each([
        ['weekly limit below daily', createEconomyConfig({ emission: { weeklyLimit: 1n } })],
        ['burn share above 100%', createEconomyConfig({ buyback: { burnShareBps: 10_001n } })],
        ['inverted lock range', createEconomyConfig({ staking: { minLockSeconds: 400 * SECONDS_PER_DAY } })],
        ['multiplier ceiling below 1x', createEconomyConfig({ rewards: { maxTotalMultiplierBps: 9_999n } })],
        ['capacity below required samples', createEconomyConfig({ buyback: { history: { capacity: 10 } } })],
        ['duplicate tier thresholds', createEconomyConfig({
            tiers: { tiers: [{ name: 'a', minStake: 1n, bonusBps: 1n }, { name: 'b', minStake: 1n, bonusBps: 2n }] },
        })],
    ])('rejects %s', (_label, config) => {
        expect(() => validateEconomyConfig(config)).toThrow('[InvalidConfiguration]');
    });

    it('is enforced when the core starts', () => {
        expect(() => new EconomyCore({
            ledger: new InMemoryLedger(),
            oracle: new ScriptedOracle(),
            addresses: { stakingVault: 'vault', rewardPool: 'pool', treasury: 'treasury' },
            config: createEconomyConfig({ referral: { rateBps: 20_000n } }),
        })).toThrow('[InvalidConfiguration] referral.rateBps');
    });
});

describe('loadEconomyConfigFromEnv', () => {
    it('maps IKIGAI_* variables onto the defaults', () => {
        const config = loadEconomyConfigFromEnv({
            IKIGAI_COMBO_STEP_BPS: '2500',
            IKIGAI_DAILY_EMISSION_LIMIT: '2.5',
            IKIGAI_REFERRAL_COOLDOWN_SECONDS: ' 60 ',
            IKIGAI_AVERAGE_SOURCE: 'oracle',
            IKIGAI_MAX_SUPPLY: '',
            UNRELATED: 'ignored',
        });

        expect(config.combo.stepBps).toBe(2_500n);
        expect(config.emission.dailyLimit).toBe(2_500_000_000_000_000_000n);
        expect(config.referral.cooldownSeconds).toBe(60);
        expect(config.oracle.averageSource).toBe('oracle');
        expect(config.emission.maxSupply).toBe(tokens(1_000_000_000));
    });

    it('returns empty overrides for an empty environment', () => {
        expect(readEconomyOverrides({})).toEqual({
            combo: {},
            loyalty: {},
            referral: {},
            rewards: {},
            staking: {},
            emission: {},
            buyback: {},
            oracle: {},
        });
    });

    it.each([
        ['IKIGAI_COMBO_STEP_BPS', '-1'],
        ['IKIGAI_REFERRAL_RATE_BPS', '1.5'],
        ['IKIGAI_CLAIM_COOLDOWN_SECONDS', '1e3'],
        ['IKIGAI_MAX_REFERRAL_REWARD', 'abc'],
        ['IKIGAI_AVERAGE_SOURCE', 'chain'],
    ])('rejects %s=%s', (key, value) => {
        expect(() => loadEconomyConfigFromEnv({ [key]: value })).toThrow(`[InvalidConfiguration] ${key}=${value}`);
    });

    it('validates the merged result', () => {
        expect(() => loadEconomyConfigFromEnv({ IKIGAI_MIN_LOCK_SECONDS: String(400 * SECONDS_PER_DAY) }))
            .toThrow('[InvalidConfiguration] staking: minLockSeconds exceeds maxLockSeconds');
    });
});
