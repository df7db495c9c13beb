/**
 * Tier Table Tests
 */

import { tokens } from '../src/config/constants';
import { TierTable } from '../src/tiers/tierTable';

describe('TierTable', () => {
    const table = new TierTable();

    it('falls back to the base tier below every threshold', () => {
        expect(table.lookup(0n)).toEqual({ name: 'none', minStake: 0n, bonusBps: 0n, level: 0 });
        expect(table.bonusBps(tokens(999))).toBe(0n);
    });

    it('matches a threshold exactly', () => {
        const match = table.lookup(tokens(1_000));
        expect(match.name).toBe('bronze');
        expect(match.bonusBps).toBe(500n);
        expect(match.level).toBe(1);
    });

    it('returns the highest threshold met', () => {
        const match = table.lookup(tokens(15_000));
        expect(match.name).toBe('gold');
        expect(match.bonusBps).toBe(2_500n);
        expect(match.level).toBe(3);

        expect(table.lookup(tokens(1_000_000)).name).toBe('platinum');
    });

    it('lists tiers lowest first', () => {
        expect(table.listTiers().map(t => t.name)).toEqual(['bronze', 'silver', 'gold', 'platinum']);
    });

    it('accepts tiers in any order', () => {
        const custom = new TierTable({
            tiers: [
                { name: 'high', minStake: 100n, bonusBps: 20n },
                { name: 'low', minStake: 10n, bonusBps: 10n },
            ],
        });
        expect(custom.lookup(50n).name).toBe('low');
        expect(custom.lookup(100n).name).toBe('high');
    });

    it('rejects duplicate thresholds', () => {
        expect(() => new TierTable({
            tiers: [
                { name: 'a', minStake: 10n, bonusBps: 10n },
                { name: 'b', minStake: 10n, bonusBps: 20n },
            ],
        })).toThrow('[InvalidConfiguration]');
    });

    it('rejects negative bonuses', () => {
        expect(() => new TierTable({ tiers: [{ name: 'a', minStake: 10n, bonusBps: -1n }] }))
            .toThrow('[InvalidConfiguration]');
    });
});
