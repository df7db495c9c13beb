/**
 * ID Generation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Position IDs must never repeat, including IDs generated in a tight loop.
 *
 * ID Format: {uuid}-{nanoseconds} or {uuid}-{nanoseconds}-r{attempt}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { generateOperationId, generatePositionId } from '../src/utils/id';

const POSITION_ID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}-\d+$/i;

describe('ID Generation', () => {
    describe('generatePositionId', () => {
        test('always returns unique values', () => {
            expect(generatePositionId()).not.toBe(generatePositionId());
        });

        test('combines a UUID v4 with nanosecond entropy', () => {
            expect(generatePositionId()).toMatch(POSITION_ID);
        });

        test('includes retry suffix when attempt > 0', () => {
            expect(generatePositionId(1)).toMatch(/-r1$/);
            expect(generatePositionId(3)).toMatch(/-r3$/);
            expect(generatePositionId(0)).not.toMatch(/-r\d+$/);
        });

        test('rapid generation produces unique IDs', () => {
            const ids = new Set<string>();
            for (let i = 0; i < 10_000; i++) {
                ids.add(generatePositionId());
            }
            expect(ids.size).toBe(10_000);
        });
    });

    describe('generateOperationId', () => {
        test('is the first UUID group', () => {
            expect(generateOperationId()).toMatch(/^[0-9a-f]{8}$/);
        });
    });
});
