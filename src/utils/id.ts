/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Stake position IDs are generated fresh per position and never reused:
 * a UUID v4 plus nanosecond entropy, with an optional retry suffix.
 *
 * FORMAT:
 * - First attempt: {uuid}-{nanoseconds}
 * - Retry attempts: {uuid}-{nanoseconds}-r{attempt}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a collision-resistant ID for a new stake position.
 *
 * @param attempt - Retry attempt number (0 for first attempt)
 *
 * @example
 * ```typescript
 * const positionId = generatePositionId();
 * // "6ba7b810-9dad-41d1-80b4-00c04fd430c8-1234567890123456789"
 * ```
 */
export function generatePositionId(attempt: number = 0): string {
    const base = uuidv4();
    const nano = process.hrtime.bigint().toString();

    return attempt > 0 ? `${base}-${nano}-r${attempt}` : `${base}-${nano}`;
}

/**
 * Short correlation id for log lines of a single core operation.
 */
export function generateOperationId(): string {
    return uuidv4().split('-')[0];
}
