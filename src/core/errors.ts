/**
 * Economy Errors
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every failure raised by the core is an EconomyError carrying a `kind` that
 * callers branch on. Kinds are grouped into categories:
 *
 *   validation  - caller input is wrong; correct it and call again
 *   timing      - a cooldown or lock is active; retry later
 *   capacity    - a policy limit has been reached
 *   arithmetic  - an integer left its range; always a bug
 *   dependency  - an external collaborator failed
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type ErrorCategory = 'validation' | 'timing' | 'capacity' | 'arithmetic' | 'dependency';

const KIND_CATEGORIES = {
    InvalidAmount: 'validation',
    LockOutOfRange: 'validation',
    InsufficientStake: 'validation',
    InvalidReferrer: 'validation',
    ReferrerAlreadySet: 'validation',
    PositionNotFound: 'validation',
    InvalidMerge: 'validation',
    InvalidPriceSample: 'validation',
    InvalidConfiguration: 'validation',
    NothingToClaim: 'validation',

    StakeLocked: 'timing',
    ClaimTooSoon: 'timing',
    AdjustmentTooSoon: 'timing',
    AllocationTooSoon: 'timing',
    ReferralCooldown: 'timing',

    ExceedsEmissionCap: 'capacity',
    ExceedsMaxSupply: 'capacity',
    MaxReferralRewardReached: 'capacity',

    ArithmeticOverflow: 'arithmetic',

    PriceUnavailable: 'dependency',
    InsufficientPriceHistory: 'dependency',
    LedgerCallFailed: 'dependency',
} as const satisfies Record<string, ErrorCategory>;

export type ErrorKind = keyof typeof KIND_CATEGORIES;

export type ErrorContext = Record<string, unknown>;

export class EconomyError extends Error {
    public readonly category: ErrorCategory;

    constructor(
        public readonly kind: ErrorKind,
        detail: string,
        public readonly context: ErrorContext = {}
    ) {
        super(`[${kind}] ${detail}`);
        this.name = 'EconomyError';
        this.category = KIND_CATEGORIES[kind];
    }
}

export function categoryOf(kind: ErrorKind): ErrorCategory {
    return KIND_CATEGORIES[kind];
}

/**
 * Type guard, optionally narrowed to a specific kind.
 */
export function isEconomyError(error: unknown, kind?: ErrorKind): error is EconomyError {
    if (!(error instanceof EconomyError)) return false;
    return kind === undefined || error.kind === kind;
}

/**
 * Timing errors clear by themselves once the cooldown or lock elapses.
 */
export function isRetryable(error: unknown): boolean {
    return isEconomyError(error) && error.category === 'timing';
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
