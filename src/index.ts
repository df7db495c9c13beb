/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * IKIGAI ECONOMY CORE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Reward, emission, buyback and staking rules for the IKIGAI token, as a
 * library. Hosts construct an EconomyCore with their token ledger, price
 * oracle and clock; nothing runs at import time.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export * from './engine';
export * from './tiers';
export * from './combo';
export * from './loyalty';
export * from './referral';
export * from './rewards';
export * from './staking';
export * from './emission';
export * from './buyback';
export * from './integrations';

export * from './config/constants';
export {
    DEFAULT_ECONOMY_CONFIG,
    DEFAULT_ORACLE_CONFIG,
    createEconomyConfig,
    validateEconomyConfig,
} from './config/economy';
export type {
    AverageSource,
    BuybackOverrides,
    EconomyConfig,
    EconomyConfigOverrides,
    OracleConfig,
} from './config/economy';
export { loadEconomyConfigFromEnv, readEconomyOverrides } from './config/env';

export { EconomyError, categoryOf, describeError, isEconomyError, isRetryable } from './core/errors';
export type { ErrorCategory, ErrorContext, ErrorKind } from './core/errors';
export { ManualClock, systemClock } from './core/clock';
export type { Clock } from './core/clock';
export { KeyedLock } from './core/keyedLock';

export * as fixedPoint from './math/fixedPoint';
export { formatBps, formatMultiplier, formatUnits, parseUnits } from './utils/format';
export { generateOperationId, generatePositionId } from './utils/id';
export { CriticalEventTransport, isCriticalRecord, registerCriticalSink } from './utils/logger';
export type { CriticalLogSink } from './utils/logger';
export { default as logger } from './utils/logger';
