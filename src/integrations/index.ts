export type { OraclePrice, PriceOracle, RewardNotifier, RewardPaidNotice, TokenLedger } from './types';
export { readFreshPrice, readTrailingAverage } from './oracle';
export { callLedger, readBalance } from './ledger';
