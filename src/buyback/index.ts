/**
 * Buyback Engine Module
 */

export type {
    AllocationBand,
    AllocationBandConfig,
    AllocationUpdate,
    BuybackConfig,
    BuybackQuote,
    BuybackSnapshot,
    BuybackState,
    PriceHistoryConfig,
    PriceSample,
    RevenueSplit,
    TrailingAverages,
} from './types';
export { DEFAULT_BUYBACK_CONFIG, DEFAULT_PRICE_HISTORY_CONFIG, createBuybackState } from './config';
export { PriceHistory } from './priceHistory';
export { BuybackEngine } from './buybackEngine';
