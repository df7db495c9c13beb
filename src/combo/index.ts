/**
 * Combo Tracker Module
 *
 * USAGE (per trade):
 *   const { appliedBonusBps, next } = registerTrade(account.combo, now, config);
 *   // reward with appliedBonusBps, then store `next`
 */

export type { ComboState, ComboConfig, ComboPhase, ComboTradeResult } from './types';
export { DEFAULT_COMBO_CONFIG, createComboConfig } from './config';
export {
    COLD_COMBO,
    isWithinComboWindow,
    materializeCombo,
    registerTrade,
    comboBonusBps,
    comboPhase,
} from './tracker';
