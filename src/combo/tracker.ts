/**
 * Combo Tracker
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Two phases per account:
 *   cold - multiplier 1x (10000 bps)
 *   warm - multiplier > 1x, rising by stepBps per trade up to maxMultiplierBps
 *
 * The reset to cold is LAZY: it is only evaluated when the account trades
 * again. A dormant account keeps its stale stored multiplier until then.
 * materializeCombo() computes the state as of `now` without storing it.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { BASIS_POINTS } from '../config/constants';
import { min, subClamp } from '../math/fixedPoint';
import { DEFAULT_COMBO_CONFIG } from './config';
import { ComboConfig, ComboPhase, ComboState, ComboTradeResult } from './types';

export const COLD_COMBO: ComboState = {
    multiplierBps: BASIS_POINTS,
    lastActionTime: null,
    streak: 0,
};

/**
 * Whether the chain is still inside its window at `now`.
 */
export function isWithinComboWindow(
    state: ComboState,
    now: number,
    config: ComboConfig = DEFAULT_COMBO_CONFIG
): boolean {
    if (state.lastActionTime === null) return false;
    return now - state.lastActionTime <= config.windowSeconds;
}

/**
 * State as of `now`: the stored state if the window is still open, cold otherwise.
 */
export function materializeCombo(
    state: ComboState,
    now: number,
    config: ComboConfig = DEFAULT_COMBO_CONFIG
): ComboState {
    if (isWithinComboWindow(state, now, config)) {
        return state;
    }
    return { ...COLD_COMBO, lastActionTime: state.lastActionTime };
}

/**
 * Register a qualifying trade. The trade is rewarded at the materialized
 * multiplier, then the chain advances by one step.
 */
export function registerTrade(
    state: ComboState,
    now: number,
    config: ComboConfig = DEFAULT_COMBO_CONFIG
): ComboTradeResult {
    const materialized = materializeCombo(state, now, config);
    const wasReset = state.streak > 0 && !isWithinComboWindow(state, now, config);

    const appliedMultiplierBps = materialized.multiplierBps;
    const nextMultiplier = min(appliedMultiplierBps + config.stepBps, config.maxMultiplierBps);

    return {
        appliedMultiplierBps,
        appliedBonusBps: comboBonusBps(appliedMultiplierBps),
        next: {
            multiplierBps: nextMultiplier,
            lastActionTime: now,
            streak: materialized.streak + 1,
        },
        wasReset,
    };
}

/**
 * Bonus portion of a combo multiplier (what stacks on the 1x base).
 */
export function comboBonusBps(multiplierBps: bigint): bigint {
    return subClamp(multiplierBps, BASIS_POINTS);
}

export function comboPhase(
    state: ComboState,
    now: number,
    config: ComboConfig = DEFAULT_COMBO_CONFIG
): ComboPhase {
    return materializeCombo(state, now, config).multiplierBps > BASIS_POINTS ? 'warm' : 'cold';
}
