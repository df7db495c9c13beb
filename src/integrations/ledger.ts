import { EconomyError, ErrorContext, describeError } from '../core/errors';
import logger from '../utils/logger';

/**
 * Run a ledger call and require it to report success. A `false` result or a
 * rejection becomes LedgerCallFailed.
 */
export async function callLedger(
    label: string,
    call: () => Promise<boolean>,
    context: ErrorContext = {}
): Promise<void> {
    let ok: boolean;
    try {
        ok = await call();
    } catch (err) {
        logger.error(`[LEDGER] ${label} threw: ${describeError(err)}`);
        throw new EconomyError('LedgerCallFailed', `${label} failed`, { ...context, cause: describeError(err) });
    }

    if (!ok) {
        logger.error(`[LEDGER] ${label} reported failure`);
        throw new EconomyError('LedgerCallFailed', `${label} was rejected`, context);
    }
}

export async function readBalance(
    label: string,
    call: () => Promise<bigint>,
    context: ErrorContext = {}
): Promise<bigint> {
    try {
        return await call();
    } catch (err) {
        logger.error(`[LEDGER] ${label} threw: ${describeError(err)}`);
        throw new EconomyError('LedgerCallFailed', `${label} failed`, { ...context, cause: describeError(err) });
    }
}
