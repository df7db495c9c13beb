export type {
    ReferralConfig,
    ReferralEarnings,
    ReferralDecision,
    ReferralOutcome,
    ReferralSkipReason,
} from './types';
export { DEFAULT_REFERRAL_CONFIG, EMPTY_REFERRAL_EARNINGS } from './config';
export {
    validateReferrer,
    evaluateReferralCredit,
    assertReferralCredit,
    applyReferralCredit,
} from './tracker';
