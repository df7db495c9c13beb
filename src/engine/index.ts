export { EconomyCore, accountKey } from './economyCore';
export type {
    AccountSnapshot,
    EconomyCoreOptions,
    EconomyEventMap,
    EconomyEventName,
    SystemAddresses,
} from './types';
