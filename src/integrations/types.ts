/**
 * Collaborator interfaces the economy core calls out to.
 */

/**
 * Token custody. Each mutating call resolves to `true` on success; `false` or
 * a rejection means nothing moved.
 */
export interface TokenLedger {
    mint(to: string, amount: bigint): Promise<boolean>;
    burn(from: string, amount: bigint): Promise<boolean>;
    transfer(from: string, to: string, amount: bigint): Promise<boolean>;
    balanceOf(account: string): Promise<bigint>;
}

export interface OraclePrice {
    price: bigint;
    /** Seconds */
    timestamp: number;
}

export interface PriceOracle {
    getCurrentPrice(): Promise<OraclePrice>;
    getTrailingAverage(windowDays: number): Promise<bigint>;
}

export interface RewardPaidNotice {
    account: string;
    amount: bigint;
    timestamp: number;
}

/**
 * Best-effort downstream notification after a claim (e.g. a marketplace
 * rewards feed). Failures are logged only.
 */
export interface RewardNotifier {
    notifyRewardPaid(notice: RewardPaidNotice): Promise<void>;
}
