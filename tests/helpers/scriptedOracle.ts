import { OraclePrice, PriceOracle } from '../../src/integrations/types';

export class ScriptedOracle implements PriceOracle {
    offline = false;

    private current: OraclePrice = { price: 100n, timestamp: 0 };
    private readonly averages = new Map<number, bigint>();

    quote(price: bigint, timestamp: number): void {
        this.current = { price, timestamp };
    }

    setAverage(windowDays: number, average: bigint): void {
        this.averages.set(windowDays, average);
    }

    async getCurrentPrice(): Promise<OraclePrice> {
        if (this.offline) throw new Error('oracle offline');
        return this.current;
    }

    async getTrailingAverage(windowDays: number): Promise<bigint> {
        if (this.offline) throw new Error('oracle offline');
        const average = this.averages.get(windowDays);
        if (average === undefined) throw new Error(`no ${windowDays}d average`);
        return average;
    }
}
