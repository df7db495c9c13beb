import { CriticalEventTransport, isCriticalRecord } from '../src/utils/logger';

describe('critical log records', () => {
    test('isCriticalRecord', () => {
        expect(isCriticalRecord('error', 'anything')).toBe(true);
        expect(isCriticalRecord('warn', 'anything')).toBe(true);
        expect(isCriticalRecord('info', '[BURN] 5 burned')).toBe(true);
        expect(isCriticalRecord('info', '[STAKING] alice staked 5')).toBe(false);
        expect(isCriticalRecord('debug', '[REWARD] alice trading')).toBe(false);
    });

    test('forwards only critical records to sinks', () => {
        const transport = new CriticalEventTransport();
        const sink = jest.fn();
        const done = jest.fn();
        transport.addSink(sink);

        transport.log({ level: 'info', message: '[MINT] 5 minted', timestamp: '2026-01-01T00:00:00.000Z' }, done);
        transport.log({ level: 'info', message: '[STAKING] alice staked 5' }, done);

        expect(sink).toHaveBeenCalledTimes(1);
        expect(sink).toHaveBeenCalledWith({
            level: 'info',
            message: '[MINT] 5 minted',
            timestamp: '2026-01-01T00:00:00.000Z',
        });
        expect(done).toHaveBeenCalledTimes(2);
    });

    test('a failing sink does not stop the others', () => {
        const consoleError = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        const transport = new CriticalEventTransport();
        const healthy = jest.fn();
        transport.addSink(() => {
            throw new Error('sink down');
        });
        transport.addSink(healthy);

        transport.log({ level: 'error', message: 'ledger unreachable' }, () => undefined);

        expect(healthy).toHaveBeenCalledTimes(1);
        expect(consoleError).toHaveBeenCalledTimes(1);
        consoleError.mockRestore();
    });

    test('removed sinks stop receiving records', () => {
        const transport = new CriticalEventTransport();
        const sink = jest.fn();
        const remove = transport.addSink(sink);

        remove();
        transport.log({ level: 'warn', message: 'cooldown active' }, () => undefined);

        expect(sink).not.toHaveBeenCalled();
    });
});
