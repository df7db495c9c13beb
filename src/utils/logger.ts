import path from 'path';
import winston from 'winston';
import Transport from 'winston-transport';

/**
 * Receives critical log records (errors, warnings, supply-affecting events).
 * Hosts use this to feed an audit trail.
 */
export type CriticalLogSink = (record: { level: string; message: string; timestamp: string }) => void;

const CRITICAL_TAGS = ['[MINT]', '[BURN]', '[CLAIM]', '[BUYBACK]', '[EMISSION]'];

export function isCriticalRecord(level: string, message: string): boolean {
    return level === 'error' || level === 'warn' || CRITICAL_TAGS.some(tag => message.includes(tag));
}

export class CriticalEventTransport extends Transport {
    private readonly sinks = new Set<CriticalLogSink>();

    constructor(opts: Transport.TransportStreamOptions = {}) {
        super(opts);
    }

    addSink(sink: CriticalLogSink): () => void {
        this.sinks.add(sink);
        return () => {
            this.sinks.delete(sink);
        };
    }

    log(info: { level: string; message: unknown; timestamp?: string }, callback: () => void): void {
        setImmediate(() => {
            this.emit('logged', info);
        });

        const message = typeof info.message === 'string' ? info.message : String(info.message);

        if (isCriticalRecord(info.level, message)) {
            const record = {
                level: info.level,
                message,
                timestamp: info.timestamp ?? new Date().toISOString(),
            };
            for (const sink of this.sinks) {
                try {
                    sink(record);
                } catch (err) {
                    // a failing sink must not reach the caller of logger.*
                    console.error('[LOGGING] critical sink failed:', err);
                }
            }
        }

        callback();
    }
}

export const criticalTransport = new CriticalEventTransport();

const transports: winston.transport[] = [
    new winston.transports.Console({
        format: winston.format.combine(
            winston.format.colorize(),
            winston.format.simple()
        ),
    }),
    criticalTransport,
];

const LOG_DIR = process.env.LOG_DIR;
if (LOG_DIR) {
    transports.push(new winston.transports.File({ filename: path.join(LOG_DIR, 'error.log'), level: 'error' }));
    transports.push(new winston.transports.File({ filename: path.join(LOG_DIR, 'combined.log') }));
}

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: process.env.NODE_ENV === 'test',
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports,
});

export function registerCriticalSink(sink: CriticalLogSink): () => void {
    return criticalTransport.addSink(sink);
}

export default logger;
