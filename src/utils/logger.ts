import winston from 'winston';

// Token amounts are bigints, which JSON.stringify rejects
const stringifyMeta = (meta: Record<string, unknown>): string =>
    JSON.stringify(meta, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value));

export const createLogger = (level: string = 'info', label?: string): winston.Logger => {
    return winston.createLogger({
        level,
        format: winston.format.combine(
            winston.format.label({ label: label || 'distributor' }),
            winston.format.timestamp(),
            winston.format.printf(({ timestamp, level, label, message, ...meta }) =>
                `${timestamp} [${label}] ${level}: ${message} ${Object.keys(meta).length ? stringifyMeta(meta) : ''}`
            )
        ),
        transports: [new winston.transports.Console()],
    });
};
