import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = mod ? `[${String(mod)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(ts)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
});

// stdout belongs to the MCP transport and the console summary
export const logger = winston.createLogger({
    level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
    format: combine(timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
    transports: [
        new winston.transports.Console({
            stderrLevels: [...LOG_LEVELS],
            format: combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
        }),
    ],
});

export function createModuleLogger(moduleName: string): winston.Logger {
    return logger.child({ module: moduleName });
}
