import * as fs from 'fs';

// Structured logging utility
interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    context?: Record<string, unknown>;
}

export type LogLevel = 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { info: 0, warn: 1, error: 2 };

function minimumLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL;
    if (configured === 'warn' || configured === 'error') return configured;
    return 'info';
}

export function log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

    const entry: LogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
        context
    };

    console.log(JSON.stringify(entry));

    // Plain-text copy for the process manager, when configured
    const logFile = process.env.LOG_FILE;
    if (!logFile) return;
    try {
        const logMessage = `${entry.timestamp} [${level.toUpperCase()}] ${message}${context ? ' ' + JSON.stringify(context) : ''}\n`;
        fs.appendFileSync(logFile, logMessage);
    } catch (err) {
        console.error(`Failed to append to ${logFile}: ${String(err)}`);
    }
}
