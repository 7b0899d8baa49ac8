// Centralized logging for the service
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR
};

export function parseLogLevel(value: string): LogLevel {
    const level = LEVEL_NAMES[value.trim().toLowerCase()];
    if (level === undefined) {
        throw new Error(`Unknown log level: ${value}`);
    }
    return level;
}

export class Logger {
    private static instance: Logger;
    private currentLevel: LogLevel = LogLevel.INFO;
    
    private constructor() {}
    
    static getInstance(): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger();
        }
        return Logger.instance;
    }
    
    setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    getLevel(): LogLevel {
        return this.currentLevel;
    }
    
    debug(message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.log(`[DEBUG] ${message}`, context ?? '');
        }
    }
    
    info(message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.log(`[INFO] ${message}`, context ?? '');
        }
    }
    
    warn(message: string, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.warn(`[WARN] ${message}`, context ?? '');
        }
    }
    
    error(message: string, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            console.error(`[ERROR] ${message}`, error ?? '');
        }
    }
}

export const logger = Logger.getInstance(); 
