/**
 * Service configuration read from the environment.
 *
 * `loadConfig` takes the environment as a parameter so tests can pass a
 * plain object; the entry point passes `process.env` after dotenv has run.
 */
import * as path from 'path';
import { LogLevel, parseLogLevel } from '../utils/logger.js';

export type Env = Record<string, string | undefined>;

export interface AppConfig {
    port: number;
    vectorDir: string;
    vectorFile: string;
    archiveUrl: string;
    archiveFile: string;
    autoDownload: boolean;
    defaultTopN: number;
    scanTimeoutMs: number;
    prettyJson: boolean;
    logLevel: LogLevel;
}

function optionalEnv(env: Env, name: string, fallback: string): string {
    return env[name] || fallback;
}

function optionalIntegerEnv(env: Env, name: string, fallback: number, min: number): number {
    const raw = env[name];
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed < min) {
        throw new Error(`Environment variable ${name} must be an integer >= ${min}, got: ${raw}`);
    }
    return parsed;
}

function optionalBooleanEnv(env: Env, name: string, fallback: boolean): boolean {
    const raw = env[name];
    if (!raw) return fallback;
    switch (raw.trim().toLowerCase()) {
        case 'true':
        case '1':
        case 'yes':
            return true;
        case 'false':
        case '0':
        case 'no':
            return false;
        default:
            throw new Error(`Environment variable ${name} must be a boolean, got: ${raw}`);
    }
}

export function loadConfig(env: Env): AppConfig {
    return {
        port: optionalIntegerEnv(env, 'PORT', 4001, 0),
        vectorDir: optionalEnv(env, 'VECTOR_DIR', 'glove'),
        vectorFile: optionalEnv(env, 'VECTOR_FILE', 'glove.6B.300d.txt'),
        archiveUrl: optionalEnv(env, 'VECTOR_ARCHIVE_URL', 'https://nlp.stanford.edu/data/glove.6B.zip'),
        archiveFile: optionalEnv(env, 'VECTOR_ARCHIVE_FILE', 'glove.6B.zip'),
        autoDownload: optionalBooleanEnv(env, 'VECTOR_AUTO_DOWNLOAD', true),
        defaultTopN: optionalIntegerEnv(env, 'DEFAULT_TOP_N', 5, 1),
        scanTimeoutMs: optionalIntegerEnv(env, 'SCAN_TIMEOUT_MS', 0, 0),
        // Development mode pretty-prints responses unless told otherwise
        prettyJson: optionalBooleanEnv(env, 'PRETTY_JSON', env.NODE_ENV === 'development'),
        logLevel: parseLogLevel(optionalEnv(env, 'LOG_LEVEL', 'info'))
    };
}

export function vectorFilePath(config: Pick<AppConfig, 'vectorDir' | 'vectorFile'>): string {
    return path.join(config.vectorDir, config.vectorFile);
}

export function archiveFilePath(config: Pick<AppConfig, 'vectorDir' | 'archiveFile'>): string {
    return path.join(config.vectorDir, config.archiveFile);
}
