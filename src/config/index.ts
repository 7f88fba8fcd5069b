import dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../domain/errors';
import { isLogLevel, LOG_LEVELS, LogLevel } from '../infrastructure/logging/logger';

// Load environment variables
dotenv.config();

export const DEFAULT_API_ENDPOINT = 'https://api.reka.ai/v1/transcription_or_translation';

/**
 * CLI configuration loaded from environment variables (and `.env`).
 */
export interface Config {
    apiEndpoint: string;
    apiKeyFile: string;
    /** Takes precedence over the key file when set */
    apiKey?: string;
    /** Explicit ffmpeg binary; otherwise ffmpeg is looked up on PATH */
    ffmpegPath?: string;
    logLevel: LogLevel;
}

export function defaultApiKeyFile(homeDir: string = os.homedir()): string {
    return path.join(homeDir, '.config', 'reka', 'api_key');
}

/**
 * Expands a leading `~` or `~/` to the home directory.
 */
export function expandHomeDir(filePath: string, homeDir: string = os.homedir()): string {
    if (filePath === '~') {
        return homeDir;
    }
    if (filePath.startsWith('~/')) {
        return path.join(homeDir, filePath.slice(2));
    }
    return filePath;
}

function getEnvVar(key: string, defaultValue?: string): string | undefined {
    let value = process.env[key];
    if (value === undefined) {
        return defaultValue;
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"') && value.length >= 2) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) {
        value = value.substring(1, value.length - 1);
    }

    return value.length > 0 ? value : defaultValue;
}

function getEnvVarLogLevel(key: string, defaultValue: LogLevel): LogLevel {
    const value = getEnvVar(key, defaultValue) ?? defaultValue;
    const normalized = value.toLowerCase();
    if (!isLogLevel(normalized)) {
        throw new ConfigError(`Environment variable ${key} must be one of ${LOG_LEVELS.join(', ')}, got: ${value}`);
    }
    return normalized;
}

/**
 * Loads and validates configuration from environment variables.
 */
export function loadConfig(): Config {
    const apiKeyFile = getEnvVar('REKA_API_KEY_FILE');

    return {
        apiEndpoint: getEnvVar('REKA_API_ENDPOINT', DEFAULT_API_ENDPOINT) ?? DEFAULT_API_ENDPOINT,
        apiKeyFile: apiKeyFile ? expandHomeDir(apiKeyFile) : defaultApiKeyFile(),
        apiKey: getEnvVar('REKA_API_KEY'),
        ffmpegPath: getEnvVar('FFMPEG_PATH'),
        logLevel: getEnvVarLogLevel('LOG_LEVEL', 'info'),
    };
}
