import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const DEFAULT_BASE_URL = 'https://api.elevenlabs.io/v1';
export const DEFAULT_MODEL_ID = 'eleven_monolingual_v1';

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // ElevenLabs
    elevenLabsApiKey: string;
    elevenLabsBaseUrl: string;
    elevenLabsModelId: string;

    // HTTP timeouts (ms)
    requestTimeoutMs: number;
    streamTimeoutMs: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        elevenLabsApiKey: getEnvVar('ELEVENLABS_API_KEY', ''),
        elevenLabsBaseUrl: getEnvVar('ELEVENLABS_BASE_URL', DEFAULT_BASE_URL),
        elevenLabsModelId: getEnvVar('ELEVENLABS_MODEL_ID', DEFAULT_MODEL_ID),

        requestTimeoutMs: getEnvVarNumber('ELEVENLABS_REQUEST_TIMEOUT_MS', 30000),
        streamTimeoutMs: getEnvVarNumber('ELEVENLABS_STREAM_TIMEOUT_MS', 120000),
    };
}

/**
 * Validates that the configuration can drive the client.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.elevenLabsApiKey) {
        errors.push('ELEVENLABS_API_KEY is required for voice listing and synthesis');
    }
    if (config.requestTimeoutMs <= 0) {
        errors.push('ELEVENLABS_REQUEST_TIMEOUT_MS must be positive');
    }
    if (config.streamTimeoutMs <= 0) {
        errors.push('ELEVENLABS_STREAM_TIMEOUT_MS must be positive');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
