import dotenv from 'dotenv';
import { ConfigError } from '../domain/errors/PipelineErrors';

// Load environment variables
dotenv.config();

export type FootageSelection = 'first' | 'longest' | 'random';

const FOOTAGE_SELECTIONS: readonly FootageSelection[] = ['first', 'longest', 'random'];

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    environment: string;

    // Pexels (stock footage)
    pexelsApiKey: string;
    footage: {
        baseUrl: string;
        searchPrefix: string;
        perPage: number;
        selection: FootageSelection;
        orientation: string;
        maxAttempts: number;
        retryBackoffMs: number;
        requestTimeoutMs: number;
        downloadsDir: string;
    };

    // Local text model (Ollama-compatible)
    llm: {
        serverUrl: string;
        model: string;
        temperature: number;
        seed?: number;
        maxTokens: number;
        requestTimeoutMs: number;
    };

    description: {
        maxChars: number;
        minChars: number;
    };

    // HeyGen (video synthesis)
    heygenApiKey: string;
    video: {
        baseUrl: string;
        avatarId?: string;
        voiceId?: string;
        width: number;
        height: number;
        pollIntervalMs: number;
        pollBackoff: number;
        maxPollIntervalMs: number;
        timeoutMs: number;
        downloadRendered: boolean;
        outputDir: string;
        requestTimeoutMs: number;
    };

    pipeline: {
        parallelism: number;
    };
}

/** Credentials the run cannot start without. */
const REQUIRED_CREDENTIALS = ['PEXELS_API_KEY', 'HEYGEN_API_KEY'] as const;

function readEnv(key: string): string | undefined {
    let value = process.env[key];
    if (value === undefined) {
        return undefined;
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVar(key: string, defaultValue: string): string {
    return readEnv(key) ?? defaultValue;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = readEnv(key);
    return value ? value : undefined;
}

function getEnvVarNumber(key: string, defaultValue: number): number {
    const value = getEnvVar(key, defaultValue.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getOptionalEnvVarNumber(key: string): number | undefined {
    const value = getOptionalEnvVar(key);
    if (value === undefined) {
        return undefined;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new ConfigError(`Environment variable ${key} must be an integer, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue: boolean): boolean {
    const value = readEnv(key);
    if (value === undefined || value === '') {
        return defaultValue;
    }
    return value.toLowerCase() === 'true';
}

function getFootageSelection(): FootageSelection {
    const value = getEnvVar('FOOTAGE_SELECTION', 'first').toLowerCase();
    const match = FOOTAGE_SELECTIONS.find(selection => selection === value);
    if (!match) {
        throw new ConfigError(`FOOTAGE_SELECTION must be one of ${FOOTAGE_SELECTIONS.join(', ')}, got: ${value}`);
    }
    return match;
}

/**
 * Loads configuration from environment variables.
 * @throws ConfigError naming every missing credential, before anything else is read
 */
export function loadConfig(): Config {
    const missing = REQUIRED_CREDENTIALS.filter(key => !getOptionalEnvVar(key));
    if (missing.length > 0) {
        throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`, [...missing]);
    }

    return {
        environment: getEnvVar('NODE_ENV', 'development'),

        // Pexels
        pexelsApiKey: getEnvVar('PEXELS_API_KEY', ''),
        footage: {
            baseUrl: getEnvVar('PEXELS_BASE_URL', 'https://api.pexels.com/videos'),
            searchPrefix: getEnvVar('FOOTAGE_SEARCH_PREFIX', 'luxury'),
            perPage: getEnvVarNumber('FOOTAGE_RESULTS_PER_PAGE', 1),
            selection: getFootageSelection(),
            orientation: getEnvVar('FOOTAGE_ORIENTATION', 'landscape'),
            maxAttempts: getEnvVarNumber('FOOTAGE_MAX_ATTEMPTS', 2),
            retryBackoffMs: getEnvVarNumber('FOOTAGE_RETRY_BACKOFF_MS', 1000),
            requestTimeoutMs: getEnvVarNumber('FOOTAGE_REQUEST_TIMEOUT_MS', 30000),
            downloadsDir: getEnvVar('DOWNLOADS_DIR', 'downloads'),
        },

        // Local text model
        llm: {
            serverUrl: getEnvVar('LOCAL_LLM_URL', 'http://localhost:11434'),
            model: getEnvVar('LOCAL_LLM_MODEL', 'llama3.2'),
            temperature: getEnvVarNumber('LLM_TEMPERATURE', 0.7),
            seed: getOptionalEnvVarNumber('LLM_SEED'),
            maxTokens: getEnvVarNumber('LLM_MAX_TOKENS', 200),
            requestTimeoutMs: getEnvVarNumber('LLM_REQUEST_TIMEOUT_MS', 120000),
        },

        description: {
            maxChars: getEnvVarNumber('DESCRIPTION_MAX_CHARS', 600),
            minChars: getEnvVarNumber('DESCRIPTION_MIN_CHARS', 20),
        },

        // HeyGen
        heygenApiKey: getEnvVar('HEYGEN_API_KEY', ''),
        video: {
            baseUrl: getEnvVar('HEYGEN_BASE_URL', 'https://api.heygen.com'),
            avatarId: getOptionalEnvVar('HEYGEN_AVATAR_ID'),
            voiceId: getOptionalEnvVar('HEYGEN_VOICE_ID'),
            width: getEnvVarNumber('VIDEO_WIDTH', 1920),
            height: getEnvVarNumber('VIDEO_HEIGHT', 1080),
            pollIntervalMs: getEnvVarNumber('VIDEO_POLL_INTERVAL_MS', 5000),
            pollBackoff: getEnvVarNumber('VIDEO_POLL_BACKOFF', 1),
            maxPollIntervalMs: getEnvVarNumber('VIDEO_POLL_MAX_INTERVAL_MS', 30000),
            timeoutMs: getEnvVarNumber('VIDEO_TIMEOUT_MS', 300000),
            downloadRendered: getEnvVarBoolean('DOWNLOAD_RENDERED_VIDEO', true),
            outputDir: getEnvVar('OUTPUT_DIR', 'output'),
            requestTimeoutMs: getEnvVarNumber('HEYGEN_REQUEST_TIMEOUT_MS', 120000),
        },

        pipeline: {
            parallelism: getEnvVarNumber('PIPELINE_PARALLELISM', 1),
        },
    };
}

/**
 * Checks value ranges that loadConfig cannot express through types.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.footage.perPage) || config.footage.perPage < 1 || config.footage.perPage > 80) {
        errors.push('FOOTAGE_RESULTS_PER_PAGE must be an integer between 1 and 80');
    }
    if (!Number.isInteger(config.footage.maxAttempts) || config.footage.maxAttempts < 1) {
        errors.push('FOOTAGE_MAX_ATTEMPTS must be a positive integer');
    }
    if (config.description.minChars > config.description.maxChars) {
        errors.push('DESCRIPTION_MIN_CHARS must not exceed DESCRIPTION_MAX_CHARS');
    }
    if (config.video.pollIntervalMs <= 0) {
        errors.push('VIDEO_POLL_INTERVAL_MS must be positive');
    }
    if (config.video.pollBackoff < 1) {
        errors.push('VIDEO_POLL_BACKOFF must be at least 1');
    }
    if (config.footage.requestTimeoutMs <= 0 || config.video.requestTimeoutMs <= 0) {
        errors.push('FOOTAGE_REQUEST_TIMEOUT_MS and HEYGEN_REQUEST_TIMEOUT_MS must be positive');
    }
    if (config.video.timeoutMs <= 0) {
        errors.push('VIDEO_TIMEOUT_MS must be positive');
    }
    if (!Number.isInteger(config.pipeline.parallelism) || config.pipeline.parallelism < 1) {
        errors.push('PIPELINE_PARALLELISM must be a positive integer');
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
