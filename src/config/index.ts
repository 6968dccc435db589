import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export type StorageProvider = 'supabase' | 'cloudinary';

/**
 * Application configuration loaded from environment variables.
 * Built once at startup and handed to component constructors.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    allowedOrigin: string;

    // Bearer auth
    apiAuthEnabled: boolean;
    apiAuthToken: string;

    // ElevenLabs TTS
    elevenApiKey: string;
    elevenBaseUrl: string;
    elevenModelId: string;
    ttsOutputFormat: string;
    ttsMaxChars: number;

    // Video providers
    replicateApiToken: string;
    didApiKey: string;
    didBaseUrl: string;
    videoPollIntervalMs: number;
    videoTimeoutMs: number;

    // Bounded retries for transient provider failures
    providerMaxRetries: number;

    // Storage
    storageProvider: StorageProvider;
    supabaseUrl: string;
    supabaseServiceRole: string;
    supabaseBucket: string;
    supabaseRecordsTable: string;
    cloudinaryCloudName: string;
    cloudinaryApiKey: string;
    cloudinaryApiSecret: string;

    // Muxing
    audioLeadDelaySeconds: number;
    audioTailPadSeconds: number;
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

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = getEnvVar(key, defaultValue?.toString());
    return value.toLowerCase() === 'true';
}

function getStorageProvider(): StorageProvider {
    const value = getEnvVar('STORAGE_PROVIDER', 'supabase').toLowerCase();
    if (value === 'supabase' || value === 'cloudinary') {
        return value;
    }
    throw new Error(`STORAGE_PROVIDER must be "supabase" or "cloudinary", got: ${value}`);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),
        allowedOrigin: getEnvVar('ALLOWED_ORIGIN', '*'),

        // Bearer auth
        apiAuthEnabled: getEnvVarBoolean('API_AUTH_ENABLED', false),
        apiAuthToken: getEnvVar('API_AUTH_TOKEN', ''),

        // ElevenLabs TTS (kept small for talking-head providers' 10MB limit)
        elevenApiKey: getEnvVar('ELEVEN_API_KEY', ''),
        elevenBaseUrl: getEnvVar('ELEVEN_BASE_URL', 'https://api.elevenlabs.io'),
        elevenModelId: getEnvVar('ELEVEN_MODEL_ID', 'eleven_multilingual_v2'),
        ttsOutputFormat: getEnvVar('TTS_OUTPUT_FORMAT', 'mp3_44100_64'),
        ttsMaxChars: getEnvVarNumber('TTS_MAX_CHARS', 600),

        // Video providers
        replicateApiToken: getEnvVar('REPLICATE_API_TOKEN', ''),
        didApiKey: getEnvVar('DID_API_KEY', ''),
        didBaseUrl: getEnvVar('DID_BASE_URL', 'https://api.d-id.com'),
        videoPollIntervalMs: getEnvVarNumber('VIDEO_POLL_INTERVAL_MS', 2000),
        videoTimeoutMs: getEnvVarNumber('VIDEO_TIMEOUT_MS', 600000),

        providerMaxRetries: getEnvVarNumber('PROVIDER_MAX_RETRIES', 2),

        // Storage
        storageProvider: getStorageProvider(),
        supabaseUrl: getEnvVar('SUPABASE_URL', '').replace(/\/+$/, ''),
        supabaseServiceRole: getEnvVar('SUPABASE_SERVICE_ROLE', ''),
        supabaseBucket: getEnvVar('SUPABASE_BUCKET', 'pets'),
        supabaseRecordsTable: getEnvVar('SUPABASE_RECORDS_TABLE', 'generation_records'),
        cloudinaryCloudName: getEnvVar('CLOUDINARY_CLOUD_NAME', ''),
        cloudinaryApiKey: getEnvVar('CLOUDINARY_API_KEY', ''),
        cloudinaryApiSecret: getEnvVar('CLOUDINARY_API_SECRET', ''),

        // Muxing
        audioLeadDelaySeconds: getEnvVarNumber('AUDIO_LEAD_DELAY_SECONDS', 0.55),
        audioTailPadSeconds: getEnvVarNumber('AUDIO_TAIL_PAD_SECONDS', 0),
    };
}

/**
 * Validates that required credentials are present for the configured providers.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.elevenApiKey) {
        errors.push('ELEVEN_API_KEY is required for speech synthesis');
    }
    if (!config.replicateApiToken) {
        errors.push('REPLICATE_API_TOKEN is required for video generation');
    }
    // Records always live in Supabase, whatever the object store
    if (!config.supabaseUrl || !config.supabaseServiceRole) {
        errors.push('SUPABASE_URL and SUPABASE_SERVICE_ROLE are required for result records');
    }
    if (config.storageProvider === 'cloudinary') {
        if (!config.cloudinaryCloudName || !config.cloudinaryApiKey || !config.cloudinaryApiSecret) {
            errors.push('Cloudinary credentials are required when STORAGE_PROVIDER is "cloudinary"');
        }
    }
    if (config.apiAuthEnabled && !config.apiAuthToken) {
        errors.push('API_AUTH_TOKEN is required when API_AUTH_ENABLED is true');
    }
    if (config.videoPollIntervalMs <= 0 || config.videoTimeoutMs <= 0) {
        errors.push('VIDEO_POLL_INTERVAL_MS and VIDEO_TIMEOUT_MS must be positive');
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
