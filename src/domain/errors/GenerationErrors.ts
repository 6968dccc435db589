/**
 * Error taxonomy for the generation pipeline.
 *
 * Every failure that leaves the orchestrator is a GenerationError, so the HTTP
 * layer can tell caller faults from provider faults from internal faults.
 */

/**
 * Who is responsible for a failure.
 * - 'caller': bad input, never retried
 * - 'provider': a remote service declined, failed or was unreachable
 * - 'internal': local processing or persistence failed
 */
export type FaultDomain = 'caller' | 'provider' | 'internal';

export type GenerationErrorCode =
    | 'VALIDATION_REJECTED'
    | 'TEXT_TOO_LONG'
    | 'AUDIO_TOO_LARGE'
    | 'PROVIDER_REJECTED'
    | 'PROVIDER_UNAVAILABLE'
    | 'STORAGE_UNAVAILABLE'
    | 'STORAGE_AUTH_REJECTED'
    | 'JOB_FAILED'
    | 'JOB_TIMED_OUT'
    | 'MUX_FAILED'
    | 'PERSISTENCE_FAILED';

export abstract class GenerationError extends Error {
    abstract readonly code: GenerationErrorCode;
    abstract readonly fault: FaultDomain;

    constructor(
        message: string,
        public readonly detail?: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

export class ValidationRejectedError extends GenerationError {
    readonly code: GenerationErrorCode = 'VALIDATION_REJECTED';
    readonly fault = 'caller';
}

export class TextTooLongError extends ValidationRejectedError {
    override readonly code: GenerationErrorCode = 'TEXT_TOO_LONG';

    constructor(public readonly maxChars: number, actualChars: number) {
        super(`Text too long (${actualChars} chars, max ${maxChars}). Please shorten your script.`);
    }
}

export class AudioTooLargeError extends ValidationRejectedError {
    override readonly code: GenerationErrorCode = 'AUDIO_TOO_LARGE';

    constructor(public readonly sizeBytes: number, maxBytes: number) {
        super(`Generated audio is too large (${sizeBytes} bytes > ${maxBytes}). Shorten the script or reduce bitrate.`);
    }
}

/**
 * A remote service explicitly declined the request (auth, quota, bad voice id).
 * The provider's own message is kept in `detail`.
 */
export class ProviderRejectedError extends GenerationError {
    readonly code = 'PROVIDER_REJECTED';
    readonly fault = 'provider';

    constructor(
        public readonly provider: string,
        detail: string,
        public readonly status?: number
    ) {
        super(`${provider} rejected the request: ${detail}`, detail);
    }
}

export class ProviderUnavailableError extends GenerationError {
    readonly code = 'PROVIDER_UNAVAILABLE';
    readonly fault = 'provider';

    constructor(public readonly provider: string, detail: string) {
        super(`${provider} is unavailable: ${detail}`, detail);
    }
}

export class StorageUnavailableError extends GenerationError {
    readonly code = 'STORAGE_UNAVAILABLE';
    readonly fault = 'provider';

    constructor(detail: string) {
        super(`Storage is unavailable: ${detail}`, detail);
    }
}

export class StorageAuthRejectedError extends GenerationError {
    readonly code = 'STORAGE_AUTH_REJECTED';
    readonly fault = 'provider';

    constructor(detail: string) {
        super(`Storage rejected credentials: ${detail}`, detail);
    }
}

/**
 * The video job reached `failed` or `canceled`. `detail` carries provider logs.
 */
export class JobFailedError extends GenerationError {
    readonly code = 'JOB_FAILED';
    readonly fault = 'provider';

    constructor(
        public readonly providerJobId: string,
        public readonly terminalStatus: 'failed' | 'canceled',
        detail: string
    ) {
        super(`Video job ${providerJobId} ${terminalStatus}: ${detail}`, detail);
    }
}

/**
 * Milliseconds as seconds with at most one decimal: 3500 -> "3.5s", 120000 -> "120s".
 */
export function formatSeconds(ms: number): string {
    return `${Number((ms / 1000).toFixed(1))}s`;
}

/**
 * The video job never reached a terminal state inside the allowed window.
 */
export class JobTimedOutError extends GenerationError {
    readonly code = 'JOB_TIMED_OUT';
    readonly fault = 'provider';

    constructor(
        public readonly providerJobId: string,
        public readonly timeoutMs: number,
        public readonly lastStatus: string
    ) {
        super(`Video job ${providerJobId} timed out after ${formatSeconds(timeoutMs)} (last status: ${lastStatus})`);
    }
}

export class MuxFailedError extends GenerationError {
    readonly code = 'MUX_FAILED';
    readonly fault = 'internal';

    constructor(detail: string) {
        super(`Muxing failed: ${detail}`, detail);
    }
}

export class PersistenceFailedError extends GenerationError {
    readonly code = 'PERSISTENCE_FAILED';
    readonly fault = 'internal';

    constructor(detail: string) {
        super(`Failed to record generation result: ${detail}`, detail);
    }
}

/**
 * Extracts a printable message from anything thrown.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    try {
        return JSON.stringify(error) ?? 'Unknown error';
    } catch {
        return 'Unknown error';
    }
}
