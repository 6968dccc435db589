import axios from 'axios';
import {
    ProviderRejectedError,
    ProviderUnavailableError,
    describeError,
} from '../../domain/errors/GenerationErrors';
import { isTransientStatus } from './RetryUtils';

function readString(value: unknown, key: string): string | undefined {
    if (typeof value === 'object' && value !== null && key in value) {
        const field: unknown = Reflect.get(value, key);
        return typeof field === 'string' && field.length > 0 ? field : undefined;
    }
    return undefined;
}

/**
 * Pulls the provider's own message out of an error body.
 * Handles JSON objects (`message`, `detail`, `error`, `error.message`, `detail.message`),
 * plain text and arraybuffer bodies.
 */
export function extractProviderMessage(data: unknown): string | undefined {
    if (data === undefined || data === null) {
        return undefined;
    }
    if (typeof data === 'string') {
        return data.trim() || undefined;
    }
    if (data instanceof ArrayBuffer || Buffer.isBuffer(data)) {
        const text = Buffer.from(data instanceof ArrayBuffer ? new Uint8Array(data) : data).toString('utf-8');
        try {
            const parsed: unknown = JSON.parse(text);
            return extractProviderMessage(parsed) ?? (text.trim() || undefined);
        } catch {
            return text.trim() || undefined;
        }
    }
    if (typeof data === 'object') {
        const nestedDetail: unknown = 'detail' in data ? Reflect.get(data, 'detail') : undefined;
        const nestedError: unknown = 'error' in data ? Reflect.get(data, 'error') : undefined;
        return readString(nestedDetail, 'message')
            ?? readString(data, 'detail')
            ?? readString(nestedError, 'message')
            ?? readString(data, 'error')
            ?? readString(data, 'message')
            ?? readString(data, 'description')
            ?? JSON.stringify(data);
    }
    return String(data);
}

/**
 * Maps a failed HTTP call to the pipeline's error taxonomy.
 * 4xx (other than 429) is an explicit rejection carrying the provider message verbatim;
 * everything else is treated as the provider being unavailable.
 */
export function toProviderError(provider: string, error: unknown): ProviderRejectedError | ProviderUnavailableError {
    if (error instanceof ProviderRejectedError || error instanceof ProviderUnavailableError) {
        return error;
    }
    if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = extractProviderMessage(error.response?.data) ?? error.message;
        if (!isTransientStatus(status)) {
            return new ProviderRejectedError(provider, message, status);
        }
        return new ProviderUnavailableError(provider, status ? `HTTP ${status}: ${message}` : message);
    }
    return new ProviderUnavailableError(provider, describeError(error));
}

export function isProviderUnavailable(error: unknown): boolean {
    return error instanceof ProviderUnavailableError;
}
