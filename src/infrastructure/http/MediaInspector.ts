import axios, { AxiosResponse } from 'axios';
import { toProviderError } from './ProviderErrors';

/**
 * Headers-only view of a public media URL.
 */
export interface MediaHeadInfo {
    status: number;
    contentType: string;
    bytes: number;
}

function headerValue(response: AxiosResponse, name: string): string {
    const value: unknown = response.headers[name];
    return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

/**
 * Total size from a "bytes 0-1/12345" Content-Range header, when present.
 */
export function totalFromContentRange(contentRange: string): number | null {
    const match = /\/(\d+)\s*$/.exec(contentRange);
    return match ? parseInt(match[1], 10) : null;
}

/**
 * Reads status, content type and size of a URL without downloading the body.
 * Falls back to a 2-byte ranged GET for hosts that refuse HEAD.
 */
export class MediaInspector {
    constructor(private readonly timeoutMs: number = 30000) { }

    async headInfo(url: string): Promise<MediaHeadInfo> {
        const options = { timeout: this.timeoutMs, validateStatus: () => true };

        try {
            let response = await axios.head(url, options);
            let ranged = false;
            if (response.status >= 400) {
                response = await axios.get(url, {
                    ...options,
                    headers: { Range: 'bytes=0-1' },
                    responseType: 'arraybuffer',
                });
                ranged = true;
            }

            const contentType = headerValue(response, 'content-type');
            const rangeTotal = ranged ? totalFromContentRange(headerValue(response, 'content-range')) : null;
            const length = rangeTotal ?? parseInt(headerValue(response, 'content-length') || '0', 10);

            return {
                status: response.status,
                contentType,
                bytes: isNaN(length) ? 0 : length,
            };
        } catch (error) {
            throw toProviderError('Media host', error);
        }
    }
}
