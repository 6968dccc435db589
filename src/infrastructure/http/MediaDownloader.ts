import axios from 'axios';
import { IMediaDownloader } from '../../domain/ports/IMediaDownloader';
import { toProviderError } from './ProviderErrors';

/**
 * Downloads remote media into memory for local processing (muxing).
 */
export class MediaDownloader implements IMediaDownloader {
    constructor(
        private readonly timeoutMs: number = 300000,
        private readonly maxBytes: number = 500 * 1024 * 1024
    ) { }

    async download(url: string): Promise<Buffer> {
        try {
            const response = await axios.get<ArrayBuffer>(url, {
                responseType: 'arraybuffer',
                timeout: this.timeoutMs,
                maxContentLength: this.maxBytes,
            });
            const buffer = Buffer.from(response.data);
            console.log(`[Download] ${url} (${(buffer.byteLength / (1024 * 1024)).toFixed(2)} MB)`);
            return buffer;
        } catch (error) {
            throw toProviderError('Media host', error);
        }
    }
}
