import axios from 'axios';
import { IVideoJobProvider, VideoJobRequest } from '../../domain/ports/IVideoJobProvider';
import { VideoJobSnapshot, VideoJobStatus } from '../../domain/entities/VideoJob';
import { MAX_AUDIO_BYTES } from '../../domain/entities/Artifacts';
import { ProviderUnavailableError, ValidationRejectedError } from '../../domain/errors/GenerationErrors';
import { toProviderError } from '../http/ProviderErrors';
import { MediaInspector } from '../http/MediaInspector';

const MAX_SOURCE_BYTES = 9_500_000;

interface DIdTalk {
    id?: string;
    status?: string;
    result_url?: string;
    error?: { kind?: string; description?: string } | string;
}

export function mapDIdStatus(status: string | undefined): VideoJobStatus {
    switch (status) {
        case 'created':
            return 'queued';
        case 'started':
            return 'processing';
        case 'done':
            return 'succeeded';
        case 'error':
        case 'rejected':
            return 'failed';
        default:
            return 'processing';
    }
}

function describeTalkError(error: DIdTalk['error']): string | undefined {
    if (!error) {
        return undefined;
    }
    if (typeof error === 'string') {
        return error;
    }
    return [error.kind, error.description].filter(Boolean).join(': ') || undefined;
}

/**
 * D-ID Talks client: animates a still image from a speech track.
 * API key may be "key:secret"; it is sent as Basic auth.
 */
export class DIdTalksJobProvider implements IVideoJobProvider {
    readonly name = 'd-id';
    private readonly authHeader: string;
    private readonly baseUrl: string;

    constructor(
        apiKey: string,
        baseUrl: string = 'https://api.d-id.com',
        private readonly inspector: MediaInspector = new MediaInspector(),
        private readonly timeoutMs: number = 60000
    ) {
        if (!apiKey) {
            throw new Error('DID_API_KEY is not configured');
        }
        this.authHeader = `Basic ${Buffer.from(apiKey).toString('base64')}`;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
    }

    async createJob(request: VideoJobRequest): Promise<{ providerJobId: string; snapshot: VideoJobSnapshot }> {
        if (!request.audioUrl) {
            throw new ValidationRejectedError('D-ID talks require a speech track');
        }
        await this.preflight(request.imageUrl, request.audioUrl);

        let talk: DIdTalk;
        try {
            const response = await axios.post<DIdTalk>(
                `${this.baseUrl}/talks`,
                {
                    source_url: request.imageUrl,
                    // No explicit resolution; D-ID picks one from the source image
                    script: { type: 'audio', audio_url: request.audioUrl },
                },
                {
                    headers: { Authorization: this.authHeader, 'Content-Type': 'application/json' },
                    timeout: this.timeoutMs,
                }
            );
            talk = response.data;
        } catch (error) {
            throw toProviderError('D-ID', error);
        }

        if (!talk.id) {
            throw new ProviderUnavailableError('D-ID', 'No talk id returned');
        }
        console.log(`[D-ID] Talk created: ${talk.id}`);
        return { providerJobId: talk.id, snapshot: this.toSnapshot(talk) };
    }

    async getJob(providerJobId: string): Promise<VideoJobSnapshot> {
        try {
            const response = await axios.get<DIdTalk>(`${this.baseUrl}/talks/${encodeURIComponent(providerJobId)}`, {
                headers: { Authorization: this.authHeader },
                timeout: this.timeoutMs,
            });
            return this.toSnapshot(response.data);
        } catch (error) {
            throw toProviderError('D-ID', error);
        }
    }

    /**
     * D-ID fetches both URLs itself and rejects oversized or mistyped inputs late;
     * check headers up front instead.
     */
    private async preflight(imageUrl: string, audioUrl: string): Promise<void> {
        const [audio, image] = await Promise.all([
            this.inspector.headInfo(audioUrl),
            this.inspector.headInfo(imageUrl),
        ]);

        if (audio.bytes > MAX_AUDIO_BYTES) {
            throw new ValidationRejectedError(`Audio too large: ${audio.bytes} bytes (>9.5MB)`);
        }
        if (image.bytes > MAX_SOURCE_BYTES) {
            throw new ValidationRejectedError(`Image too large: ${image.bytes} bytes (>9.5MB)`);
        }
        if (audio.contentType && !audio.contentType.includes('audio')) {
            throw new ValidationRejectedError(`audio_url content-type '${audio.contentType}' is not audio/*`);
        }
        if (image.contentType && !image.contentType.includes('image')) {
            throw new ValidationRejectedError(`image_url content-type '${image.contentType}' is not image/*`);
        }
    }

    private toSnapshot(talk: DIdTalk): VideoJobSnapshot {
        const snapshot: VideoJobSnapshot = { status: mapDIdStatus(talk.status) };
        if (talk.result_url) {
            snapshot.output = talk.result_url;
        }
        const error = describeTalkError(talk.error);
        if (error) {
            snapshot.error = error;
        }
        return snapshot;
    }
}
