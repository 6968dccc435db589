import axios from 'axios';
import { ISpeechSynthesizer } from '../../domain/ports/ISpeechSynthesizer';
import { MAX_AUDIO_BYTES, SpeechArtifact, createSpeechArtifact } from '../../domain/entities/Artifacts';
import { AudioTooLargeError, TextTooLongError, ValidationRejectedError } from '../../domain/errors/GenerationErrors';
import { toProviderError, isProviderUnavailable } from '../http/ProviderErrors';
import { withRetry } from '../http/RetryUtils';

export interface ElevenLabsOptions {
    apiKey: string;
    baseUrl?: string;
    modelId?: string;
    /** Default output format, e.g. "mp3_44100_64" */
    outputFormat?: string;
    maxChars?: number;
    /** Extra attempts after a transient failure */
    maxRetries?: number;
    retryBackoffMs?: number;
    timeoutMs?: number;
}

/**
 * Content type of an ElevenLabs output format ("mp3_44100_64" -> audio/mpeg).
 */
export function audioContentType(outputFormat: string): string {
    const codec = outputFormat.split('_')[0].toLowerCase();
    switch (codec) {
        case 'pcm':
            return 'audio/pcm';
        case 'ulaw':
            return 'audio/basic';
        case 'opus':
            return 'audio/ogg';
        default:
            return 'audio/mpeg';
    }
}

/**
 * ElevenLabs text-to-speech client.
 */
export class ElevenLabsSpeechSynthesizer implements ISpeechSynthesizer {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly modelId: string;
    private readonly outputFormat: string;
    private readonly maxChars: number;
    private readonly maxRetries: number;
    private readonly retryBackoffMs: number;
    private readonly timeoutMs: number;

    constructor(options: ElevenLabsOptions) {
        if (!options.apiKey) {
            throw new Error('ElevenLabs API key is required');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://api.elevenlabs.io').replace(/\/+$/, '');
        this.modelId = options.modelId ?? 'eleven_multilingual_v2';
        this.outputFormat = options.outputFormat ?? 'mp3_44100_64';
        this.maxChars = options.maxChars ?? 600;
        this.maxRetries = options.maxRetries ?? 2;
        this.retryBackoffMs = options.retryBackoffMs ?? 1000;
        this.timeoutMs = options.timeoutMs ?? 120000;
    }

    async synthesize(text: string, voiceId: string, outputFormat: string = this.outputFormat): Promise<SpeechArtifact> {
        // Local checks first: no provider cost for requests we would reject anyway
        if (!text || !text.trim()) {
            throw new ValidationRejectedError('Text is required for speech synthesis');
        }
        if (text.length > this.maxChars) {
            throw new TextTooLongError(this.maxChars, text.length);
        }
        if (!voiceId || !voiceId.trim()) {
            throw new ValidationRejectedError('voice_id is required for speech synthesis');
        }

        console.log(`[ElevenLabs] Synthesizing ${text.length} chars with voice ${voiceId} (${outputFormat})`);

        const bytes = await withRetry(() => this.requestSpeech(text, voiceId, outputFormat), {
            maxAttempts: this.maxRetries + 1,
            initialBackoffMs: this.retryBackoffMs,
            isRetryable: isProviderUnavailable,
            onRetry: (attempt, error, delay) => {
                console.warn(`[ElevenLabs] Attempt ${attempt} failed (${error instanceof Error ? error.message : error}). Retrying in ${Math.round(delay)}ms...`);
            },
        });

        if (bytes.byteLength > MAX_AUDIO_BYTES) {
            throw new AudioTooLargeError(bytes.byteLength, MAX_AUDIO_BYTES);
        }

        const contentType = audioContentType(outputFormat);
        console.log(`[ElevenLabs] Received ${bytes.byteLength} bytes of ${contentType}`);
        return createSpeechArtifact(bytes, contentType);
    }

    private async requestSpeech(text: string, voiceId: string, outputFormat: string): Promise<Buffer> {
        try {
            const response = await axios.post<ArrayBuffer>(
                `${this.baseUrl}/v1/text-to-speech/${encodeURIComponent(voiceId)}`,
                {
                    text,
                    model_id: this.modelId,
                },
                {
                    params: { output_format: outputFormat },
                    headers: {
                        'xi-api-key': this.apiKey,
                        'Content-Type': 'application/json',
                        Accept: 'audio/*',
                    },
                    responseType: 'arraybuffer',
                    timeout: this.timeoutMs,
                }
            );
            return Buffer.from(response.data);
        } catch (error) {
            throw toProviderError('ElevenLabs', error);
        }
    }
}
