import axios from 'axios';
import { IMetadataRecorder } from '../../domain/ports/IMetadataRecorder';
import { GenerationResult, RecordDetails } from '../../domain/entities/Artifacts';
import { PersistenceFailedError, describeError } from '../../domain/errors/GenerationErrors';
import { extractProviderMessage } from '../http/ProviderErrors';

export interface SupabaseRecordsOptions {
    url: string;
    serviceRole: string;
    table?: string;
    timeoutMs?: number;
}

/**
 * Row shape of the generation records table.
 */
export interface GenerationRecordRow {
    user_id: string | null;
    model_id: string;
    image_url: string;
    prompt: string;
    script: string | null;
    voice_id: string | null;
    resolution: string;
    duration: number;
    audio_url: string | null;
    video_url: string;
    final_url: string;
    storage_key: string | null;
    created_at: string;
}

export function toRecordRow(
    result: GenerationResult,
    modelId: string,
    details: RecordDetails,
    createdAt: Date
): GenerationRecordRow {
    return {
        user_id: details.userId ?? null,
        model_id: modelId,
        image_url: details.imageUrl,
        prompt: details.prompt,
        script: details.script ?? null,
        voice_id: details.voiceId ?? null,
        resolution: details.resolution,
        duration: details.durationSeconds,
        audio_url: result.audioUrl ?? null,
        video_url: result.videoUrl,
        final_url: result.finalUrl,
        storage_key: details.storageKey ?? null,
        created_at: createdAt.toISOString(),
    };
}

/**
 * Inserts one row per completed workflow through Supabase's PostgREST API.
 */
export class SupabaseMetadataRecorder implements IMetadataRecorder {
    private readonly endpoint: string;
    private readonly serviceRole: string;
    private readonly timeoutMs: number;

    constructor(
        options: SupabaseRecordsOptions,
        private readonly now: () => Date = () => new Date()
    ) {
        if (!options.url || !options.serviceRole) {
            throw new Error('Supabase credentials are required (url, serviceRole)');
        }
        this.endpoint = `${options.url.replace(/\/+$/, '')}/rest/v1/${options.table ?? 'generation_records'}`;
        this.serviceRole = options.serviceRole;
        this.timeoutMs = options.timeoutMs ?? 30000;
    }

    async record(result: GenerationResult, modelId: string, details: RecordDetails): Promise<void> {
        const row = toRecordRow(result, modelId, details, this.now());

        try {
            await axios.post(this.endpoint, row, {
                headers: {
                    Authorization: `Bearer ${this.serviceRole}`,
                    apikey: this.serviceRole,
                    'Content-Type': 'application/json',
                    Prefer: 'return=minimal',
                },
                timeout: this.timeoutMs,
            });
            console.log(`[Supabase] Recorded ${modelId} result ${row.final_url}`);
        } catch (error) {
            if (axios.isAxiosError(error)) {
                const status = error.response?.status;
                const message = extractProviderMessage(error.response?.data) ?? error.message;
                throw new PersistenceFailedError(status ? `insert failed (${status}): ${message}` : `insert failed: ${message}`);
            }
            throw new PersistenceFailedError(describeError(error));
        }
    }
}
