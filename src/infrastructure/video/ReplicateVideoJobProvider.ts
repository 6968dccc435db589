import Replicate from 'replicate';
import { IVideoJobProvider, VideoJobRequest } from '../../domain/ports/IVideoJobProvider';
import { VideoJobSnapshot, VideoJobStatus } from '../../domain/entities/VideoJob';
import {
    ProviderRejectedError,
    ProviderUnavailableError,
    describeError,
} from '../../domain/errors/GenerationErrors';
import { isTransientStatus } from '../http/RetryUtils';
import { buildReplicateInput } from './ReplicateModelInputs';

const MAX_LOG_CHARS = 2000;

/**
 * Maps Replicate prediction states onto the job lifecycle.
 */
export function mapReplicateStatus(status: string): VideoJobStatus {
    switch (status) {
        case 'starting':
            return 'queued';
        case 'processing':
            return 'processing';
        case 'succeeded':
            return 'succeeded';
        case 'failed':
            return 'failed';
        case 'canceled':
        case 'aborted':
            return 'canceled';
        default:
            console.warn(`[Replicate] Unknown prediction status "${status}", treating as processing`);
            return 'processing';
    }
}

function normalizeOutput(output: unknown): string | string[] | undefined {
    if (typeof output === 'string') {
        return output;
    }
    if (Array.isArray(output)) {
        return output.filter((item): item is string => typeof item === 'string');
    }
    return undefined;
}

function tailLogs(logs: unknown): string | undefined {
    if (typeof logs !== 'string' || logs.trim().length === 0) {
        return undefined;
    }
    return logs.length > MAX_LOG_CHARS ? logs.slice(-MAX_LOG_CHARS) : logs;
}

/**
 * The SDK's ApiError carries the fetch Response; read its status without depending on the class.
 */
function responseStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'response' in error) {
        const response: unknown = Reflect.get(error, 'response');
        if (typeof response === 'object' && response !== null && 'status' in response) {
            const status: unknown = Reflect.get(response, 'status');
            return typeof status === 'number' ? status : undefined;
        }
    }
    return undefined;
}

/**
 * Replicate predictions client for image-to-video models.
 */
export class ReplicateVideoJobProvider implements IVideoJobProvider {
    readonly name = 'replicate';
    private readonly replicate: Replicate;

    constructor(apiToken: string) {
        if (!apiToken) {
            throw new Error('REPLICATE_API_TOKEN is not configured');
        }
        this.replicate = new Replicate({ auth: apiToken });
    }

    async createJob(request: VideoJobRequest): Promise<{ providerJobId: string; snapshot: VideoJobSnapshot }> {
        const input = buildReplicateInput(request);
        console.log(`[Replicate] Creating prediction for ${request.modelId} (${request.resolution}, ${request.seconds}s${request.proMode ? ', pro' : ''})`);

        try {
            const prediction = await this.replicate.predictions.create({
                model: request.modelId,
                input,
            });
            if (!prediction.id) {
                throw new ProviderUnavailableError('Replicate', 'No prediction id returned');
            }
            console.log(`[Replicate] Prediction created: ${prediction.id}`);
            return {
                providerJobId: prediction.id,
                snapshot: this.toSnapshot(prediction.status, prediction.output, prediction.error, prediction.logs),
            };
        } catch (error) {
            throw this.toProviderError(error);
        }
    }

    async getJob(providerJobId: string): Promise<VideoJobSnapshot> {
        try {
            const prediction = await this.replicate.predictions.get(providerJobId);
            return this.toSnapshot(prediction.status, prediction.output, prediction.error, prediction.logs);
        } catch (error) {
            throw this.toProviderError(error);
        }
    }

    private toSnapshot(status: string, output: unknown, error: unknown, logs: unknown): VideoJobSnapshot {
        const snapshot: VideoJobSnapshot = { status: mapReplicateStatus(status) };
        const normalized = normalizeOutput(output);
        if (normalized !== undefined) {
            snapshot.output = normalized;
        }
        if (error !== undefined && error !== null) {
            snapshot.error = describeError(error);
        }
        const tail = tailLogs(logs);
        if (tail) {
            snapshot.logs = tail;
        }
        return snapshot;
    }

    private toProviderError(error: unknown): ProviderRejectedError | ProviderUnavailableError {
        if (error instanceof ProviderRejectedError || error instanceof ProviderUnavailableError) {
            return error;
        }
        const status = responseStatus(error);
        const message = describeError(error);
        if (!isTransientStatus(status)) {
            return new ProviderRejectedError('Replicate', message, status);
        }
        return new ProviderUnavailableError('Replicate', message);
    }
}
