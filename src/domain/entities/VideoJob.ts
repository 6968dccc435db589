import { VideoProviderName } from './ModelCapability';

/**
 * Lifecycle of a provider-side video generation job.
 *
 *   queued -> processing -> succeeded | failed | canceled
 *   queued ------------------^
 */
export type VideoJobStatus = 'queued' | 'processing' | 'succeeded' | 'failed' | 'canceled';

export type TerminalVideoJobStatus = Extract<VideoJobStatus, 'succeeded' | 'failed' | 'canceled'>;

export interface VideoJobHandle {
    readonly providerJobId: string;
    readonly provider: VideoProviderName;
    readonly modelId: string;
    readonly submittedAt: Date;
    status: VideoJobStatus;
    outputUrl?: string;
    errorDetail?: string;
}

/**
 * One observation of a job returned by a provider poll.
 */
export interface VideoJobSnapshot {
    status: VideoJobStatus;
    /** Providers return either a single URL or a list of URLs */
    output?: string | readonly string[];
    error?: string;
    logs?: string;
}

const ALLOWED_TRANSITIONS: Record<VideoJobStatus, readonly VideoJobStatus[]> = {
    queued: ['queued', 'processing', 'succeeded', 'failed', 'canceled'],
    processing: ['processing', 'succeeded', 'failed', 'canceled'],
    succeeded: [],
    failed: [],
    canceled: [],
};

export function isTerminalStatus(status: VideoJobStatus): status is TerminalVideoJobStatus {
    switch (status) {
        case 'succeeded':
        case 'failed':
        case 'canceled':
            return true;
        case 'queued':
        case 'processing':
            return false;
    }
}

export function createVideoJobHandle(
    providerJobId: string,
    provider: VideoProviderName,
    modelId: string,
    initialStatus: VideoJobStatus = 'queued'
): VideoJobHandle {
    return {
        providerJobId,
        provider,
        modelId,
        submittedAt: new Date(),
        status: initialStatus,
    };
}

/**
 * Picks the canonical output URL: the value itself, or the first entry of a list.
 */
export function canonicalOutputUrl(output: string | readonly string[] | undefined): string | undefined {
    if (output === undefined) {
        return undefined;
    }
    if (typeof output === 'string') {
        return output.length > 0 ? output : undefined;
    }
    return output.find((url) => url.length > 0);
}

/**
 * Applies a poll snapshot to the handle.
 * Terminal handles are never changed; a backwards move (processing -> queued) is ignored.
 * Returns true when the handle changed status.
 */
export function applyJobSnapshot(handle: VideoJobHandle, snapshot: VideoJobSnapshot): boolean {
    if (!ALLOWED_TRANSITIONS[handle.status].includes(snapshot.status)) {
        return false;
    }

    const changed = handle.status !== snapshot.status;
    handle.status = snapshot.status;

    if (snapshot.status === 'succeeded') {
        handle.outputUrl = canonicalOutputUrl(snapshot.output);
    }
    if (snapshot.status === 'failed' || snapshot.status === 'canceled') {
        handle.errorDetail = [snapshot.error, snapshot.logs]
            .filter((part): part is string => typeof part === 'string' && part.trim().length > 0)
            .join('\n') || undefined;
    }

    return changed;
}
