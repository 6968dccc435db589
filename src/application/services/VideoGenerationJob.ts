import { IVideoJobProvider, VideoJobRequest } from '../../domain/ports/IVideoJobProvider';
import { VideoProviderName } from '../../domain/entities/ModelCapability';
import {
    VideoJobHandle,
    applyJobSnapshot,
    createVideoJobHandle,
    isTerminalStatus,
} from '../../domain/entities/VideoJob';
import { ModelCapabilityRegistry } from '../../domain/services/ModelCapabilityRegistry';
import {
    JobFailedError,
    JobTimedOutError,
    ProviderUnavailableError,
    ValidationRejectedError,
} from '../../domain/errors/GenerationErrors';
import { sleep as defaultSleep } from '../../infrastructure/http/RetryUtils';

export interface VideoGenerationJobOptions {
    /** Millisecond clock; injectable for tests */
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Submits generation jobs to the provider that serves a model and polls them to a terminal state.
 */
export class VideoGenerationJob {
    private readonly providers: ReadonlyMap<VideoProviderName, IVideoJobProvider>;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        providers: readonly IVideoJobProvider[],
        private readonly registry: ModelCapabilityRegistry,
        options: VideoGenerationJobOptions = {}
    ) {
        this.providers = new Map(providers.map((provider) => [provider.name, provider]));
        this.now = options.now ?? (() => Date.now());
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Starts a job. Provider errors surface before any handle exists.
     */
    async submit(request: VideoJobRequest): Promise<VideoJobHandle> {
        const capability = this.registry.get(request.modelId);
        if (!capability) {
            throw new ValidationRejectedError(`unsupported model: ${request.modelId}`);
        }

        const provider = this.providers.get(capability.provider);
        if (!provider) {
            throw new ProviderUnavailableError(capability.provider, 'provider is not configured');
        }

        const { providerJobId, snapshot } = await provider.createJob(request);
        const handle = createVideoJobHandle(providerJobId, capability.provider, request.modelId);
        applyJobSnapshot(handle, snapshot);

        console.log(`[VideoJob] Submitted ${request.modelId} job ${providerJobId} (${handle.status})`);
        return handle;
    }

    /**
     * Polls until the job settles and returns its output URL.
     * The deadline is checked before every poll; the final sleep never overshoots it.
     */
    async awaitCompletion(handle: VideoJobHandle, pollIntervalMs: number, timeoutMs: number): Promise<string> {
        const provider = this.providers.get(handle.provider);
        if (!provider) {
            throw new ProviderUnavailableError(handle.provider, 'provider is not configured');
        }

        const deadline = this.now() + timeoutMs;
        let polls = 0;

        while (!isTerminalStatus(handle.status)) {
            const remaining = deadline - this.now();
            if (remaining <= 0) {
                throw new JobTimedOutError(handle.providerJobId, timeoutMs, handle.status);
            }

            await this.sleep(Math.min(pollIntervalMs, remaining));
            if (this.now() >= deadline) {
                throw new JobTimedOutError(handle.providerJobId, timeoutMs, handle.status);
            }

            polls++;
            try {
                const snapshot = await provider.getJob(handle.providerJobId);
                if (applyJobSnapshot(handle, snapshot) || polls % 10 === 0) {
                    console.log(`[VideoJob] ${handle.providerJobId}: ${handle.status} (poll ${polls})`);
                }
            } catch (error) {
                if (error instanceof ProviderUnavailableError) {
                    console.warn(`[VideoJob] Poll ${polls} for ${handle.providerJobId} failed, retrying: ${error.detail}`);
                    continue;
                }
                throw error;
            }
        }

        return this.settle(handle);
    }

    private settle(handle: VideoJobHandle): string {
        switch (handle.status) {
            case 'succeeded':
                if (!handle.outputUrl) {
                    throw new JobFailedError(handle.providerJobId, 'failed', 'job succeeded without an output URL');
                }
                console.log(`[VideoJob] ${handle.providerJobId} completed: ${handle.outputUrl}`);
                return handle.outputUrl;
            case 'failed':
            case 'canceled':
                throw new JobFailedError(handle.providerJobId, handle.status, handle.errorDetail ?? 'no detail provided');
            default:
                throw new Error(`Job ${handle.providerJobId} is not settled: ${handle.status}`);
        }
    }
}
