import { Resolution, VideoProviderName } from '../entities/ModelCapability';
import { VideoJobSnapshot } from '../entities/VideoJob';

/**
 * Everything a provider needs to start one generation job.
 */
export interface VideoJobRequest {
    modelId: string;
    imageUrl: string;
    prompt: string;
    seconds: number;
    resolution: Resolution;
    /** Derived from the capability table; never caller-supplied */
    proMode: boolean;
    /** Public URL of the speech track, for models that animate from audio */
    audioUrl?: string;
}

/**
 * IVideoJobProvider - Port for asynchronous video generation services.
 * Implementations: ReplicateVideoJobProvider, DIdTalksJobProvider
 */
export interface IVideoJobProvider {
    readonly name: VideoProviderName;

    /**
     * Starts a job and returns the provider's job id together with its first observed state.
     * Fails with ProviderRejectedError / ProviderUnavailableError before any job exists.
     */
    createJob(request: VideoJobRequest): Promise<{ providerJobId: string; snapshot: VideoJobSnapshot }>;

    /**
     * Reads the current state of a job. Side-effect free on the provider.
     */
    getJob(providerJobId: string): Promise<VideoJobSnapshot>;
}
