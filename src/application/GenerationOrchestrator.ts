import { v4 as uuidv4 } from 'uuid';
import {
    GenerationRequest,
    SpeechInput,
    SpeechTrackRequest,
    getSpeechInput,
    wantsSpeech,
} from '../domain/entities/GenerationRequest';
import { GenerationResult, RecordDetails, extensionForContentType } from '../domain/entities/Artifacts';
import { ModelCapability } from '../domain/entities/ModelCapability';
import { ModelCapabilityRegistry, TALKING_HEAD_MODEL_ID } from '../domain/services/ModelCapabilityRegistry';
import { buildStorageKey, resolveUserStoragePrefix } from '../domain/services/StorageKeys';
import { ValidationRejectedError, describeError } from '../domain/errors/GenerationErrors';
import { ISpeechSynthesizer } from '../domain/ports/ISpeechSynthesizer';
import { IArtifactStore } from '../domain/ports/IArtifactStore';
import { IMuxer, MuxOptions } from '../domain/ports/IMuxer';
import { IMetadataRecorder } from '../domain/ports/IMetadataRecorder';
import { IMediaDownloader } from '../domain/ports/IMediaDownloader';
import { VideoJobRequest } from '../domain/ports/IVideoJobProvider';
import { VideoGenerationJob } from './services/VideoGenerationJob';
import { RollbackLedger } from './services/RollbackLedger';

export interface OrchestratorDependencies {
    registry: ModelCapabilityRegistry;
    speechSynthesizer: ISpeechSynthesizer;
    artifactStore: IArtifactStore;
    videoJob: VideoGenerationJob;
    muxer: IMuxer;
    metadataRecorder: IMetadataRecorder;
    mediaDownloader: IMediaDownloader;
}

export interface OrchestratorSettings {
    pollIntervalMs: number;
    timeoutMs: number;
    ttsOutputFormat: string;
    mux: MuxOptions;
}

interface ValidatedPlan {
    capability: ModelCapability;
    proMode: boolean;
    storagePrefix: string;
}

/**
 * GenerationOrchestrator runs the two generation workflows and owns every failure decision:
 * which errors surface, and which uploaded artifacts are deleted again.
 */
export class GenerationOrchestrator {
    constructor(
        private readonly deps: OrchestratorDependencies,
        private readonly settings: OrchestratorSettings
    ) { }

    /**
     * Dispatches on the presence of speech input.
     */
    async run(request: GenerationRequest): Promise<GenerationResult> {
        return wantsSpeech(request) ? this.runSpeechAndVideo(request) : this.runVideoOnly(request);
    }

    /**
     * Image + prompt -> video job -> record. Uploads nothing, so nothing is rolled back.
     */
    async runVideoOnly(request: GenerationRequest): Promise<GenerationResult> {
        const requestId = newRequestId();
        if (wantsSpeech(request)) {
            throw new ValidationRejectedError('video-only requests must not carry speech input');
        }
        const plan = this.plan(request, false);
        console.log(`[Orchestrator] [${requestId}] Video-only run on ${request.modelId} at ${request.resolution}`);

        const videoUrl = await this.generateVideo(request, plan, undefined);
        const result: GenerationResult = { videoUrl, finalUrl: videoUrl };

        await this.deps.metadataRecorder.record(result, request.modelId, this.recordDetails(request, null));
        console.log(`[Orchestrator] [${requestId}] Completed: ${result.finalUrl}`);
        return result;
    }

    /**
     * Image + hosted speech track -> talking-head job -> record.
     * The caller owns the audio, so nothing is uploaded or rolled back.
     */
    async runWithSpeechTrack(request: SpeechTrackRequest): Promise<GenerationResult> {
        const requestId = newRequestId();
        const capability = this.deps.registry.get(TALKING_HEAD_MODEL_ID);
        if (!capability) {
            throw new ValidationRejectedError('unsupported model');
        }
        const owner = resolveUserStoragePrefix(request.userContext);
        console.log(`[Orchestrator] [${requestId}] Speech-track run on ${capability.modelId} for ${owner}`);

        const videoUrl = await this.runJob({
            modelId: capability.modelId,
            imageUrl: request.imageUrl,
            prompt: '',
            seconds: capability.defaultSeconds,
            resolution: capability.defaultResolution,
            proMode: false,
            audioUrl: request.audioUrl,
        });
        const result: GenerationResult = { audioUrl: request.audioUrl, videoUrl, finalUrl: videoUrl };

        await this.deps.metadataRecorder.record(result, capability.modelId, {
            imageUrl: request.imageUrl,
            prompt: '',
            resolution: capability.defaultResolution,
            durationSeconds: capability.defaultSeconds,
            ...(request.userContext ? { userId: request.userContext.id } : {}),
        });
        console.log(`[Orchestrator] [${requestId}] Completed: ${result.finalUrl}`);
        return result;
    }

    /**
     * Speech -> upload -> video job -> (mux -> upload) -> record.
     * Any failure after the first upload deletes everything this request uploaded.
     */
    async runSpeechAndVideo(request: GenerationRequest): Promise<GenerationResult> {
        const requestId = newRequestId();
        const speech = getSpeechInput(request);
        if (!speech) {
            throw new ValidationRejectedError('speech text and voice_id are required');
        }
        const plan = this.plan(request, true);
        console.log(`[Orchestrator] [${requestId}] Speech+video run on ${request.modelId} at ${request.resolution}`);

        const ledger = new RollbackLedger(this.deps.artifactStore, ` [${requestId}]`);
        try {
            return await this.speechAndVideo(requestId, request, speech, plan, ledger);
        } catch (error) {
            if (ledger.size > 0) {
                console.warn(`[Orchestrator] [${requestId}] Failed, rolling back ${ledger.size} artifact(s): ${describeError(error)}`);
                await ledger.rollback();
            }
            throw error;
        }
    }

    private async speechAndVideo(
        requestId: string,
        request: GenerationRequest,
        speech: SpeechInput,
        plan: ValidatedPlan,
        ledger: RollbackLedger
    ): Promise<GenerationResult> {
        const artifact = await this.deps.speechSynthesizer.synthesize(
            speech.text,
            speech.voiceId,
            this.settings.ttsOutputFormat
        );
        console.log(`[Orchestrator] [${requestId}] Speech synthesized (${artifact.sizeBytes} bytes)`);

        const audioKey = buildStorageKey(plan.storagePrefix, 'audio', extensionForContentType(artifact.contentType));
        ledger.track(this.deps.artifactStore.storagePathFor(audioKey));
        const audio = await this.deps.artifactStore.upload(artifact.bytes, audioKey, artifact.contentType);

        const videoUrl = await this.generateVideo(
            request,
            plan,
            plan.capability.requiresAudioInput ? audio.publicUrl : undefined
        );

        let finalUrl = videoUrl;
        let storageKey: string | null = null;
        if (plan.capability.outputEmbedsAudio) {
            console.log(`[Orchestrator] [${requestId}] ${request.modelId} output carries speech, skipping mux`);
        } else {
            const videoBytes = await this.deps.mediaDownloader.download(videoUrl);
            const audioBytes = await this.deps.mediaDownloader.download(audio.publicUrl);
            const muxed = await this.deps.muxer.mux(videoBytes, audioBytes, this.settings.ttsOutputFormat, this.settings.mux);

            const finalKey = buildStorageKey(plan.storagePrefix, 'videos', 'mp4');
            ledger.track(this.deps.artifactStore.storagePathFor(finalKey));
            const final = await this.deps.artifactStore.upload(muxed, finalKey, 'video/mp4');
            finalUrl = final.publicUrl;
            storageKey = final.storagePath;
        }

        const result: GenerationResult = { audioUrl: audio.publicUrl, videoUrl, finalUrl };
        await this.deps.metadataRecorder.record(result, request.modelId, this.recordDetails(request, storageKey));

        console.log(`[Orchestrator] [${requestId}] Completed: ${result.finalUrl}`);
        return result;
    }

    private plan(request: GenerationRequest, wantsAudio: boolean): ValidatedPlan {
        const validation = this.deps.registry.validate(request.modelId, wantsAudio, request.resolution);
        if (!validation.ok) {
            throw new ValidationRejectedError(validation.reason);
        }
        return {
            capability: validation.capability,
            proMode: validation.proMode,
            storagePrefix: resolveUserStoragePrefix(request.userContext),
        };
    }

    private async generateVideo(
        request: GenerationRequest,
        plan: ValidatedPlan,
        audioUrl: string | undefined
    ): Promise<string> {
        return this.runJob({
            modelId: request.modelId,
            imageUrl: request.imageUrl,
            prompt: request.prompt,
            seconds: request.seconds,
            resolution: request.resolution,
            proMode: plan.proMode,
            ...(audioUrl ? { audioUrl } : {}),
        });
    }

    private async runJob(jobRequest: VideoJobRequest): Promise<string> {
        const handle = await this.deps.videoJob.submit(jobRequest);
        return this.deps.videoJob.awaitCompletion(handle, this.settings.pollIntervalMs, this.settings.timeoutMs);
    }

    private recordDetails(request: GenerationRequest, storageKey: string | null): RecordDetails {
        return {
            imageUrl: request.imageUrl,
            prompt: request.prompt,
            resolution: request.resolution,
            durationSeconds: request.seconds,
            ...(request.userContext ? { userId: request.userContext.id } : {}),
            ...(request.speechText !== undefined ? { script: request.speechText } : {}),
            ...(request.voiceId !== undefined ? { voiceId: request.voiceId } : {}),
            ...(storageKey ? { storageKey } : {}),
        };
    }
}

function newRequestId(): string {
    return uuidv4().slice(0, 8);
}
