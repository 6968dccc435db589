import { Router, Request, Response } from 'express';
import { GenerationOrchestrator } from '../../application/GenerationOrchestrator';
import { ModelCapabilityRegistry } from '../../domain/services/ModelCapabilityRegistry';
import {
    GenerationRequestInput,
    createGenerationRequest,
    createSpeechTrackRequest,
} from '../../domain/entities/GenerationRequest';
import { GenerationResult } from '../../domain/entities/Artifacts';
import { asyncHandler } from '../middleware/errorHandler';
import { ajv, parseBody } from './bodyValidation';

export interface VideoJobBody {
    image_url: string;
    prompt: string;
    seconds?: number;
    resolution?: string;
    model?: string;
    user_context?: { id: string };
}

export interface SpeechVideoJobBody extends VideoJobBody {
    text: string;
    voice_id: string;
}

export interface SpeechTrackJobBody {
    image_url: string;
    audio_url: string;
    user_context?: { id: string };
}

const userContextSchema = {
    type: 'object',
    properties: { id: { type: 'string' } },
    required: ['id'],
};

const videoJobProperties = {
    image_url: { type: 'string', minLength: 1 },
    prompt: { type: 'string', minLength: 1 },
    seconds: { type: 'integer', minimum: 0 },
    resolution: { type: 'string', minLength: 1 },
    model: { type: 'string', minLength: 1 },
    user_context: userContextSchema,
};

const videoJobSchema = {
    type: 'object',
    properties: videoJobProperties,
    required: ['image_url', 'prompt'],
};

const speechVideoJobSchema = {
    type: 'object',
    properties: {
        ...videoJobProperties,
        text: { type: 'string', minLength: 1 },
        voice_id: { type: 'string', minLength: 1 },
    },
    required: ['image_url', 'prompt', 'text', 'voice_id'],
};

const speechTrackJobSchema = {
    type: 'object',
    properties: {
        image_url: { type: 'string', pattern: '^https?://' },
        audio_url: { type: 'string', pattern: '^https?://' },
        user_context: userContextSchema,
    },
    required: ['image_url', 'audio_url'],
};

const validateVideoJob = ajv.compile<VideoJobBody>(videoJobSchema);
const validateSpeechVideoJob = ajv.compile<SpeechVideoJobBody>(speechVideoJobSchema);
const validateSpeechTrackJob = ajv.compile<SpeechTrackJobBody>(speechTrackJobSchema);

/**
 * Fills model, seconds and resolution from the capability table when the body omits them.
 */
export function toRequestInput(registry: ModelCapabilityRegistry, body: VideoJobBody): GenerationRequestInput {
    const modelId = body.model ?? registry.getDefault().modelId;
    const capability = registry.get(modelId) ?? registry.getDefault();

    return {
        imageUrl: body.image_url,
        prompt: body.prompt,
        seconds: body.seconds ?? capability.defaultSeconds,
        resolution: body.resolution ?? capability.defaultResolution,
        modelId,
        ...(body.user_context ? { userContext: { id: body.user_context.id } } : {}),
    };
}

function toResponse(result: GenerationResult): Record<string, string> {
    return {
        ...(result.audioUrl ? { audio_url: result.audioUrl } : {}),
        video_url: result.videoUrl,
        final_url: result.finalUrl,
    };
}

/**
 * Creates the synchronous generation routes.
 */
export function createGenerationRoutes(
    orchestrator: GenerationOrchestrator,
    registry: ModelCapabilityRegistry
): Router {
    const router = Router();

    /**
     * POST /jobs
     *
     * Image + hosted speech track to a talking-head clip.
     */
    router.post(
        '/jobs',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateSpeechTrackJob, req.body);
            const request = createSpeechTrackRequest({
                imageUrl: body.image_url,
                audioUrl: body.audio_url,
                ...(body.user_context ? { userContext: { id: body.user_context.id } } : {}),
            });

            const result = await orchestrator.runWithSpeechTrack(request);
            res.json(toResponse(result));
        })
    );

    /**
     * POST /jobs/video
     *
     * Image + prompt to video. Responds once the clip is generated and recorded.
     */
    router.post(
        '/jobs/video',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateVideoJob, req.body);
            const request = createGenerationRequest(toRequestInput(registry, body));

            const result = await orchestrator.runVideoOnly(request);
            res.json(toResponse(result));
        })
    );

    /**
     * POST /jobs/speech-video
     *
     * Image + prompt + script to a talking clip with its speech track.
     */
    router.post(
        '/jobs/speech-video',
        asyncHandler(async (req: Request, res: Response) => {
            const body = parseBody(validateSpeechVideoJob, req.body);
            const request = createGenerationRequest({
                ...toRequestInput(registry, body),
                speechText: body.text,
                voiceId: body.voice_id,
            });

            const result = await orchestrator.runSpeechAndVideo(request);
            res.json(toResponse(result));
        })
    );

    return router;
}
