import { ValidationRejectedError } from '../errors/GenerationErrors';
import { Resolution } from './ModelCapability';

/**
 * Authenticated caller scope forwarded by the HTTP layer.
 */
export interface UserContext {
    id: string;
}

/**
 * A validated, immutable request for one workflow run.
 */
export interface GenerationRequest {
    readonly imageUrl: string;
    readonly prompt: string;
    readonly seconds: number;
    readonly resolution: Resolution;
    readonly modelId: string;
    /** Speech script; always paired with voiceId */
    readonly speechText?: string;
    readonly voiceId?: string;
    readonly userContext?: UserContext;
}

export interface GenerationRequestInput {
    imageUrl: string;
    prompt: string;
    seconds: number;
    resolution: Resolution;
    modelId: string;
    speechText?: string;
    voiceId?: string;
    userContext?: UserContext;
}

/**
 * Speech fields narrowed to their present form.
 */
export interface SpeechInput {
    text: string;
    voiceId: string;
}

function isBlank(value: string | undefined): boolean {
    return value === undefined || value.trim().length === 0;
}

/**
 * Builds a frozen GenerationRequest.
 * Rejects partial speech input: speechText and voiceId come together or not at all.
 */
export function createGenerationRequest(input: GenerationRequestInput): GenerationRequest {
    if (isBlank(input.imageUrl)) {
        throw new ValidationRejectedError('image_url is required');
    }
    if (isBlank(input.prompt)) {
        throw new ValidationRejectedError('prompt is required');
    }
    if (!Number.isInteger(input.seconds) || input.seconds < 0) {
        throw new ValidationRejectedError(`seconds must be a non-negative integer, got: ${input.seconds}`);
    }

    const hasText = !isBlank(input.speechText);
    const hasVoice = !isBlank(input.voiceId);
    if (hasText !== hasVoice) {
        throw new ValidationRejectedError(
            hasText ? 'voice_id is required when speech text is provided' : 'speech text is required when voice_id is provided'
        );
    }

    const request: GenerationRequest = {
        imageUrl: input.imageUrl.trim(),
        prompt: input.prompt.trim(),
        seconds: input.seconds,
        resolution: input.resolution,
        modelId: input.modelId,
        ...(hasText ? { speechText: input.speechText, voiceId: input.voiceId } : {}),
        ...(input.userContext ? { userContext: Object.freeze({ ...input.userContext }) } : {}),
    };

    return Object.freeze(request);
}

/**
 * Returns the speech pair when the request carries one.
 */
export function getSpeechInput(request: GenerationRequest): SpeechInput | null {
    if (request.speechText !== undefined && request.voiceId !== undefined) {
        return { text: request.speechText, voiceId: request.voiceId };
    }
    return null;
}

export function wantsSpeech(request: GenerationRequest): boolean {
    return getSpeechInput(request) !== null;
}

/**
 * An image paired with an already-hosted speech track, animated by the talking-head model.
 */
export interface SpeechTrackRequest {
    readonly imageUrl: string;
    readonly audioUrl: string;
    readonly userContext?: UserContext;
}

export function createSpeechTrackRequest(input: SpeechTrackRequest): SpeechTrackRequest {
    if (isBlank(input.imageUrl)) {
        throw new ValidationRejectedError('image_url is required');
    }
    if (isBlank(input.audioUrl)) {
        throw new ValidationRejectedError('audio_url is required');
    }
    return Object.freeze({
        imageUrl: input.imageUrl.trim(),
        audioUrl: input.audioUrl.trim(),
        ...(input.userContext ? { userContext: Object.freeze({ ...input.userContext }) } : {}),
    });
}
