/**
 * Which external service runs the generation job for a model.
 */
export type VideoProviderName = 'replicate' | 'd-id';

/**
 * Output resolution label, e.g. "768p" or "1080p".
 */
export type Resolution = string;

/**
 * Static description of what a generation model can do.
 */
export interface ModelCapability {
    /** Provider-qualified model id, e.g. "minimax/hailuo-02" */
    modelId: string;
    provider: VideoProviderName;
    displayName: string;
    /** Model animates from a speech track (speech-to-video); unusable without speech */
    requiresAudioInput: boolean;
    /** Model accepts an image + prompt without any audio */
    supportsPromptOnly: boolean;
    /** Model output already carries the synchronized speech track, so no muxing is needed */
    outputEmbedsAudio: boolean;
    supportedResolutions: readonly Resolution[];
    /** Used when a request does not name a resolution */
    defaultResolution: Resolution;
    /** Used when a request does not name a clip length; providers receive any length unchanged */
    defaultSeconds: number;
    /** Requests at or above this resolution run in the provider's higher-fidelity mode */
    proModeThreshold?: Resolution;
    isDefault: boolean;
}

/**
 * Parses the vertical line count out of a resolution label ("1080p" -> 1080).
 * Returns null for labels that do not follow the `<n>p` form.
 */
export function resolutionLines(resolution: Resolution): number | null {
    const match = /^(\d+)p$/i.exec(resolution.trim());
    return match ? parseInt(match[1], 10) : null;
}

/**
 * Whether the requested resolution meets the model's pro-mode threshold.
 */
export function isProModeResolution(capability: ModelCapability, resolution: Resolution): boolean {
    if (!capability.proModeThreshold) {
        return false;
    }
    const requested = resolutionLines(resolution);
    const threshold = resolutionLines(capability.proModeThreshold);
    if (requested === null || threshold === null) {
        return false;
    }
    return requested >= threshold;
}
