import { ModelCapability, Resolution, isProModeResolution } from '../entities/ModelCapability';

/**
 * Outcome of a capability check.
 */
export type CapabilityValidation =
    | { ok: true; capability: ModelCapability; proMode: boolean }
    | { ok: false; reason: CapabilityRejection };

export type CapabilityRejection =
    | 'unsupported model'
    | 'model requires paired speech input'
    | 'unsupported resolution';

export const TALKING_HEAD_MODEL_ID = 'd-id/talks';

/**
 * Generation models this service can drive.
 */
export const DEFAULT_MODEL_CAPABILITIES: readonly ModelCapability[] = [
    {
        modelId: 'minimax/hailuo-02',
        provider: 'replicate',
        displayName: 'Hailuo 02',
        requiresAudioInput: false,
        supportsPromptOnly: true,
        outputEmbedsAudio: false,
        supportedResolutions: ['512p', '768p', '1080p'],
        defaultResolution: '768p',
        defaultSeconds: 6,
        isDefault: true,
    },
    {
        modelId: 'kwaivgi/kling-v2.1',
        provider: 'replicate',
        displayName: 'Kling v2.1',
        requiresAudioInput: false,
        supportsPromptOnly: true,
        outputEmbedsAudio: false,
        supportedResolutions: ['720p', '768p', '1080p'],
        defaultResolution: '768p',
        defaultSeconds: 5,
        proModeThreshold: '1080p',
        isDefault: false,
    },
    {
        modelId: 'bytedance/seedance-1-lite',
        provider: 'replicate',
        displayName: 'Seedance 1 Lite',
        requiresAudioInput: false,
        supportsPromptOnly: true,
        outputEmbedsAudio: false,
        supportedResolutions: ['480p', '720p', '1080p'],
        defaultResolution: '720p',
        defaultSeconds: 5,
        isDefault: false,
    },
    {
        modelId: TALKING_HEAD_MODEL_ID,
        provider: 'd-id',
        displayName: 'D-ID Talking Head',
        requiresAudioInput: true,
        supportsPromptOnly: false,
        outputEmbedsAudio: true,
        supportedResolutions: ['512p'],
        defaultResolution: '512p',
        // Clip length follows the speech track
        defaultSeconds: 0,
        isDefault: false,
    },
];

function deepFreeze(capability: ModelCapability): ModelCapability {
    Object.freeze(capability.supportedResolutions);
    return Object.freeze(capability);
}

/**
 * Immutable lookup table of model capabilities. Pure: no I/O, no mutation after construction.
 */
export class ModelCapabilityRegistry {
    private readonly byId: ReadonlyMap<string, ModelCapability>;
    private readonly defaultModel: ModelCapability;

    constructor(capabilities: readonly ModelCapability[] = DEFAULT_MODEL_CAPABILITIES) {
        const byId = new Map<string, ModelCapability>();
        for (const capability of capabilities) {
            if (byId.has(capability.modelId)) {
                throw new Error(`Duplicate model capability: ${capability.modelId}`);
            }
            byId.set(capability.modelId, deepFreeze({
                ...capability,
                supportedResolutions: [...capability.supportedResolutions],
            }));
        }

        const defaults = [...byId.values()].filter((capability) => capability.isDefault);
        if (defaults.length !== 1) {
            throw new Error(`Exactly one default model is required, found ${defaults.length}`);
        }

        this.byId = byId;
        this.defaultModel = defaults[0];
    }

    /**
     * Checks whether a model can serve a request.
     * Pro mode is derived from the requested resolution and cannot be set by callers.
     */
    validate(modelId: string, wantsAudio: boolean, resolution: Resolution): CapabilityValidation {
        const capability = this.byId.get(modelId);
        if (!capability) {
            return { ok: false, reason: 'unsupported model' };
        }
        if (!wantsAudio && (capability.requiresAudioInput || !capability.supportsPromptOnly)) {
            return { ok: false, reason: 'model requires paired speech input' };
        }
        if (!capability.supportedResolutions.includes(resolution)) {
            return { ok: false, reason: 'unsupported resolution' };
        }
        return {
            ok: true,
            capability,
            proMode: isProModeResolution(capability, resolution),
        };
    }

    get(modelId: string): ModelCapability | undefined {
        return this.byId.get(modelId);
    }

    getDefault(): ModelCapability {
        return this.defaultModel;
    }

    list(): ModelCapability[] {
        return [...this.byId.values()];
    }
}
