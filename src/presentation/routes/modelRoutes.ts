import { Router, Request, Response } from 'express';
import { ModelCapability } from '../../domain/entities/ModelCapability';
import { ModelCapabilityRegistry } from '../../domain/services/ModelCapabilityRegistry';

function describeModel(capability: ModelCapability): Record<string, unknown> {
    return {
        provider: capability.provider,
        display_name: capability.displayName,
        requires_audio_input: capability.requiresAudioInput,
        supports_prompt_only: capability.supportsPromptOnly,
        output_embeds_audio: capability.outputEmbedsAudio,
        supported_resolutions: [...capability.supportedResolutions],
        default_resolution: capability.defaultResolution,
        default_seconds: capability.defaultSeconds,
        ...(capability.proModeThreshold ? { pro_mode_threshold: capability.proModeThreshold } : {}),
    };
}

/**
 * Creates the public model catalogue route.
 */
export function createModelRoutes(registry: ModelCapabilityRegistry): Router {
    const router = Router();

    /**
     * GET /models
     *
     * Lists every supported model and what it accepts.
     */
    router.get('/models', (req: Request, res: Response) => {
        const supportedModels: Record<string, unknown> = {};
        for (const capability of registry.list()) {
            supportedModels[capability.modelId] = describeModel(capability);
        }

        res.json({
            default_model: registry.getDefault().modelId,
            supported_models: supportedModels,
        });
    });

    return router;
}
