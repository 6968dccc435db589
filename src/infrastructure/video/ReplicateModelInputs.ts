import { VideoJobRequest } from '../../domain/ports/IVideoJobProvider';

/**
 * Builds the model-specific `input` object for a Replicate image-to-video prediction.
 * Each model names its image and mode parameters differently.
 */
export function buildReplicateInput(request: VideoJobRequest): Record<string, unknown> {
    switch (request.modelId) {
        case 'minimax/hailuo-02':
            return {
                prompt: request.prompt,
                first_frame_image: request.imageUrl,
                duration: request.seconds,
                resolution: request.resolution,
                prompt_optimizer: false,
            };
        case 'kwaivgi/kling-v2.1':
            // Kling has no resolution knob: 1080p output comes from pro mode
            return {
                prompt: request.prompt,
                start_image: request.imageUrl,
                duration: request.seconds,
                mode: request.proMode ? 'pro' : 'standard',
                aspect_ratio: request.proMode ? '16:9' : '1:1',
            };
        case 'bytedance/seedance-1-lite':
            return {
                prompt: request.prompt,
                image: request.imageUrl,
                duration: request.seconds,
                resolution: request.resolution,
            };
        default:
            return {
                prompt: request.prompt,
                image: request.imageUrl,
                duration: request.seconds,
                resolution: request.resolution,
                ...(request.audioUrl ? { audio: request.audioUrl } : {}),
            };
    }
}
