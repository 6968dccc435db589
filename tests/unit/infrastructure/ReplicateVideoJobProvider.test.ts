const mockCreate = jest.fn();
const mockGet = jest.fn();

jest.mock('replicate', () =>
    jest.fn().mockImplementation(() => ({
        predictions: {
            create: (...args: unknown[]) => mockCreate(...args),
            get: (...args: unknown[]) => mockGet(...args),
        },
    }))
);

import {
    ReplicateVideoJobProvider,
    mapReplicateStatus,
} from '../../../src/infrastructure/video/ReplicateVideoJobProvider';
import { buildReplicateInput } from '../../../src/infrastructure/video/ReplicateModelInputs';
import { VideoJobRequest } from '../../../src/domain/ports/IVideoJobProvider';
import {
    ProviderRejectedError,
    ProviderUnavailableError,
} from '../../../src/domain/errors/GenerationErrors';

const request: VideoJobRequest = {
    modelId: 'minimax/hailuo-02',
    imageUrl: 'https://img.example/cat.png',
    prompt: 'a cat waves',
    seconds: 6,
    resolution: '768p',
    proMode: false,
};

function apiError(status: number, message: string): Error {
    return Object.assign(new Error(message), { response: { status } });
}

describe('ReplicateVideoJobProvider', () => {
    const provider = new ReplicateVideoJobProvider('test-secret');

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    it('requires an API token', () => {
        expect(() => new ReplicateVideoJobProvider('')).toThrow('REPLICATE_API_TOKEN is not configured');
    });

    describe('createJob', () => {
        it('creates a prediction with the model-specific input', async () => {
            mockCreate.mockResolvedValue({ id: 'pred-1', status: 'starting', output: null, error: null, logs: '' });

            const created = await provider.createJob(request);

            expect(mockCreate).toHaveBeenCalledWith({
                model: 'minimax/hailuo-02',
                input: {
                    prompt: 'a cat waves',
                    first_frame_image: 'https://img.example/cat.png',
                    duration: 6,
                    resolution: '768p',
                    prompt_optimizer: false,
                },
            });
            expect(created).toEqual({ providerJobId: 'pred-1', snapshot: { status: 'queued' } });
        });

        it('maps a 4xx to ProviderRejected', async () => {
            mockCreate.mockRejectedValue(apiError(422, 'Invalid input: duration must be 6 or 10'));

            const outcome = provider.createJob(request);

            await expect(outcome).rejects.toBeInstanceOf(ProviderRejectedError);
            await expect(outcome).rejects.toMatchObject({ status: 422, detail: 'Invalid input: duration must be 6 or 10' });
        });

        it('maps 5xx, 429 and network errors to ProviderUnavailable', async () => {
            mockCreate.mockRejectedValueOnce(apiError(503, 'Service Unavailable'));
            await expect(provider.createJob(request)).rejects.toBeInstanceOf(ProviderUnavailableError);

            mockCreate.mockRejectedValueOnce(apiError(429, 'Too Many Requests'));
            await expect(provider.createJob(request)).rejects.toBeInstanceOf(ProviderUnavailableError);

            mockCreate.mockRejectedValueOnce(new TypeError('fetch failed'));
            await expect(provider.createJob(request)).rejects.toThrow('Replicate is unavailable: fetch failed');
        });
    });

    describe('getJob', () => {
        it('reports a succeeded prediction with its output', async () => {
            mockGet.mockResolvedValue({
                id: 'pred-1',
                status: 'succeeded',
                output: ['https://replicate.delivery/out.mp4'],
                error: null,
                logs: 'done',
            });

            await expect(provider.getJob('pred-1')).resolves.toEqual({
                status: 'succeeded',
                output: ['https://replicate.delivery/out.mp4'],
                logs: 'done',
            });
            expect(mockGet).toHaveBeenCalledWith('pred-1');
        });

        it('carries the error and log tail of a failed prediction', async () => {
            const logs = `${'x'.repeat(2500)}END`;
            mockGet.mockResolvedValue({ id: 'pred-1', status: 'failed', output: null, error: 'CUDA out of memory', logs });

            const snapshot = await provider.getJob('pred-1');

            expect(snapshot.status).toBe('failed');
            expect(snapshot.error).toBe('CUDA out of memory');
            expect(snapshot.logs).toHaveLength(2000);
            expect(snapshot.logs?.endsWith('END')).toBe(true);
        });
    });
});

describe('mapReplicateStatus', () => {
    it('maps prediction states onto the job lifecycle', () => {
        jest.spyOn(console, 'warn').mockImplementation(() => { });

        expect(mapReplicateStatus('starting')).toBe('queued');
        expect(mapReplicateStatus('processing')).toBe('processing');
        expect(mapReplicateStatus('succeeded')).toBe('succeeded');
        expect(mapReplicateStatus('failed')).toBe('failed');
        expect(mapReplicateStatus('canceled')).toBe('canceled');
        expect(mapReplicateStatus('aborted')).toBe('canceled');
        expect(mapReplicateStatus('warming')).toBe('processing');
    });
});

describe('buildReplicateInput', () => {
    it('runs kling in pro mode at 16:9 when pro mode is set', () => {
        expect(buildReplicateInput({ ...request, modelId: 'kwaivgi/kling-v2.1', seconds: 5, resolution: '1080p', proMode: true }))
            .toEqual({
                prompt: 'a cat waves',
                start_image: 'https://img.example/cat.png',
                duration: 5,
                mode: 'pro',
                aspect_ratio: '16:9',
            });
    });

    it('runs kling in standard mode at 1:1 otherwise', () => {
        expect(buildReplicateInput({ ...request, modelId: 'kwaivgi/kling-v2.1', seconds: 5 }))
            .toMatchObject({ mode: 'standard', aspect_ratio: '1:1' });
    });

    it('passes resolution to seedance', () => {
        expect(buildReplicateInput({ ...request, modelId: 'bytedance/seedance-1-lite', seconds: 5, resolution: '480p' }))
            .toEqual({
                prompt: 'a cat waves',
                image: 'https://img.example/cat.png',
                duration: 5,
                resolution: '480p',
            });
    });

    it('forwards the audio URL to other models', () => {
        expect(buildReplicateInput({ ...request, modelId: 'acme/lipsync', audioUrl: 'https://store.example/a.mp3' }))
            .toMatchObject({ audio: 'https://store.example/a.mp3' });
    });
});
