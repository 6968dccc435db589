import { VideoGenerationJob } from '../../../src/application/services/VideoGenerationJob';
import { ModelCapabilityRegistry } from '../../../src/domain/services/ModelCapabilityRegistry';
import { IVideoJobProvider, VideoJobRequest } from '../../../src/domain/ports/IVideoJobProvider';
import { VideoProviderName } from '../../../src/domain/entities/ModelCapability';
import {
    JobFailedError,
    JobTimedOutError,
    ProviderRejectedError,
    ProviderUnavailableError,
    ValidationRejectedError,
} from '../../../src/domain/errors/GenerationErrors';

function fakeProvider(name: VideoProviderName): jest.Mocked<IVideoJobProvider> {
    return {
        name,
        createJob: jest.fn(),
        getJob: jest.fn(),
    };
}

const hailuoRequest: VideoJobRequest = {
    modelId: 'minimax/hailuo-02',
    imageUrl: 'https://img.example/cat.png',
    prompt: 'a cat waves',
    seconds: 6,
    resolution: '768p',
    proMode: false,
};

describe('VideoGenerationJob', () => {
    let clock: number;
    let sleep: jest.Mock<Promise<void>, [number]>;
    let replicate: jest.Mocked<IVideoJobProvider>;
    let did: jest.Mocked<IVideoJobProvider>;
    let job: VideoGenerationJob;

    beforeEach(() => {
        clock = 0;
        sleep = jest.fn(async (ms: number) => {
            clock += ms;
        });
        replicate = fakeProvider('replicate');
        did = fakeProvider('d-id');
        job = new VideoGenerationJob([replicate, did], new ModelCapabilityRegistry(), {
            now: () => clock,
            sleep,
        });
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    describe('submit', () => {
        it('routes the request to the provider that serves the model', async () => {
            did.createJob.mockResolvedValue({ providerJobId: 'talk-1', snapshot: { status: 'queued' } });

            const handle = await job.submit({
                ...hailuoRequest,
                modelId: 'd-id/talks',
                resolution: '512p',
                audioUrl: 'https://store.example/a.mp3',
            });

            expect(did.createJob).toHaveBeenCalledTimes(1);
            expect(replicate.createJob).not.toHaveBeenCalled();
            expect(handle).toMatchObject({ providerJobId: 'talk-1', provider: 'd-id', modelId: 'd-id/talks', status: 'queued' });
        });

        it('applies the first observed state', async () => {
            replicate.createJob.mockResolvedValue({ providerJobId: 'pred-1', snapshot: { status: 'processing' } });

            const handle = await job.submit(hailuoRequest);
            expect(handle.status).toBe('processing');
        });

        it('surfaces provider errors before any handle exists', async () => {
            replicate.createJob.mockRejectedValue(new ProviderRejectedError('Replicate', 'Invalid token', 401));

            await expect(job.submit(hailuoRequest)).rejects.toThrow('Replicate rejected the request: Invalid token');
        });

        it('rejects models the registry does not know', async () => {
            await expect(job.submit({ ...hailuoRequest, modelId: 'acme/none' })).rejects.toThrow(ValidationRejectedError);
        });

        it('reports a missing provider as unavailable', async () => {
            const replicateOnly = new VideoGenerationJob([replicate], new ModelCapabilityRegistry());

            await expect(replicateOnly.submit({ ...hailuoRequest, modelId: 'd-id/talks' }))
                .rejects.toThrow('d-id is unavailable: provider is not configured');
        });
    });

    describe('awaitCompletion', () => {
        beforeEach(() => {
            replicate.createJob.mockResolvedValue({ providerJobId: 'pred-1', snapshot: { status: 'queued' } });
        });

        it('polls on the interval until the job succeeds', async () => {
            replicate.getJob
                .mockResolvedValueOnce({ status: 'processing' })
                .mockResolvedValueOnce({ status: 'succeeded', output: ['https://cdn.example/out.mp4'] });

            const handle = await job.submit(hailuoRequest);
            const url = await job.awaitCompletion(handle, 2000, 60000);

            expect(url).toBe('https://cdn.example/out.mp4');
            expect(replicate.getJob).toHaveBeenCalledTimes(2);
            expect(replicate.getJob).toHaveBeenCalledWith('pred-1');
            expect(sleep.mock.calls).toEqual([[2000], [2000]]);
        });

        it('returns without polling when the job already finished', async () => {
            replicate.createJob.mockResolvedValue({
                providerJobId: 'pred-2',
                snapshot: { status: 'succeeded', output: 'https://cdn.example/fast.mp4' },
            });

            const handle = await job.submit(hailuoRequest);

            await expect(job.awaitCompletion(handle, 2000, 60000)).resolves.toBe('https://cdn.example/fast.mp4');
            expect(replicate.getJob).not.toHaveBeenCalled();
            expect(sleep).not.toHaveBeenCalled();
        });

        it('clamps the last sleep to the deadline and times out without another poll', async () => {
            replicate.getJob.mockResolvedValue({ status: 'processing' });

            const handle = await job.submit(hailuoRequest);
            const outcome = job.awaitCompletion(handle, 1000, 3500);

            await expect(outcome).rejects.toBeInstanceOf(JobTimedOutError);
            await expect(outcome).rejects.toThrow('Video job pred-1 timed out after 3.5s (last status: processing)');
            expect(sleep.mock.calls).toEqual([[1000], [1000], [1000], [500]]);
            expect(replicate.getJob).toHaveBeenCalledTimes(3);
        });

        it('maps a failed job to JobFailedError with the provider detail', async () => {
            replicate.getJob.mockResolvedValue({ status: 'failed', error: 'NSFW content detected', logs: 'frame 12' });

            const handle = await job.submit(hailuoRequest);

            await expect(job.awaitCompletion(handle, 1000, 10000)).rejects.toMatchObject({
                code: 'JOB_FAILED',
                terminalStatus: 'failed',
                detail: 'NSFW content detected\nframe 12',
            });
        });

        it('maps a canceled job to JobFailedError', async () => {
            replicate.getJob.mockResolvedValue({ status: 'canceled' });

            const handle = await job.submit(hailuoRequest);
            const outcome = job.awaitCompletion(handle, 1000, 10000);

            await expect(outcome).rejects.toBeInstanceOf(JobFailedError);
            await expect(outcome).rejects.toThrow('Video job pred-1 canceled: no detail provided');
        });

        it('treats success without an output URL as a failure', async () => {
            replicate.getJob.mockResolvedValue({ status: 'succeeded', output: [] });

            const handle = await job.submit(hailuoRequest);

            await expect(job.awaitCompletion(handle, 1000, 10000))
                .rejects.toThrow('Video job pred-1 failed: job succeeded without an output URL');
        });

        it('retries a transient poll failure on the next tick', async () => {
            replicate.getJob
                .mockRejectedValueOnce(new ProviderUnavailableError('Replicate', 'HTTP 502: Bad Gateway'))
                .mockResolvedValueOnce({ status: 'succeeded', output: 'https://cdn.example/out.mp4' });

            const handle = await job.submit(hailuoRequest);

            await expect(job.awaitCompletion(handle, 1000, 10000)).resolves.toBe('https://cdn.example/out.mp4');
            expect(replicate.getJob).toHaveBeenCalledTimes(2);
        });

        it('surfaces a rejection on poll', async () => {
            replicate.getJob.mockRejectedValue(new ProviderRejectedError('Replicate', 'Prediction not found', 404));

            const handle = await job.submit(hailuoRequest);

            await expect(job.awaitCompletion(handle, 1000, 10000)).rejects.toBeInstanceOf(ProviderRejectedError);
            expect(replicate.getJob).toHaveBeenCalledTimes(1);
        });

        it('ignores a backwards status report while polling', async () => {
            replicate.getJob
                .mockResolvedValueOnce({ status: 'processing' })
                .mockResolvedValueOnce({ status: 'queued' })
                .mockResolvedValueOnce({ status: 'succeeded', output: 'https://cdn.example/out.mp4' });

            const handle = await job.submit(hailuoRequest);
            await job.awaitCompletion(handle, 1000, 10000);

            expect(handle.status).toBe('succeeded');
            expect(replicate.getJob).toHaveBeenCalledTimes(3);
        });
    });
});
