import {
    applyJobSnapshot,
    canonicalOutputUrl,
    createVideoJobHandle,
    isTerminalStatus,
} from '../../../src/domain/entities/VideoJob';

describe('VideoJob state machine', () => {
    it('starts queued', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02');
        expect(handle.status).toBe('queued');
        expect(handle.outputUrl).toBeUndefined();
    });

    it('moves queued -> processing -> succeeded and captures the output', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02');

        expect(applyJobSnapshot(handle, { status: 'processing' })).toBe(true);
        expect(applyJobSnapshot(handle, { status: 'succeeded', output: 'https://cdn.example/out.mp4' })).toBe(true);

        expect(handle.status).toBe('succeeded');
        expect(handle.outputUrl).toBe('https://cdn.example/out.mp4');
    });

    it('allows queued to settle directly', () => {
        const handle = createVideoJobHandle('job-1', 'd-id', 'd-id/talks');
        applyJobSnapshot(handle, { status: 'failed', error: 'face not detected' });

        expect(handle.status).toBe('failed');
        expect(handle.errorDetail).toBe('face not detected');
    });

    it('ignores a backwards move from processing to queued', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02', 'processing');

        expect(applyJobSnapshot(handle, { status: 'queued' })).toBe(false);
        expect(handle.status).toBe('processing');
    });

    it('never changes a terminal handle', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02');
        applyJobSnapshot(handle, { status: 'succeeded', output: 'https://cdn.example/a.mp4' });

        expect(applyJobSnapshot(handle, { status: 'failed', error: 'late' })).toBe(false);
        expect(handle.status).toBe('succeeded');
        expect(handle.outputUrl).toBe('https://cdn.example/a.mp4');
        expect(handle.errorDetail).toBeUndefined();
    });

    it('reports no change for a repeated status', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02', 'processing');
        expect(applyJobSnapshot(handle, { status: 'processing' })).toBe(false);
    });

    it('joins provider error and logs on failure', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02');
        applyJobSnapshot(handle, { status: 'canceled', error: 'stopped', logs: 'step 3/10' });

        expect(handle.errorDetail).toBe('stopped\nstep 3/10');
    });

    it('leaves errorDetail empty when the provider gives nothing', () => {
        const handle = createVideoJobHandle('job-1', 'replicate', 'minimax/hailuo-02');
        applyJobSnapshot(handle, { status: 'failed', error: '  ' });

        expect(handle.errorDetail).toBeUndefined();
    });

    it('classifies terminal states', () => {
        expect(isTerminalStatus('queued')).toBe(false);
        expect(isTerminalStatus('processing')).toBe(false);
        expect(isTerminalStatus('succeeded')).toBe(true);
        expect(isTerminalStatus('failed')).toBe(true);
        expect(isTerminalStatus('canceled')).toBe(true);
    });
});

describe('canonicalOutputUrl', () => {
    it('returns a string output as is', () => {
        expect(canonicalOutputUrl('https://cdn.example/a.mp4')).toBe('https://cdn.example/a.mp4');
    });

    it('takes the first non-empty entry of a list', () => {
        expect(canonicalOutputUrl(['', 'https://cdn.example/b.mp4', 'https://cdn.example/c.mp4']))
            .toBe('https://cdn.example/b.mp4');
    });

    it('returns undefined for missing or empty output', () => {
        expect(canonicalOutputUrl(undefined)).toBeUndefined();
        expect(canonicalOutputUrl('')).toBeUndefined();
        expect(canonicalOutputUrl([])).toBeUndefined();
    });
});
