import { Request, Response } from 'express';
import { requireAuth } from '../../../../src/presentation/middleware/auth';
import { AppError, ForbiddenError, UnauthorizedError } from '../../../../src/presentation/middleware/errorHandler';

function requestWith(authorization?: string): Request {
    const req: Partial<Request> = {
        header: jest.fn((name: string) => (name.toLowerCase() === 'authorization' ? authorization : undefined)) as Request['header'],
    };
    return req as Request;
}

describe('requireAuth', () => {
    const res = {} as Response;

    test('lets every request through when disabled', () => {
        const next = jest.fn();
        requireAuth({ apiAuthEnabled: false, apiAuthToken: '' })(requestWith(), res, next);

        expect(next).toHaveBeenCalledWith();
    });

    test('fails closed when enabled without a token', () => {
        const next = jest.fn();
        requireAuth({ apiAuthEnabled: true, apiAuthToken: '' })(requestWith('Bearer test-secret'), res, next);

        const [err] = next.mock.calls[0];
        expect(err).toBeInstanceOf(AppError);
        expect(err.statusCode).toBe(500);
        expect(err.message).toBe('Server auth misconfigured');
    });

    test('rejects a missing bearer token with 401', () => {
        const next = jest.fn();
        requireAuth({ apiAuthEnabled: true, apiAuthToken: 'test-secret' })(requestWith('Basic abc'), res, next);

        expect(next.mock.calls[0][0]).toBeInstanceOf(UnauthorizedError);
        expect(next.mock.calls[0][0].message).toBe('Missing bearer token');
    });

    test('rejects a wrong token with 403', () => {
        const next = jest.fn();
        requireAuth({ apiAuthEnabled: true, apiAuthToken: 'test-secret' })(requestWith('Bearer wrong-secret'), res, next);

        expect(next.mock.calls[0][0]).toBeInstanceOf(ForbiddenError);
    });

    test('accepts the configured token case-insensitively on the scheme', () => {
        const next = jest.fn();
        requireAuth({ apiAuthEnabled: true, apiAuthToken: 'test-secret' })(requestWith('bearer test-secret'), res, next);

        expect(next).toHaveBeenCalledWith();
    });
});
