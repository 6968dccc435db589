import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { Config } from '../../config';
import { AppError, ForbiddenError, UnauthorizedError } from './errorHandler';

function tokensMatch(presented: string, expected: string): boolean {
    const a = Buffer.from(presented);
    const b = Buffer.from(expected);
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer-token guard for generation and debug routes.
 * Disabled auth lets every request through.
 */
export function requireAuth(config: Pick<Config, 'apiAuthEnabled' | 'apiAuthToken'>): RequestHandler {
    return (req: Request, _res: Response, next: NextFunction) => {
        if (!config.apiAuthEnabled) {
            next();
            return;
        }
        if (!config.apiAuthToken) {
            next(new AppError(500, 'Server auth misconfigured'));
            return;
        }

        const header = req.header('authorization') ?? '';
        const match = /^Bearer\s+(.+)$/i.exec(header.trim());
        if (!match) {
            next(new UnauthorizedError('Missing bearer token'));
            return;
        }
        if (!tokensMatch(match[1].trim(), config.apiAuthToken)) {
            next(new ForbiddenError('Invalid token'));
            return;
        }
        next();
    };
}
