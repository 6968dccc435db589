import { Request, Response, NextFunction } from 'express';
import { GenerationError } from '../../domain/errors/GenerationErrors';

/**
 * Application-specific error with status code.
 */
export class AppError extends Error {
    constructor(
        public readonly statusCode: number,
        message: string
    ) {
        super(message);
        this.name = 'AppError';
    }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(404, message);
        this.name = 'NotFoundError';
    }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
    constructor(
        message: string = 'Bad request',
        public readonly details?: unknown
    ) {
        super(400, message);
        this.name = 'BadRequestError';
    }
}

/**
 * Unauthorized error (401).
 */
export class UnauthorizedError extends AppError {
    constructor(message: string = 'Unauthorized') {
        super(401, message);
        this.name = 'UnauthorizedError';
    }
}

/**
 * Forbidden error (403).
 */
export class ForbiddenError extends AppError {
    constructor(message: string = 'Forbidden') {
        super(403, message);
        this.name = 'ForbiddenError';
    }
}

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        fault?: string;
        details?: unknown;
    };
}

/**
 * HTTP status for a pipeline failure.
 * Caller faults are 400; provider faults split by whether retrying later could help.
 */
export function statusForGenerationError(err: GenerationError): number {
    switch (err.fault) {
        case 'caller':
            return 400;
        case 'internal':
            return 500;
        case 'provider':
            switch (err.code) {
                case 'JOB_TIMED_OUT':
                    return 504;
                case 'PROVIDER_UNAVAILABLE':
                case 'STORAGE_UNAVAILABLE':
                    return 503;
                default:
                    return 502;
            }
    }
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof NotFoundError || (err instanceof GenerationError && err.fault === 'caller')) {
        console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
    } else {
        console.error(`[ERROR] ${err.name}: ${err.message}`);
        if (err.stack) {
            console.error(err.stack);
        }
    }

    if (err instanceof GenerationError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.code,
                fault: err.fault,
                ...(err.detail !== undefined ? { details: err.detail } : {}),
            },
        };
        res.status(statusForGenerationError(err)).json(response);
        return;
    }

    if (err instanceof AppError) {
        const response: ErrorResponse = {
            error: {
                message: err.message,
                code: err.name,
                ...(err instanceof BadRequestError && err.details !== undefined ? { details: err.details } : {}),
            },
        };
        res.status(err.statusCode).json(response);
        return;
    }

    // Malformed JSON bodies rejected by express.json()
    if (err instanceof SyntaxError && 'body' in err) {
        const response: ErrorResponse = {
            error: {
                message: 'Malformed JSON body',
                code: 'BadRequestError',
            },
        };
        res.status(400).json(response);
        return;
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: 'INTERNAL_ERROR',
            fault: 'internal',
        },
    };
    res.status(500).json(response);
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
