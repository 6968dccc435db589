import { Router, Request, Response } from 'express';
import { MediaInspector } from '../../infrastructure/http/MediaInspector';
import { asyncHandler } from '../middleware/errorHandler';
import { ajv, parseBody } from './bodyValidation';

interface HeadBody {
    url: string;
}

const validateHead = ajv.compile<HeadBody>({
    type: 'object',
    properties: { url: { type: 'string', pattern: '^https?://' } },
    required: ['url'],
});

/**
 * Creates diagnostics routes for checking media URLs before a run.
 */
export function createDebugRoutes(inspector: MediaInspector): Router {
    const router = Router();

    /**
     * POST /debug/head
     *
     * Reports status, content type and size of a media URL as providers will see it.
     */
    router.post(
        '/debug/head',
        asyncHandler(async (req: Request, res: Response) => {
            const { url } = parseBody(validateHead, req.body);
            const info = await inspector.headInfo(url);

            res.json({
                status: info.status,
                content_type: info.contentType,
                bytes: info.bytes,
            });
        })
    );

    return router;
}
