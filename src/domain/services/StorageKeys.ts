import { v4 as uuidv4, validate as isUuid } from 'uuid';
import { UserContext } from '../entities/GenerationRequest';
import { ValidationRejectedError } from '../errors/GenerationErrors';

export const ANONYMOUS_PREFIX = 'anonymous';

/**
 * Storage prefix for a caller: "anonymous" without context, "users/<uuid>" otherwise.
 */
export function resolveUserStoragePrefix(userContext?: UserContext | null): string {
    if (!userContext) {
        return ANONYMOUS_PREFIX;
    }
    const id = userContext.id.trim();
    if (!isUuid(id)) {
        throw new ValidationRejectedError(`user_context.id must be a UUID, got: ${userContext.id}`);
    }
    return `users/${id.toLowerCase()}`;
}

/**
 * Builds a fresh object key under `prefix/folder`. Every call yields a new path,
 * so retried or concurrent uploads never collide.
 */
export function buildStorageKey(prefix: string, folder: string, extension: string): string {
    const cleanPrefix = prefix.replace(/^\/+|\/+$/g, '');
    const cleanFolder = folder.replace(/^\/+|\/+$/g, '');
    const cleanExtension = extension.replace(/^\.+/, '');
    return `${cleanPrefix}/${cleanFolder}/${uuidv4()}.${cleanExtension}`;
}
