import { v2 as cloudinary } from 'cloudinary';
import { IArtifactStore } from '../../domain/ports/IArtifactStore';
import { StoredArtifact } from '../../domain/entities/Artifacts';
import {
    StorageAuthRejectedError,
    StorageUnavailableError,
    describeError,
} from '../../domain/errors/GenerationErrors';

export interface CloudinaryStorageOptions {
    cloudName: string;
    apiKey: string;
    apiSecret: string;
}

type CloudinaryResourceType = 'image' | 'video' | 'raw';

/**
 * Cloudinary files audio under the 'video' resource type.
 */
export function resourceTypeFor(contentType: string): CloudinaryResourceType {
    if (contentType.startsWith('video/') || contentType.startsWith('audio/')) {
        return 'video';
    }
    if (contentType.startsWith('image/')) {
        return 'image';
    }
    return 'raw';
}

function stripExtension(logicalPath: string): string {
    return logicalPath.replace(/^\/+/, '').replace(/\.[^./]+$/, '');
}

function readHttpCode(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'http_code' in error) {
        const code: unknown = Reflect.get(error, 'http_code');
        return typeof code === 'number' ? code : undefined;
    }
    return undefined;
}

function readMessage(error: unknown): string {
    if (typeof error === 'object' && error !== null && 'message' in error) {
        const message: unknown = Reflect.get(error, 'message');
        if (typeof message === 'string') {
            return message;
        }
    }
    return describeError(error);
}

/**
 * Cloudinary-backed artifact store. Storage paths are Cloudinary public ids.
 */
export class CloudinaryArtifactStore implements IArtifactStore {
    constructor(options: CloudinaryStorageOptions) {
        if (!options.cloudName || !options.apiKey || !options.apiSecret) {
            throw new Error('Cloudinary credentials are required (cloudName, apiKey, apiSecret)');
        }

        cloudinary.config({
            cloud_name: options.cloudName,
            api_key: options.apiKey,
            api_secret: options.apiSecret,
            secure: true,
        });
    }

    storagePathFor(logicalPath: string): string {
        return stripExtension(logicalPath);
    }

    async upload(bytes: Buffer, logicalPath: string, contentType: string): Promise<StoredArtifact> {
        const publicId = this.storagePathFor(logicalPath);
        const dataUri = `data:${contentType};base64,${bytes.toString('base64')}`;
        console.log(`[Cloudinary] Uploading ${bytes.byteLength} bytes as ${publicId}`);

        try {
            const result = await cloudinary.uploader.upload(dataUri, {
                public_id: publicId,
                resource_type: resourceTypeFor(contentType),
                overwrite: false,
                unique_filename: false,
            });

            return {
                publicUrl: result.secure_url,
                storagePath: result.public_id,
                contentType,
            };
        } catch (error) {
            throw this.toStorageError('upload', error);
        }
    }

    async delete(storagePath: string): Promise<void> {
        let outcome: unknown;
        try {
            // Every artifact this pipeline stores is audio or video
            outcome = await cloudinary.uploader.destroy(storagePath, {
                resource_type: 'video',
                invalidate: true,
            });
        } catch (error) {
            throw this.toStorageError('delete', error);
        }

        const result: unknown = typeof outcome === 'object' && outcome !== null ? Reflect.get(outcome, 'result') : undefined;
        if (result === 'ok') {
            console.log(`[Cloudinary] Deleted ${storagePath}`);
            return;
        }
        if (result === 'not found') {
            console.warn(`[Cloudinary] ${storagePath} was already deleted`);
            return;
        }
        throw new StorageUnavailableError(`Cloudinary delete of ${storagePath} returned: ${String(result)}`);
    }

    private toStorageError(operation: 'upload' | 'delete', error: unknown): StorageAuthRejectedError | StorageUnavailableError {
        const httpCode = readHttpCode(error);
        const message = readMessage(error);
        if (httpCode === 401 || httpCode === 403) {
            return new StorageAuthRejectedError(`Cloudinary ${operation} failed (${httpCode}): ${message}`);
        }
        return new StorageUnavailableError(`Cloudinary ${operation} failed: ${message}`);
    }
}
