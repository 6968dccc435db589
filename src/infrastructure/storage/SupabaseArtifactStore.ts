import axios from 'axios';
import { IArtifactStore } from '../../domain/ports/IArtifactStore';
import { StoredArtifact } from '../../domain/entities/Artifacts';
import {
    StorageAuthRejectedError,
    StorageUnavailableError,
    describeError,
} from '../../domain/errors/GenerationErrors';
import { extractProviderMessage } from '../http/ProviderErrors';

export interface SupabaseStorageOptions {
    /** Project URL, e.g. https://<project>.supabase.co */
    url: string;
    serviceRole: string;
    bucket: string;
    timeoutMs?: number;
}

function pathSegments(objectPath: string): string[] {
    return objectPath.split('/').filter((segment) => segment.length > 0);
}

function encodePath(objectPath: string): string {
    return pathSegments(objectPath).map(encodeURIComponent).join('/');
}

/**
 * Supabase Storage client: uploads bytes and returns public download URLs.
 */
export class SupabaseArtifactStore implements IArtifactStore {
    private readonly uploadBase: string;
    private readonly publicBase: string;
    private readonly serviceRole: string;
    private readonly bucket: string;
    private readonly timeoutMs: number;

    constructor(options: SupabaseStorageOptions) {
        if (!options.url || !options.serviceRole) {
            throw new Error('Supabase credentials are required (url, serviceRole)');
        }
        if (!options.bucket) {
            throw new Error('Supabase bucket is required');
        }
        const base = options.url.replace(/\/+$/, '');
        this.uploadBase = `${base}/storage/v1/object`;
        this.publicBase = `${base}/storage/v1/object/public`;
        this.serviceRole = options.serviceRole;
        this.bucket = options.bucket;
        this.timeoutMs = options.timeoutMs ?? 120000;
    }

    storagePathFor(logicalPath: string): string {
        return pathSegments(logicalPath).join('/');
    }

    async upload(bytes: Buffer, logicalPath: string, contentType: string): Promise<StoredArtifact> {
        const objectPath = encodePath(logicalPath);
        console.log(`[Supabase] Uploading ${bytes.byteLength} bytes to ${this.bucket}/${objectPath}`);

        try {
            await axios.post(`${this.uploadBase}/${this.bucket}/${objectPath}`, bytes, {
                headers: {
                    ...this.authHeaders(),
                    'Content-Type': contentType,
                    // Paths are unique per attempt; never replace an existing object
                    'x-upsert': 'false',
                },
                timeout: this.timeoutMs,
                maxBodyLength: Infinity,
            });
        } catch (error) {
            throw this.toStorageError('upload', error);
        }

        return {
            publicUrl: this.getPublicUrl(objectPath),
            storagePath: this.storagePathFor(logicalPath),
            contentType,
        };
    }

    async delete(storagePath: string): Promise<void> {
        const objectPath = encodePath(storagePath);
        try {
            await axios.delete(`${this.uploadBase}/${this.bucket}/${objectPath}`, {
                headers: this.authHeaders(),
                timeout: this.timeoutMs,
            });
            console.log(`[Supabase] Deleted ${this.bucket}/${objectPath}`);
        } catch (error) {
            // Already gone counts as deleted
            if (axios.isAxiosError(error) && error.response?.status === 404) {
                console.warn(`[Supabase] ${this.bucket}/${objectPath} was already deleted`);
                return;
            }
            throw this.toStorageError('delete', error);
        }
    }

    /**
     * Public URL; `download=1` forces the file body instead of an HTML preview.
     */
    getPublicUrl(objectPath: string): string {
        return `${this.publicBase}/${this.bucket}/${objectPath}?download=1`;
    }

    private authHeaders(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.serviceRole}`,
            apikey: this.serviceRole,
        };
    }

    private toStorageError(operation: 'upload' | 'delete', error: unknown): StorageAuthRejectedError | StorageUnavailableError {
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            const message = extractProviderMessage(error.response?.data) ?? error.message;
            if (status === 401 || status === 403) {
                return new StorageAuthRejectedError(`Supabase ${operation} failed (${status}): ${message}`);
            }
            return new StorageUnavailableError(`Supabase ${operation} failed${status ? ` (${status})` : ''}: ${message}`);
        }
        return new StorageUnavailableError(`Supabase ${operation} failed: ${describeError(error)}`);
    }
}
